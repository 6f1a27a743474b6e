// ReviewFields.ts
// -----------------------------------------------------------------------------
// The fixed questionnaire the bot walks a user through.  The order of
// `FIELD_ORDER` is the order of the prompts, and every other module (summary,
// status report, edit menu) iterates it rather than hard-coding field names.
// -----------------------------------------------------------------------------

export const FIELD_ORDER = [
  'title',
  'labels',
  'poster',
  'rating',
  'review',
  'scenes',
  'youtube',
  'source_data',
] as const;

export type FieldName = (typeof FIELD_ORDER)[number];

/** Values collected so far.  A key is present only once its step was answered. */
export type FieldMap = Partial<Record<FieldName, string>>;

export const FIELD_PROMPTS: Record<FieldName, string> = {
  title: 'Please enter the movie title:',
  labels: 'Please enter labels (comma-separated):',
  poster: 'Please enter the poster image name (e.g., MovieName):',
  rating: 'Please enter the movie rating (e.g., 8.5):',
  review: 'Please enter your movie review:',
  scenes: 'Please enter scene numbers (comma-separated, e.g., 1,2,3,4):',
  youtube: 'Please enter the YouTube embed link:',
  source_data: 'Please enter source data (Year/Month/MovieCode, e.g., 2025/08/asd5tg):',
};

export function isFieldName(value: string): value is FieldName {
  return FIELD_ORDER.some((field) => field === value);
}

/** `source_data` → `Source Data` */
export function fieldLabel(field: FieldName): string {
  return field
    .split('_')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}
