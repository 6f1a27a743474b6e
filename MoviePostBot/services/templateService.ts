import * as fs from 'fs';
import { FieldMap } from '../models/ReviewFields';
import { TemplateError, errorMessage } from '../errors';
import { SCENE_COUNT } from './fieldValidationService';

/**
 * Placeholder tokens the post template must contain, in substitution order.
 * Substitution is literal: every occurrence of a token is replaced.
 */
export const PLACEHOLDERS = {
  poster: '(1#Poster)',
  rating: '(2#Rating)',
  review: '(3#MovieReview)',
  youtube: '(5#YoutubeEmbedLink)',
  sourceData: '(6#Year/Month/MovieCode)',
  scenes: ['(4#Scene1)', '(4#Scene2)', '(4#Scene3)', '(4#Scene4)'],
} as const;

export const REQUIRED_PLACEHOLDERS: readonly string[] = [
  PLACEHOLDERS.poster,
  PLACEHOLDERS.rating,
  PLACEHOLDERS.review,
  ...PLACEHOLDERS.scenes,
  PLACEHOLDERS.youtube,
  PLACEHOLDERS.sourceData,
];

const DEFAULTS = {
  poster: 'DefaultPoster',
  rating: '0.0',
  review: 'No review available',
  scenes: '1,2,3,4',
  youtube: 'https://www.youtube.com/embed/dQw4w9WgXcQ',
  sourceData: '2025/01/default',
  scene: '1',
};

const EMBED_BASE = 'https://www.youtube.com/embed/';

export interface TemplateValidation {
  valid: boolean;
  missing: string[];
}

/**
 * Splits the comma-separated scene list, trims each entry and pads/truncates
 * it to exactly four entries.
 */
export function processScenes(input: string): string[] {
  const scenes = input.split(',').map((s) => s.trim());
  while (scenes.length < SCENE_COUNT) {
    scenes.push(DEFAULTS.scene);
  }
  return scenes.slice(0, SCENE_COUNT);
}

/**
 * Converts `watch?v=` and `youtu.be/` links to the embed form.  Embed links
 * and anything unrecognised are returned unchanged.
 */
export function toEmbedUrl(link: string): string {
  if (!link) return DEFAULTS.youtube;

  let videoId: string | undefined;
  if (link.includes('youtube.com/watch?v=')) {
    videoId = link.split('v=')[1].split('&')[0];
  } else if (link.includes('youtu.be/')) {
    videoId = link.split('youtu.be/')[1].split('?')[0];
  } else if (link.includes('youtube.com/embed/')) {
    return link;
  }

  if (!videoId) {
    console.warn(`[templateService] Could not extract video ID from: ${link}`);
    return link;
  }
  return `${EMBED_BASE}${videoId}`;
}

function orDefault(value: string | undefined, fallback: string): string {
  return value ? value : fallback;
}

export class TemplateService {
  private cached?: string;

  constructor(private readonly templatePath: string) {}

  /** Reads the template once; later calls reuse the cached document. */
  private load(): string {
    if (this.cached == null) {
      try {
        this.cached = fs.readFileSync(this.templatePath, 'utf8');
      } catch (err) {
        throw new TemplateError(`Cannot read template ${this.templatePath}: ${errorMessage(err)}`);
      }
    }
    return this.cached;
  }

  /**
   * Substitutes the collected fields into the template.  Never throws: a
   * template that cannot be read yields an inline error paragraph instead.
   */
  render(fields: FieldMap): string {
    let template: string;
    try {
      template = this.load();
    } catch (err) {
      console.error('[templateService] Error processing template', err);
      return `<p>Error processing template: ${errorMessage(err)}</p>`;
    }

    let html = template
      .split(PLACEHOLDERS.poster).join(orDefault(fields.poster, DEFAULTS.poster))
      .split(PLACEHOLDERS.rating).join(orDefault(fields.rating, DEFAULTS.rating))
      .split(PLACEHOLDERS.review).join(orDefault(fields.review, DEFAULTS.review))
      .split(PLACEHOLDERS.youtube).join(toEmbedUrl(fields.youtube ?? ''))
      .split(PLACEHOLDERS.sourceData).join(orDefault(fields.source_data, DEFAULTS.sourceData));

    processScenes(orDefault(fields.scenes, DEFAULTS.scenes)).forEach((scene, idx) => {
      html = html.split(PLACEHOLDERS.scenes[idx]).join(scene);
    });

    return html;
  }

  /** Reports which required placeholders the template lacks.  Never throws. */
  validateTemplate(): TemplateValidation {
    let content: string;
    try {
      content = fs.readFileSync(this.templatePath, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        console.error(`[templateService] Template file not found: ${this.templatePath}`);
        return { valid: false, missing: ['Template file not found'] };
      }
      console.error('[templateService] Error validating template', err);
      return { valid: false, missing: [errorMessage(err)] };
    }

    const missing = REQUIRED_PLACEHOLDERS.filter((token) => !content.includes(token));
    if (missing.length > 0) {
      console.warn('[templateService] Missing placeholders in template:', missing);
    }
    return { valid: missing.length === 0, missing };
  }
}
