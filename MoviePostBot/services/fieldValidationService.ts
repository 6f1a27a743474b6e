import { FieldName } from '../models/ReviewFields';

export type ValidationResult =
  | { ok: true; value: string }
  | { ok: false; message: string };

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const VIDEO_HOSTS = ['youtube.com', 'youtu.be'];

export const SCENE_COUNT = 4;
export const SOURCE_DATA_SEGMENTS = 3;

/** Parses a plain decimal (optionally with exponent); `null` for anything else. */
export function parseRating(input: string): number | null {
  const trimmed = input.trim();
  if (!DECIMAL.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Checks one answer of the questionnaire.  The input is trimmed first and the
 * trimmed value is what gets stored.  Only the rules below are enforced;
 * everything else is free text.
 */
export function validateField(field: FieldName, input: string): ValidationResult {
  const value = input.trim();
  if (!value) {
    return { ok: false, message: '❌ Input cannot be empty. Please try again.' };
  }

  switch (field) {
    case 'rating': {
      const rating = parseRating(value);
      if (rating == null) {
        return { ok: false, message: '❌ Please enter a valid number for rating.' };
      }
      if (rating < 0 || rating > 10) {
        return { ok: false, message: '❌ Rating should be between 0 and 10. Please try again.' };
      }
      break;
    }
    case 'scenes':
      if (value.split(',').map((s) => s.trim()).length !== SCENE_COUNT) {
        return {
          ok: false,
          message: '❌ Please provide exactly 4 scene numbers separated by commas (e.g., 1,2,3,4).',
        };
      }
      break;
    case 'youtube':
      if (!VIDEO_HOSTS.some((host) => value.includes(host))) {
        return { ok: false, message: '❌ Please provide a valid YouTube link.' };
      }
      break;
    case 'source_data':
      if (value.split('/').length !== SOURCE_DATA_SEGMENTS) {
        return { ok: false, message: '❌ Please use the format: Year/Month/MovieCode (e.g., 2025/08/asd5tg)' };
      }
      break;
    default:
      break;
  }

  return { ok: true, value };
}
