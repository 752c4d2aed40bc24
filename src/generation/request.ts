/**
 * Request validation. Runs before planning, so a rejected request never
 * reaches the model.
 */

import {
  DIFFICULTIES,
  MAX_REQUESTED_COUNT,
  MIN_REQUESTED_COUNT,
  type Difficulty,
  type GenerationRequest,
} from './types.js';
import { invalidInput } from './errors.js';

export function isDifficulty(value: unknown): value is Difficulty {
  return DIFFICULTIES.some((difficulty) => difficulty === value);
}

/**
 * @throws GenerationError INVALID_INPUT naming the offending field
 */
export function validateGenerationRequest(
  request: GenerationRequest,
  maxSourceChars: number
): GenerationRequest {
  const { source_text, requested_count, difficulty } = request;

  if (typeof source_text !== 'string' || source_text.trim().length === 0) {
    throw invalidInput('Source text is empty', { field: 'source_text' });
  }
  if (source_text.length > maxSourceChars) {
    throw invalidInput(`Source text exceeds ${maxSourceChars} characters`, {
      field: 'source_text',
      length: source_text.length,
      max_source_chars: maxSourceChars,
    });
  }
  if (
    !Number.isInteger(requested_count) ||
    requested_count < MIN_REQUESTED_COUNT ||
    requested_count > MAX_REQUESTED_COUNT
  ) {
    throw invalidInput(
      `requested_count must be an integer between ${MIN_REQUESTED_COUNT} and ${MAX_REQUESTED_COUNT}`,
      { field: 'requested_count', value: requested_count }
    );
  }
  if (!isDifficulty(difficulty)) {
    throw invalidInput(`difficulty must be one of ${DIFFICULTIES.join(', ')}`, {
      field: 'difficulty',
      value: difficulty,
    });
  }

  return request;
}
