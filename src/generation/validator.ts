/**
 * Validator and Deduper
 * =====================
 *
 * Decides whether a parsed candidate joins the session's accepted set.
 *
 * Checks, in order:
 * 1. Structure: non-empty stem and explanation, exactly 4 distinct
 *    non-empty options, integer answer index in [0, 3]
 * 2. Exact duplicate of an accepted stem (after normalization)
 * 3. Near duplicate: token-set overlap at or above the similarity threshold
 *
 * Rejections are values, never errors.
 */

import { createHash } from 'node:crypto';
import type { AcceptDecision, QuestionCandidate, ValidatedQuestion } from './types.js';
import { normalizeStem, stemTokens } from '../utils/normalize.js';
import { tokenOverlap } from '../utils/similarity.js';
import type { MetricsCollector } from '../infra/metrics.js';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.8;

export interface AcceptOptions {
  chunk_index: number;
  /**
   * Overlap ratio in [0, 1] at or above which stems count as near duplicates.
   */
  similarity_threshold?: number;
  metrics?: MetricsCollector;
}

/**
 * First structural defect of a candidate, or null when it is well-formed.
 */
export function checkStructure(candidate: QuestionCandidate): string | null {
  if (candidate.stem.trim().length === 0) return 'empty stem';
  if (candidate.explanation.trim().length === 0) return 'empty explanation';
  if (candidate.options.length !== 4) return `expected 4 options, got ${candidate.options.length}`;
  if (candidate.options.some((option) => option.trim().length === 0)) return 'empty option';

  const distinct = new Set(candidate.options.map((option) => option.trim()));
  if (distinct.size !== 4) return 'duplicate options';

  const index = candidate.correct_option_index;
  if (!Number.isInteger(index) || index < 0 || index > 3) {
    return `answer index out of range: ${index}`;
  }
  return null;
}

/**
 * Content id derived from the normalized stem.
 */
export function questionId(normalizedStem: string): string {
  return `q_${createHash('sha256').update(normalizedStem, 'utf-8').digest('hex').slice(0, 16)}`;
}

/**
 * Validate a candidate against the questions accepted so far.
 */
export function acceptCandidate(
  candidate: QuestionCandidate,
  acceptedSoFar: readonly ValidatedQuestion[],
  options: AcceptOptions
): AcceptDecision {
  const decision = decide(candidate, acceptedSoFar, options);
  if (!decision.accepted) {
    options.metrics?.debug('Candidate rejected', {
      chunk_index: options.chunk_index,
      reason: decision.reason,
      detail: decision.detail,
    });
  }
  return decision;
}

function decide(
  candidate: QuestionCandidate,
  acceptedSoFar: readonly ValidatedQuestion[],
  options: AcceptOptions
): AcceptDecision {
  const defect = checkStructure(candidate);
  if (defect) {
    return { accepted: false, reason: 'structure', detail: defect };
  }

  const normalized = normalizeStem(candidate.stem);
  const tokens = stemTokens(normalized);
  const threshold = options.similarity_threshold ?? DEFAULT_SIMILARITY_THRESHOLD;

  for (const existing of acceptedSoFar) {
    const existingNormalized = normalizeStem(existing.stem);
    if (existingNormalized === normalized) {
      return { accepted: false, reason: 'duplicate', detail: `same stem as ${existing.id}` };
    }

    const overlap = tokenOverlap(tokens, stemTokens(existingNormalized));
    if (overlap >= threshold) {
      return {
        accepted: false,
        reason: 'near_duplicate',
        detail: `overlap ${overlap.toFixed(2)} with ${existing.id}`,
      };
    }
  }

  return {
    accepted: true,
    question: {
      id: questionId(normalized),
      stem: candidate.stem.trim(),
      options: candidate.options,
      correct_option_index: candidate.correct_option_index,
      explanation: candidate.explanation.trim(),
      chunk_index: options.chunk_index,
    },
  };
}
