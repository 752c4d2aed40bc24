/**
 * Chunk Planner
 * =============
 *
 * Splits source text into bounded chunks for the model's context window.
 *
 * Units, coarsest first:
 * 1. Paragraphs (separated by blank lines)
 * 2. Sentences (`.`, `!` or `?` followed by whitespace), only for paragraphs over the limit
 * 3. Hard cuts at the last whitespace inside the window, only for sentences over the limit
 *
 * Units are packed greedily. Chunk spans are contiguous and cover the source
 * exactly; whitespace between chunks belongs to the preceding span.
 */

import type { Chunk } from './types.js';
import { invalidInput } from './errors.js';

// =============================================================================
// Ranges
// =============================================================================

/**
 * Half-open character range into the source.
 */
interface Range {
  start: number;
  end: number;
}

const PARAGRAPH_SEPARATOR = /\n\s*\n/g;
const SENTENCE_SEPARATOR = /(?<=[.!?])\s+/g;

function isWhitespace(text: string, index: number): boolean {
  const char = text[index];
  return char !== undefined && /\s/.test(char);
}

/**
 * Shrink a range to its non-whitespace content; null when nothing remains.
 */
function trimRange(text: string, range: Range): Range | null {
  let { start, end } = range;
  while (start < end && isWhitespace(text, start)) start++;
  while (end > start && isWhitespace(text, end - 1)) end--;
  return start < end ? { start, end } : null;
}

/**
 * Split a range on a global separator pattern into trimmed, non-empty pieces.
 */
function splitRange(text: string, range: Range, separator: RegExp): Range[] {
  const pieces: Range[] = [];
  const pattern = new RegExp(separator.source, 'g');
  pattern.lastIndex = range.start;

  let cursor = range.start;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null && match.index < range.end) {
    const piece = trimRange(text, { start: cursor, end: match.index });
    if (piece) pieces.push(piece);
    cursor = match.index + match[0].length;
  }

  const tail = trimRange(text, { start: cursor, end: range.end });
  if (tail) pieces.push(tail);
  return pieces;
}

/**
 * Cut an over-long range into windows of at most `limit` characters,
 * breaking at the last whitespace inside each window where one exists.
 */
function hardCut(text: string, range: Range, limit: number): Range[] {
  const pieces: Range[] = [];
  let start = range.start;

  while (start < range.end) {
    if (range.end - start <= limit) {
      pieces.push({ start, end: range.end });
      break;
    }

    const windowEnd = start + limit;
    let cut = -1;
    for (let i = windowEnd; i > start; i--) {
      if (isWhitespace(text, i)) {
        cut = i;
        break;
      }
    }

    if (cut === -1) {
      cut = windowEnd;
      // Keep surrogate pairs intact; a pair wider than the window stays whole
      const code = text.charCodeAt(cut - 1);
      if (code >= 0xd800 && code <= 0xdbff) cut += cut - 1 > start ? -1 : 1;
    }

    const piece = trimRange(text, { start, end: cut });
    if (piece) pieces.push(piece);

    start = cut;
    while (start < range.end && isWhitespace(text, start)) start++;
  }

  return pieces;
}

/**
 * Break the source into units no longer than `limit`.
 */
function planUnits(text: string, limit: number): Range[] {
  const units: Range[] = [];

  for (const paragraph of splitRange(text, { start: 0, end: text.length }, PARAGRAPH_SEPARATOR)) {
    if (paragraph.end - paragraph.start <= limit) {
      units.push(paragraph);
      continue;
    }

    for (const sentence of splitRange(text, paragraph, SENTENCE_SEPARATOR)) {
      if (sentence.end - sentence.start <= limit) {
        units.push(sentence);
      } else {
        units.push(...hardCut(text, sentence, limit));
      }
    }
  }

  return units;
}

// =============================================================================
// Planning
// =============================================================================

/**
 * Plan the chunks of a source text.
 *
 * Pure: identical input yields identical boundaries.
 *
 * @throws GenerationError INVALID_INPUT when the text is blank or the limit is not a positive integer
 */
export function planChunks(sourceText: string, maxChunkChars: number): Chunk[] {
  if (!Number.isInteger(maxChunkChars) || maxChunkChars < 1) {
    throw invalidInput(`maxChunkChars must be a positive integer, got ${maxChunkChars}`, {
      max_chunk_chars: maxChunkChars,
    });
  }
  if (sourceText.trim().length === 0) {
    throw invalidInput('Source text is empty');
  }

  const packed: Range[] = [];
  let current: Range | null = null;

  for (const unit of planUnits(sourceText, maxChunkChars)) {
    if (current && unit.end - current.start <= maxChunkChars) {
      current.end = unit.end;
    } else {
      if (current) packed.push(current);
      current = { ...unit };
    }
  }
  if (current) packed.push(current);

  return packed.map((content, index) => {
    const next = packed[index + 1];
    return {
      index,
      start_offset: index === 0 ? 0 : content.start,
      end_offset: next ? next.start : sourceText.length,
      text: sourceText.slice(content.start, content.end),
    };
  });
}

/**
 * Reassemble the source from chunk spans.
 */
export function joinChunkSpans(sourceText: string, chunks: readonly Chunk[]): string {
  return chunks.map((chunk) => sourceText.slice(chunk.start_offset, chunk.end_offset)).join('');
}
