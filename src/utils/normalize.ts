/**
 * Text Normalization
 * ==================
 *
 * Deterministic normalization helpers shared by extraction and deduplication.
 *
 * Normalization steps for document text:
 * 1. Strip BOM if present
 * 2. Convert CRLF and lone CR → LF
 * 3. Normalize Unicode to NFC
 */

/**
 * UTF-8 BOM
 */
const UTF8_BOM = '\uFEFF';

/**
 * Normalize a string to canonical form.
 */
export function normalizeString(input: string): string {
  let result = input;

  if (result.startsWith(UTF8_BOM)) {
    result = result.slice(1);
  }

  result = result.replace(/\r\n/g, '\n');
  result = result.replace(/\r/g, '\n');

  return result.normalize('NFC');
}

/**
 * Decode bytes as UTF-8 and normalize.
 *
 * @throws TypeError if bytes are not valid UTF-8
 */
export function normalizeBytes(bytes: Uint8Array): string {
  const decoder = new TextDecoder('utf-8', { fatal: true });
  return normalizeString(decoder.decode(bytes));
}

/**
 * Collapse every whitespace run to a single space and trim.
 */
export function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, ' ').trim();
}

/**
 * Canonical form of a question stem for duplicate detection:
 * NFC, case-folded, whitespace-collapsed, trailing punctuation removed.
 */
export function normalizeStem(stem: string): string {
  return collapseWhitespace(stem.normalize('NFC').toLowerCase()).replace(/[\s?.!:;,]+$/u, '');
}

/**
 * Word tokens of a normalized stem (letters and digits only).
 */
export function stemTokens(normalizedStem: string): string[] {
  return normalizedStem.split(/[^\p{L}\p{N}]+/u).filter((token) => token.length > 0);
}
