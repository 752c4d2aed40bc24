/**
 * Response Parser
 * ===============
 *
 * Extracts question candidates from free-form model output. Never throws.
 *
 * Strategies, in order:
 * 1. json       - whole text or a fenced block parses as an array, a
 *                 `{ questions: [...] }` wrapper, a single record, or one
 *                 record per line
 * 2. fragments  - every balanced `{...}` object is parsed on its own
 * 3. plain_text - numbered stems, `A)`-`D)` options, `Answer:` and
 *                 `Explanation:` lines
 *
 * The first strategy that recognizes records decides the outcome. Records
 * with a missing field, a wrong option count, duplicate option text or an
 * unresolvable answer are dropped, never repaired.
 */

import type { OptionSet, ParseOutcome, ParseStrategy, QuestionCandidate } from './types.js';

// =============================================================================
// Field Aliases
// =============================================================================

const STEM_KEYS = ['question', 'stem'] as const;
const OPTION_KEYS = ['options', 'choices'] as const;
const ANSWER_KEYS = ['answer', 'correct_answer', 'correct_option_index', 'answer_index'] as const;
const EXPLANATION_KEYS = ['explanation'] as const;

const OPTION_LETTERS = ['A', 'B', 'C', 'D'] as const;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick(record: JsonRecord, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (record[key] !== undefined) return record[key];
  }
  return undefined;
}

function looksLikeQuestion(record: JsonRecord): boolean {
  return pick(record, STEM_KEYS) !== undefined || pick(record, OPTION_KEYS) !== undefined;
}

// =============================================================================
// Record Conversion
// =============================================================================

const LABELLED_OPTION = /^\(?([A-Da-d])[).:]\s+(.*)$/s;
const BARE_LETTER = /^\(?([A-Da-d])\)?[.:]?$/;

/**
 * Strip `A) `..`D) ` prefixes, but only when all four options carry them in order.
 */
function stripOptionLabels(options: string[]): string[] {
  const stripped: string[] = [];
  for (const [i, option] of options.entries()) {
    const match = LABELLED_OPTION.exec(option);
    if (!match || match[1]?.toUpperCase() !== OPTION_LETTERS[i]) return options;
    stripped.push((match[2] ?? '').trim());
  }
  return stripped;
}

function toOptionSet(value: unknown): OptionSet | null {
  if (!Array.isArray(value) || value.length !== 4) return null;

  const trimmed: string[] = [];
  for (const option of value) {
    if (typeof option !== 'string') return null;
    trimmed.push(option.trim());
  }

  const [a, b, c, d] = stripOptionLabels(trimmed);
  if (a === undefined || b === undefined || c === undefined || d === undefined) return null;
  if (new Set([a, b, c, d]).size !== 4) return null;

  return [a, b, c, d];
}

/**
 * Resolve an answer given as an index, a letter, or the text of an option.
 */
export function resolveAnswer(value: unknown, options: OptionSet): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 && value <= 3 ? value : null;
  }
  if (typeof value !== 'string') return null;

  const answer = value.trim();
  const index = options.indexOf(answer);
  if (index !== -1) return index;

  const letter = BARE_LETTER.exec(answer) ?? LABELLED_OPTION.exec(answer);
  if (!letter?.[1]) return null;
  const resolved = OPTION_LETTERS.findIndex((candidate) => candidate === letter[1]?.toUpperCase());

  // A letter followed by text must name the same option
  const text = letter[2]?.trim() ?? '';
  if (text.length > 0 && text.toLowerCase() !== options[resolved]?.toLowerCase()) return null;
  return resolved;
}

/**
 * Convert an untrusted record into a candidate; null when it must be dropped.
 */
export function toCandidate(record: JsonRecord): QuestionCandidate | null {
  const stem = pick(record, STEM_KEYS);
  const explanation = pick(record, EXPLANATION_KEYS);
  if (typeof stem !== 'string' || typeof explanation !== 'string') return null;

  const options = toOptionSet(pick(record, OPTION_KEYS));
  if (!options) return null;

  const correct_option_index = resolveAnswer(pick(record, ANSWER_KEYS), options);
  if (correct_option_index === null) return null;

  return {
    stem: stem.trim(),
    options,
    correct_option_index,
    explanation: explanation.trim(),
  };
}

interface Harvest {
  candidates: QuestionCandidate[];
  dropped: number;
}

function harvest(records: readonly unknown[]): Harvest {
  const candidates: QuestionCandidate[] = [];
  let dropped = 0;
  for (const record of records) {
    const candidate = isRecord(record) ? toCandidate(record) : null;
    if (candidate) {
      candidates.push(candidate);
    } else {
      dropped++;
    }
  }
  return { candidates, dropped };
}

// =============================================================================
// Strategy 1: Strict JSON
// =============================================================================

function tryParseJSON(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Question records held by a parsed JSON value; null when it holds none.
 */
function recordsOf(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value;
  if (!isRecord(value)) return null;

  const wrapped = value.questions ?? value.mcqs;
  if (Array.isArray(wrapped)) return wrapped;

  return looksLikeQuestion(value) ? [value] : null;
}

function parseLines(text: string): unknown[] | null {
  const lines = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (lines.length < 2) return null;

  const records: unknown[] = [];
  for (const line of lines) {
    const parsed = tryParseJSON(line);
    if (!parsed.ok || !isRecord(parsed.value)) return null;
    records.push(parsed.value);
  }
  return records;
}

/**
 * Bodies worth a strict parse: the whole text, then each fenced block.
 */
function jsonBodies(text: string): string[] {
  const bodies = [text];
  for (const match of text.matchAll(/```[a-zA-Z]*\s*([\s\S]*?)```/g)) {
    const body = match[1]?.trim();
    if (body) bodies.push(body);
  }
  return bodies;
}

function parseStrict(text: string): unknown[] | null {
  for (const body of jsonBodies(text)) {
    const parsed = tryParseJSON(body);
    const records = parsed.ok ? recordsOf(parsed.value) : parseLines(body);
    if (records) return records;
  }
  return null;
}

// =============================================================================
// Strategy 2: Fragment Scan
// =============================================================================

/**
 * End index (exclusive) of the balanced object opening at `start`, or -1.
 */
function balancedEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === '{') depth++;
    else if (char === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

/**
 * Question-like objects found anywhere in the text. An object that does not
 * parse, or is not question-like, is searched for nested objects instead.
 */
function scanFragments(text: string): JsonRecord[] {
  const records: JsonRecord[] = [];
  let cursor = text.indexOf('{');

  while (cursor !== -1) {
    const end = balancedEnd(text, cursor);
    if (end !== -1) {
      const parsed = tryParseJSON(text.slice(cursor, end));
      if (parsed.ok && isRecord(parsed.value) && looksLikeQuestion(parsed.value)) {
        records.push(parsed.value);
        cursor = text.indexOf('{', end);
        continue;
      }
    }
    cursor = text.indexOf('{', cursor + 1);
  }

  return records;
}

// =============================================================================
// Strategy 3: Plain Text
// =============================================================================

const STEM_LINE = /^(?:(?:q|question)\s*)?\d+\s*[.):-]\s*(.+)$/i;
const STEM_LABEL_LINE = /^question\s*:\s*(.+)$/i;
const OPTION_LINE = /^\(?([A-Da-d])[).:]\s+(.+)$/;
const ANSWER_LINE = /^(?:correct\s+)?answer\s*[:-]\s*(.+)$/i;
const EXPLANATION_LINE = /^explanation\s*[:-]\s*(.*)$/i;

/**
 * Drop markdown bold markers (`**x**`, `__x__`) so labels match.
 */
function stripEmphasis(line: string): string {
  return line
    .replace(/\*\*/g, '')
    .replace(/(^|\s)__(\S(?:.*?\S)?)__(?=\s|$)/g, '$1$2')
    .trim();
}

interface TextBlock {
  stem: string;
  options: string[];
  answer?: string;
  explanation?: string;
  field: 'stem' | 'options' | 'answer' | 'explanation';
}

function blockToRecord(block: TextBlock): JsonRecord {
  return {
    question: block.stem.trim(),
    options: block.options,
    answer: block.answer?.trim(),
    explanation: block.explanation,
  };
}

function parsePlainText(text: string): JsonRecord[] {
  const blocks: TextBlock[] = [];
  let block: TextBlock | undefined;

  for (const rawLine of text.split('\n')) {
    const line = stripEmphasis(rawLine);
    if (line.length === 0) continue;

    const answer = ANSWER_LINE.exec(line);
    const explanation = EXPLANATION_LINE.exec(line);
    const option = OPTION_LINE.exec(line);
    const stem = STEM_LINE.exec(line) ?? STEM_LABEL_LINE.exec(line);

    if (answer && block) {
      block.answer = answer[1] ?? '';
      block.field = 'answer';
    } else if (explanation && block) {
      block.explanation = explanation[1] ?? '';
      block.field = 'explanation';
    } else if (option && block && block.field !== 'explanation') {
      block.options.push(option[2] ?? '');
      block.field = 'options';
    } else if (stem) {
      block = { stem: stem[1] ?? '', options: [], field: 'stem' };
      blocks.push(block);
    } else if (block?.field === 'stem') {
      block.stem += ` ${line}`;
    } else if (block?.field === 'explanation') {
      block.explanation = `${block.explanation ?? ''} ${line}`.trim();
    }
  }

  return blocks.map(blockToRecord);
}

// =============================================================================
// Parser
// =============================================================================

function outcome(strategy: ParseStrategy, records: readonly unknown[]): ParseOutcome {
  const { candidates, dropped } = harvest(records);
  return candidates.length > 0
    ? { kind: 'candidates', strategy, candidates, dropped }
    : { kind: 'empty', dropped };
}

/**
 * Parse raw model output into question candidates.
 */
export function parseResponse(rawText: string): ParseOutcome {
  const text = rawText.replace(/\r\n?/g, '\n').trim();
  if (text.length === 0) {
    return { kind: 'empty', dropped: 0 };
  }

  const strict = parseStrict(text);
  if (strict) return outcome('json', strict);

  const fragments = scanFragments(text);
  if (fragments.length > 0) return outcome('fragments', fragments);

  return outcome('plain_text', parsePlainText(text));
}
