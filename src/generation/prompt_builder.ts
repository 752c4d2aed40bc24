/**
 * Prompt Builder
 * ==============
 *
 * Renders a chunk and generation parameters into one instruction string with
 * a strict JSON output contract. Deterministic and side-effect free.
 */

import type { Chunk, Difficulty } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A section in a structured prompt.
 */
export interface PromptSection {
  title: string;
  content: string;
}

export interface PromptOptions {
  /**
   * Append the reinforcement instruction used when re-prompting after an
   * unusable response.
   */
  strict?: boolean;
}

// =============================================================================
// Content
// =============================================================================

export const DIFFICULTY_GUIDANCE: Readonly<Record<Difficulty, string>> = {
  easy: 'Ask about facts stated directly in the text. Distractors should be clearly wrong to a reader who understood the text.',
  medium:
    'Ask questions that require understanding relationships between ideas in the text. Distractors should be plausible but contradicted by the text.',
  hard: 'Ask questions that require inference, application or synthesis across several statements. Distractors should reflect common misconceptions.',
};

export const OUTPUT_CONTRACT = `Return ONLY a JSON array with this exact structure, no other text:
[
  {
    "question": "Question text here?",
    "options": ["Option A", "Option B", "Option C", "Option D"],
    "answer": 0,
    "explanation": "Brief explanation of why this is correct"
  }
]

The "answer" field must be the zero-based index (0-3) of the correct option.
Return ONLY the JSON array, no markdown, no code blocks, no additional text.`;

export const STRICT_SUFFIX = 'IMPORTANT: Return ONLY valid JSON array, nothing else.';

// =============================================================================
// Rendering
// =============================================================================

/**
 * Build a structured prompt with sections. Empty sections are omitted.
 */
export function buildStructuredPrompt(sections: PromptSection[]): string {
  return sections
    .filter((s) => s.content.trim().length > 0)
    .map((s) => `## ${s.title}\n\n${s.content}`)
    .join('\n\n');
}

function plural(count: number): string {
  return count === 1 ? 'question' : 'questions';
}

/**
 * Build the generation prompt for one chunk.
 */
export function buildPrompt(
  chunk: Chunk,
  difficulty: Difficulty,
  countHint: number,
  options: PromptOptions = {}
): string {
  const body = buildStructuredPrompt([
    {
      title: 'Task',
      content: `You are an expert educator creating multiple-choice questions.\nGiven the following text, generate ${countHint} multiple-choice ${plural(countHint)} at ${difficulty} difficulty level.`,
    },
    { title: 'Text', content: chunk.text },
    {
      title: 'Requirements',
      content: [
        `- Generate exactly ${countHint} ${plural(countHint)}`,
        `- Difficulty: ${difficulty}. ${DIFFICULTY_GUIDANCE[difficulty]}`,
        '- Each question must have exactly 4 distinct options',
        '- Exactly one option must be correct',
        '- Include a brief explanation for the correct answer',
        '- Use only information contained in the text',
      ].join('\n'),
    },
    { title: 'Output Format', content: OUTPUT_CONTRACT },
  ]);

  return options.strict ? `${body}\n\n${STRICT_SUFFIX}` : body;
}
