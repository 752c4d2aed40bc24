/**
 * Prompt Builder Tests
 * ====================
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  buildPrompt,
  buildStructuredPrompt,
  DIFFICULTY_GUIDANCE,
  OUTPUT_CONTRACT,
  STRICT_SUFFIX,
} from '../prompt_builder.js';
import type { Chunk } from '../types.js';

const chunk: Chunk = {
  index: 0,
  start_offset: 0,
  end_offset: 52,
  text: 'Mitochondria produce most of the energy in the cell.',
};

describe('buildStructuredPrompt', () => {
  it('renders sections in order and skips empty ones', () => {
    const prompt = buildStructuredPrompt([
      { title: 'One', content: 'first' },
      { title: 'Empty', content: '   ' },
      { title: 'Two', content: 'second' },
    ]);

    assert.equal(prompt, '## One\n\nfirst\n\n## Two\n\nsecond');
  });
});

describe('buildPrompt', () => {
  it('embeds the chunk text, count hint and difficulty', () => {
    const prompt = buildPrompt(chunk, 'medium', 2);

    assert.ok(prompt.startsWith('## Task\n\n'));
    assert.ok(prompt.includes(`## Text\n\n${chunk.text}\n\n## Requirements`));
    assert.ok(prompt.includes('generate 2 multiple-choice questions at medium difficulty level.'));
    assert.ok(prompt.includes('- Generate exactly 2 questions'));
    assert.ok(prompt.includes(`- Difficulty: medium. ${DIFFICULTY_GUIDANCE.medium}`));
  });

  it('ends with the output contract', () => {
    const prompt = buildPrompt(chunk, 'easy', 3);
    assert.ok(prompt.endsWith(`## Output Format\n\n${OUTPUT_CONTRACT}`));
  });

  it('uses the singular for a hint of one', () => {
    const prompt = buildPrompt(chunk, 'hard', 1);

    assert.ok(prompt.includes('generate 1 multiple-choice question at hard difficulty level.'));
    assert.ok(prompt.includes('- Generate exactly 1 question\n'));
  });

  it('varies guidance by difficulty', () => {
    const easy = buildPrompt(chunk, 'easy', 2);
    const hard = buildPrompt(chunk, 'hard', 2);

    assert.ok(easy.includes(DIFFICULTY_GUIDANCE.easy));
    assert.ok(!easy.includes(DIFFICULTY_GUIDANCE.hard));
    assert.ok(hard.includes(DIFFICULTY_GUIDANCE.hard));
  });

  it('is deterministic', () => {
    assert.equal(buildPrompt(chunk, 'medium', 4), buildPrompt(chunk, 'medium', 4));
  });

  it('appends the reinforcement instruction only in strict mode', () => {
    const normal = buildPrompt(chunk, 'medium', 2);
    const strict = buildPrompt(chunk, 'medium', 2, { strict: true });

    assert.ok(!normal.includes(STRICT_SUFFIX));
    assert.equal(strict, `${normal}\n\n${STRICT_SUFFIX}`);
  });
});
