/**
 * Validator and Deduper Tests
 * ===========================
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';

import { acceptCandidate, checkStructure } from '../validator.js';
import type { ValidatedQuestion } from '../types.js';
import { candidate, quietMetrics } from '../../tests/utils/questions.js';

function accepted(stem: string, chunk_index = 0): ValidatedQuestion {
  const decision = acceptCandidate(candidate({ stem }), [], { chunk_index });
  if (!decision.accepted) throw new Error(`fixture rejected: ${decision.detail}`);
  return decision.question;
}

describe('checkStructure', () => {
  it('passes a well-formed candidate', () => {
    assert.equal(checkStructure(candidate()), null);
  });

  it('names the first defect', () => {
    assert.equal(checkStructure(candidate({ stem: '  ' })), 'empty stem');
    assert.equal(checkStructure(candidate({ explanation: '' })), 'empty explanation');
    assert.equal(checkStructure(candidate({ options: ['A', '', 'C', 'D'] })), 'empty option');
    assert.equal(checkStructure(candidate({ options: ['A', 'B', 'A ', 'D'] })), 'duplicate options');
    assert.equal(checkStructure(candidate({ correct_option_index: 4 })), 'answer index out of range: 4');
    assert.equal(checkStructure(candidate({ correct_option_index: 1.5 })), 'answer index out of range: 1.5');
  });
});

describe('acceptCandidate', () => {
  it('accepts a candidate with a content id and its chunk index', () => {
    const decision = acceptCandidate(candidate(), [], { chunk_index: 3 });

    const expectedId =
      'q_' + createHash('sha256').update('what is the capital of france', 'utf-8').digest('hex').slice(0, 16);
    assert.deepEqual(decision, {
      accepted: true,
      question: { ...candidate(), id: expectedId, chunk_index: 3 },
    });
  });

  it('rejects structural defects', () => {
    const decision = acceptCandidate(candidate({ explanation: ' ' }), [], { chunk_index: 0 });
    assert.deepEqual(decision, { accepted: false, reason: 'structure', detail: 'empty explanation' });
  });

  it('rejects stems differing only by case and whitespace', () => {
    const first = accepted('What is  the Capital of France?');
    const decision = acceptCandidate(candidate({ stem: 'what is the capital   of france' }), [first], {
      chunk_index: 1,
    });

    assert.deepEqual(decision, {
      accepted: false,
      reason: 'duplicate',
      detail: `same stem as ${first.id}`,
    });
  });

  it('rejects near duplicates at the default threshold', () => {
    const first = accepted('What is the primary function of the mitochondria in a cell?');
    const decision = acceptCandidate(
      candidate({ stem: 'What is the primary function of the mitochondria in the cell?' }),
      [first],
      { chunk_index: 0 }
    );

    assert.deepEqual(decision, {
      accepted: false,
      reason: 'near_duplicate',
      detail: `overlap 0.90 with ${first.id}`,
    });
  });

  it('honours a configured threshold', () => {
    const first = accepted('Which gas do plants absorb during photosynthesis?');
    const next = candidate({ stem: 'Which gas do plants absorb in photosynthesis?' });

    assert.equal(acceptCandidate(next, [first], { chunk_index: 0 }).accepted, true);
    assert.equal(
      acceptCandidate(next, [first], { chunk_index: 0, similarity_threshold: 0.7 }).accepted,
      false
    );
  });

  it('logs rejections at debug level', () => {
    const metrics = quietMetrics();
    acceptCandidate(candidate({ correct_option_index: 7 }), [], { chunk_index: 2, metrics });

    const logs = metrics.getLogs('debug');
    assert.equal(logs.length, 1);
    assert.equal(logs[0]?.message, 'Candidate rejected');
    assert.deepEqual(logs[0]?.context, {
      chunk_index: 2,
      reason: 'structure',
      detail: 'answer index out of range: 7',
    });
  });
});
