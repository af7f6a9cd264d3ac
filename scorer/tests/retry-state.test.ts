/**
 * Tests for the retry state machine
 */

import { describe, it, expect } from 'vitest';

import { INITIAL_RETRY_STATE, backoffDelay, isTerminal, transition } from '../src/retry-state.js';
import type { RetryState } from '../src/retry-state.js';
import { makeEvaluation } from './fixtures.js';

const passing = makeEvaluation({ total: 90 });
const failing = makeEvaluation({ total: 60 });

describe('transition', () => {
  it('moves from attempting to evaluating once generated', () => {
    expect(transition(INITIAL_RETRY_STATE, { type: 'GENERATED' }, 3)).toEqual({
      status: 'EVALUATING',
      attempt: 0,
      previous: null,
    });
  });

  it('succeeds on a passing evaluation', () => {
    const evaluating: RetryState = { status: 'EVALUATING', attempt: 1, previous: failing };
    expect(transition(evaluating, { type: 'EVALUATED', evaluation: passing }, 3)).toEqual({
      status: 'SUCCEEDED',
      attempt: 1,
      evaluation: passing,
    });
  });

  it('retries a failing evaluation with it as the previous one', () => {
    const evaluating: RetryState = { status: 'EVALUATING', attempt: 0, previous: null };
    expect(transition(evaluating, { type: 'EVALUATED', evaluation: failing }, 3)).toEqual({
      status: 'ATTEMPTING',
      attempt: 1,
      previous: failing,
    });
  });

  it('is exhausted after a failing last attempt', () => {
    const evaluating: RetryState = { status: 'EVALUATING', attempt: 3, previous: failing };
    expect(transition(evaluating, { type: 'EVALUATED', evaluation: failing }, 3)).toEqual({
      status: 'EXHAUSTED',
      attempt: 3,
      evaluation: failing,
    });
  });

  it('keeps the previous evaluation across an error', () => {
    const error = new Error('provider timeout');
    const attempting: RetryState = { status: 'ATTEMPTING', attempt: 1, previous: failing };
    expect(transition(attempting, { type: 'ERRORED', error }, 3)).toEqual({
      status: 'ATTEMPTING',
      attempt: 2,
      previous: failing,
    });
  });

  it('fails on an error in the last attempt', () => {
    const error = new Error('provider timeout');
    const evaluating: RetryState = { status: 'EVALUATING', attempt: 0, previous: null };
    const next = transition(evaluating, { type: 'ERRORED', error }, 0);
    expect(next).toEqual({ status: 'FAILED', attempt: 0, error });
    expect(isTerminal(next)).toBe(true);
  });

  it('ignores events that do not apply', () => {
    expect(transition(INITIAL_RETRY_STATE, { type: 'EVALUATED', evaluation: passing }, 3)).toBe(
      INITIAL_RETRY_STATE
    );
    const done: RetryState = { status: 'SUCCEEDED', attempt: 0, evaluation: passing };
    expect(transition(done, { type: 'GENERATED' }, 3)).toBe(done);
    expect(isTerminal(INITIAL_RETRY_STATE)).toBe(false);
  });
});

describe('backoffDelay', () => {
  it('follows the schedule and repeats the last entry', () => {
    const delays = [1, 2, 4];
    expect([0, 1, 2, 3, 4].map((attempt) => backoffDelay(attempt, delays))).toEqual([1, 2, 4, 4, 4]);
  });

  it('is 0 for an empty schedule', () => {
    expect(backoffDelay(2, [])).toBe(0);
  });
});
