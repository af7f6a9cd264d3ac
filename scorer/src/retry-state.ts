/**
 * Retry State Machine
 *
 * ATTEMPTING(i) -> EVALUATING(i) -> SUCCEEDED | EXHAUSTED | ATTEMPTING(i+1)
 * with FAILED reachable from either live state on an unrecovered error.
 *
 * The transition function is pure; RetryHandler performs the side effects
 * (generation, evaluation, sleeping) between transitions.
 */

import type { Evaluation } from './types.js';

// ============================================================================
// Types
// ============================================================================

export type RetryState =
  | { readonly status: 'ATTEMPTING'; readonly attempt: number; readonly previous: Evaluation | null }
  | { readonly status: 'EVALUATING'; readonly attempt: number; readonly previous: Evaluation | null }
  | { readonly status: 'SUCCEEDED'; readonly attempt: number; readonly evaluation: Evaluation }
  | { readonly status: 'EXHAUSTED'; readonly attempt: number; readonly evaluation: Evaluation }
  | { readonly status: 'FAILED'; readonly attempt: number; readonly error: unknown };

export type RetryEvent =
  | { readonly type: 'GENERATED' }
  | { readonly type: 'EVALUATED'; readonly evaluation: Evaluation }
  | { readonly type: 'ERRORED'; readonly error: unknown };

export type TerminalState = Extract<RetryState, { status: 'SUCCEEDED' | 'EXHAUSTED' | 'FAILED' }>;

export const INITIAL_RETRY_STATE: RetryState = { status: 'ATTEMPTING', attempt: 0, previous: null };

// ============================================================================
// Transitions
// ============================================================================

export function isTerminal(state: RetryState): state is TerminalState {
  return state.status === 'SUCCEEDED' || state.status === 'EXHAUSTED' || state.status === 'FAILED';
}

/**
 * Computes the next state. Events that do not apply to the current state
 * leave it unchanged.
 */
export function transition(state: RetryState, event: RetryEvent, maxRetries: number): RetryState {
  const lastAttempt = state.attempt >= maxRetries;

  switch (state.status) {
    case 'ATTEMPTING':
      if (event.type === 'GENERATED') {
        return { status: 'EVALUATING', attempt: state.attempt, previous: state.previous };
      }
      if (event.type === 'ERRORED') {
        return lastAttempt
          ? { status: 'FAILED', attempt: state.attempt, error: event.error }
          : { status: 'ATTEMPTING', attempt: state.attempt + 1, previous: state.previous };
      }
      return state;

    case 'EVALUATING':
      if (event.type === 'EVALUATED') {
        if (event.evaluation.passes_quality_gate) {
          return { status: 'SUCCEEDED', attempt: state.attempt, evaluation: event.evaluation };
        }
        return lastAttempt
          ? { status: 'EXHAUSTED', attempt: state.attempt, evaluation: event.evaluation }
          : { status: 'ATTEMPTING', attempt: state.attempt + 1, previous: event.evaluation };
      }
      if (event.type === 'ERRORED') {
        return lastAttempt
          ? { status: 'FAILED', attempt: state.attempt, error: event.error }
          : { status: 'ATTEMPTING', attempt: state.attempt + 1, previous: state.previous };
      }
      return state;

    case 'SUCCEEDED':
    case 'EXHAUSTED':
    case 'FAILED':
      return state;
  }
}

// ============================================================================
// Backoff
// ============================================================================

/**
 * Delay in seconds after a failed attempt; the last entry repeats.
 */
export function backoffDelay(attempt: number, retryDelays: readonly number[]): number {
  if (retryDelays.length === 0) {
    return 0;
  }
  return retryDelays[Math.min(attempt, retryDelays.length - 1)] ?? 0;
}
