/**
 * Retry Orchestration
 *
 * Drives repeated generate -> evaluate cycles until an article passes the
 * quality gate or the retries run out, feeding each evaluation back into the
 * next generation call.
 */

import { resolveConfig } from './config.js';
import type { QualityConfigOverrides } from './config.js';
import { criticalIssueKind } from './critical.js';
import { RetryCancelledError } from './errors.js';
import { createStructuredLogger, logger as defaultLogger } from './logger.js';
import type { Logger, StructuredLogger } from './logger.js';
import { backoffDelay, INITIAL_RETRY_STATE, transition } from './retry-state.js';
import type { RetryState } from './retry-state.js';
import { EvaluationSchema } from './schema.js';
import type {
  CriticalIssueKind,
  Evaluation,
  EvaluationFunction,
  FinalStatus,
  GenerationOperation,
  QualityConfig,
  RetryAttempt,
  RetryContext,
  RetryFeedback,
  RetryOutcome,
  RetryPatternAnalysis,
  Trend,
  WordCountTrend,
} from './types.js';
import { IMPROVEMENT_THRESHOLDS } from './types.js';

// ============================================================================
// Types
// ============================================================================

export type Sleep = (ms: number) => Promise<void>;

export interface RetryHandlerOptions {
  config?: QualityConfig | QualityConfigOverrides;
  /** Replaces the real timer, e.g. with a recording fake in tests */
  sleep?: Sleep;
  logger?: Logger;
}

export interface ExecuteOptions {
  /** Context for logging (e.g., "Article generation") */
  readonly context?: string;
  /** Checked before every attempt; aborting abandons the loop */
  readonly signal?: AbortSignal;
}

/**
 * Sleeps for the specified duration.
 *
 * @example
 * await sleep(1000); // Wait 1 second
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Retry Handler
// ============================================================================

/**
 * One handler per workflow run is the simplest setup, but the loop state
 * lives inside each executeWithRetry call, so concurrent calls on the same
 * handler do not share history.
 */
export class RetryHandler {
  readonly config: QualityConfig;
  private readonly sleep: Sleep;
  private readonly log: StructuredLogger;

  constructor(options: RetryHandlerOptions = {}) {
    this.config = resolveConfig(options.config);
    this.sleep = options.sleep ?? sleep;
    this.log = createStructuredLogger('[Retry]', options.logger ?? defaultLogger);
  }

  /**
   * Runs `operation` until its evaluated result passes the quality gate.
   *
   * Each evaluation is parsed with EvaluationSchema. Errors from the
   * operation, the evaluation or that parse consume an attempt and are
   * re-thrown unchanged after the last one. A gate failure on the last
   * attempt is returned with `final_status: 'FAIL'`, never thrown.
   *
   * @example
   * const outcome = await handler.executeWithRetry(
   *   (input, retry) => generateArticle(input, retry),
   *   (article) => engine.evaluateArticle(article.text, 2000, 'knee arthroscopy'),
   *   { strategy, facts, context, patterns }
   * );
   */
  async executeWithRetry<TInput, TResult>(
    operation: GenerationOperation<TInput, TResult>,
    evaluate: EvaluationFunction<TResult>,
    input: TInput,
    options: ExecuteOptions = {}
  ): Promise<RetryOutcome<TResult>> {
    const { context = 'operation', signal } = options;
    const maxRetries = this.config.max_retries;
    const history: RetryAttempt[] = [];
    let state: RetryState = INITIAL_RETRY_STATE;

    while (state.status === 'ATTEMPTING') {
      const attempt = state.attempt;

      if (signal?.aborted) {
        throw new RetryCancelledError(context, attempt);
      }

      this.log.info(`${context} attempt ${attempt + 1}/${maxRetries + 1}`);

      const retry: RetryContext | undefined =
        attempt > 0 ? { retry_count: attempt, previous_evaluation: state.previous } : undefined;

      let settled: { result: TResult; evaluation: Evaluation };
      try {
        const result = await operation(input, retry);
        state = transition(state, { type: 'GENERATED' }, maxRetries);
        settled = { result, evaluation: EvaluationSchema.parse(await evaluate(result)) };
      } catch (error) {
        state = transition(state, { type: 'ERRORED', error }, maxRetries);
        if (state.status === 'FAILED') {
          this.log.warn(
            `${context} failed after ${maxRetries + 1} attempts: ${errorMessage(error)}`
          );
          throw error;
        }
        await this.backoff(context, attempt, `error: ${errorMessage(error)}`);
        continue;
      }

      const { result, evaluation } = settled;
      history.push({
        attempt,
        score: evaluation.total_score,
        passes: evaluation.passes_quality_gate,
        critical_issues: [...evaluation.critical_issues],
        word_count: evaluation.word_count_actual,
      });

      this.log.structured('info', {
        event: 'attempt_evaluated',
        context,
        attempt,
        score: evaluation.total_score,
        passes: evaluation.passes_quality_gate,
      });

      state = transition(state, { type: 'EVALUATED', evaluation }, maxRetries);

      if (state.status === 'SUCCEEDED') {
        this.log.info(`${context} passed on attempt ${attempt + 1}`);
        return this.outcome(result, evaluation, attempt, history, 'PASS');
      }
      if (state.status === 'EXHAUSTED') {
        this.log.warn(`${context} did not pass the quality gate after ${maxRetries + 1} attempts`);
        return this.outcome(result, evaluation, attempt, history, 'FAIL');
      }

      await this.backoff(context, attempt, `score ${evaluation.total_score}`);
    }

    throw new Error(`${context} ended in unexpected retry state ${state.status}`);
  }

  private async backoff(context: string, attempt: number, reason: string): Promise<void> {
    const delaySeconds = backoffDelay(attempt, this.config.retry_delays);
    this.log.info(`${context} retrying in ${delaySeconds}s (${reason})`);
    await this.sleep(delaySeconds * 1000);
  }

  private outcome<TResult>(
    result: TResult,
    evaluation: Evaluation,
    attempt: number,
    history: readonly RetryAttempt[],
    finalStatus: FinalStatus
  ): RetryOutcome<TResult> {
    return {
      result,
      evaluation,
      retry_count: attempt,
      retry_history: history,
      final_status: finalStatus,
    };
  }

  /**
   * Whether another generation is worth it. Passing articles, catastrophic
   * shortfalls and structurally broken generations are not retried.
   */
  shouldRetry(evaluation: Evaluation): boolean {
    if (evaluation.passes_quality_gate) {
      return false;
    }

    if (evaluation.word_count_deviation_percent < this.config.catastrophic_word_count_threshold) {
      this.log.info('Skipping retry due to critically low word count');
      return false;
    }

    if (evaluation.critical_issues.length > this.config.max_critical_issues_for_retry) {
      this.log.info('Skipping retry due to too many critical issues');
      return false;
    }

    return true;
  }

  generateRetryFeedback(evaluation: Evaluation): RetryFeedback {
    return {
      previous_score: evaluation.total_score,
      score_breakdown: { ...evaluation.score_breakdown },
      critical_issues: [...evaluation.critical_issues],
      improvements_needed: [...evaluation.improvements_needed],
      word_count_issue: evaluation.word_count_deviation_percent < this.config.word_count_fail_threshold,
      specific_instructions: this.generateSpecificInstructions(evaluation),
    };
  }

  private generateSpecificInstructions(evaluation: Evaluation): string[] {
    const instructions: string[] = [];
    const breakdown = evaluation.score_breakdown;

    if (breakdown.voice_consistency < IMPROVEMENT_THRESHOLDS.voice_consistency) {
      instructions.push(...SCORE_INSTRUCTIONS.voice_consistency);
    }
    if (breakdown.structure_quality < IMPROVEMENT_THRESHOLDS.structure_quality) {
      instructions.push(...SCORE_INSTRUCTIONS.structure_quality);
    }
    if (breakdown.domain_accuracy < IMPROVEMENT_THRESHOLDS.domain_accuracy) {
      instructions.push(...SCORE_INSTRUCTIONS.domain_accuracy);
    }
    if (breakdown.technical_seo < IMPROVEMENT_THRESHOLDS.technical_seo) {
      instructions.push(...SCORE_INSTRUCTIONS.technical_seo);
    }

    if (evaluation.word_count_deviation_percent < this.config.word_count_fail_threshold) {
      const wordsToAdd = Math.abs(
        Math.trunc((evaluation.word_count_deviation_percent * evaluation.word_count_target) / 100)
      );
      instructions.push(`CRITICAL: Increase content by approximately ${wordsToAdd} words`);
      instructions.push('Expand explanations and add more detail to the treatment sections');
    }

    for (const issue of evaluation.critical_issues) {
      const kind = criticalIssueKind(issue);
      if (kind !== undefined && kind !== 'word_count') {
        instructions.push(CRITICAL_INSTRUCTIONS[kind]);
      }
    }

    return instructions;
  }

  /**
   * Summarises how scores and issues evolved over one run's history.
   * Returns null for an empty history.
   */
  analyzeRetryPattern(history: readonly RetryAttempt[]): RetryPatternAnalysis | null {
    const first = history[0];
    const last = history[history.length - 1];
    if (first === undefined || last === undefined) {
      return null;
    }

    const scores = history.map((attempt) => attempt.score);
    const scoreTrend: Trend =
      last.score > first.score ? 'improving' : last.score < first.score ? 'declining' : 'stable';

    const issueFrequency = new Map<string, number>();
    for (const attempt of history) {
      for (const issue of attempt.critical_issues) {
        issueFrequency.set(issue, (issueFrequency.get(issue) ?? 0) + 1);
      }
    }
    const persistentIssues = [...issueFrequency]
      .filter(([, count]) => count > 1)
      .map(([issue]) => issue);

    const wordCountTrend: WordCountTrend =
      last.word_count > first.word_count
        ? 'increasing'
        : last.word_count < first.word_count
          ? 'decreasing'
          : 'stable';

    return {
      total_attempts: history.length,
      score_trend: scoreTrend,
      score_range: [Math.min(...scores), Math.max(...scores)],
      persistent_issues: persistentIssues,
      word_count_trend: wordCountTrend,
      final_score: last.score,
      recommendation: retryRecommendation(scoreTrend, persistentIssues),
    };
  }
}

// ============================================================================
// Instruction tables
// ============================================================================

const SCORE_INSTRUCTIONS = {
  voice_consistency: [
    "CRITICAL: Write only in the third person ('The surgeon performs'), never 'I' or 'my'",
    'Mention credentials only once, in the introduction',
  ],
  structure_quality: [
    'Follow the logical flow: Anatomy -> Symptoms -> Diagnosis -> Treatment -> Recovery',
    'Keep paragraphs to 2-3 sentences maximum',
    'Remove any repetitive content or redundant sections',
  ],
  domain_accuracy: [
    'Use outcome RANGES (75-85%) not exact percentages (80%)',
    "Include variability disclaimers: 'depends on', 'varies with'",
    "Explain technical terms in plain language: 'cartilage (the protective layer)'",
  ],
  technical_seo: [
    'Ensure the main keyword appears in the H1 title and the first paragraph',
    'Use proper markdown: # for H1, ## for H2, **bold** for emphasis',
    'Add bullet points and numbered lists where appropriate',
  ],
} as const;

const CRITICAL_INSTRUCTIONS: Readonly<Record<Exclude<CriticalIssueKind, 'word_count'>, string>> = {
  first_person: 'ELIMINATE ALL first-person references immediately',
  emotional_content: 'REMOVE all emotional content and personal stories',
  missing_variability: 'ADD variability disclaimers to all success rates and outcomes',
};

function retryRecommendation(trend: Trend, persistentIssues: readonly string[]): string {
  if (trend === 'improving' && persistentIssues.length <= 1) {
    return 'Continue with current approach - showing improvement';
  }
  if (trend === 'stable' && persistentIssues.length > 0) {
    return `Focus on resolving persistent issues: ${persistentIssues.slice(0, 2).join(', ')}`;
  }
  if (trend === 'declining') {
    return 'Consider fundamental approach change - quality declining';
  }
  return 'Standard retry approach - monitor for improvement';
}
