/**
 * Main scoring orchestrator
 * Runs the four category formulas, critical issue detection and the pass gate
 */

import { resolveConfig } from './config.js';
import type { QualityConfigOverrides } from './config.js';
import { applyCriticalPenalties, detectCriticalIssues, generateImprovements } from './critical.js';
import {
  scoreDomainAccuracy,
  scoreStructureQuality,
  scoreTechnicalSeo,
  scoreVoiceConsistency,
} from './formulas.js';
import { createStructuredLogger, logger as defaultLogger } from './logger.js';
import type { Logger, StructuredLogger } from './logger.js';
import { countWords, wordCountDeviation } from './text.js';
import type { Evaluation, QualityConfig, ScoreBreakdown } from './types.js';
import { DEFAULT_VOCABULARY } from './vocabulary.js';
import type { Vocabulary } from './vocabulary.js';

// ============================================================================
// Evaluation construction
// ============================================================================

export function calculateTotal(breakdown: ScoreBreakdown): number {
  return (
    breakdown.voice_consistency +
    breakdown.structure_quality +
    breakdown.domain_accuracy +
    breakdown.technical_seo
  );
}

/**
 * The quality gate: enough points, and not too short. Overage is not bounded.
 */
export function determinePassStatus(
  totalScore: number,
  deviationPercent: number,
  passThreshold: number,
  wordCountFailThreshold: number
): boolean {
  return totalScore >= passThreshold && deviationPercent > wordCountFailThreshold;
}

export interface EvaluationFields {
  total_score: number;
  score_breakdown: ScoreBreakdown;
  word_count_actual: number;
  word_count_target: number;
  critical_issues: readonly string[];
  improvements_needed: readonly string[];
  retry_count?: number;
  previous_scores?: readonly number[];
}

/**
 * Builds a frozen Evaluation. The deviation and the pass flag are derived
 * here, once.
 */
export function createEvaluation(
  fields: EvaluationFields,
  gate: Pick<QualityConfig, 'pass_threshold' | 'word_count_fail_threshold'>
): Evaluation {
  const deviation = wordCountDeviation(fields.word_count_actual, fields.word_count_target);

  const evaluation: Evaluation = {
    total_score: fields.total_score,
    score_breakdown: Object.freeze({ ...fields.score_breakdown }),
    word_count_actual: fields.word_count_actual,
    word_count_target: fields.word_count_target,
    word_count_deviation_percent: deviation,
    critical_issues: Object.freeze([...fields.critical_issues]),
    improvements_needed: Object.freeze([...fields.improvements_needed]),
    passes_quality_gate: determinePassStatus(
      fields.total_score,
      deviation,
      gate.pass_threshold,
      gate.word_count_fail_threshold
    ),
    retry_count: fields.retry_count ?? 0,
  };

  if (fields.previous_scores !== undefined) {
    evaluation.previous_scores = Object.freeze([...fields.previous_scores]);
  }

  return Object.freeze(evaluation);
}

// ============================================================================
// Scoring Engine
// ============================================================================

export interface ScoringEngineOptions {
  config?: QualityConfig | QualityConfigOverrides;
  vocabulary?: Vocabulary;
  logger?: Logger;
}

export class ScoringEngine {
  readonly config: QualityConfig;
  readonly vocabulary: Vocabulary;
  private readonly log: StructuredLogger;

  constructor(options: ScoringEngineOptions = {}) {
    this.config = resolveConfig(options.config);
    this.vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY;
    this.log = createStructuredLogger('[Scorer]', options.logger ?? defaultLogger);
  }

  /**
   * Scores an article across the four categories and applies the quality gate.
   * Never throws for empty or malformed text; missing signals simply cost points.
   */
  evaluateArticle(
    text: string,
    targetWordCount: number,
    topic: string,
    retryCount = 0,
    previousScores?: readonly number[]
  ): Evaluation {
    const actualWordCount = countWords(text);
    const deviation = wordCountDeviation(actualWordCount, targetWordCount);

    const breakdown: ScoreBreakdown = {
      voice_consistency: scoreVoiceConsistency(text, this.vocabulary),
      structure_quality: scoreStructureQuality(text, this.vocabulary),
      domain_accuracy: scoreDomainAccuracy(text, this.vocabulary),
      technical_seo: scoreTechnicalSeo(text, targetWordCount, topic),
    };

    const issues = detectCriticalIssues(
      text,
      deviation,
      this.config.word_count_fail_threshold,
      this.vocabulary
    );

    const totalScore = applyCriticalPenalties(
      calculateTotal(breakdown),
      issues,
      this.config.critical_penalties
    );

    const evaluation = createEvaluation(
      {
        total_score: totalScore,
        score_breakdown: breakdown,
        word_count_actual: actualWordCount,
        word_count_target: targetWordCount,
        critical_issues: issues.map((issue) => issue.message),
        improvements_needed: generateImprovements(breakdown, issues),
        retry_count: retryCount,
        previous_scores: previousScores,
      },
      this.config
    );

    this.log.structured('info', {
      event: 'evaluation_complete',
      message: `Article evaluation completed: ${totalScore}/100`,
      topic,
      passes: evaluation.passes_quality_gate,
      critical_issues: issues.length,
    });

    return evaluation;
  }
}
