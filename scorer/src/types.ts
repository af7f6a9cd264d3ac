/**
 * TypeScript type definitions for the quality gate
 */

import type { Evaluation, RetryAttempt, ValidationResult } from './schema.js';

// Re-export Zod-inferred types
export type {
  ScoreBreakdown,
  Evaluation,
  PatternType,
  Pattern,
  PatternInput,
  AntiPattern,
  AntiPatternInput,
  DetailedFeedback,
  ValidationResult,
  RetryAttempt,
  EvaluationRequest,
} from './schema.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface CriticalPenaltyConfig {
  first_person: number;
  emotional_content: number;
  missing_variability: number;
  word_count: number;
}

export interface QualityConfig {
  /** Minimum total score that passes the gate */
  pass_threshold: number;
  /** Deviation percent at or below which the article is too short */
  word_count_fail_threshold: number;
  /** Retries after the first attempt */
  max_retries: number;
  /** Backoff schedule in seconds; the last entry repeats */
  retry_delays: readonly number[];
  /** Deviation percent below which regeneration is not worth it */
  catastrophic_word_count_threshold: number;
  /** More critical issues than this means a broken generation */
  max_critical_issues_for_retry: number;
  critical_penalties: CriticalPenaltyConfig;
}

// ============================================================================
// Category Types
// ============================================================================

export type ScoreCategory = 'voice_consistency' | 'structure_quality' | 'domain_accuracy' | 'technical_seo';

export type CriticalIssueKind = 'first_person' | 'emotional_content' | 'missing_variability' | 'word_count';

export interface CriticalIssue {
  kind: CriticalIssueKind;
  message: string;
}

// ============================================================================
// Retry Types
// ============================================================================

export type FinalStatus = 'PASS' | 'FAIL';

/** Passed to the generation callback on every attempt after the first */
export interface RetryContext {
  retry_count: number;
  /** Last evaluation seen; null when every earlier attempt threw */
  previous_evaluation: Evaluation | null;
}

/** Default input of a generation callback */
export interface GenerationInput {
  strategy: unknown;
  facts: unknown;
  context: unknown;
  patterns: unknown;
}

export interface GeneratedArticle {
  text: string;
  word_count: number;
}

export type GenerationOperation<TInput, TResult> = (
  input: TInput,
  retry?: RetryContext
) => Promise<TResult>;

export type EvaluationFunction<TResult> = (result: TResult) => Evaluation | Promise<Evaluation>;

export interface RetryOutcome<TResult> {
  result: TResult;
  evaluation: Evaluation;
  retry_count: number;
  retry_history: readonly RetryAttempt[];
  final_status: FinalStatus;
}

export type Trend = 'improving' | 'declining' | 'stable';
export type WordCountTrend = 'increasing' | 'decreasing' | 'stable';

export interface RetryFeedback {
  previous_score: number;
  score_breakdown: Evaluation['score_breakdown'];
  critical_issues: readonly string[];
  improvements_needed: readonly string[];
  word_count_issue: boolean;
  specific_instructions: readonly string[];
}

export interface RetryPatternAnalysis {
  total_attempts: number;
  score_trend: Trend;
  score_range: readonly [number, number];
  persistent_issues: readonly string[];
  word_count_trend: WordCountTrend;
  final_score: number;
  recommendation: string;
}

// ============================================================================
// Combined Evaluation Types
// ============================================================================

export type FinalRecommendation = 'PUBLISH' | 'REVIEW' | 'RETRY' | 'MAJOR_REVISION';

export interface EvaluationSummary {
  ai_score: number;
  pattern_score: number;
  passes_ai_gate: boolean;
  passes_pattern_validation: boolean;
  critical_issues_count: number;
  pattern_violations_count: number;
}

export interface CombinedEvaluation {
  ai_evaluation: Evaluation;
  pattern_validation: ValidationResult;
  combined_score: number;
  final_recommendation: FinalRecommendation;
  recommendation_message: string;
  evaluation_summary: EvaluationSummary;
}

export interface QuickCheckResult {
  quick_score: number;
  word_count_actual: number;
  word_count_deviation: number;
  issues: string[];
  warnings: string[];
  passes_quick_check: boolean;
  structure_metrics: {
    h1_count: number;
    h2_count: number;
    paragraph_count: number;
  };
}

// ============================================================================
// Constants
// ============================================================================

export const SCORE_CATEGORIES: readonly ScoreCategory[] = [
  'voice_consistency',
  'structure_quality',
  'domain_accuracy',
  'technical_seo',
];

export const CRITICAL_ISSUE_KINDS: readonly CriticalIssueKind[] = [
  'first_person',
  'emotional_content',
  'missing_variability',
  'word_count',
];

export const CATEGORY_MAXIMUMS: Readonly<Record<ScoreCategory, number>> = {
  voice_consistency: 25,
  structure_quality: 25,
  domain_accuracy: 30,
  technical_seo: 20,
};

/** Sub-scores below these values trigger improvement suggestions */
export const IMPROVEMENT_THRESHOLDS: Readonly<Record<ScoreCategory, number>> = {
  voice_consistency: 20,
  structure_quality: 20,
  domain_accuracy: 24,
  technical_seo: 16,
};

export const DEFAULT_QUALITY_CONFIG: QualityConfig = {
  pass_threshold: 80,
  word_count_fail_threshold: -15.0,
  max_retries: 3,
  retry_delays: [1, 2, 4],
  catastrophic_word_count_threshold: -50,
  max_critical_issues_for_retry: 3,
  critical_penalties: {
    first_person: 10,
    emotional_content: 8,
    missing_variability: 8,
    word_count: 0,
  },
};
