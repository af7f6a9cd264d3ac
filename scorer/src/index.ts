/**
 * Public API of the article quality gate
 */

export { ScoringEngine, calculateTotal, createEvaluation, determinePassStatus } from './scorer.js';
export type { EvaluationFields, ScoringEngineOptions } from './scorer.js';

export {
  ContentValidator,
  HeuristicRuleMatcher,
  FIX_CODES,
  calculateValidationScore,
  suggestFixes,
} from './validator.js';
export type { ContentValidatorOptions, RuleMatcher } from './validator.js';

export { RetryHandler, sleep } from './retry.js';
export type { ExecuteOptions, RetryHandlerOptions, Sleep } from './retry.js';
export { INITIAL_RETRY_STATE, backoffDelay, isTerminal, transition } from './retry-state.js';
export type { RetryEvent, RetryState, TerminalState } from './retry-state.js';

export {
  RECOMMENDATION_MESSAGES,
  calculateCombinedScore,
  combineEvaluations,
  evaluateRequest,
  finalRecommendation,
  quickQualityCheck,
} from './combined.js';
export type { EvaluateRequestOptions, QuickCheckOptions } from './combined.js';

export { CRITICAL_ISSUE_MESSAGES, criticalIssueKind } from './critical.js';
export { QualityConfigSchema, loadConfigFromEnv, resolveConfig } from './config.js';
export type { QualityConfigOverrides } from './config.js';
export { ConfigValidationError, RetryCancelledError, RuleDefinitionError } from './errors.js';
export { createPrefixedLogger, createStructuredLogger, logger, silentLogger } from './logger.js';
export type { LogLevel, Logger, StructuredLogEntry, StructuredLogger } from './logger.js';
export { DEFAULT_VOCABULARY, VocabularySchema, createVocabulary, loadVocabulary } from './vocabulary.js';
export type { Vocabulary } from './vocabulary.js';
export * from './schema.js';
export {
  CATEGORY_MAXIMUMS,
  DEFAULT_QUALITY_CONFIG,
  IMPROVEMENT_THRESHOLDS,
  SCORE_CATEGORIES,
} from './types.js';
export type {
  CombinedEvaluation,
  CriticalIssue,
  CriticalIssueKind,
  CriticalPenaltyConfig,
  EvaluationFunction,
  EvaluationSummary,
  FinalRecommendation,
  FinalStatus,
  GeneratedArticle,
  GenerationInput,
  GenerationOperation,
  QualityConfig,
  QuickCheckResult,
  RetryContext,
  RetryFeedback,
  RetryOutcome,
  RetryPatternAnalysis,
  ScoreCategory,
  Trend,
  WordCountTrend,
} from './types.js';
