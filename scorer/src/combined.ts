/**
 * Combined verdicts
 *
 * Merges a ScoringEngine evaluation with a ContentValidator result into one
 * publish recommendation, and offers a quick structural check that skips the
 * full scorer.
 */

import type { QualityConfigOverrides } from './config.js';
import { hasFirstPersonVoice } from './formulas.js';
import { createPrefixedLogger, logger as defaultLogger } from './logger.js';
import type { Logger } from './logger.js';
import { ScoringEngine } from './scorer.js';
import { extractSections, splitParagraphs, wordCountDeviation } from './text.js';
import type {
  CombinedEvaluation,
  Evaluation,
  EvaluationRequest,
  FinalRecommendation,
  QualityConfig,
  QuickCheckResult,
  ValidationResult,
} from './types.js';
import { ContentValidator } from './validator.js';
import { DEFAULT_VOCABULARY } from './vocabulary.js';
import type { Vocabulary } from './vocabulary.js';

// ============================================================================
// Combined evaluation
// ============================================================================

const AI_WEIGHT = 0.7;
const PATTERN_WEIGHT = 0.3;
const INVALID_PATTERN_PENALTY = 10;

export const RECOMMENDATION_MESSAGES: Readonly<Record<FinalRecommendation, string>> = {
  PUBLISH: 'Article meets all quality standards',
  REVIEW: 'Good quality but minor improvements recommended',
  RETRY: 'Significant improvements needed',
  MAJOR_REVISION: 'Substantial rewrite required',
};

/**
 * 70% engine score, 30% pattern score, minus 10 when validation failed.
 */
export function calculateCombinedScore(evaluation: Evaluation, validation: ValidationResult): number {
  let combined = Math.floor(
    evaluation.total_score * AI_WEIGHT + validation.validation_score * PATTERN_WEIGHT
  );

  if (!validation.is_valid) {
    combined = Math.max(0, combined - INVALID_PATTERN_PENALTY);
  }

  return Math.min(100, combined);
}

export function finalRecommendation(
  evaluation: Evaluation,
  validation: ValidationResult
): FinalRecommendation {
  if (evaluation.passes_quality_gate && validation.is_valid) return 'PUBLISH';
  if (evaluation.total_score >= 70 && validation.is_valid) return 'REVIEW';
  if (evaluation.total_score >= 60) return 'RETRY';
  return 'MAJOR_REVISION';
}

export function combineEvaluations(
  evaluation: Evaluation,
  validation: ValidationResult
): CombinedEvaluation {
  const recommendation = finalRecommendation(evaluation, validation);

  return {
    ai_evaluation: evaluation,
    pattern_validation: validation,
    combined_score: calculateCombinedScore(evaluation, validation),
    final_recommendation: recommendation,
    recommendation_message: RECOMMENDATION_MESSAGES[recommendation],
    evaluation_summary: {
      ai_score: evaluation.total_score,
      pattern_score: validation.validation_score,
      passes_ai_gate: evaluation.passes_quality_gate,
      passes_pattern_validation: validation.is_valid,
      critical_issues_count: evaluation.critical_issues.length,
      pattern_violations_count: validation.violated_antipatterns.length,
    },
  };
}

export interface EvaluateRequestOptions {
  vocabulary?: Vocabulary;
  logger?: Logger;
}

/**
 * Scores one request. Rules, when present, add a validation pass and the
 * combined recommendation; otherwise the plain evaluation is returned.
 *
 * @throws RuleDefinitionError when a supplied rule is malformed
 */
export function evaluateRequest(
  request: EvaluationRequest,
  config?: QualityConfig | QualityConfigOverrides,
  options: EvaluateRequestOptions = {}
): Evaluation | CombinedEvaluation {
  const engine = new ScoringEngine({ config, ...options });
  const evaluation = engine.evaluateArticle(
    request.text,
    request.target_word_count,
    request.topic,
    request.retry_count
  );

  if (request.patterns === undefined && request.anti_patterns === undefined) {
    return evaluation;
  }

  const validator = new ContentValidator(request.patterns ?? [], request.anti_patterns ?? [], options);
  return combineEvaluations(evaluation, validator.validateContent(request.text));
}

// ============================================================================
// Quick check
// ============================================================================

export interface QuickCheckOptions {
  /** Text every article must contain, such as an author signature */
  requiredSignature?: string;
  vocabulary?: Vocabulary;
  logger?: Logger;
}

const QUICK_FAIL_DEVIATION = -15;
const QUICK_WARN_DEVIATION = -5;
const MIN_SECTIONS = 3;

/**
 * Fast structural checks for rapid feedback. Words are whitespace tokens,
 * markdown included, so the count runs slightly above the scorer's.
 */
export function quickQualityCheck(
  text: string,
  targetWordCount: number,
  options: QuickCheckOptions = {}
): QuickCheckResult {
  const vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY;
  const log = createPrefixedLogger('[QuickCheck]', options.logger ?? defaultLogger);

  const trimmed = text.trim();
  const actualWordCount = trimmed === '' ? 0 : trimmed.split(/\s+/).length;
  const deviation = wordCountDeviation(actualWordCount, targetWordCount);
  const hasH1 = text.startsWith('#');
  const h2Count = extractSections(text).length;

  const issues: string[] = [];
  const warnings: string[] = [];

  if (deviation < QUICK_FAIL_DEVIATION) {
    issues.push('Word count critically low');
  } else if (deviation < QUICK_WARN_DEVIATION) {
    warnings.push('Word count below target');
  }

  if (!hasH1) {
    issues.push('Missing H1 header');
  }

  if (h2Count < MIN_SECTIONS) {
    warnings.push('Few sections detected');
  }

  if (hasFirstPersonVoice(text, vocabulary)) {
    issues.push('First person usage detected');
  }

  if (options.requiredSignature !== undefined && !text.includes(options.requiredSignature)) {
    issues.push('Missing required signature');
  }

  const quickScore = Math.max(0, 100 - issues.length * 15 - warnings.length * 5);
  log.info(`Quick quality check completed: ${quickScore}/100`);

  return {
    quick_score: quickScore,
    word_count_actual: actualWordCount,
    word_count_deviation: deviation,
    issues,
    warnings,
    passes_quick_check: issues.length === 0,
    structure_metrics: {
      h1_count: hasH1 ? 1 : 0,
      h2_count: h2Count,
      paragraph_count: splitParagraphs(text).length,
    },
  };
}
