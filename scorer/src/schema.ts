/**
 * Zod schemas for article evaluation, rule definitions and retry records
 */

import { z } from 'zod';

// ============================================================================
// Score Schemas
// ============================================================================

export const ScoreBreakdownSchema = z.object({
  voice_consistency: z.number().int().min(0).max(25),
  structure_quality: z.number().int().min(0).max(25),
  domain_accuracy: z.number().int().min(0).max(30),
  technical_seo: z.number().int().min(0).max(20),
});

export const EvaluationSchema = z.object({
  total_score: z.number().int().min(0).max(100),
  score_breakdown: ScoreBreakdownSchema,

  // Word count analysis
  word_count_actual: z.number().int().min(0),
  word_count_target: z.number().int().min(0),
  word_count_deviation_percent: z.number(),

  // Quality assessment
  critical_issues: z.array(z.string()).readonly(),
  improvements_needed: z.array(z.string()).readonly(),
  passes_quality_gate: z.boolean(),

  // Retry information
  retry_count: z.number().int().min(0),
  previous_scores: z.array(z.number()).readonly().optional(),
});

// ============================================================================
// Rule Schemas (supplied by the caller's rule source)
// ============================================================================

export const PatternTypeSchema = z.enum([
  'voice',
  'structure',
  'domain-accuracy',
  'seo',
  'cultural',
]);

export const PatternSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  pattern_type: PatternTypeSchema,
  examples: z.array(z.string()),
  weight: z.number().int().positive().default(1),
  required: z.boolean().default(false),
});

export const AntiPatternSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  pattern_type: PatternTypeSchema,
  examples: z.array(z.string()),
  penalty_points: z.number().int().min(0),
  auto_fail: z.boolean().default(false),
});

// ============================================================================
// Validation Output
// ============================================================================

export const DetailedFeedbackSchema = z.object({
  content_length: z.number(),
  sections_found: z.number(),
  matched_pattern_count: z.number(),
  violation_count: z.number(),
  voice_analysis: z.object({
    first_person_usage: z.number(),
    third_person_usage: z.number(),
    voice_consistency: z.boolean(),
  }),
  structure_analysis: z.object({
    section_count: z.number(),
    paragraph_count: z.number(),
    average_paragraph_length: z.number(),
  }),
  domain_analysis: z.object({
    range_claims: z.number(),
    absolute_claims: z.number(),
    domain_terms: z.number(),
  }),
  auto_fail_violations: z.array(z.string()),
  missing_required_patterns: z.array(z.string()),
});

export const ValidationResultSchema = z.object({
  is_valid: z.boolean(),
  matched_patterns: z.array(z.string()),
  violated_antipatterns: z.array(z.string()),
  suggested_fixes: z.array(z.string()),
  validation_score: z.number().int().min(0).max(100),
  detailed_feedback: DetailedFeedbackSchema,
});

// ============================================================================
// Retry Records
// ============================================================================

export const RetryAttemptSchema = z.object({
  attempt: z.number().int().min(0),
  score: z.number(),
  passes: z.boolean(),
  critical_issues: z.array(z.string()).readonly(),
  word_count: z.number().int().min(0),
});

// ============================================================================
// CLI Request
// ============================================================================

export const EvaluationRequestSchema = z.object({
  text: z.string(),
  target_word_count: z.number().int().min(0),
  topic: z.string().default(''),
  retry_count: z.number().int().min(0).default(0),
  patterns: z.array(z.unknown()).optional(),
  anti_patterns: z.array(z.unknown()).optional(),
});

// ============================================================================
// Type exports (inferred from schemas)
// ============================================================================

export type ScoreBreakdown = z.infer<typeof ScoreBreakdownSchema>;
export type Evaluation = z.infer<typeof EvaluationSchema>;
export type PatternType = z.infer<typeof PatternTypeSchema>;
export type Pattern = z.infer<typeof PatternSchema>;
export type PatternInput = z.input<typeof PatternSchema>;
export type AntiPattern = z.infer<typeof AntiPatternSchema>;
export type AntiPatternInput = z.input<typeof AntiPatternSchema>;
export type DetailedFeedback = z.infer<typeof DetailedFeedbackSchema>;
export type ValidationResult = z.infer<typeof ValidationResultSchema>;
export type RetryAttempt = z.infer<typeof RetryAttemptSchema>;
export type EvaluationRequest = z.infer<typeof EvaluationRequestSchema>;
