/**
 * Shared article fixtures
 */

import { createEvaluation } from '../src/scorer.js';
import { DEFAULT_QUALITY_CONFIG } from '../src/types.js';
import type { Evaluation, ScoreBreakdown, ValidationResult } from '../src/types.js';

export const TOPIC = 'knee arthroscopy';

/** Scores full marks in every category when the target equals its word count */
export const GOOD_ARTICLE = `# Knee Arthroscopy: A Complete Guide

Knee arthroscopy is a minimally invasive surgical procedure for joint problems. The surgeon performs it through small incisions.

## Anatomy of the Knee

The knee joint contains cartilage (the protective layer on the bones). The meniscus (a shock-absorbing pad) sits between the bones.

## Symptoms

Common symptoms include pain and swelling. The patient may also notice stiffness.

## Treatment Options

The specialist recommends **clinical** assessment first. Options include:
- Physiotherapy
- Arthroscopic surgery

Success rates range from 75-85% for most patients. Recovery depends on age and varies with activity level.

## Recovery

Board-certified surgeons follow evidence-based protocols. Individual differences affect the timeline.`;

export const FIRST_PERSON_ARTICLE = GOOD_ARTICLE.replace(
  'The patient may also notice stiffness.',
  'In my experience the patient may also notice stiffness.'
);

export const LINE_START_FIRST_PERSON_ARTICLE = GOOD_ARTICLE.replace(
  'Common symptoms include pain and swelling.',
  'We see pain and swelling.'
);

export const NO_VARIABILITY_ARTICLE = GOOD_ARTICLE.replace(
  'Recovery depends on age and varies with activity level.',
  'Recovery takes several weeks for most people.'
).replace('Individual differences affect the timeline.', 'Rehabilitation follows a set timeline.');

export const ANECDOTAL_ARTICLE = GOOD_ARTICLE.replace(
  'Common symptoms include pain and swelling.',
  'Common symptoms include pain and feelings of instability.'
);

export const FULL_MARKS: ScoreBreakdown = {
  voice_consistency: 25,
  structure_quality: 25,
  domain_accuracy: 30,
  technical_seo: 20,
};

interface EvaluationFixture {
  total?: number;
  breakdown?: ScoreBreakdown;
  actual?: number;
  target?: number;
  issues?: readonly string[];
}

/**
 * Evaluation with the pass flag derived from the default gate.
 */
export function makeEvaluation(fixture: EvaluationFixture = {}): Evaluation {
  return createEvaluation(
    {
      total_score: fixture.total ?? 100,
      score_breakdown: fixture.breakdown ?? FULL_MARKS,
      word_count_actual: fixture.actual ?? 2000,
      word_count_target: fixture.target ?? 2000,
      critical_issues: fixture.issues ?? [],
      improvements_needed: [],
    },
    DEFAULT_QUALITY_CONFIG
  );
}

export function makeValidation(score: number, isValid: boolean, violated: string[] = []): ValidationResult {
  return {
    is_valid: isValid,
    matched_patterns: [],
    violated_antipatterns: violated,
    suggested_fixes: [],
    validation_score: score,
    detailed_feedback: {
      content_length: 0,
      sections_found: 0,
      matched_pattern_count: 0,
      violation_count: violated.length,
      voice_analysis: { first_person_usage: 0, third_person_usage: 0, voice_consistency: false },
      structure_analysis: { section_count: 0, paragraph_count: 0, average_paragraph_length: 0 },
      domain_analysis: { range_claims: 0, absolute_claims: 0, domain_terms: 0 },
      auto_fail_violations: [],
      missing_required_patterns: [],
    },
  };
}
