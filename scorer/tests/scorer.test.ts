/**
 * Tests for the scoring engine
 * Includes smoke tests and fixture article tests
 */

import { describe, it, expect } from 'vitest';

import { CRITICAL_ISSUE_MESSAGES } from '../src/critical.js';
import { silentLogger } from '../src/logger.js';
import { ScoringEngine, createEvaluation, determinePassStatus } from '../src/scorer.js';
import { countWords } from '../src/text.js';
import { DEFAULT_QUALITY_CONFIG } from '../src/types.js';
import {
  ANECDOTAL_ARTICLE,
  FIRST_PERSON_ARTICLE,
  GOOD_ARTICLE,
  LINE_START_FIRST_PERSON_ARTICLE,
  NO_VARIABILITY_ARTICLE,
  TOPIC,
} from './fixtures.js';

const engine = new ScoringEngine({ logger: silentLogger });

// ============================================================================
// Smoke Tests: Basic validation
// ============================================================================

describe('Smoke Tests', () => {
  it('keeps every category within its range', () => {
    for (const text of [GOOD_ARTICLE, FIRST_PERSON_ARTICLE, '', 'plain words only']) {
      const { score_breakdown: b, total_score } = engine.evaluateArticle(text, 2000, TOPIC);
      expect(b.voice_consistency).toBeGreaterThanOrEqual(0);
      expect(b.voice_consistency).toBeLessThanOrEqual(25);
      expect(b.structure_quality).toBeGreaterThanOrEqual(0);
      expect(b.structure_quality).toBeLessThanOrEqual(25);
      expect(b.domain_accuracy).toBeGreaterThanOrEqual(0);
      expect(b.domain_accuracy).toBeLessThanOrEqual(30);
      expect(b.technical_seo).toBeGreaterThanOrEqual(0);
      expect(b.technical_seo).toBeLessThanOrEqual(20);
      expect(total_score).toBeGreaterThanOrEqual(0);
      expect(total_score).toBeLessThanOrEqual(100);
    }
  });

  it('returns the same evaluation for the same input', () => {
    const first = engine.evaluateArticle(GOOD_ARTICLE, 500, TOPIC);
    const second = engine.evaluateArticle(GOOD_ARTICLE, 500, TOPIC);
    expect(second).toEqual(first);
  });

  it('returns frozen evaluations', () => {
    const evaluation = engine.evaluateArticle(GOOD_ARTICLE, 500, TOPIC);
    expect(Object.isFrozen(evaluation)).toBe(true);
    expect(Object.isFrozen(evaluation.score_breakdown)).toBe(true);
    expect(Object.isFrozen(evaluation.critical_issues)).toBe(true);
  });

  it('records the retry count and previous scores', () => {
    const evaluation = engine.evaluateArticle(GOOD_ARTICLE, 500, TOPIC, 2, [61, 74]);
    expect(evaluation.retry_count).toBe(2);
    expect(evaluation.previous_scores).toEqual([61, 74]);
  });
});

// ============================================================================
// Pass gate
// ============================================================================

describe('Pass gate', () => {
  it('needs the threshold score and a deviation above the fail threshold', () => {
    expect(determinePassStatus(80, 0, 80, -15)).toBe(true);
    expect(determinePassStatus(79, 0, 80, -15)).toBe(false);
    expect(determinePassStatus(95, -15, 80, -15)).toBe(false);
    expect(determinePassStatus(95, -14.9, 80, -15)).toBe(true);
  });

  it('does not bound overage', () => {
    expect(determinePassStatus(90, 60, 80, -15)).toBe(true);
  });

  it('derives deviation and pass flag when building an evaluation', () => {
    const evaluation = createEvaluation(
      {
        total_score: 88,
        score_breakdown: {
          voice_consistency: 20,
          structure_quality: 22,
          domain_accuracy: 28,
          technical_seo: 18,
        },
        word_count_actual: 2100,
        word_count_target: 2000,
        critical_issues: [],
        improvements_needed: [],
      },
      DEFAULT_QUALITY_CONFIG
    );

    expect(evaluation.word_count_deviation_percent).toBeCloseTo(5);
    expect(evaluation.passes_quality_gate).toBe(true);
    expect(evaluation.retry_count).toBe(0);
    expect(evaluation.previous_scores).toBeUndefined();
  });

  it('fails a high-scoring article that is 20% short', () => {
    const evaluation = createEvaluation(
      {
        total_score: 92,
        score_breakdown: {
          voice_consistency: 25,
          structure_quality: 25,
          domain_accuracy: 28,
          technical_seo: 14,
        },
        word_count_actual: 800,
        word_count_target: 1000,
        critical_issues: [],
        improvements_needed: [],
      },
      DEFAULT_QUALITY_CONFIG
    );

    expect(evaluation.word_count_deviation_percent).toBeCloseTo(-20);
    expect(evaluation.passes_quality_gate).toBe(false);
  });

  it('honours a configured pass threshold', () => {
    const strict = new ScoringEngine({ config: { pass_threshold: 95 }, logger: silentLogger });
    const target = countWords(NO_VARIABILITY_ARTICLE);
    const evaluation = strict.evaluateArticle(NO_VARIABILITY_ARTICLE, target, TOPIC);
    expect(evaluation.total_score).toBe(88);
    expect(evaluation.passes_quality_gate).toBe(false);
  });
});

// ============================================================================
// Fixture Article Tests
// ============================================================================

describe('Fixture articles', () => {
  it('gives a well-formed article full marks', () => {
    const target = countWords(GOOD_ARTICLE);
    const evaluation = engine.evaluateArticle(GOOD_ARTICLE, target, TOPIC);

    expect(evaluation.score_breakdown).toEqual({
      voice_consistency: 25,
      structure_quality: 25,
      domain_accuracy: 30,
      technical_seo: 20,
    });
    expect(evaluation.total_score).toBe(100);
    expect(evaluation.word_count_deviation_percent).toBe(0);
    expect(evaluation.critical_issues).toEqual([]);
    expect(evaluation.improvements_needed).toEqual([]);
    expect(evaluation.passes_quality_gate).toBe(true);
  });

  it('penalises first-person voice in the category and again as a critical issue', () => {
    const target = countWords(FIRST_PERSON_ARTICLE);
    const evaluation = engine.evaluateArticle(FIRST_PERSON_ARTICLE, target, TOPIC);

    expect(evaluation.score_breakdown.voice_consistency).toBe(15);
    expect(evaluation.critical_issues).toEqual([CRITICAL_ISSUE_MESSAGES.first_person]);
    expect(evaluation.total_score).toBe(80);
    expect(evaluation.passes_quality_gate).toBe(true);
    expect(evaluation.improvements_needed).toEqual([
      'Write consistently in the third person throughout',
      'Remove any first-person references (I, my, we, our)',
      'Rewrite every first-person sentence in the third person',
    ]);
  });

  it('flags first person at the start of a line', () => {
    const target = countWords(LINE_START_FIRST_PERSON_ARTICLE);
    const evaluation = engine.evaluateArticle(LINE_START_FIRST_PERSON_ARTICLE, target, TOPIC);

    expect(evaluation.score_breakdown.voice_consistency).toBe(15);
    expect(evaluation.critical_issues).toEqual([CRITICAL_ISSUE_MESSAGES.first_person]);
    expect(evaluation.total_score).toBe(80);
  });

  it('flags missing variability disclaimers', () => {
    const target = countWords(NO_VARIABILITY_ARTICLE);
    const evaluation = engine.evaluateArticle(NO_VARIABILITY_ARTICLE, target, TOPIC);

    expect(evaluation.score_breakdown.domain_accuracy).toBe(26);
    expect(evaluation.critical_issues).toEqual([CRITICAL_ISSUE_MESSAGES.missing_variability]);
    expect(evaluation.total_score).toBe(88);
    expect(evaluation.improvements_needed).toEqual([
      'State that outcomes vary and depend on the individual case',
    ]);
  });

  it('flags anecdotal content', () => {
    const target = countWords(ANECDOTAL_ARTICLE);
    const evaluation = engine.evaluateArticle(ANECDOTAL_ARTICLE, target, TOPIC);

    expect(evaluation.score_breakdown.voice_consistency).toBe(22);
    expect(evaluation.critical_issues).toEqual([CRITICAL_ISSUE_MESSAGES.emotional_content]);
    expect(evaluation.total_score).toBe(89);
  });

  it('fails a good article that is half the target length', () => {
    const target = countWords(GOOD_ARTICLE) * 2;
    const evaluation = engine.evaluateArticle(GOOD_ARTICLE, target, TOPIC);

    expect(evaluation.word_count_deviation_percent).toBe(-50);
    expect(evaluation.score_breakdown.technical_seo).toBe(14);
    expect(evaluation.critical_issues).toEqual(['Word count critically low (-50.0% from target)']);
    expect(evaluation.total_score).toBe(94);
    expect(evaluation.passes_quality_gate).toBe(false);
  });

  it('scores an empty article without throwing', () => {
    const evaluation = engine.evaluateArticle('', 1000, TOPIC);

    expect(evaluation.word_count_actual).toBe(0);
    expect(evaluation.word_count_deviation_percent).toBe(-100);
    expect(evaluation.score_breakdown).toEqual({
      voice_consistency: 12,
      structure_quality: 25,
      domain_accuracy: 21,
      technical_seo: 2,
    });
    expect(evaluation.critical_issues).toEqual([
      CRITICAL_ISSUE_MESSAGES.missing_variability,
      'Word count critically low (-100.0% from target)',
    ]);
    expect(evaluation.total_score).toBe(52);
    expect(evaluation.passes_quality_gate).toBe(false);
    expect(evaluation.improvements_needed).toHaveLength(8);
  });

  it('treats a zero target as no deviation', () => {
    const evaluation = engine.evaluateArticle(GOOD_ARTICLE, 0, TOPIC);
    expect(evaluation.word_count_deviation_percent).toBe(0);
    expect(evaluation.score_breakdown.technical_seo).toBe(20);
  });

  it('does not require a topic mention when the topic is blank', () => {
    const target = countWords(GOOD_ARTICLE);
    const withTopic = engine.evaluateArticle(GOOD_ARTICLE, target, 'hip replacement');
    const withoutTopic = engine.evaluateArticle(GOOD_ARTICLE, target, '');

    expect(withTopic.score_breakdown.technical_seo).toBe(14);
    expect(withoutTopic.score_breakdown.technical_seo).toBe(20);
  });
});
