/**
 * Deterministic scoring formulas for each category.
 * Every category starts at its maximum and loses points per detected problem.
 */

import {
  bodyParagraphs,
  countAll,
  countAllMatches,
  countMatches,
  countOutOfOrderSections,
  countWords,
  escapeRegExp,
  extractSections,
  isHeading,
  splitSentences,
} from './text.js';
import { CATEGORY_MAXIMUMS } from './types.js';
import type { Vocabulary } from './vocabulary.js';

// ============================================================================
// Utility Functions
// ============================================================================

function clamp(val: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, val));
}

// ============================================================================
// 1. Voice Consistency (0-25)
// ============================================================================

export function scoreVoiceConsistency(content: string, vocabulary: Vocabulary): number {
  let score = CATEGORY_MAXIMUMS.voice_consistency;
  const lower = content.toLowerCase();

  // Third-person narration
  if (countAll(lower, vocabulary.third_person_indicators) < 3) {
    score -= 5;
  }

  // First person is forbidden
  if (countAllMatches(lower, vocabulary.first_person_patterns) > 0) {
    score -= 10;
  }

  // Professional tone
  if (countAll(lower, vocabulary.professional_terms) < 2) {
    score -= 4;
  }

  // Credentials mentioned naturally, once or twice
  const credentials = countAll(lower, vocabulary.credential_markers);
  if (credentials === 0) {
    score -= 4;
  } else if (credentials > 2) {
    score -= 2;
  }

  // No emotional tone
  if (countAll(lower, vocabulary.emotional_markers) > 0) {
    score -= 3;
  }

  return clamp(score, 0, CATEGORY_MAXIMUMS.voice_consistency);
}

// ============================================================================
// 2. Structure Quality (0-25)
// ============================================================================

/**
 * Section order penalty (0-10): 2 points per expected section found out of order.
 */
export function sectionOrderPenalty(content: string, expectedOrder: readonly string[]): number {
  const { outOfOrder } = countOutOfOrderSections(extractSections(content), expectedOrder);
  return Math.min(10, outOfOrder * 2);
}

/**
 * Repetition penalty (0-8) once more than 10% of sentences are duplicates.
 */
export function repetitionPenalty(content: string): number {
  const sentences = splitSentences(content);
  if (sentences.length === 0) {
    return 0;
  }

  const unique = new Set(sentences.map((s) => s.toLowerCase()));
  const ratio = 1 - unique.size / sentences.length;

  if (ratio > 0.1) {
    return Math.min(8, Math.floor(ratio * 40));
  }
  return 0;
}

/**
 * Paragraph length penalty (0-4): one point per body paragraph outside 2-5 sentences.
 */
export function paragraphLengthPenalty(content: string): number {
  let penalty = 0;

  for (const paragraph of bodyParagraphs(content)) {
    const sentenceCount = splitSentences(paragraph).length;
    if (sentenceCount > 5 || sentenceCount < 2) {
      penalty++;
    }
  }

  return Math.min(4, penalty);
}

/**
 * Transition penalty (0-3): one point per H2 heading with no body text
 * before the next heading or the end of the article.
 */
export function transitionPenalty(content: string): number {
  const lines = content.split('\n').map((line) => line.trim()).filter((line) => line !== '');
  let penalty = 0;

  lines.forEach((line, index) => {
    if (!line.startsWith('##') || line.startsWith('###')) return;
    const next = lines[index + 1];
    if (next === undefined || isHeading(next)) {
      penalty++;
    }
  });

  return Math.min(3, penalty);
}

export function scoreStructureQuality(content: string, vocabulary: Vocabulary): number {
  let score = CATEGORY_MAXIMUMS.structure_quality;

  score -= sectionOrderPenalty(content, vocabulary.section_order);
  score -= repetitionPenalty(content);
  score -= paragraphLengthPenalty(content);
  score -= transitionPenalty(content);

  return clamp(score, 0, CATEGORY_MAXIMUMS.structure_quality);
}

// ============================================================================
// 3. Domain Accuracy (0-30)
// ============================================================================

/**
 * Contradiction penalty (0-8): 2 points per opposing pair that both appear.
 */
export function contradictionPenalty(content: string, vocabulary: Vocabulary): number {
  const lower = content.toLowerCase();
  let penalty = 0;

  for (const [positive, negative] of vocabulary.contradiction_pairs) {
    if (lower.includes(positive) && lower.includes(negative)) {
      penalty += 2;
    }
  }

  return Math.min(8, penalty);
}

/**
 * Explanation penalty (0-4) when fewer than half of the technical terms used
 * are followed by a parenthesised explanation on the same line.
 */
export function explanationPenalty(content: string, vocabulary: Vocabulary): number {
  const lower = content.toLowerCase();
  const used = vocabulary.technical_terms.filter((term) => lower.includes(term));
  if (used.length === 0) {
    return 0;
  }

  const explained = used.filter((term) =>
    new RegExp(`${escapeRegExp(term)}.*?\\([^)]+\\)`).test(lower)
  ).length;

  const ratio = explained / used.length;
  if (ratio < 0.5) {
    return Math.min(4, Math.floor((0.5 - ratio) * 8));
  }
  return 0;
}

export function countRangeClaims(content: string, vocabulary: Vocabulary): number {
  return countMatches(content, vocabulary.range_pattern);
}

export function countAbsoluteClaims(content: string, vocabulary: Vocabulary): number {
  return countAllMatches(content.toLowerCase(), vocabulary.absolute_claim_patterns);
}

export function scoreDomainAccuracy(content: string, vocabulary: Vocabulary): number {
  let score = CATEGORY_MAXIMUMS.domain_accuracy;
  const lower = content.toLowerCase();

  // Outcome ranges such as 75-85%
  if (countRangeClaims(content, vocabulary) < 1) {
    score -= 5;
  }

  // Absolute claims such as "90% success"
  if (countAbsoluteClaims(content, vocabulary) > 0) {
    score -= 3;
  }

  // Variability disclaimers
  if (countAll(lower, vocabulary.variability_markers) < 2) {
    score -= 4;
  }

  score -= contradictionPenalty(content, vocabulary);
  score -= explanationPenalty(content, vocabulary);

  return clamp(score, 0, CATEGORY_MAXIMUMS.domain_accuracy);
}

// ============================================================================
// 4. Technical & SEO (0-20)
// ============================================================================

function mentionsTopic(text: string, topic: string): boolean {
  const keyword = topic.trim().toLowerCase();
  return keyword === '' || text.toLowerCase().includes(keyword);
}

/**
 * H1 penalty (0 or 3): missing, shorter than 10 characters, or without the topic.
 */
export function h1Penalty(content: string, topic: string): number {
  const h1 = content.split('\n').find((line) => line.startsWith('#') && !line.startsWith('##'));

  if (h1 === undefined || h1.trim().length < 10 || !mentionsTopic(h1, topic)) {
    return 3;
  }
  return 0;
}

/**
 * First paragraph penalty (0 or 3): the opening body paragraph is missing,
 * shorter than 50 characters, or does not mention the topic.
 */
export function firstParagraphPenalty(content: string, topic: string): number {
  const first = bodyParagraphs(content)[0];

  if (first === undefined || first.length < 50 || !mentionsTopic(first, topic)) {
    return 3;
  }
  return 0;
}

/**
 * Keyword distribution penalty (0 or 2): fewer than three H2 sections.
 */
export function keywordDistributionPenalty(content: string): number {
  return extractSections(content).length < 3 ? 2 : 0;
}

/**
 * Markdown penalty (0-4): one point each for no H1, no H2, no bold, no list.
 */
export function markdownPenalty(content: string): number {
  let penalty = 0;

  if (!/^#[^#]/m.test(content)) penalty++;
  if (!/^##[^#]/m.test(content)) penalty++;
  if (!/\*\*[^*]+\*\*/.test(content)) penalty++;
  if (!/^[-*+]\s/m.test(content)) penalty++;

  return penalty;
}

/**
 * Word count accuracy penalty (0-6) by absolute deviation from the target.
 */
export function wordCountPenalty(actual: number, target: number): number {
  if (target === 0) {
    return 0;
  }

  const deviation = Math.abs(actual - target) / target;

  if (deviation <= 0.05) return 0;
  if (deviation <= 0.1) return 1;
  if (deviation <= 0.15) return 2;
  if (deviation <= 0.2) return 4;
  return 6;
}

export function scoreTechnicalSeo(content: string, targetWordCount: number, topic: string): number {
  let score = CATEGORY_MAXIMUMS.technical_seo;

  score -= h1Penalty(content, topic);
  score -= firstParagraphPenalty(content, topic);
  score -= keywordDistributionPenalty(content);
  score -= markdownPenalty(content);
  score -= wordCountPenalty(countWords(content), targetWordCount);

  return clamp(score, 0, CATEGORY_MAXIMUMS.technical_seo);
}

// ============================================================================
// Shared detectors
// ============================================================================

export function hasFirstPersonVoice(content: string, vocabulary: Vocabulary): boolean {
  return countFirstPerson(content, vocabulary) > 0;
}

export function countThirdPerson(content: string, vocabulary: Vocabulary): number {
  return countAll(content.toLowerCase(), vocabulary.third_person_indicators);
}

export function countFirstPerson(content: string, vocabulary: Vocabulary): number {
  return countAllMatches(content.toLowerCase(), vocabulary.first_person_patterns);
}

export function countDomainTerms(content: string, vocabulary: Vocabulary): number {
  return countAll(content.toLowerCase(), vocabulary.domain_terms);
}
