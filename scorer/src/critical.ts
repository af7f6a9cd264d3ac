/**
 * Critical issue detection, penalties and improvement suggestions.
 *
 * Critical issues are reported as data. Their penalty is applied to the
 * summed total on top of whatever the category formulas already deducted.
 */

import { hasFirstPersonVoice } from './formulas.js';
import { containsAny } from './text.js';
import { CRITICAL_ISSUE_KINDS, IMPROVEMENT_THRESHOLDS, SCORE_CATEGORIES } from './types.js';
import type {
  CriticalIssue,
  CriticalIssueKind,
  CriticalPenaltyConfig,
  ScoreBreakdown,
  ScoreCategory,
} from './types.js';
import type { Vocabulary } from './vocabulary.js';

// ============================================================================
// Messages
// ============================================================================

export const CRITICAL_ISSUE_MESSAGES = {
  first_person: 'First-person voice detected (forbidden voice)',
  emotional_content: 'Emotional or anecdotal content detected (forbidden pattern)',
  missing_variability: 'Missing variability disclaimers',
  word_count: 'Word count critically low',
} as const satisfies Record<CriticalIssueKind, string>;

/**
 * Recovers the kind of a critical issue from its message.
 */
export function criticalIssueKind(message: string): CriticalIssueKind | undefined {
  return CRITICAL_ISSUE_KINDS.find((kind) => message.startsWith(CRITICAL_ISSUE_MESSAGES[kind]));
}

// ============================================================================
// Detection
// ============================================================================

export function detectCriticalIssues(
  content: string,
  wordCountDeviation: number,
  failThreshold: number,
  vocabulary: Vocabulary
): CriticalIssue[] {
  const issues: CriticalIssue[] = [];
  const lower = content.toLowerCase();

  if (hasFirstPersonVoice(content, vocabulary)) {
    issues.push({ kind: 'first_person', message: CRITICAL_ISSUE_MESSAGES.first_person });
  }

  if (containsAny(lower, vocabulary.anecdotal_markers)) {
    issues.push({ kind: 'emotional_content', message: CRITICAL_ISSUE_MESSAGES.emotional_content });
  }

  if (!containsAny(lower, vocabulary.variability_markers)) {
    issues.push({ kind: 'missing_variability', message: CRITICAL_ISSUE_MESSAGES.missing_variability });
  }

  if (wordCountDeviation < failThreshold) {
    issues.push({
      kind: 'word_count',
      message: `${CRITICAL_ISSUE_MESSAGES.word_count} (${wordCountDeviation.toFixed(1)}% from target)`,
    });
  }

  return issues;
}

/**
 * Subtracts the fixed penalty of every critical issue, floored at 0.
 */
export function applyCriticalPenalties(
  score: number,
  issues: readonly CriticalIssue[],
  penalties: CriticalPenaltyConfig
): number {
  const deducted = issues.reduce((total, issue) => total + penalties[issue.kind], 0);
  return Math.max(0, score - deducted);
}

// ============================================================================
// Improvements
// ============================================================================

const CATEGORY_IMPROVEMENTS: Readonly<Record<ScoreCategory, readonly string[]>> = {
  voice_consistency: [
    'Write consistently in the third person throughout',
    'Remove any first-person references (I, my, we, our)',
  ],
  structure_quality: [
    'Improve the logical flow: anatomy, then symptoms, then treatment',
    'Keep paragraphs to 2-3 sentences for better readability',
  ],
  domain_accuracy: [
    'Use outcome ranges (75-85%) instead of exact percentages',
    'Add more variability disclaimers and individual differences',
  ],
  technical_seo: [
    'Ensure the main keyword appears in the H1 and the first paragraph',
    'Improve markdown formatting with proper headers and bold text',
  ],
};

const CRITICAL_IMPROVEMENTS: Readonly<Record<CriticalIssueKind, string>> = {
  first_person: 'Rewrite every first-person sentence in the third person',
  emotional_content: 'Remove personal stories and emotional anecdotes',
  missing_variability: 'State that outcomes vary and depend on the individual case',
  word_count: 'Significantly expand content to meet minimum word count requirements',
};

/**
 * Maps low category scores and critical issues to fixed suggestions.
 * Same input, same list.
 */
export function generateImprovements(
  breakdown: ScoreBreakdown,
  issues: readonly CriticalIssue[]
): string[] {
  const improvements: string[] = [];

  for (const category of SCORE_CATEGORIES) {
    if (breakdown[category] < IMPROVEMENT_THRESHOLDS[category]) {
      improvements.push(...CATEGORY_IMPROVEMENTS[category]);
    }
  }

  for (const issue of issues) {
    improvements.push(CRITICAL_IMPROVEMENTS[issue.kind]);
  }

  return improvements;
}
