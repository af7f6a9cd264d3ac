/**
 * Rule-based content validation against approved patterns and anti-patterns
 */

import { z } from 'zod';

import { RuleDefinitionError } from './errors.js';
import {
  countAbsoluteClaims,
  countDomainTerms,
  countFirstPerson,
  countRangeClaims,
  countThirdPerson,
  hasFirstPersonVoice,
} from './formulas.js';
import { createPrefixedLogger, logger as defaultLogger } from './logger.js';
import type { Logger } from './logger.js';
import { AntiPatternSchema, PatternSchema } from './schema.js';
import {
  containsAny,
  countOutOfOrderSections,
  extractSections,
  splitParagraphs,
} from './text.js';
import type {
  AntiPattern,
  DetailedFeedback,
  Pattern,
  PatternType,
  ValidationResult,
} from './types.js';
import { DEFAULT_VOCABULARY } from './vocabulary.js';
import type { Vocabulary } from './vocabulary.js';

// ============================================================================
// Matching Strategy
// ============================================================================

/**
 * Decides whether a rule applies to a text. Swap the implementation to change
 * how rules are recognised without touching the validator.
 */
export interface RuleMatcher {
  matchesPattern(content: string, pattern: Pattern): boolean;
  violatesAntiPattern(content: string, antiPattern: AntiPattern): boolean;
}

function containsExample(content: string, examples: readonly string[]): boolean {
  const lower = content.toLowerCase();
  return examples.some((example) => example !== '' && lower.includes(example.toLowerCase()));
}

/**
 * Literal examples first, then a keyword/regex heuristic per rule type.
 */
export class HeuristicRuleMatcher implements RuleMatcher {
  constructor(private readonly vocabulary: Vocabulary = DEFAULT_VOCABULARY) {}

  matchesPattern(content: string, pattern: Pattern): boolean {
    if (containsExample(content, pattern.examples)) {
      return true;
    }

    switch (pattern.pattern_type) {
      case 'voice':
        return countThirdPerson(content, this.vocabulary) > 0;
      case 'structure': {
        const { found, outOfOrder } = countOutOfOrderSections(
          extractSections(content),
          this.vocabulary.section_order
        );
        return found > 0 && outOfOrder === 0;
      }
      case 'domain-accuracy':
        return countRangeClaims(content, this.vocabulary) > 0;
      case 'seo':
      case 'cultural':
        return false;
    }
  }

  violatesAntiPattern(content: string, antiPattern: AntiPattern): boolean {
    if (containsExample(content, antiPattern.examples)) {
      return true;
    }

    switch (antiPattern.pattern_type) {
      case 'voice':
        return hasFirstPersonVoice(content, this.vocabulary);
      case 'structure':
        return containsAny(content.toLowerCase(), this.vocabulary.emotional_markers);
      case 'domain-accuracy':
        return countAbsoluteClaims(content, this.vocabulary) > 0;
      case 'seo':
      case 'cultural':
        return false;
    }
  }
}

// ============================================================================
// Fix codes
// ============================================================================

export const FIX_CODES: Readonly<Record<PatternType, string>> = {
  voice: 'voice_fix_third_person',
  structure: 'structure_fix_logical_flow',
  'domain-accuracy': 'domain_fix_ranges',
  seo: 'seo_fix_keywords',
  cultural: 'cultural_fix_context',
};

// ============================================================================
// Validator
// ============================================================================

export interface ContentValidatorOptions {
  vocabulary?: Vocabulary;
  matcher?: RuleMatcher;
  logger?: Logger;
}

function parseRules<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: readonly unknown[],
  kind: 'pattern' | 'anti-pattern'
): readonly T[] {
  const parsed = z.array(schema).safeParse(input);
  if (!parsed.success) {
    throw RuleDefinitionError.fromZodError(kind, parsed.error);
  }
  return Object.freeze(parsed.data);
}

export class ContentValidator {
  readonly patterns: readonly Pattern[];
  readonly antiPatterns: readonly AntiPattern[];
  private readonly vocabulary: Vocabulary;
  private readonly matcher: RuleMatcher;
  private readonly log: Logger;

  /**
   * Takes PatternInput / AntiPatternInput shapes. Rules are parsed with
   * PatternSchema and AntiPatternSchema, so raw JSON from a rule store can be
   * passed straight in.
   *
   * @throws RuleDefinitionError when a rule is missing a required field or
   *   carries an unknown type
   */
  constructor(
    patterns: readonly unknown[],
    antiPatterns: readonly unknown[],
    options: ContentValidatorOptions = {}
  ) {
    this.patterns = parseRules(PatternSchema, patterns, 'pattern');
    this.antiPatterns = parseRules(AntiPatternSchema, antiPatterns, 'anti-pattern');
    this.vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY;
    this.matcher = options.matcher ?? new HeuristicRuleMatcher(this.vocabulary);
    this.log = createPrefixedLogger('[Validator]', options.logger ?? defaultLogger);
  }

  validateContent(content: string): ValidationResult {
    const matched = this.patterns.filter((p) => this.matcher.matchesPattern(content, p));
    const violated = this.antiPatterns.filter((a) => this.matcher.violatesAntiPattern(content, a));

    const validationScore = calculateValidationScore(matched, violated);
    const isValid = validationScore >= 70 && violated.length === 0;

    this.log.debug(
      `Validation score ${validationScore}: ${matched.length} matched, ${violated.length} violated`
    );

    return {
      is_valid: isValid,
      matched_patterns: matched.map((p) => p.id),
      violated_antipatterns: violated.map((a) => a.id),
      suggested_fixes: suggestFixes(violated),
      validation_score: validationScore,
      detailed_feedback: this.generateDetailedFeedback(content, matched, violated),
    };
  }

  private generateDetailedFeedback(
    content: string,
    matched: readonly Pattern[],
    violated: readonly AntiPattern[]
  ): DetailedFeedback {
    const sections = extractSections(content);
    const paragraphs = splitParagraphs(content);
    const firstPerson = countFirstPerson(content, this.vocabulary);
    const thirdPerson = countThirdPerson(content, this.vocabulary);
    const paragraphWords = paragraphs.reduce((sum, p) => sum + p.split(/\s+/).length, 0);
    const matchedIds = new Set(matched.map((p) => p.id));

    return {
      content_length: content.length,
      sections_found: sections.length,
      matched_pattern_count: matched.length,
      violation_count: violated.length,
      voice_analysis: {
        first_person_usage: firstPerson,
        third_person_usage: thirdPerson,
        voice_consistency: thirdPerson > firstPerson,
      },
      structure_analysis: {
        section_count: sections.length,
        paragraph_count: paragraphs.length,
        average_paragraph_length: paragraphs.length > 0 ? paragraphWords / paragraphs.length : 0,
      },
      domain_analysis: {
        range_claims: countRangeClaims(content, this.vocabulary),
        absolute_claims: countAbsoluteClaims(content, this.vocabulary),
        domain_terms: countDomainTerms(content, this.vocabulary),
      },
      auto_fail_violations: violated.filter((a) => a.auto_fail).map((a) => a.id),
      missing_required_patterns: this.patterns
        .filter((p) => p.required && !matchedIds.has(p.id))
        .map((p) => p.id),
    };
  }
}

// ============================================================================
// Scoring helpers
// ============================================================================

export function calculateValidationScore(
  matched: readonly Pattern[],
  violated: readonly AntiPattern[]
): number {
  const patternScore = matched.reduce((sum, p) => sum + p.weight * 10, 0);
  const penalty = violated.reduce((sum, a) => sum + a.penalty_points, 0);
  return Math.max(0, Math.min(100, patternScore - penalty));
}

/**
 * One fix code per violated rule type, in first-seen order.
 */
export function suggestFixes(violated: readonly AntiPattern[]): string[] {
  return [...new Set(violated.map((a) => FIX_CODES[a.pattern_type]))];
}
