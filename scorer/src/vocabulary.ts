/**
 * Indicator vocabularies for the keyword/regex heuristics.
 *
 * The scorer and validator never hardcode words; they read them from a
 * Vocabulary so another language or domain only needs a new JSON file.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { ConfigValidationError, formatZodIssues } from './errors.js';

const regexSource = z.string().refine(
  (source) => {
    try {
      new RegExp(source);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Invalid regular expression' }
);

export const VocabularySchema = z.object({
  name: z.string().min(1),
  third_person_indicators: z.array(z.string()),
  /** Regexes matched against lowercased content */
  first_person_patterns: z.array(regexSource),
  professional_terms: z.array(z.string()),
  credential_markers: z.array(z.string()),
  /** Broad emotional tone markers (voice penalty, structure anti-patterns) */
  emotional_markers: z.array(z.string()),
  /** Anecdotal section markers that raise a critical issue */
  anecdotal_markers: z.array(z.string()),
  /** Expected H2 order, matched as substrings of section titles */
  section_order: z.array(z.string()),
  variability_markers: z.array(z.string()),
  range_pattern: regexSource,
  absolute_claim_patterns: z.array(regexSource),
  contradiction_pairs: z.array(z.tuple([z.string(), z.string()])),
  /** Terms expected to carry a parenthesised plain-language gloss */
  technical_terms: z.array(z.string()),
  domain_terms: z.array(z.string()),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

/**
 * Lowercases every word list so the heuristics can compare against
 * lowercased content. Regex sources are kept as written.
 */
function normalize(vocabulary: Vocabulary): Vocabulary {
  const lower = (list: readonly string[]): string[] => list.map((item) => item.toLowerCase());
  return {
    ...vocabulary,
    third_person_indicators: lower(vocabulary.third_person_indicators),
    professional_terms: lower(vocabulary.professional_terms),
    credential_markers: lower(vocabulary.credential_markers),
    emotional_markers: lower(vocabulary.emotional_markers),
    anecdotal_markers: lower(vocabulary.anecdotal_markers),
    section_order: lower(vocabulary.section_order),
    variability_markers: lower(vocabulary.variability_markers),
    contradiction_pairs: vocabulary.contradiction_pairs.map(
      ([a, b]): [string, string] => [a.toLowerCase(), b.toLowerCase()]
    ),
    technical_terms: lower(vocabulary.technical_terms),
    domain_terms: lower(vocabulary.domain_terms),
  };
}

function parseVocabulary(data: unknown, source: string): Vocabulary {
  const parsed = VocabularySchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigValidationError(
      `invalid vocabulary ${source}: ${formatZodIssues(parsed.error).join('; ')}`
    );
  }
  return Object.freeze(normalize(parsed.data));
}

/**
 * Reads and validates a vocabulary JSON file.
 */
export function loadVocabulary(path: string | URL): Vocabulary {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parseVocabulary(raw, String(path));
}

export const DEFAULT_VOCABULARY: Vocabulary = loadVocabulary(
  new URL('../data/clinical-en.json', import.meta.url)
);

/**
 * Overlays caller lists onto a base vocabulary (default: clinical-en).
 *
 * @example
 * const vocabulary = createVocabulary({
 *   name: 'dental-en',
 *   section_order: ['anatomy', 'causes', 'treatment', 'aftercare'],
 * });
 */
export function createVocabulary(
  overrides: Partial<Vocabulary>,
  base: Vocabulary = DEFAULT_VOCABULARY
): Vocabulary {
  return parseVocabulary({ ...base, ...overrides }, overrides.name ?? base.name);
}
