/**
 * Quality Gate Configuration
 *
 * Defaults, environment loading and consistency checks for the thresholds
 * shared by the scoring engine and the retry handler.
 */

import { z } from 'zod';

import { ConfigValidationError, formatZodIssues } from './errors.js';
import { DEFAULT_QUALITY_CONFIG } from './types.js';
import type { QualityConfig } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

const CriticalPenaltySchema = z.object({
  first_person: z.number().int().min(0),
  emotional_content: z.number().int().min(0),
  missing_variability: z.number().int().min(0),
  word_count: z.number().int().min(0),
});

export const QualityConfigSchema = z.object({
  pass_threshold: z.number().int().min(0).max(100),
  word_count_fail_threshold: z.number(),
  max_retries: z.number().int().min(0),
  retry_delays: z.array(z.number().min(0)).min(1, 'retry_delays needs at least one entry'),
  catastrophic_word_count_threshold: z.number(),
  max_critical_issues_for_retry: z.number().int().min(0),
  critical_penalties: CriticalPenaltySchema,
});

export type QualityConfigOverrides = Partial<Omit<QualityConfig, 'critical_penalties'>> & {
  critical_penalties?: Partial<QualityConfig['critical_penalties']>;
};

// ============================================================================
// Resolution
// ============================================================================

/**
 * Merges overrides onto the defaults and validates the result.
 *
 * @throws ConfigValidationError when a value is out of range or the
 *   thresholds contradict each other
 */
export function resolveConfig(overrides: QualityConfigOverrides = {}): QualityConfig {
  const merged = {
    ...DEFAULT_QUALITY_CONFIG,
    ...overrides,
    critical_penalties: {
      ...DEFAULT_QUALITY_CONFIG.critical_penalties,
      ...overrides.critical_penalties,
    },
  };

  const parsed = QualityConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigValidationError(formatZodIssues(parsed.error).join('; '));
  }

  const config = parsed.data;
  if (config.catastrophic_word_count_threshold > config.word_count_fail_threshold) {
    throw new ConfigValidationError(
      `catastrophic_word_count_threshold (${config.catastrophic_word_count_threshold}) ` +
        `cannot be greater than word_count_fail_threshold (${config.word_count_fail_threshold})`
    );
  }

  return config;
}

// ============================================================================
// Environment
// ============================================================================

const EnvSchema = z.object({
  QUALITY_PASS_THRESHOLD: z.coerce.number().int().optional(),
  WORD_COUNT_FAIL_THRESHOLD: z.coerce.number().optional(),
  MAX_RETRIES: z.coerce.number().int().optional(),
  RETRY_DELAYS: z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === ''
        ? undefined
        : value.split(',').map((part) => Number(part.trim()))
    )
    .pipe(z.array(z.number().finite()).optional()),
});

/**
 * Builds the configuration from environment variables, falling back to the
 * defaults for anything unset.
 *
 * @example
 * // QUALITY_PASS_THRESHOLD=85 RETRY_DELAYS=1,1,2
 * const config = loadConfigFromEnv(process.env);
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): QualityConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigValidationError(formatZodIssues(parsed.error).join('; '));
  }

  const overrides: QualityConfigOverrides = {};
  const { QUALITY_PASS_THRESHOLD, WORD_COUNT_FAIL_THRESHOLD, MAX_RETRIES, RETRY_DELAYS } = parsed.data;
  if (QUALITY_PASS_THRESHOLD !== undefined) overrides.pass_threshold = QUALITY_PASS_THRESHOLD;
  if (WORD_COUNT_FAIL_THRESHOLD !== undefined) overrides.word_count_fail_threshold = WORD_COUNT_FAIL_THRESHOLD;
  if (MAX_RETRIES !== undefined) overrides.max_retries = MAX_RETRIES;
  if (RETRY_DELAYS !== undefined) overrides.retry_delays = RETRY_DELAYS;

  return resolveConfig(overrides);
}
