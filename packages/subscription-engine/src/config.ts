// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { InvalidConfigError, describeIssues } from './errors.js';

/** Keywords that mark an email as a renewal notice (English and Scandinavian). */
export const DEFAULT_RENEWAL_KEYWORDS: readonly string[] = ['renew', 'förnya', 'fornyelse', 'renewal'];

/** Keywords that mark an email as announcing a price increase. */
export const DEFAULT_PRICE_INCREASE_KEYWORDS: readonly string[] = ['price increase', 'höjs', 'higher rate'];

// ---------------------------------------------------------------------------
// Cadence
// ---------------------------------------------------------------------------

/**
 * Inclusive window, in whole days, between the two most recent same-key
 * charges for the pair to count as a monthly cadence.
 */
const CadenceConfigSchema = z
  .object({
    minDays: z.number().int().nonnegative().default(27),
    maxDays: z.number().int().nonnegative().default(33),
  })
  .refine((cadence) => cadence.minDays <= cadence.maxDays, {
    message: 'minDays must not exceed maxDays',
    path: ['maxDays'],
  });

// ---------------------------------------------------------------------------
// Classifier keywords
// ---------------------------------------------------------------------------

/**
 * Keyword sets matched as lower-case substrings of `subject + ' ' + body`.
 * Entries are lower-cased on parse so callers may pass any casing.
 */
const KeywordConfigSchema = z.object({
  renewal: z
    .array(z.string().min(1).transform((keyword) => keyword.toLowerCase()))
    .min(1)
    .default([...DEFAULT_RENEWAL_KEYWORDS]),
  priceIncrease: z
    .array(z.string().min(1).transform((keyword) => keyword.toLowerCase()))
    .min(1)
    .default([...DEFAULT_PRICE_INCREASE_KEYWORDS]),
});

export type KeywordConfig = z.infer<typeof KeywordConfigSchema>;

// ---------------------------------------------------------------------------
// Root engine config
// ---------------------------------------------------------------------------

export const EngineConfigSchema = z.object({
  cadence: CadenceConfigSchema.default({}),
  /** Days added to a charge (or a renewal) to project the next renewal. */
  renewalPeriodDays: z.number().int().positive().default(30),
  /** Days after a renewal-reminder email at which the renewal is expected. */
  reminderLeadDays: z.number().int().positive().default(7),
  /** Default look-ahead window for `dashboard()`. */
  dashboardHorizonDays: z.number().int().nonnegative().default(14),
  keywords: KeywordConfigSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/**
 * Parse and validate a raw config object, throwing InvalidConfigError on
 * failure. `undefined` yields the all-defaults config.
 */
export function parseEngineConfig(raw: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new InvalidConfigError(describeIssues(result.error));
  }
  return result.data;
}
