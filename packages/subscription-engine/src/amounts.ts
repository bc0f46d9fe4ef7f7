// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Round to 2 decimal places, half away from zero.
 * EPSILON nudges values such as 1.005 that are stored just below the midpoint.
 */
export function roundCurrency(value: number): number {
  const magnitude = Math.round((Math.abs(value) + Number.EPSILON) * 100) / 100;
  return value < 0 ? -magnitude : magnitude;
}

/** Arithmetic mean of the amounts. Returns 0 for an empty list. */
export function meanAmount(amounts: readonly number[]): number {
  if (amounts.length === 0) return 0;
  return amounts.reduce((sum, amount) => sum + amount, 0) / amounts.length;
}

/** Positive monthly cost derived from a set of signed charges. */
export function monthlyCostOf(amounts: readonly number[]): number {
  return roundCurrency(Math.abs(meanAmount(amounts)));
}
