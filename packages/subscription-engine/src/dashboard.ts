// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { roundCurrency } from './amounts.js';
import { calendarDateAfter } from './dates.js';
import type { DashboardSummary, Subscription } from './types.js';

/**
 * Project the registry into a dashboard summary. Pure: nothing passed in is
 * modified.
 *
 * `upcomingRenewals` holds active subscriptions renewing on or before
 * `today + horizonDays`, earliest first; ties keep registry order.
 */
export function buildDashboard(
  subscriptions: readonly Subscription[],
  savedTotal: number,
  today: Date,
  horizonDays: number,
): DashboardSummary {
  if (!Number.isInteger(horizonDays) || horizonDays < 0) {
    throw new RangeError(`horizonDays must be a non-negative integer, got ${horizonDays}.`);
  }

  const active = subscriptions.filter((subscription) => subscription.status === 'active');
  const cancelled = subscriptions.filter((subscription) => subscription.status === 'cancelled');
  const cutoff = calendarDateAfter(today, horizonDays);

  const upcomingRenewals = active
    .filter((subscription) => subscription.nextRenewalDate <= cutoff)
    .sort((a, b) => compareDates(a.nextRenewalDate, b.nextRenewalDate));

  return {
    activeSubscriptions: active.length,
    cancelledSubscriptions: cancelled.length,
    monthlyCommitment: roundCurrency(active.reduce((sum, subscription) => sum + subscription.monthlyCost, 0)),
    totalSavings: roundCurrency(savedTotal),
    upcomingRenewals,
  };
}

function compareDates(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
