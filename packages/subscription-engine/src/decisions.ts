// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { roundCurrency } from './amounts.js';
import { shiftCalendarDate } from './dates.js';
import type { EngineConfig } from './config.js';
import type { SubscriptionRegistry } from './storage/registry.js';
import type { Decision, Subscription, SubscriptionStatus } from './types.js';

export const CANCELLED_NOTE = 'Cancelled via assistant';
export const RENEWED_NOTE = 'Renewed via assistant';

export interface DecisionResult {
  readonly subscription: Subscription;
  readonly previousStatus: SubscriptionStatus;
  /** What this decision added to the savings total. */
  readonly savingsDelta: number;
}

/**
 * Applies user decisions as status transitions and owns the savings total.
 *
 * | from      | cancel                          | renew                    |
 * |-----------|---------------------------------|--------------------------|
 * | active    | cancelled, savings += cost      | active, renewal + period |
 * | cancelled | cancelled, savings unchanged    | active, renewal + period |
 *
 * Cancelling leaves cost and renewal date as they were.
 */
export class DecisionProcessor {
  private saved = 0;

  constructor(
    private readonly registry: SubscriptionRegistry,
    private readonly config: Pick<EngineConfig, 'renewalPeriodDays'>,
  ) {}

  /**
   * Throws SubscriptionNotFoundError for an unknown id, before anything
   * changes.
   */
  apply(subscriptionId: number, decision: Decision): DecisionResult {
    const current = this.registry.require(subscriptionId);

    if (decision === 'cancel') {
      const savingsDelta = current.status === 'cancelled' ? 0 : current.monthlyCost;
      this.saved += savingsDelta;
      const subscription = this.registry.update(subscriptionId, {
        status: 'cancelled',
        notes: CANCELLED_NOTE,
      });
      return { subscription, previousStatus: current.status, savingsDelta };
    }

    const subscription = this.registry.update(subscriptionId, {
      status: 'active',
      nextRenewalDate: shiftCalendarDate(current.nextRenewalDate, this.config.renewalPeriodDays),
      notes: RENEWED_NOTE,
    });
    return { subscription, previousStatus: current.status, savingsDelta: 0 };
  }

  /** Running savings total, rounded to 2 decimals. */
  get savedTotal(): number {
    return roundCurrency(this.saved);
  }
}
