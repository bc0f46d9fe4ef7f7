// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { monthlyCostOf } from './amounts.js';
import { calendarDateAfter, wholeDaysBetween } from './dates.js';
import { deriveProviderName } from './normalize.js';
import type { EngineConfig } from './config.js';
import type { Ledger } from './storage/ledger.js';
import type { SubscriptionRegistry } from './storage/registry.js';
import type { Subscription, TransactionRecord } from './types.js';

export type MatchOutcome =
  | { readonly kind: 'none' }
  | { readonly kind: 'created'; readonly subscription: Subscription }
  | { readonly kind: 'updated'; readonly subscription: Subscription };

const NO_MATCH: MatchOutcome = { kind: 'none' };

/**
 * Recognizes recurring charges in the ledger.
 *
 * A transaction completes a cadence when the two most recent charges sharing
 * its description key are between `cadence.minDays` and `cadence.maxDays`
 * apart (inclusive). The first cadence in a key cluster mints a subscription;
 * every later one refreshes that same subscription. A cluster never gets a
 * second subscription, even when a gap outside the window leaves some of its
 * charges unlinked.
 */
export class MatchingEngine {
  constructor(
    private readonly ledger: Ledger,
    private readonly registry: SubscriptionRegistry,
    private readonly config: Pick<EngineConfig, 'cadence' | 'renewalPeriodDays'>,
  ) {}

  /** Evaluate a transaction that has just been appended to the ledger. */
  link(record: TransactionRecord): MatchOutcome {
    const similar = this.ledger.cluster(record.descriptionKey);
    if (similar.length < 2) return NO_MATCH;

    const latest = similar[similar.length - 1];
    const previous = similar[similar.length - 2];
    if (latest === undefined || previous === undefined) return NO_MATCH;

    const interval = wholeDaysBetween(previous.timestamp, latest.timestamp);
    if (interval < this.config.cadence.minDays || interval > this.config.cadence.maxDays) {
      return NO_MATCH;
    }

    const existingId = this.ledger.subscriptionForKey(record.descriptionKey);
    if (existingId === undefined) {
      return { kind: 'created', subscription: this.createFromCluster(similar, latest) };
    }

    this.ledger.link(record.id, existingId);
    return { kind: 'updated', subscription: this.refresh(existingId) };
  }

  /**
   * Recompute cost, last charge and next renewal from every transaction
   * linked to the subscription. Status and notes are left untouched.
   */
  refresh(subscriptionId: number): Subscription {
    const linked = this.ledger.linkedTo(subscriptionId);
    const latest = linked[linked.length - 1];
    if (latest === undefined) {
      return this.registry.require(subscriptionId);
    }

    return this.registry.update(subscriptionId, {
      monthlyCost: monthlyCostOf(linked.map((transaction) => transaction.amount)),
      nextRenewalDate: calendarDateAfter(latest.timestamp, this.config.renewalPeriodDays),
      lastTransactionAt: latest.timestamp,
    });
  }

  private createFromCluster(
    cluster: readonly TransactionRecord[],
    latest: TransactionRecord,
  ): Subscription {
    const subscription = this.registry.create({
      provider: deriveProviderName(latest.description),
      reference: latest.description,
      monthlyCost: monthlyCostOf(cluster.map((transaction) => transaction.amount)),
      nextRenewalDate: calendarDateAfter(latest.timestamp, this.config.renewalPeriodDays),
      status: 'active',
      lastTransactionAt: latest.timestamp,
    });

    for (const transaction of cluster) {
      this.ledger.link(transaction.id, subscription.id);
    }
    return subscription;
  }
}
