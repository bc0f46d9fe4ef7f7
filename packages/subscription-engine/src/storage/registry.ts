// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { SubscriptionNotFoundError } from '../errors.js';
import type { Subscription } from '../types.js';

/** Fields a caller supplies when the registry mints a new subscription. */
export type SubscriptionDraft = Omit<Subscription, 'id'>;

/** Fields that may change on an existing subscription. */
export type SubscriptionPatch = Partial<Omit<Subscription, 'id'>>;

/**
 * Authoritative store of subscription state.
 *
 * Snapshots are frozen; every update swaps in a new object, so a reference a
 * reader already holds never changes underneath it. Each stored and returned
 * snapshot carries its own `lastTransactionAt`, so a caller mutating that
 * Date reaches neither the store nor other readers. Ids come from a
 * monotonically increasing counter and are never reused. Nothing is ever
 * removed.
 */
export class SubscriptionRegistry {
  private readonly snapshots = new Map<number, Subscription>();
  private sequence = 0;

  /** Assign the next id and store the first snapshot. */
  create(draft: SubscriptionDraft): Subscription {
    this.sequence += 1;
    const subscription = snapshotOf({ ...draft, id: this.sequence });
    this.snapshots.set(subscription.id, subscription);
    return snapshotOf(subscription);
  }

  /**
   * Replace a snapshot with a copy that has `patch` applied.
   * Throws SubscriptionNotFoundError for an unknown id.
   */
  update(id: number, patch: SubscriptionPatch): Subscription {
    const current = this.require(id);
    const next = snapshotOf({ ...current, ...patch, id });
    this.snapshots.set(id, next);
    return snapshotOf(next);
  }

  get(id: number): Subscription | null {
    const subscription = this.snapshots.get(id);
    return subscription === undefined ? null : snapshotOf(subscription);
  }

  require(id: number): Subscription {
    const subscription = this.snapshots.get(id);
    if (subscription === undefined) {
      throw new SubscriptionNotFoundError(id);
    }
    return snapshotOf(subscription);
  }

  has(id: number): boolean {
    return this.snapshots.has(id);
  }

  /** All snapshots in id order. */
  list(): readonly Subscription[] {
    return Array.from(this.snapshots.values(), snapshotOf);
  }

  get size(): number {
    return this.snapshots.size;
  }
}

function snapshotOf(subscription: Subscription): Subscription {
  return Object.freeze({
    ...subscription,
    lastTransactionAt: new Date(subscription.lastTransactionAt.getTime()),
  });
}
