// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { normalizeDescription } from '../normalize.js';
import type { TransactionFilter, TransactionInput, TransactionRecord } from '../types.js';

interface LedgerEntry {
  readonly id: number;
  readonly descriptionKey: string;
  readonly description: string;
  readonly amount: number;
  readonly timestamp: Date;
  subscriptionId?: number;
}

/**
 * Append-only, in-process transaction history.
 *
 * Entries are never removed or reordered. The only mutable field is the
 * back-link to a subscription, which is written at most once. Readers always
 * receive copies.
 */
export class Ledger {
  private readonly entries: LedgerEntry[] = [];

  // descriptionKey -> entries sharing it, in append order
  private readonly byKey = new Map<string, LedgerEntry[]>();

  /** Normalize and append a transaction. Returns a copy of the stored record. */
  append(input: TransactionInput): TransactionRecord {
    const entry: LedgerEntry = {
      id: this.entries.length + 1,
      descriptionKey: normalizeDescription(input.description),
      description: input.description,
      amount: input.amount,
      timestamp: new Date(input.timestamp.getTime()),
    };

    this.entries.push(entry);
    const cluster = this.byKey.get(entry.descriptionKey);
    if (cluster !== undefined) {
      cluster.push(entry);
    } else {
      this.byKey.set(entry.descriptionKey, [entry]);
    }

    return copyOf(entry);
  }

  /**
   * Every transaction sharing `descriptionKey`, oldest first.
   * Ties on timestamp keep append order.
   */
  cluster(descriptionKey: string): readonly TransactionRecord[] {
    const entries = this.byKey.get(descriptionKey) ?? [];
    return sortByTimestamp(entries).map(copyOf);
  }

  /**
   * The subscription already associated with a key cluster, if any entry of
   * the cluster has been linked.
   */
  subscriptionForKey(descriptionKey: string): number | undefined {
    const entries = this.byKey.get(descriptionKey) ?? [];
    return entries.find((entry) => entry.subscriptionId !== undefined)?.subscriptionId;
  }

  /** Every transaction linked to `subscriptionId`, oldest first. */
  linkedTo(subscriptionId: number): readonly TransactionRecord[] {
    const linked = this.entries.filter((entry) => entry.subscriptionId === subscriptionId);
    return sortByTimestamp(linked).map(copyOf);
  }

  /**
   * Link a transaction to a subscription.
   *
   * Re-linking to the same subscription is a no-op. Throws if the transaction
   * is unknown or already linked elsewhere.
   */
  link(transactionId: number, subscriptionId: number): void {
    const entry = this.entries[transactionId - 1];
    if (entry === undefined) {
      throw new RangeError(`Transaction ${transactionId} is not in the ledger.`);
    }
    if (entry.subscriptionId === subscriptionId) return;
    if (entry.subscriptionId !== undefined) {
      throw new Error(
        `Transaction ${transactionId} is already linked to subscription ${entry.subscriptionId}; ` +
          `refusing to relink it to ${subscriptionId}.`,
      );
    }
    entry.subscriptionId = subscriptionId;
  }

  /**
   * Return transaction history, optionally filtered.
   * All filter fields are AND-ed together. Results keep append order.
   */
  list(filter?: TransactionFilter): readonly TransactionRecord[] {
    return this.entries
      .filter((entry) => {
        if (filter === undefined) return true;
        if (filter.subscriptionId !== undefined && entry.subscriptionId !== filter.subscriptionId) {
          return false;
        }
        if (filter.since !== undefined && entry.timestamp < filter.since) {
          return false;
        }
        if (filter.until !== undefined && entry.timestamp > filter.until) {
          return false;
        }
        return true;
      })
      .map(copyOf);
  }

  get size(): number {
    return this.entries.length;
  }
}

function sortByTimestamp(entries: readonly LedgerEntry[]): LedgerEntry[] {
  return [...entries].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

function copyOf(entry: LedgerEntry): TransactionRecord {
  const record: TransactionRecord = {
    id: entry.id,
    descriptionKey: entry.descriptionKey,
    description: entry.description,
    amount: entry.amount,
    timestamp: new Date(entry.timestamp.getTime()),
  };
  return entry.subscriptionId === undefined
    ? record
    : { ...record, subscriptionId: entry.subscriptionId };
}
