// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { z } from 'zod';
import { classifyEmail } from './classifier.js';
import { parseEngineConfig } from './config.js';
import type { EngineConfig } from './config.js';
import { EmailCorrelator } from './correlator.js';
import { buildDashboard } from './dashboard.js';
import { DecisionProcessor } from './decisions.js';
import { InvalidInputError, describeIssues } from './errors.js';
import {
  EVENT_DECISION_APPLIED,
  EVENT_EMAIL_CLASSIFIED,
  EVENT_SUBSCRIPTION_DETECTED,
  EVENT_SUBSCRIPTION_UPDATED,
  SubscriptionEventEmitter,
} from './events.js';
import { MatchingEngine } from './matching.js';
import { Ledger } from './storage/ledger.js';
import { SubscriptionRegistry } from './storage/registry.js';
import {
  DecisionSchema,
  EmailInputSchema,
  TransactionFilterSchema,
  TransactionInputSchema,
} from './types.js';
import type {
  DashboardSummary,
  Decision,
  EmailInput,
  EmailRecord,
  Subscription,
  TransactionFilter,
  TransactionInput,
  TransactionRecord,
} from './types.js';

export type Clock = () => Date;

/**
 * SubscriptionEngine — in-memory subscription detection and lifecycle.
 *
 * Composes the ledger, registry, matching engine, email correlator and
 * decision processor behind four commands and a handful of queries.
 *
 * Contract:
 *  - Every public method is synchronous and runs to completion; within one
 *    instance there is a single writer.
 *  - Inputs are validated before anything is stored. A failed validation or
 *    an unknown subscription id leaves all state untouched.
 *  - Snapshots returned to callers are frozen copies with their own Dates
 *    and tag sets, and never change afterwards; later updates produce new
 *    snapshots.
 *  - Listeners on `events` run synchronously once the state change is
 *    complete. An error a listener throws reaches the caller, but the
 *    operation's effect stays applied, so a caller must not retry it.
 *  - State lives only as long as the instance. Construct a fresh engine per
 *    test or per tenant.
 */
export class SubscriptionEngine {
  readonly events = new SubscriptionEventEmitter();

  readonly #config: EngineConfig;
  readonly #clock: Clock;
  readonly #ledger = new Ledger();
  readonly #registry = new SubscriptionRegistry();
  readonly #emails: EmailRecord[] = [];
  readonly #matcher: MatchingEngine;
  readonly #correlator: EmailCorrelator;
  readonly #decisions: DecisionProcessor;

  constructor(config: unknown = {}, clock: Clock = () => new Date()) {
    this.#config = parseEngineConfig(config);
    this.#clock = clock;
    this.#matcher = new MatchingEngine(this.#ledger, this.#registry, this.#config);
    this.#correlator = new EmailCorrelator(this.#registry, this.#config);
    this.#decisions = new DecisionProcessor(this.#registry, this.#config);
  }

  // ─── Commands ─────────────────────────────────────────────────────────────

  /**
   * Append a bank transaction and run cadence detection on its cluster.
   *
   * @returns The created or refreshed subscription, or `null` when this
   *          transaction does not complete a monthly cadence.
   */
  registerTransaction(input: TransactionInput): Subscription | null {
    const validated = validate(TransactionInputSchema, input, 'transaction');
    const record = this.#ledger.append(validated);
    const outcome = this.#matcher.link(record);

    switch (outcome.kind) {
      case 'none':
        return null;
      case 'created':
        this.events.emit(EVENT_SUBSCRIPTION_DETECTED, {
          subscription: outcome.subscription,
          transactionId: record.id,
          timestamp: this.#now(),
        });
        return outcome.subscription;
      case 'updated':
        this.events.emit(EVENT_SUBSCRIPTION_UPDATED, {
          subscription: outcome.subscription,
          cause: 'transaction',
          timestamp: this.#now(),
        });
        return outcome.subscription;
    }
  }

  /**
   * Classify an email, store it, and apply its signals to the registry.
   */
  ingestEmail(input: EmailInput): EmailRecord {
    const validated = validate(EmailInputSchema, input, 'email');
    const record: EmailRecord = Object.freeze({
      id: this.#emails.length + 1,
      subject: validated.subject,
      body: validated.body,
      timestamp: new Date(validated.timestamp.getTime()),
      tags: classifyEmail(validated.subject, validated.body, this.#config.keywords),
    });
    this.#emails.push(record);

    const matched = this.#correlator.correlate(record);
    const timestamp = this.#now();
    for (const id of matched) {
      this.events.emit(EVENT_SUBSCRIPTION_UPDATED, {
        subscription: this.#registry.require(id),
        cause: 'email',
        timestamp,
      });
    }
    this.events.emit(EVENT_EMAIL_CLASSIFIED, {
      emailId: record.id,
      tags: Array.from(record.tags),
      matchedSubscriptionIds: matched,
      timestamp,
    });

    return copyOfEmail(record);
  }

  /**
   * Cancel or renew a subscription.
   *
   * Throws SubscriptionNotFoundError when `subscriptionId` was never assigned.
   */
  applyDecision(subscriptionId: number, decision: Decision): Subscription {
    const validated = validate(DecisionSchema, decision, 'decision');
    const result = this.#decisions.apply(subscriptionId, validated);
    const timestamp = this.#now();

    this.events.emit(EVENT_SUBSCRIPTION_UPDATED, {
      subscription: result.subscription,
      cause: 'decision',
      timestamp,
    });
    this.events.emit(EVENT_DECISION_APPLIED, {
      subscriptionId,
      decision: validated,
      previousStatus: result.previousStatus,
      savingsDelta: result.savingsDelta,
      timestamp,
    });

    return result.subscription;
  }

  // ─── Queries ──────────────────────────────────────────────────────────────

  /**
   * Summary counts, commitment, savings and renewals due within
   * `horizonDays` of today (engine clock). Defaults to the configured horizon.
   */
  dashboard(horizonDays: number = this.#config.dashboardHorizonDays): DashboardSummary {
    return buildDashboard(
      this.#registry.list(),
      this.#decisions.savedTotal,
      this.#clock(),
      horizonDays,
    );
  }

  /** All subscriptions, active and cancelled, in id order. */
  get subscriptions(): readonly Subscription[] {
    return this.#registry.list();
  }

  listSubscriptions(): readonly Subscription[] {
    return this.#registry.list();
  }

  getSubscription(subscriptionId: number): Subscription | null {
    return this.#registry.get(subscriptionId);
  }

  /** Total monthly cost avoided through cancellations, rounded to 2 decimals. */
  get savedTotal(): number {
    return this.#decisions.savedTotal;
  }

  /**
   * Return ledger history, optionally filtered.
   * All filter fields are AND-ed together. Pass undefined to return all records.
   */
  getTransactions(filter?: TransactionFilter): readonly TransactionRecord[] {
    return this.#ledger.list(validate(TransactionFilterSchema, filter, 'transaction filter'));
  }

  /** Every ingested email, oldest first. */
  getEmails(): readonly EmailRecord[] {
    return this.#emails.map(copyOfEmail);
  }

  #now(): string {
    return this.#clock().toISOString();
  }
}

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown, kind: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError(kind, describeIssues(result.error));
  }
  return result.data;
}

function copyOfEmail(record: EmailRecord): EmailRecord {
  return Object.freeze({
    ...record,
    timestamp: new Date(record.timestamp.getTime()),
    tags: new Set(record.tags),
  });
}
