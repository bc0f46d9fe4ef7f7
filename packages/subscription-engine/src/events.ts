// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @subtrack/subscription-engine — Engine Event Emitter
 *
 * `SubscriptionEventEmitter` is a typed publish-subscribe bus for engine
 * lifecycle events. Listeners run synchronously, after the state change that
 * produced the event has been fully applied.
 *
 * Usage:
 * ```ts
 * const engine = new SubscriptionEngine();
 *
 * engine.events.on(EVENT_SUBSCRIPTION_DETECTED, ({ subscription }) => {
 *   console.log('New subscription:', subscription.provider, subscription.monthlyCost);
 * });
 * ```
 */

import type { Decision, EmailTag, Subscription, SubscriptionStatus } from './types.js';

// ---------------------------------------------------------------------------
// Event type constants
// ---------------------------------------------------------------------------

/** Emitted when cadence detection creates a new subscription. */
export const EVENT_SUBSCRIPTION_DETECTED = 'subscription:detected' as const;

/** Emitted whenever an existing subscription snapshot is replaced. */
export const EVENT_SUBSCRIPTION_UPDATED = 'subscription:updated' as const;

/** Emitted after every ingested email, tagged or not. */
export const EVENT_EMAIL_CLASSIFIED = 'email:classified' as const;

/** Emitted after a cancel or renew decision has been applied. */
export const EVENT_DECISION_APPLIED = 'decision:applied' as const;

export type SubscriptionEventName =
  | typeof EVENT_SUBSCRIPTION_DETECTED
  | typeof EVENT_SUBSCRIPTION_UPDATED
  | typeof EVENT_EMAIL_CLASSIFIED
  | typeof EVENT_DECISION_APPLIED;

const EVENT_NAMES: readonly SubscriptionEventName[] = [
  EVENT_SUBSCRIPTION_DETECTED,
  EVENT_SUBSCRIPTION_UPDATED,
  EVENT_EMAIL_CLASSIFIED,
  EVENT_DECISION_APPLIED,
];

// ---------------------------------------------------------------------------
// Event payload interfaces
// ---------------------------------------------------------------------------

export interface SubscriptionDetectedEventPayload {
  readonly subscription: Subscription;
  /** Ledger id of the transaction that completed the cadence. */
  readonly transactionId: number;
  /** ISO 8601 timestamp from the engine clock. */
  readonly timestamp: string;
}

export type SubscriptionUpdateCause = 'transaction' | 'email' | 'decision';

export interface SubscriptionUpdatedEventPayload {
  readonly subscription: Subscription;
  readonly cause: SubscriptionUpdateCause;
  readonly timestamp: string;
}

export interface EmailClassifiedEventPayload {
  readonly emailId: number;
  readonly tags: readonly EmailTag[];
  /** Subscriptions whose snapshot was replaced because of this email. */
  readonly matchedSubscriptionIds: readonly number[];
  readonly timestamp: string;
}

export interface DecisionAppliedEventPayload {
  readonly subscriptionId: number;
  readonly decision: Decision;
  readonly previousStatus: SubscriptionStatus;
  /** Amount added to the savings accumulator; 0 unless this cancel was the first. */
  readonly savingsDelta: number;
  readonly timestamp: string;
}

/**
 * Maps each event name to its payload type.
 * Drives the generic signatures of `on()`, `off()`, and `emit()`.
 */
export interface SubscriptionEventPayloadMap {
  [EVENT_SUBSCRIPTION_DETECTED]: SubscriptionDetectedEventPayload;
  [EVENT_SUBSCRIPTION_UPDATED]: SubscriptionUpdatedEventPayload;
  [EVENT_EMAIL_CLASSIFIED]: EmailClassifiedEventPayload;
  [EVENT_DECISION_APPLIED]: DecisionAppliedEventPayload;
}

export type SubscriptionEventListener<E extends SubscriptionEventName> = (
  payload: SubscriptionEventPayloadMap[E],
) => void;

interface ListenerEntry<E extends SubscriptionEventName> {
  readonly listener: SubscriptionEventListener<E>;
  readonly once: boolean;
}

type ListenerRegistry = {
  [E in SubscriptionEventName]: Array<ListenerEntry<E>>;
};

// ---------------------------------------------------------------------------
// SubscriptionEventEmitter
// ---------------------------------------------------------------------------

/**
 * Typed publish-subscribe event emitter.
 *
 * Supports multiple listeners per event, ordered registration, and
 * once-only listeners. All operations are synchronous.
 */
export class SubscriptionEventEmitter {
  readonly #listeners: ListenerRegistry = {
    [EVENT_SUBSCRIPTION_DETECTED]: [],
    [EVENT_SUBSCRIPTION_UPDATED]: [],
    [EVENT_EMAIL_CLASSIFIED]: [],
    [EVENT_DECISION_APPLIED]: [],
  };

  /**
   * Register a persistent listener. Returns `this` for chaining.
   */
  on<E extends SubscriptionEventName>(event: E, listener: SubscriptionEventListener<E>): this {
    this.#entries(event).push({ listener, once: false });
    return this;
  }

  /**
   * Register a listener that is removed after its first invocation.
   */
  once<E extends SubscriptionEventName>(event: E, listener: SubscriptionEventListener<E>): this {
    this.#entries(event).push({ listener, once: true });
    return this;
  }

  /**
   * Remove the first registration of `listener` for `event`.
   */
  off<E extends SubscriptionEventName>(event: E, listener: SubscriptionEventListener<E>): this {
    const entries = this.#entries(event);
    const index = entries.findIndex((entry) => entry.listener === listener);
    if (index !== -1) {
      entries.splice(index, 1);
    }
    return this;
  }

  /**
   * Invoke every listener for `event` in registration order.
   *
   * One-shot listeners are removed before invocation so a listener that
   * re-emits the same event cannot fire twice.
   *
   * @returns `true` if at least one listener was invoked.
   */
  emit<E extends SubscriptionEventName>(event: E, payload: SubscriptionEventPayloadMap[E]): boolean {
    const entries = this.#entries(event);
    if (entries.length === 0) return false;

    // Listeners added or removed during emission do not affect this call.
    const snapshot = [...entries];
    const remaining = entries.filter((entry) => !entry.once);
    entries.splice(0, entries.length, ...remaining);

    for (const { listener } of snapshot) {
      listener(payload);
    }
    return true;
  }

  /**
   * Remove all listeners for `event`, or for every event when omitted.
   */
  removeAllListeners(event?: SubscriptionEventName): this {
    const events = event !== undefined ? [event] : EVENT_NAMES;
    for (const name of events) {
      this.#entries(name).length = 0;
    }
    return this;
  }

  listenerCount(event: SubscriptionEventName): number {
    return this.#entries(event).length;
  }

  listeners<E extends SubscriptionEventName>(event: E): ReadonlyArray<SubscriptionEventListener<E>> {
    return this.#entries(event).map((entry) => entry.listener);
  }

  #entries<E extends SubscriptionEventName>(event: E): Array<ListenerEntry<E>> {
    return this.#listeners[event];
  }
}
