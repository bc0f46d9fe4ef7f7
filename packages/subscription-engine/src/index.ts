// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @subtrack/subscription-engine — recurring-payment detection and lifecycle.
 *
 * Public API surface:
 *
 * Engine
 *   SubscriptionEngine   — ingest transactions and emails, apply decisions, read the dashboard
 *
 * Building blocks (usable standalone or via SubscriptionEngine)
 *   Ledger, SubscriptionRegistry, MatchingEngine, EmailCorrelator,
 *   DecisionProcessor, buildDashboard
 *
 * Text helpers
 *   normalizeDescription, deriveProviderName, classifyEmail
 *
 * Config (Zod schema + parsed types), inbound schemas, errors, events
 */

// ─── Core class ──────────────────────────────────────────────────────────────
export { SubscriptionEngine } from './engine.js';
export type { Clock } from './engine.js';

// ─── Types ───────────────────────────────────────────────────────────────────
export type {
  CalendarDate,
  DashboardSummary,
  Decision,
  EmailInput,
  EmailRecord,
  EmailTag,
  Subscription,
  SubscriptionStatus,
  TransactionFilter,
  TransactionInput,
  TransactionRecord,
} from './types.js';

// ─── Zod schemas (for downstream validation) ─────────────────────────────────
export {
  DecisionSchema,
  EmailInputSchema,
  TransactionFilterSchema,
  TransactionInputSchema,
} from './types.js';

// ─── Config ──────────────────────────────────────────────────────────────────
export {
  EngineConfigSchema,
  parseEngineConfig,
  DEFAULT_RENEWAL_KEYWORDS,
  DEFAULT_PRICE_INCREASE_KEYWORDS,
} from './config.js';
export type { EngineConfig, EngineConfigInput, KeywordConfig } from './config.js';

// ─── Errors ──────────────────────────────────────────────────────────────────
export {
  SubscriptionEngineError,
  SubscriptionNotFoundError,
  InvalidInputError,
  InvalidConfigError,
} from './errors.js';

// ─── Events ──────────────────────────────────────────────────────────────────
export {
  SubscriptionEventEmitter,
  EVENT_SUBSCRIPTION_DETECTED,
  EVENT_SUBSCRIPTION_UPDATED,
  EVENT_EMAIL_CLASSIFIED,
  EVENT_DECISION_APPLIED,
} from './events.js';
export type {
  SubscriptionEventName,
  SubscriptionEventListener,
  SubscriptionEventPayloadMap,
  SubscriptionDetectedEventPayload,
  SubscriptionUpdatedEventPayload,
  SubscriptionUpdateCause,
  EmailClassifiedEventPayload,
  DecisionAppliedEventPayload,
} from './events.js';

// ─── Building blocks ─────────────────────────────────────────────────────────
export { Ledger } from './storage/ledger.js';
export { SubscriptionRegistry } from './storage/registry.js';
export type { SubscriptionDraft, SubscriptionPatch } from './storage/registry.js';
export { MatchingEngine } from './matching.js';
export type { MatchOutcome } from './matching.js';
export { EmailCorrelator, RENEWAL_REMINDER_NOTE, priceIncreaseNote } from './correlator.js';
export { DecisionProcessor, CANCELLED_NOTE, RENEWED_NOTE } from './decisions.js';
export type { DecisionResult } from './decisions.js';
export { buildDashboard } from './dashboard.js';

// ─── Utilities ───────────────────────────────────────────────────────────────
export { normalizeDescription, deriveProviderName, capitalize, titleCase } from './normalize.js';
export { classifyEmail } from './classifier.js';
export { roundCurrency, meanAmount, monthlyCostOf } from './amounts.js';
export { toCalendarDate, calendarDateAfter, shiftCalendarDate, wholeDaysBetween } from './dates.js';
