// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';

// ─── Inbound events ─────────────────────────────────────────────────────────

export const TransactionInputSchema = z.object({
  /** Description as it appears on the bank statement. */
  description: z.string(),
  /** Signed amount; negative for a debit. */
  amount: z.number().finite(),
  /** When the transaction was posted. */
  timestamp: z.date(),
});
export type TransactionInput = z.infer<typeof TransactionInputSchema>;

export const EmailInputSchema = z.object({
  subject: z.string(),
  body: z.string(),
  timestamp: z.date(),
});
export type EmailInput = z.infer<typeof EmailInputSchema>;

export const DecisionSchema = z.enum(['cancel', 'renew']);
export type Decision = z.infer<typeof DecisionSchema>;

// ─── Subscription ────────────────────────────────────────────────────────────

export type SubscriptionStatus = 'active' | 'cancelled';

/**
 * Calendar date without a time component, formatted `yyyy-MM-dd`.
 * Lexicographic order matches chronological order.
 */
export type CalendarDate = string;

export interface Subscription {
  readonly id: number;
  /** Human-capitalized provider name derived from the statement text. */
  readonly provider: string;
  /** Verbatim statement description the subscription was detected from. */
  readonly reference: string;
  readonly monthlyCost: number;
  readonly nextRenewalDate: CalendarDate;
  readonly status: SubscriptionStatus;
  readonly lastTransactionAt: Date;
  readonly notes?: string;
}

// ─── Ledger ──────────────────────────────────────────────────────────────────

export interface TransactionRecord {
  readonly id: number;
  readonly descriptionKey: string;
  readonly description: string;
  readonly amount: number;
  readonly timestamp: Date;
  readonly subscriptionId?: number;
}

export const TransactionFilterSchema = z.object({
  subscriptionId: z.number().int().positive().optional(),
  since: z.date().optional(),
  until: z.date().optional(),
}).optional();
export type TransactionFilter = z.infer<typeof TransactionFilterSchema>;

// ─── Email ───────────────────────────────────────────────────────────────────

export type EmailTag = 'renewal_notice' | 'price_increase';

export interface EmailRecord {
  readonly id: number;
  readonly subject: string;
  readonly body: string;
  readonly timestamp: Date;
  readonly tags: ReadonlySet<EmailTag>;
}

// ─── Dashboard ───────────────────────────────────────────────────────────────

export interface DashboardSummary {
  readonly activeSubscriptions: number;
  readonly cancelledSubscriptions: number;
  readonly monthlyCommitment: number;
  readonly totalSavings: number;
  /** Active subscriptions renewing within the horizon, earliest first. */
  readonly upcomingRenewals: readonly Subscription[];
}
