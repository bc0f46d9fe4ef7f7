// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { calendarDateAfter, toCalendarDate } from './dates.js';
import { deriveProviderName } from './normalize.js';
import type { EngineConfig } from './config.js';
import type { SubscriptionRegistry } from './storage/registry.js';
import type { EmailRecord } from './types.js';

export const RENEWAL_REMINDER_NOTE = 'Renewal reminder synced from email';

export function priceIncreaseNote(emailTimestamp: Date): string {
  return `Price increase detected on ${toCalendarDate(emailTimestamp)}`;
}

/**
 * Applies a classified email to the registry.
 *
 * - `price_increase` annotates every subscription, active or cancelled,
 *   whatever provider the email is about.
 * - `renewal_notice` moves the renewal of every subscription whose provider
 *   matches the one derived from the subject (case-insensitive) to
 *   `reminderLeadDays` after the email.
 *
 * The price note is written first, so a subscription hit by both effects ends
 * up with the renewal note.
 */
export class EmailCorrelator {
  constructor(
    private readonly registry: SubscriptionRegistry,
    private readonly config: Pick<EngineConfig, 'reminderLeadDays'>,
  ) {}

  /** Returns the ids of every subscription whose snapshot was replaced. */
  correlate(email: EmailRecord): readonly number[] {
    const touched = new Set<number>();

    if (email.tags.has('price_increase')) {
      const notes = priceIncreaseNote(email.timestamp);
      for (const subscription of this.registry.list()) {
        this.registry.update(subscription.id, { notes });
        touched.add(subscription.id);
      }
    }

    if (email.tags.has('renewal_notice')) {
      const provider = deriveProviderName(email.subject).toLowerCase();
      const nextRenewalDate = calendarDateAfter(email.timestamp, this.config.reminderLeadDays);
      for (const subscription of this.registry.list()) {
        if (subscription.provider.toLowerCase() !== provider) continue;
        this.registry.update(subscription.id, {
          nextRenewalDate,
          notes: RENEWAL_REMINDER_NOTE,
        });
        touched.add(subscription.id);
      }
    }

    return Array.from(touched).sort((a, b) => a - b);
  }
}
