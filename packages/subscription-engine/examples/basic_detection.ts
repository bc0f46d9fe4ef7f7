// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * basic_detection.ts
 *
 * Walks one engine through its whole lifecycle:
 *   1. Feed two months of bank transactions; subscriptions appear on the second charge.
 *   2. Ingest a renewal reminder email for one provider.
 *   3. Cancel another subscription.
 *   4. Print the dashboard.
 *
 * Run with:  npx tsx examples/basic_detection.ts
 */

import {
  EVENT_SUBSCRIPTION_DETECTED,
  SubscriptionEngine,
} from '../src/index.js';

// ─── Setup ────────────────────────────────────────────────────────────────────

const today = new Date();
const daysAgo = (days: number): Date => new Date(today.getTime() - days * 86_400_000);

const engine = new SubscriptionEngine();

engine.events.on(EVENT_SUBSCRIPTION_DETECTED, ({ subscription }) => {
  console.log(`Detected #${subscription.id} ${subscription.provider}  ${subscription.monthlyCost.toFixed(2)}/month`);
});

// ─── Statement lines ──────────────────────────────────────────────────────────

const statement = [
  { description: 'Spotify ABO', amount: -99, timestamp: daysAgo(58) },
  { description: 'Netflix subscription', amount: -129, timestamp: daysAgo(45) },
  { description: 'Grocery store 114', amount: -412.3, timestamp: daysAgo(40) },
  { description: 'Spotify ABO', amount: -99, timestamp: daysAgo(28) },
  { description: 'Netflix subscription', amount: -129, timestamp: daysAgo(15) },
];

for (const line of statement) {
  engine.registerTransaction(line);
}

// ─── Inbox ────────────────────────────────────────────────────────────────────

const email = engine.ingestEmail({
  subject: 'Spotify renewal reminder',
  body: 'Your Premium plan will renew next week.',
  timestamp: today,
});
console.log(`\nEmail tagged: ${[...email.tags].join(', ') || '(none)'}`);

// ─── Decision ─────────────────────────────────────────────────────────────────

const netflix = engine.subscriptions.find((subscription) => subscription.provider === 'Netflix');
if (netflix !== undefined) {
  engine.applyDecision(netflix.id, 'cancel');
}

// ─── Dashboard ────────────────────────────────────────────────────────────────

const summary = engine.dashboard();

console.log('\n── Dashboard ─────────────────────────────────────────');
console.log(`  Active             : ${summary.activeSubscriptions}`);
console.log(`  Cancelled          : ${summary.cancelledSubscriptions}`);
console.log(`  Monthly commitment : ${summary.monthlyCommitment.toFixed(2)}`);
console.log(`  Total savings      : ${summary.totalSavings.toFixed(2)}`);
console.log('  Upcoming renewals  :');
for (const subscription of summary.upcomingRenewals) {
  console.log(`    ${subscription.nextRenewalDate}  ${subscription.provider}  (${subscription.notes ?? 'no note'})`);
}
console.log('──────────────────────────────────────────────────────');
