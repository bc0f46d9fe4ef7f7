// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { buildDashboard } from '../src/dashboard.js';
import { SubscriptionEngine } from '../src/engine.js';
import type { Subscription } from '../src/types.js';

// ── Helpers ───────────────────────────────────────────────────────────────────

function subscription(overrides: Partial<Subscription> & Pick<Subscription, 'id'>): Subscription {
  return {
    provider: `Provider ${overrides.id}`,
    reference: `Provider ${overrides.id} charge`,
    monthlyCost: 10,
    nextRenewalDate: '2026-03-10',
    status: 'active',
    lastTransactionAt: new Date(2026, 1, 10, 12),
    ...overrides,
  };
}

const TODAY = new Date(2026, 2, 1, 9); // 2026-03-01

const FIXTURE: readonly Subscription[] = [
  subscription({ id: 1, nextRenewalDate: '2026-03-10', monthlyCost: 10 }),
  subscription({ id: 2, nextRenewalDate: '2026-03-05', monthlyCost: 20.5 }),
  subscription({ id: 3, nextRenewalDate: '2026-03-01', monthlyCost: 5, status: 'cancelled' }),
  subscription({ id: 4, nextRenewalDate: '2026-04-30', monthlyCost: 7.25 }),
  subscription({ id: 5, nextRenewalDate: '2026-03-05', monthlyCost: 1 }),
];

// ── Tests ─────────────────────────────────────────────────────────────────────

describe('buildDashboard', () => {
  it('counts active and cancelled subscriptions', () => {
    const summary = buildDashboard(FIXTURE, 0, TODAY, 14);
    expect(summary.activeSubscriptions).toBe(4);
    expect(summary.cancelledSubscriptions).toBe(1);
  });

  it('sums the monthly cost of active subscriptions only', () => {
    expect(buildDashboard(FIXTURE, 0, TODAY, 14).monthlyCommitment).toBe(38.75);
  });

  it('rounds total savings to 2 decimals', () => {
    expect(buildDashboard(FIXTURE, 12.3456, TODAY, 14).totalSavings).toBe(12.35);
  });

  it('lists active renewals within the horizon, earliest first, stable on ties', () => {
    const ids = buildDashboard(FIXTURE, 0, TODAY, 14).upcomingRenewals.map((entry) => entry.id);
    expect(ids).toEqual([2, 5, 1]);
  });

  it('includes renewals falling exactly on the horizon', () => {
    const ids = buildDashboard(FIXTURE, 0, TODAY, 4).upcomingRenewals.map((entry) => entry.id);
    expect(ids).toEqual([2, 5]);
  });

  it('excludes cancelled subscriptions even when their date is due', () => {
    expect(buildDashboard(FIXTURE, 0, TODAY, 0).upcomingRenewals).toEqual([]);
  });

  it('keeps overdue active renewals', () => {
    const overdue = subscription({ id: 6, nextRenewalDate: '2026-02-20' });
    const ids = buildDashboard([...FIXTURE, overdue], 0, TODAY, 14).upcomingRenewals.map((entry) => entry.id);
    expect(ids).toEqual([6, 2, 5, 1]);
  });

  it('does not reorder or mutate its input', () => {
    const input = [...FIXTURE];
    buildDashboard(input, 0, TODAY, 60);
    expect(input.map((entry) => entry.id)).toEqual([1, 2, 3, 4, 5]);
  });

  it('rejects a negative or fractional horizon', () => {
    expect(() => buildDashboard(FIXTURE, 0, TODAY, -1)).toThrow(RangeError);
    expect(() => buildDashboard(FIXTURE, 0, TODAY, 1.5)).toThrow(RangeError);
  });
});

describe('SubscriptionEngine.dashboard', () => {
  function seeded(config: unknown = {}): SubscriptionEngine {
    // Clock: 2026-02-20. Spotify renews 2026-03-02, Netflix 2026-03-07.
    const engine = new SubscriptionEngine(config, () => new Date(2026, 1, 20, 8));
    engine.registerTransaction({ description: 'Spotify ABO', amount: -99, timestamp: new Date(2026, 0, 1, 12) });
    engine.registerTransaction({ description: 'Spotify ABO', amount: -99, timestamp: new Date(2026, 0, 31, 12) });
    engine.registerTransaction({ description: 'Netflix', amount: -129, timestamp: new Date(2026, 0, 6, 12) });
    engine.registerTransaction({ description: 'Netflix', amount: -129, timestamp: new Date(2026, 1, 5, 12) });
    return engine;
  }

  it('defaults to a 14-day horizon', () => {
    const summary = seeded().dashboard();
    expect(summary.upcomingRenewals.map((entry) => entry.provider)).toEqual(['Spotify']);
    expect(summary.monthlyCommitment).toBe(228);
  });

  it('accepts an explicit horizon', () => {
    const summary = seeded().dashboard(30);
    expect(summary.upcomingRenewals.map((entry) => entry.provider)).toEqual(['Spotify', 'Netflix']);
  });

  it('takes its default horizon from config', () => {
    const summary = seeded({ dashboardHorizonDays: 2 }).dashboard();
    expect(summary.upcomingRenewals).toEqual([]);
  });

  it('drops cancelled subscriptions from the commitment and adds them to savings', () => {
    const engine = seeded();
    engine.applyDecision(2, 'cancel');
    const summary = engine.dashboard(30);
    expect(summary.activeSubscriptions).toBe(1);
    expect(summary.cancelledSubscriptions).toBe(1);
    expect(summary.monthlyCommitment).toBe(99);
    expect(summary.totalSavings).toBe(129);
    expect(summary.upcomingRenewals.map((entry) => entry.provider)).toEqual(['Spotify']);
  });
});
