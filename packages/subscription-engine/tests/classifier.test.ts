// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { classifyEmail } from '../src/classifier.js';

describe('classifyEmail', () => {
  it('tags renewal notices', () => {
    const tags = classifyEmail('Disney+ renewal reminder', 'Your subscription will renew soon');
    expect([...tags]).toEqual(['renewal_notice']);
  });

  it('tags price increases', () => {
    const tags = classifyEmail('Important update', 'We are announcing a Price Increase from May.');
    expect([...tags]).toEqual(['price_increase']);
  });

  it('applies both tags independently', () => {
    const tags = classifyEmail('Netflix renewal', 'Your plan renews at a higher rate');
    expect(tags.has('renewal_notice')).toBe(true);
    expect(tags.has('price_increase')).toBe(true);
    expect(tags.size).toBe(2);
  });

  it('recognizes the Scandinavian keywords', () => {
    expect(classifyEmail('Din prenumeration förnyas', '').has('renewal_notice')).toBe(true);
    expect(classifyEmail('Viktigt', 'Priset höjs i mars').has('price_increase')).toBe(true);
  });

  it('returns an empty set when no keyword occurs', () => {
    expect(classifyEmail('Weekly digest', 'Nothing to see here').size).toBe(0);
  });

  it('uses caller-supplied keyword sets', () => {
    const tags = classifyEmail('Verlängerung Ihres Abos', '', {
      renewal: ['verlängerung'],
      priceIncrease: ['preiserhöhung'],
    });
    expect([...tags]).toEqual(['renewal_notice']);
  });
});
