// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { normalizeDescription, deriveProviderName, titleCase, capitalize } from '../src/normalize.js';

describe('normalizeDescription', () => {
  it('lower-cases and strips everything that is not a letter or digit', () => {
    expect(normalizeDescription('Spotify ABO')).toBe('spotifyabo');
    expect(normalizeDescription('  SPOTIFY-abo!! ')).toBe('spotifyabo');
  });

  it('keeps digits and non-ASCII letters', () => {
    expect(normalizeDescription('Viaplay Förnyelse 2026')).toBe('viaplayförnyelse2026');
  });

  it('maps descriptions without any alphanumerics to the empty key', () => {
    expect(normalizeDescription('*** / ***')).toBe('');
  });
});

describe('deriveProviderName', () => {
  it('takes the first word and capitalizes it', () => {
    expect(deriveProviderName('Netflix subscription')).toBe('Netflix');
    expect(deriveProviderName('SPOTIFY ABO')).toBe('Spotify');
  });

  it('treats punctuation and digits as word breaks', () => {
    expect(deriveProviderName('Disney+ order')).toBe('Disney');
    expect(deriveProviderName('123*hbo max')).toBe('Hbo');
  });

  it('falls back to the trimmed, title-cased text when there are no letters', () => {
    expect(deriveProviderName('  4711-0042  ')).toBe('4711-0042');
    expect(deriveProviderName('   ')).toBe('');
  });
});

describe('titleCase / capitalize', () => {
  it('upper-cases letters that follow a non-letter', () => {
    expect(titleCase('4k TV-plus')).toBe('4K Tv-Plus');
  });

  it('lower-cases everything after the first character', () => {
    expect(capitalize('yOUTUBE')).toBe('Youtube');
    expect(capitalize('')).toBe('');
  });
});
