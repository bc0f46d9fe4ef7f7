// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

const NON_ALPHANUMERIC = /[^\p{L}\p{N}]/gu;
const NON_LETTER_OR_SPACE = /[^\p{L}\s]/gu;
const LETTER = /\p{L}/u;

/**
 * Reduce a statement description to its matching key: lower-cased letters and
 * digits only. "Spotify ABO" and "spotify-abo" collide on `spotifyabo`.
 */
export function normalizeDescription(description: string): string {
  return description.toLowerCase().replace(NON_ALPHANUMERIC, '');
}

/**
 * Derive a provider name from free text.
 *
 * Digits and punctuation become word breaks; the first remaining word is
 * capitalized ("Disney+ order" → "Disney"). Text with no letters at all falls
 * back to a trimmed, title-cased copy of the input.
 */
export function deriveProviderName(reference: string): string {
  const tokens = reference
    .replace(NON_LETTER_OR_SPACE, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 0);

  const first = tokens[0];
  if (first === undefined) return titleCase(reference.trim());
  return capitalize(first);
}

/** Upper-case the first character and lower-case the rest. */
export function capitalize(word: string): string {
  const [head = '', ...rest] = Array.from(word);
  return head.toUpperCase() + rest.join('').toLowerCase();
}

/**
 * Upper-case every letter that follows a non-letter and lower-case all other
 * letters: "4k TV-plus" → "4K Tv-Plus".
 */
export function titleCase(text: string): string {
  let result = '';
  let previousWasLetter = false;
  for (const char of text) {
    if (LETTER.test(char)) {
      result += previousWasLetter ? char.toLowerCase() : char.toUpperCase();
      previousWasLetter = true;
    } else {
      result += char;
      previousWasLetter = false;
    }
  }
  return result;
}
