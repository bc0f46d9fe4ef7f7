// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { DEFAULT_PRICE_INCREASE_KEYWORDS, DEFAULT_RENEWAL_KEYWORDS } from './config.js';
import type { KeywordConfig } from './config.js';
import type { EmailTag } from './types.js';

const DEFAULT_KEYWORDS: KeywordConfig = {
  renewal: [...DEFAULT_RENEWAL_KEYWORDS],
  priceIncrease: [...DEFAULT_PRICE_INCREASE_KEYWORDS],
};

/**
 * Tag an email by keyword signal. Matching is a case-insensitive substring
 * search over the subject and body together; the two tags are independent.
 */
export function classifyEmail(
  subject: string,
  body: string,
  keywords: KeywordConfig = DEFAULT_KEYWORDS,
): ReadonlySet<EmailTag> {
  const text = `${subject} ${body}`.toLowerCase();
  const tags = new Set<EmailTag>();

  if (keywords.renewal.some((keyword) => text.includes(keyword))) {
    tags.add('renewal_notice');
  }
  if (keywords.priceIncrease.some((keyword) => text.includes(keyword))) {
    tags.add('price_increase');
  }

  return tags;
}
