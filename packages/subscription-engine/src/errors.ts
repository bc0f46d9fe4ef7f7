// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { ZodError } from 'zod';

/**
 * Base class for all @subtrack/subscription-engine errors.
 *
 * Every error carries a machine-readable `code` that calling code can
 * switch on without parsing human-readable messages.
 */
export class SubscriptionEngineError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'SubscriptionEngineError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when a decision references a subscription id the registry has never
 * assigned. No state is touched before this is raised.
 */
export class SubscriptionNotFoundError extends SubscriptionEngineError {
  readonly subscriptionId: number;

  constructor(subscriptionId: number) {
    super('SUBSCRIPTION_NOT_FOUND', `Subscription ${subscriptionId} not found.`);
    this.name = 'SubscriptionNotFoundError';
    this.subscriptionId = subscriptionId;
  }
}

/**
 * Thrown when an inbound transaction, email or decision is structurally
 * invalid. `details` holds one `path: message` entry per Zod issue.
 */
export class InvalidInputError extends SubscriptionEngineError {
  readonly details: readonly string[];

  constructor(kind: string, details: readonly string[]) {
    super('INVALID_INPUT', `Invalid ${kind}: ${details.join('; ')}`);
    this.name = 'InvalidInputError';
    this.details = details;
  }
}

/**
 * Thrown when engine configuration is structurally or semantically invalid.
 */
export class InvalidConfigError extends SubscriptionEngineError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_CONFIG', `Engine configuration is invalid: ${details.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.details = details;
  }
}

/** Flatten Zod issues into `path: message` strings. */
export function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}
