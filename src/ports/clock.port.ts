// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Wall-clock and monotonic time source for the chat feature.
 * Scope: Message timestamps and turn durations. Does not schedule or sleep.
 * Invariants: now() is ISO 8601 UTC; monotonicMs() never decreases within a process.
 * Side-effects: none (interface only)
 * Links: Implemented by adapters/server/time, tests/_fakes/fake-clock.ts
 * @public
 */

export interface Clock {
  /** Timestamp stamped on appended messages */
  now(): string;
  /** Milliseconds from an arbitrary origin; only differences are meaningful */
  monotonicMs(): number;
}
