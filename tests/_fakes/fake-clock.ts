// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/fake-clock`
 * Purpose: Clock port double so message timestamps are predictable.
 * Scope: Deterministic time control for tests. Does NOT replace system Date globally.
 * Invariants: Time advances only via explicit calls.
 * Side-effects: none
 * Links: src/ports/clock.port.ts
 * @public
 */

import type { Clock } from "@/ports";

export class FakeClock implements Clock {
  private currentTime: Date;

  constructor(initialTime: string | Date = "2024-01-01T00:00:00.000Z") {
    this.currentTime = new Date(initialTime);
  }

  now(): string {
    return this.currentTime.toISOString();
  }

  monotonicMs(): number {
    return this.currentTime.getTime();
  }

  advance(milliseconds: number): void {
    this.currentTime = new Date(this.currentTime.getTime() + milliseconds);
  }

  setTime(time: string | Date): void {
    this.currentTime = new Date(time);
  }

  reset(): void {
    this.currentTime = new Date("2024-01-01T00:00:00.000Z");
  }
}
