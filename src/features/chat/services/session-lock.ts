// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/chat/services/session-lock`
 * Purpose: Per-session mutual exclusion around the orchestration loop.
 * Scope: Runs one task at a time. Does not time out tasks.
 * Invariants: At most one task runs; "reject" fails fast with SessionBusyError; "queue" runs tasks in arrival order; a failing task releases the lock.
 * Side-effects: none
 * @internal
 */

import { SessionBusyError } from "../errors";

export type BusyPolicy = "reject" | "queue";

export class SessionLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(private readonly policy: BusyPolicy) {}

  async run<T>(task: () => Promise<T>): Promise<T> {
    // Check and claim happen synchronously, so two callers never both pass
    if (this.policy === "reject" && this.pending > 0) {
      throw new SessionBusyError();
    }
    this.pending += 1;

    const current = this.tail.then(task);
    this.tail = current.then(
      () => undefined,
      () => undefined
    );

    try {
      return await current;
    } finally {
      this.pending -= 1;
    }
  }
}
