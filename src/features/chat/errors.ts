// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/chat/errors`
 * Purpose: Feature-level errors for the chat session.
 * Scope: SessionBusyError and its guard. Does not call ports or adapters.
 * Invariants: Pure, no I/O.
 * Side-effects: none
 * Links: src/features/chat/services/session-lock.ts, route handlers (409 mapping)
 * @public
 */

/**
 * Thrown when a turn (or clear) arrives while another one holds the session
 * and the busy policy is "reject".
 */
export class SessionBusyError extends Error {
  readonly kind = "SESSION_BUSY" as const;

  constructor() {
    super("A message is already being processed for this session");
    this.name = "SessionBusyError";
  }
}

export function isSessionBusyError(error: unknown): error is SessionBusyError {
  return error instanceof SessionBusyError;
}
