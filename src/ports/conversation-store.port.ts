// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/conversation-store.port`
 * Purpose: Ordered, append-only message log for the single chat session.
 * Scope: Append, snapshot and clear. Does not validate content or decide what gets appended.
 * Invariants: Insertion order is the only ordering; no reordering, no dedup; append-only except clear(); appended messages are immutable.
 * Side-effects: none (interface only)
 * Notes: Only the orchestrator appends. Snapshots are copies; later appends never show up in an earlier snapshot.
 * Links: Implemented by adapters/server/conversation, used by features/chat
 * @public
 */

import type { Message, MessageDraft } from "@/core";

export interface ConversationStore {
  /** Stamps the next sequence number and stores the frozen message. */
  append(draft: MessageDraft): Message;
  snapshot(): readonly Message[];
  /** Empties the log. Idempotent. */
  clear(): void;
  readonly size: number;
}
