// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/chat.clear-history.v1.contract`
 * Purpose: Contract for clearing the chat session.
 * Scope: Edge IO definition. Does not contain business logic.
 * Invariants: Idempotent; 409 while a turn is running.
 * Side-effects: none
 * Links: POST /api/clear_history
 * @internal
 */

import { z } from "zod";

export const chatClearHistoryOperation = {
  id: "chat.clear_history.v1",
  summary: "Clear conversation history",
  description:
    "Empties the conversation history and resets the latest model response.",
  input: null,
  output: z.object({
    status: z.literal("success"),
    message: z.literal("Message history cleared"),
  }),
} as const;
