// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/chat.message-history.v1.contract`
 * Purpose: Contract for reading the display history of the chat session.
 * Scope: Edge IO definition with DTOs that isolate internal message types. Does not contain business logic.
 * Invariants: No system messages; insertion order; content flattened to text.
 * Side-effects: none
 * Links: GET /api/message_history
 * @internal
 */

import { z } from "zod";

export const HistoryMessageDtoSchema = z.object({
  role: z.enum(["user", "assistant", "tool"]),
  content: z.string(),
  timestamp: z.string().optional(),
});

export const chatMessageHistoryOperation = {
  id: "chat.message_history.v1",
  summary: "Conversation history",
  description:
    "Returns every user, assistant and tool message in insertion order. System messages are never included.",
  input: null,
  output: z.object({
    messageHistory: z.array(HistoryMessageDtoSchema),
  }),
} as const;
