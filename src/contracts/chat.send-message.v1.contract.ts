// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/chat.send-message.v1.contract`
 * Purpose: External API contract for sending one user message through the tool-using chat loop.
 * Scope: Edge IO definition with schema validation. Does not contain business logic.
 * Invariants: Contract remains stable; breaking changes require new version. Empty or oversized messages are rejected by core rules (400), not here.
 * Side-effects: none
 * Links: POST /api/send_message
 * @internal
 */

import { z } from "zod";

/** Mirrors core FinalAnswerStatus */
export const finalAnswerStatusSchema = z.enum([
  "success",
  "incomplete",
  "failed",
]);

export const modelFailureCodeSchema = z.enum([
  "model_auth",
  "model_rate_limited",
  "model_protocol",
  "model_timeout",
  "model_unavailable",
]);

export const chatSendMessageOperation = {
  id: "chat.send_message.v1",
  summary: "Send a chat message",
  description:
    "Appends the user message, runs the model/tool loop to a final answer and returns it. 409 while another turn is running.",
  input: z.object({
    /** Absent is treated as empty and rejected by core rules */
    message: z.string().default(""),
  }),
  output: z.object({
    /** Final answer text (or degraded text when status != success) */
    response: z.string(),
    /** Echo of the user message */
    message: z.string(),
    status: finalAnswerStatusSchema,
    errorCode: modelFailureCodeSchema.optional(),
  }),
} as const;
