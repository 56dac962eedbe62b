// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/chat/history.server`
 * Purpose: App-layer coordinator for reading and clearing the chat session.
 * Scope: Maps stored messages to DTOs, exposes the latest answer, clears history. Does not contain business logic or HTTP concerns.
 * Invariants: System messages never leave this layer; propagates SessionBusyError on clear.
 * Side-effects: IO (via resolved dependencies)
 * Links: Called by /api/message_history, /api/model_response and /api/clear_history
 * @public
 */

import type { z } from "zod";

import { resolveChatDeps } from "@/bootstrap/container";
import type { chatClearHistoryOperation } from "@/contracts/chat.clear-history.v1.contract";
import type { chatMessageHistoryOperation } from "@/contracts/chat.message-history.v1.contract";
import type { chatModelResponseOperation } from "@/contracts/chat.model-response.v1.contract";
import { toMessageDto } from "@/features/chat/public.server";
import type { RequestContext } from "@/shared/observability";

type MessageHistoryOutput = z.infer<typeof chatMessageHistoryOperation.output>;
type ModelResponseOutput = z.infer<typeof chatModelResponseOperation.output>;
type ClearHistoryOutput = z.infer<typeof chatClearHistoryOperation.output>;
type HistoryRole = MessageHistoryOutput["messageHistory"][number]["role"];

function isDisplayRole(role: string): role is HistoryRole {
  return role === "user" || role === "assistant" || role === "tool";
}

export function getMessageHistory(): MessageHistoryOutput {
  const { chatOrchestrator } = resolveChatDeps();
  const messageHistory: MessageHistoryOutput["messageHistory"] = [];
  for (const message of chatOrchestrator.getHistory()) {
    const dto = toMessageDto(message);
    // getHistory() already drops system messages; this narrows the role
    if (!isDisplayRole(dto.role)) continue;
    messageHistory.push({ ...dto, role: dto.role });
  }
  return { messageHistory };
}

export function getModelResponse(): ModelResponseOutput {
  const { chatOrchestrator } = resolveChatDeps();
  return { modelResponse: chatOrchestrator.getLatestAnswer() };
}

export async function clearHistory(
  ctx: RequestContext
): Promise<ClearHistoryOutput> {
  const { chatOrchestrator } = resolveChatDeps();
  await chatOrchestrator.clearHistory(ctx);
  return { status: "success", message: "Message history cleared" };
}
