// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces, prevents accidental creep/cycles. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Notes: Single entry point for all core domain access
 * Links: Used by features via \@/core alias
 * @public
 */

export {
  classifyLlmErrorFromStatus,
  isLlmError,
  isRetryableLlmError,
  LlmError,
  type LlmErrorKind,
  normalizeLlmErrorToFailureCode,
} from "./ai/errors";
export {
  BASELINE_SYSTEM_PROMPT,
  systemPromptDraft,
} from "./ai/system-prompt.server";
export type {
  ContentPart,
  FinalAnswer,
  FinalAnswerStatus,
  Message,
  MessageDraft,
  MessageRole,
  ModelFailureCode,
  SystemMarker,
  TextPart,
  ToolCallPart,
  ToolCallRequest,
  ToolErrorCode,
  ToolPayload,
  ToolResult,
  ToolResultPart,
} from "./chat/public";
export {
  assertMessageLength,
  assertUserMessage,
  ChatErrorCode,
  ChatValidationError,
  filterSystemMessages,
  isChatValidationError,
  MAX_MESSAGE_CHARS,
  markerDraft,
  messageText,
  renderToolCall,
  toolCallsDraft,
  toolResultContent,
  toolResultDraft,
} from "./chat/public";
