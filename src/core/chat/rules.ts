// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/rules`
 * Purpose: Pure business rules and message construction for the chat session.
 * Scope: Input validation, tool-call and tool-result message drafts, display filtering and text flattening. Does not handle I/O or time dependencies.
 * Invariants: All functions are pure and deterministic; one tool message per tool result, in the order given.
 * Side-effects: none (throws on validation failure)
 * Notes: Character counts use code points so multi-byte input is measured correctly.
 * Links: Used by features for business rule enforcement
 * @public
 */

import type {
  ContentPart,
  Message,
  MessageDraft,
  SystemMarker,
  ToolCallRequest,
  ToolResult,
} from "./model";

// Constants and errors defined in core
export const MAX_MESSAGE_CHARS = 4000;

export enum ChatErrorCode {
  EMPTY_MESSAGE = "EMPTY_MESSAGE",
  MESSAGE_TOO_LONG = "MESSAGE_TOO_LONG",
}

export class ChatValidationError extends Error {
  constructor(
    public code: ChatErrorCode,
    message: string
  ) {
    super(message);
    this.name = "ChatValidationError";
  }
}

export function isChatValidationError(
  error: unknown
): error is ChatValidationError {
  return error instanceof ChatValidationError;
}

/**
 * Parameterized validation - throws ChatValidationError on failure
 * @param content - Message content to validate
 * @param maxChars - Maximum allowed character count
 * @throws ChatValidationError when content exceeds limit
 */
export function assertMessageLength(content: string, maxChars: number): void {
  const actualLength = Array.from(content).length;

  if (actualLength > maxChars) {
    throw new ChatValidationError(
      ChatErrorCode.MESSAGE_TOO_LONG,
      `Message length ${actualLength} exceeds maximum ${maxChars} characters`
    );
  }
}

/**
 * Validates user input and returns the text to store.
 * Whitespace-only input is rejected; non-empty input is stored as given.
 */
export function assertUserMessage(
  text: string,
  maxChars: number = MAX_MESSAGE_CHARS
): string {
  if (text.trim().length === 0) {
    throw new ChatValidationError(
      ChatErrorCode.EMPTY_MESSAGE,
      "Message is required"
    );
  }
  assertMessageLength(text, maxChars);
  return text;
}

/**
 * System message filtering (server-side only)
 * @returns Messages with system messages removed
 */
export function filterSystemMessages(
  messages: readonly Message[]
): Message[] {
  return messages.filter((message) => message.role !== "system");
}

/** Display rendering of a tool invocation, e.g. `get_weather({"city":"Seattle"})`. */
export function renderToolCall(
  toolName: string,
  args: Readonly<Record<string, unknown>>
): string {
  return `${toolName}(${JSON.stringify(args)})`;
}

function partText(part: ContentPart): string {
  switch (part.type) {
    case "text":
    case "tool_call":
      return part.text;
    case "tool_result":
      return part.content;
  }
}

/** Flattens message content to a single string (parts joined by newline). */
export function messageText(message: Pick<Message, "content">): string {
  if (typeof message.content === "string") return message.content;
  return message.content.map(partText).join("\n");
}

/**
 * Builds the assistant message that records every tool call of one round.
 * Any text the model sent alongside the calls is kept as a leading text part.
 */
export function toolCallsDraft(
  calls: readonly ToolCallRequest[],
  text?: string
): MessageDraft {
  const parts: ContentPart[] = [];
  if (text && text.trim().length > 0) {
    parts.push({ type: "text", text });
  }
  for (const call of calls) {
    parts.push({
      type: "tool_call",
      toolCallId: call.id,
      toolName: call.toolName,
      arguments: call.arguments,
      rawArguments: call.rawArguments,
      text: renderToolCall(call.toolName, call.arguments),
    });
  }
  return { role: "assistant", content: parts };
}

/** Text the model sees for a tool result. */
export function toolResultContent(result: ToolResult): string {
  if (result.success) return result.payload.text;
  return `Tool ${result.toolName} failed (${result.errorCode}): ${result.errorDetail}`;
}

export function toolResultDraft(result: ToolResult): MessageDraft {
  return {
    role: "tool",
    toolCallId: result.toolCallId,
    content: [
      {
        type: "tool_result",
        toolCallId: result.toolCallId,
        toolName: result.toolName,
        success: result.success,
        isError: result.success ? result.payload.isError : true,
        ...(result.success ? {} : { errorCode: result.errorCode }),
        content: toolResultContent(result),
      },
    ],
  };
}

const MARKER_TEXT: Record<SystemMarker, string> = {
  round_limit:
    "Tool-call round limit reached before the model produced a final answer.",
  model_failure: "The language model could not be reached for this turn.",
};

export function markerDraft(marker: SystemMarker, detail?: string): MessageDraft {
  return {
    role: "system",
    marker,
    content: detail ? `${MARKER_TEXT[marker]} (${detail})` : MARKER_TEXT[marker],
  };
}
