// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/model`
 * Purpose: Domain entities and value objects for the tool-using chat session.
 * Scope: Pure domain types for messages, content parts, tool-call requests, tool results and final answers. Does not handle I/O or time operations.
 * Invariants: No Date objects, no I/O dependencies; `createdAt` is a store-assigned sequence number, never wall-clock time.
 * Side-effects: none
 * Notes: `timestamp` is an optional ISO string stamped by the feature layer for display only; ordering comes from `createdAt`.
 * Links: Used by ports, features, and adapters
 * @public
 */

export type MessageRole = "system" | "user" | "assistant" | "tool";

/** Diagnostic markers carried by orchestrator-appended system messages. */
export type SystemMarker = "round_limit" | "model_failure";

export interface TextPart {
  readonly type: "text";
  readonly text: string;
}

/**
 * Tool invocation requested by the model, recorded on the assistant message.
 * `text` is a display rendering such as `get_weather({"city":"Seattle"})`.
 */
export interface ToolCallPart {
  readonly type: "tool_call";
  readonly toolCallId: string;
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  /** Argument string exactly as the model produced it */
  readonly rawArguments: string;
  readonly text: string;
}

export interface ToolResultPart {
  readonly type: "tool_result";
  readonly toolCallId: string;
  readonly toolName: string;
  /** False when the exchange itself failed (timeout, unavailable, bad arguments) */
  readonly success: boolean;
  /** True when the tool ran but reported an application-level error */
  readonly isError: boolean;
  readonly errorCode?: ToolErrorCode;
  readonly content: string;
}

export type ContentPart = TextPart | ToolCallPart | ToolResultPart;

export interface Message {
  readonly role: MessageRole;
  readonly content: string | readonly ContentPart[];
  /** Present when role="tool"; correlates to the assistant's ToolCallPart */
  readonly toolCallId?: string;
  /** Monotonic sequence number assigned by the conversation store on append */
  readonly createdAt: number;
  /** ISO 8601 string, optional - set by feature layer */
  readonly timestamp?: string;
  readonly marker?: SystemMarker;
}

/** Message before the store assigns its sequence number. */
export type MessageDraft = Omit<Message, "createdAt">;

/**
 * Ephemeral tool invocation request produced by the model gateway.
 * `argumentsError` is set when the model's argument string is not a JSON object;
 * `arguments` is then empty and the call is answered with a failed result.
 */
export interface ToolCallRequest {
  readonly id: string;
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly rawArguments: string;
  readonly argumentsError?: string;
}

export type ToolErrorCode =
  | "invalid_arguments"
  | "unknown_tool"
  | "unavailable"
  | "timeout"
  | "execution";

export interface ToolPayload {
  readonly text: string;
  readonly isError: boolean;
}

export type ToolResult =
  | {
      readonly toolCallId: string;
      readonly toolName: string;
      readonly success: true;
      readonly payload: ToolPayload;
    }
  | {
      readonly toolCallId: string;
      readonly toolName: string;
      readonly success: false;
      readonly errorCode: ToolErrorCode;
      readonly errorDetail: string;
    };

export type FinalAnswerStatus = "success" | "incomplete" | "failed";

export type ModelFailureCode =
  | "model_auth"
  | "model_rate_limited"
  | "model_protocol"
  | "model_timeout"
  | "model_unavailable";

export interface FinalAnswer {
  readonly status: FinalAnswerStatus;
  readonly text: string;
  /** Loop rounds used by the turn (a retried model call counts once) */
  readonly rounds: number;
  readonly errorCode?: ModelFailureCode;
}
