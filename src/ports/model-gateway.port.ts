// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/model-gateway.port`
 * Purpose: Language-model abstraction for one chat-completion call with tool support.
 * Scope: Request/response shapes for a single non-streaming call. Does not loop, retry or execute tools.
 * Invariants: Only depends on core domain types; an outcome is either final text or a non-empty list of tool calls; failures throw LlmError.
 * Side-effects: none (interface only)
 * Notes: Tool definitions are passed through from the tool catalog; the gateway translates them to the provider's function-calling format.
 * Links: Implemented by adapters/server/ai, used by features/chat
 * @public
 */

import type { Message, ToolCallRequest } from "@/core";

// Re-export error types for adapters
export {
  classifyLlmErrorFromStatus,
  isLlmError,
  LlmError,
  type LlmErrorKind,
} from "@/core";

/**
 * JSON Schema for tool parameters, as advertised by the tool server.
 * Only `type` is pinned; `properties`, `required`, `$defs` and every other
 * keyword pass through to the model untouched.
 */
export interface JsonSchemaObject {
  readonly type: "object";
  readonly [keyword: string]: unknown;
}

/** Tool advertised to the model. */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: JsonSchemaObject;
}

export type ModelOutcome =
  | { readonly kind: "final"; readonly text: string }
  | {
      readonly kind: "tool_calls";
      readonly calls: readonly ToolCallRequest[];
      /** Text the model sent alongside its tool calls, if any */
      readonly text?: string;
    };

export interface ModelCallOptions {
  /** Correlation ID forwarded to adapter logs */
  readonly requestId?: string;
  readonly abortSignal?: AbortSignal;
}

export interface ModelGateway {
  /**
   * Sends the full history and tool catalog; returns the model's next step.
   * @throws LlmError on transport, HTTP or response-shape failure
   */
  complete(
    history: readonly Message[],
    tools: readonly ToolDescriptor[],
    options?: ModelCallOptions
  ): Promise<ModelOutcome>;
}
