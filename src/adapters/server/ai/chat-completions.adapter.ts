// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/chat-completions`
 * Purpose: ModelGateway over an OpenAI-compatible `/chat/completions` endpoint with function calling.
 * Scope: Serializes history and tool catalog to the wire format, performs one POST, parses the reply into a tagged outcome. Does not retry, loop or execute tools.
 * Invariants: Never logs prompts/keys/content; one HTTP request per complete(); every failure surfaces as LlmError; malformed replies are kind='protocol'.
 * Side-effects: IO (HTTP calls to the model endpoint), metrics
 * Notes: Azure-style endpoints take an `api-version` query; tool-call arguments that are not a JSON object come back as argumentsError instead of failing the call.
 * Links: ModelGateway port, `@core/ai/errors`
 * @internal
 */

import { z } from "zod";

import { type Message, messageText, type ToolCallRequest } from "@/core";
import {
  classifyLlmErrorFromStatus,
  LlmError,
  type ModelCallOptions,
  type ModelGateway,
  type ModelOutcome,
  type ToolDescriptor,
} from "@/ports";
import {
  EVENT_NAMES,
  makeLogger,
  modelCallDurationMs,
  modelErrorsTotal,
} from "@/shared/observability";

const logger = makeLogger({ component: "ChatCompletionsAdapter" });

export interface ChatCompletionsConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  apiVersion?: string | undefined;
  temperature: number;
  topP: number;
  timeoutMs: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Wire format
// ─────────────────────────────────────────────────────────────────────────────

interface WireToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

type WireMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: WireToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

interface WireTool {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: ToolDescriptor["inputSchema"];
  };
}

const wireToolCallSchema = z.object({
  id: z.string().min(1),
  type: z.literal("function").optional(),
  function: z.object({
    name: z.string().min(1),
    // Some providers send parsed objects instead of JSON strings
    arguments: z
      .union([z.string(), z.record(z.unknown())])
      .nullable()
      .optional(),
  }),
});

const completionResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z.array(wireToolCallSchema).nullable().optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
});

type WireToolCallResponse = z.infer<typeof wireToolCallSchema>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Serializes one stored message into the provider's message shape. */
export function toWireMessage(message: Message): WireMessage {
  switch (message.role) {
    case "system":
    case "user":
      return { role: message.role, content: messageText(message) };
    case "tool": {
      const parts = typeof message.content === "string" ? [] : message.content;
      const resultPart = parts.find((part) => part.type === "tool_result");
      const toolCallId =
        message.toolCallId ??
        (resultPart?.type === "tool_result" ? resultPart.toolCallId : undefined);
      if (!toolCallId) {
        throw new LlmError(
          "Tool message without toolCallId cannot be sent to the model",
          "protocol"
        );
      }
      return { role: "tool", tool_call_id: toolCallId, content: messageText(message) };
    }
    case "assistant": {
      if (typeof message.content === "string") {
        return { role: "assistant", content: message.content };
      }
      const texts: string[] = [];
      const toolCalls: WireToolCall[] = [];
      for (const part of message.content) {
        if (part.type === "tool_call") {
          toolCalls.push({
            id: part.toolCallId,
            type: "function",
            function: { name: part.toolName, arguments: part.rawArguments },
          });
        } else if (part.type === "text") {
          texts.push(part.text);
        }
      }
      const content = texts.length > 0 ? texts.join("\n") : null;
      return toolCalls.length > 0
        ? { role: "assistant", content, tool_calls: toolCalls }
        : { role: "assistant", content: content ?? "" };
    }
  }
}

export function toWireTool(tool: ToolDescriptor): WireTool {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema,
    },
  };
}

/**
 * Parses a model-produced argument string. Empty input means "no arguments".
 * Anything that is not a JSON object yields an empty argument set plus argumentsError.
 */
export function parseToolArguments(
  raw: string
): Pick<ToolCallRequest, "arguments" | "argumentsError"> {
  if (raw.trim().length === 0) return { arguments: {} };
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return { arguments: {}, argumentsError: "Tool arguments are not valid JSON" };
  }
  if (!isPlainObject(value)) {
    return {
      arguments: {},
      argumentsError: "Tool arguments must be a JSON object",
    };
  }
  return { arguments: value };
}

function toToolCallRequest(call: WireToolCallResponse): ToolCallRequest {
  const rawArgs = call.function.arguments;
  const rawArguments =
    typeof rawArgs === "string"
      ? rawArgs
      : rawArgs
        ? JSON.stringify(rawArgs)
        : "";
  return {
    id: call.id,
    toolName: call.function.name,
    rawArguments,
    ...parseToolArguments(rawArguments),
  };
}

export class ChatCompletionsAdapter implements ModelGateway {
  constructor(private readonly config: ChatCompletionsConfig) {}

  private endpoint(): string {
    const base = this.config.baseUrl.replace(/\/+$/, "");
    const query = this.config.apiVersion
      ? `?api-version=${encodeURIComponent(this.config.apiVersion)}`
      : "";
    return `${base}/chat/completions${query}`;
  }

  /** Fetch, abort and mid-body stream failures. */
  private transportError(error: unknown, options: ModelCallOptions): LlmError {
    if (error instanceof LlmError) return error;
    if (error instanceof Error) {
      if (error.name === "AbortError" && options.abortSignal?.aborted) {
        return new LlmError("Model request aborted", "aborted");
      }
      if (error.name === "AbortError" || error.name === "TimeoutError") {
        return new LlmError(
          `Model request timed out after ${this.config.timeoutMs}ms`,
          "timeout",
          408
        );
      }
      return new LlmError(`Model network error: ${error.message}`, "network");
    }
    return new LlmError("Model request failed: Unknown error", "network");
  }

  async complete(
    history: readonly Message[],
    tools: readonly ToolDescriptor[],
    options: ModelCallOptions = {}
  ): Promise<ModelOutcome> {
    const start = performance.now();
    try {
      const outcome = await this.request(history, tools, options);
      modelCallDurationMs.observe(
        { outcome: outcome.kind },
        performance.now() - start
      );
      return outcome;
    } catch (error) {
      const kind = error instanceof LlmError ? error.kind : "unknown";
      modelErrorsTotal.inc({ kind });
      modelCallDurationMs.observe({ outcome: "error" }, performance.now() - start);
      throw error;
    }
  }

  private async request(
    history: readonly Message[],
    tools: readonly ToolDescriptor[],
    options: ModelCallOptions
  ): Promise<ModelOutcome> {
    const requestBody = {
      model: this.config.model,
      messages: history.map(toWireMessage),
      temperature: this.config.temperature,
      top_p: this.config.topP,
      ...(tools.length > 0
        ? { tools: tools.map(toWireTool), tool_choice: "auto" as const }
        : {}),
    };

    const timeoutSignal = AbortSignal.timeout(this.config.timeoutMs);
    const signal = options.abortSignal
      ? AbortSignal.any([timeoutSignal, options.abortSignal])
      : timeoutSignal;

    let response: Response;
    try {
      response = await fetch(this.endpoint(), {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify(requestBody),
        signal,
      });
    } catch (error) {
      throw this.transportError(error, options);
    }

    if (!response.ok) {
      const kind = classifyLlmErrorFromStatus(response.status);
      throw new LlmError(
        `Model API error: ${response.status} ${response.statusText}`,
        kind,
        response.status
      );
    }

    // The timeout signal still covers the body read
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new LlmError("Model response is not valid JSON", "protocol");
      }
      throw this.transportError(error, options);
    }

    const parsed = completionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new LlmError(
        "Model response has an unsupported shape",
        "protocol"
      );
    }

    const [choice] = parsed.data.choices;
    if (!choice) {
      throw new LlmError("Model response has no choices", "protocol");
    }
    const toolCalls = choice.message.tool_calls ?? [];
    const content = choice.message.content ?? undefined;

    let outcome: ModelOutcome;
    if (toolCalls.length > 0) {
      outcome = {
        kind: "tool_calls",
        calls: toolCalls.map(toToolCallRequest),
        ...(content ? { text: content } : {}),
      };
    } else if (typeof content === "string") {
      outcome = { kind: "final", text: content };
    } else {
      throw new LlmError(
        "Model response carries neither text nor tool calls",
        "protocol"
      );
    }

    // Sanitized adapter log (no content, bounded fields only)
    logger.info(
      {
        model: parsed.data.model ?? this.config.model,
        requestId: options.requestId,
        finishReason: choice.finish_reason ?? undefined,
        outcome: outcome.kind,
        toolCallCount: toolCalls.length,
        contentLength: content?.length ?? 0,
        messageCount: history.length,
        toolCount: tools.length,
      },
      EVENT_NAMES.ADAPTER_CHAT_COMPLETIONS_RESULT
    );

    return outcome;
  }
}
