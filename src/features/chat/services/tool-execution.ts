// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/chat/services/tool-execution`
 * Purpose: Executes one round of model-requested tool calls through the ToolClient port.
 * Scope: Argument checks, port invocation, error-to-result mapping, tool metrics. Does not append messages.
 * Invariants:
 *   - Exactly one ToolResult per request, returned in request order (also when run in parallel)
 *   - Never throws for a single tool failure; port errors become failed results
 *   - Calls with argumentsError are answered without invoking the tool
 * Side-effects: IO (via ToolClient port), metrics
 * Links: ToolClient port, `@core/chat/rules` toolResultDraft
 * @internal
 */

import type { ToolCallRequest, ToolErrorCode, ToolResult } from "@/core";
import {
  isToolTimeoutPortError,
  isToolUnavailablePortError,
  isUnknownToolPortError,
  type ToolClient,
} from "@/ports";
import {
  EVENT_NAMES,
  type RequestContext,
  toolCallDurationMs,
  toolCallsTotal,
} from "@/shared/observability";

export interface ToolExecutionOptions {
  parallel: boolean;
  timeoutMs: number;
}

// Model-supplied names never reach metric labels unless the catalog knows them
const UNKNOWN_TOOL_LABEL = "unknown";

function failed(
  call: ToolCallRequest,
  errorCode: ToolErrorCode,
  errorDetail: string
): ToolResult {
  return {
    toolCallId: call.id,
    toolName: call.toolName,
    success: false,
    errorCode,
    errorDetail,
  };
}

export function toolErrorCodeOf(error: unknown): ToolErrorCode {
  if (isUnknownToolPortError(error)) return "unknown_tool";
  if (isToolTimeoutPortError(error)) return "timeout";
  if (isToolUnavailablePortError(error)) return "unavailable";
  return "execution";
}

async function executeOne(
  call: ToolCallRequest,
  tools: ToolClient,
  options: ToolExecutionOptions,
  ctx: RequestContext
): Promise<ToolResult> {
  if (call.argumentsError) {
    toolCallsTotal.inc({ tool: UNKNOWN_TOOL_LABEL, result: "invalid_arguments" });
    return failed(call, "invalid_arguments", call.argumentsError);
  }

  const start = performance.now();
  try {
    const payload = await tools.invoke(call.toolName, call.arguments, {
      timeoutMs: options.timeoutMs,
    });
    toolCallDurationMs.observe({ tool: call.toolName }, performance.now() - start);
    toolCallsTotal.inc({
      tool: call.toolName,
      result: payload.isError ? "tool_error" : "success",
    });
    return {
      toolCallId: call.id,
      toolName: call.toolName,
      success: true,
      payload,
    };
  } catch (error) {
    const errorCode = toolErrorCodeOf(error);
    const tool =
      errorCode === "unknown_tool" ? UNKNOWN_TOOL_LABEL : call.toolName;
    toolCallDurationMs.observe({ tool }, performance.now() - start);
    toolCallsTotal.inc({ tool, result: errorCode });
    ctx.log.warn(
      {
        event: EVENT_NAMES.CHAT_TOOL_CALL_FAILED,
        tool: call.toolName,
        toolCallId: call.id,
        errorCode,
        err: error,
      },
      EVENT_NAMES.CHAT_TOOL_CALL_FAILED
    );
    const detail = error instanceof Error ? error.message : String(error);
    return failed(call, errorCode, detail);
  }
}

/**
 * Runs every call of one round. Results always line up with `calls`.
 */
export async function executeToolCalls(
  calls: readonly ToolCallRequest[],
  tools: ToolClient,
  options: ToolExecutionOptions,
  ctx: RequestContext
): Promise<ToolResult[]> {
  if (options.parallel) {
    return Promise.all(
      calls.map((call) => executeOne(call, tools, options, ctx))
    );
  }

  const results: ToolResult[] = [];
  for (const call of calls) {
    results.push(await executeOne(call, tools, options, ctx));
  }
  return results;
}
