// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/chat/services/tool-execution`
 * Purpose: Verifies tool-call execution maps every outcome to exactly one ordered ToolResult.
 * Scope: Feature unit tests with a stub ToolClient. Does NOT test MCP transport.
 * Invariants: Results follow request order in both modes; port errors become failed results; bad arguments never reach the tool.
 * Side-effects: none
 * Links: src/features/chat/services/tool-execution.ts
 * @public
 */

import { makeTestCtx, StubToolClient, toolCall } from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import { executeToolCalls } from "@/features/chat/public.server";
import { ToolTimeoutPortError, ToolUnavailablePortError } from "@/ports";
import { toolCallsTotal } from "@/shared/observability";

const SEQUENTIAL = { parallel: false, timeoutMs: 1_000 };
const PARALLEL = { parallel: true, timeoutMs: 1_000 };

async function toolCallCount(tool: string, result: string): Promise<number> {
  const metric = await toolCallsTotal.get();
  const sample = metric.values.find(
    (value) => value.labels.tool === tool && value.labels.result === result
  );
  return sample?.value ?? 0;
}

describe("executeToolCalls", () => {
  it("returns payloads of successful calls and passes the timeout through", async () => {
    const tools = new StubToolClient().register("get_weather", (args) => ({
      text: `rain in ${String(args.city)}`,
      isError: false,
    }));

    const results = await executeToolCalls(
      [toolCall("c1", "get_weather", { city: "Seattle" })],
      tools,
      SEQUENTIAL,
      makeTestCtx()
    );

    expect(results).toEqual([
      {
        toolCallId: "c1",
        toolName: "get_weather",
        success: true,
        payload: { text: "rain in Seattle", isError: false },
      },
    ]);
    expect(tools.invocations).toEqual([
      { name: "get_weather", args: { city: "Seattle" }, options: { timeoutMs: 1_000 } },
    ]);
  });

  it("maps port errors to failed results with stable codes", async () => {
    const tools = new StubToolClient()
      .register("get_weather", () => {
        throw new ToolUnavailablePortError("get_weather", "server weather is not connected");
      })
      .register("get_air_quality", () => {
        throw new ToolTimeoutPortError("get_air_quality", 1_000);
      })
      .register("broken", () => {
        throw new Error("kaboom");
      });

    const results = await executeToolCalls(
      [
        toolCall("c1", "get_weather", { city: "Nowhere" }),
        toolCall("c2", "get_air_quality"),
        toolCall("c3", "no_such_tool"),
        toolCall("c4", "broken"),
      ],
      tools,
      SEQUENTIAL,
      makeTestCtx()
    );

    expect(results).toEqual([
      {
        toolCallId: "c1",
        toolName: "get_weather",
        success: false,
        errorCode: "unavailable",
        errorDetail: "Tool get_weather unavailable: server weather is not connected",
      },
      {
        toolCallId: "c2",
        toolName: "get_air_quality",
        success: false,
        errorCode: "timeout",
        errorDetail: "Tool get_air_quality timed out after 1000ms",
      },
      {
        toolCallId: "c3",
        toolName: "no_such_tool",
        success: false,
        errorCode: "unknown_tool",
        errorDetail: "Unknown tool: no_such_tool",
      },
      {
        toolCallId: "c4",
        toolName: "broken",
        success: false,
        errorCode: "execution",
        errorDetail: "kaboom",
      },
    ]);
  });

  it("answers calls with invalid arguments without invoking the tool", async () => {
    const tools = new StubToolClient().register("get_weather", () => ({
      text: "never",
      isError: false,
    }));

    const results = await executeToolCalls(
      [
        {
          id: "c1",
          toolName: "get_weather",
          arguments: {},
          rawArguments: "{city:",
          argumentsError: "Tool arguments are not valid JSON",
        },
      ],
      tools,
      SEQUENTIAL,
      makeTestCtx()
    );

    expect(results).toEqual([
      {
        toolCallId: "c1",
        toolName: "get_weather",
        success: false,
        errorCode: "invalid_arguments",
        errorDetail: "Tool arguments are not valid JSON",
      },
    ]);
    expect(tools.invocations).toEqual([]);
  });

  it("labels invalid-argument calls without the model-supplied tool name", async () => {
    const before = await toolCallCount("unknown", "invalid_arguments");

    await executeToolCalls(
      [
        {
          id: "c1",
          toolName: "made_up_tool_name",
          arguments: {},
          rawArguments: "[]",
          argumentsError: "Tool arguments must be a JSON object",
        },
      ],
      new StubToolClient(),
      SEQUENTIAL,
      makeTestCtx()
    );

    expect(await toolCallCount("unknown", "invalid_arguments")).toBe(before + 1);
    expect(await toolCallCount("made_up_tool_name", "invalid_arguments")).toBe(0);
  });

  it("keeps request order when parallel calls finish out of order", async () => {
    let releaseSlow: () => void = () => {};
    const slowGate = new Promise<void>((resolve) => {
      releaseSlow = resolve;
    });
    const finished: string[] = [];

    const tools = new StubToolClient()
      .register("slow", async () => {
        await slowGate;
        finished.push("slow");
        return { text: "slow result", isError: false };
      })
      .register("fast", async () => {
        finished.push("fast");
        releaseSlow();
        return { text: "fast result", isError: false };
      });

    const results = await executeToolCalls(
      [toolCall("c1", "slow"), toolCall("c2", "fast")],
      tools,
      PARALLEL,
      makeTestCtx()
    );

    expect(finished).toEqual(["fast", "slow"]);
    expect(results.map((r) => r.toolCallId)).toEqual(["c1", "c2"]);
  });

  it("runs calls one after another in sequential mode", async () => {
    const events: string[] = [];
    const tools = new StubToolClient()
      .register("a", async () => {
        events.push("a:start");
        await Promise.resolve();
        events.push("a:end");
        return { text: "a", isError: false };
      })
      .register("b", async () => {
        events.push("b:start");
        return { text: "b", isError: false };
      });

    await executeToolCalls(
      [toolCall("c1", "a"), toolCall("c2", "b")],
      tools,
      SEQUENTIAL,
      makeTestCtx()
    );

    expect(events).toEqual(["a:start", "a:end", "b:start"]);
  });
});
