// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/rules`
 * Purpose: Verifies core chat business rules for input validation and message construction.
 * Scope: Pure business logic testing. Does NOT test external dependencies or I/O.
 * Invariants: Input limits; one tool message per result; system filtering; display renderings.
 * Side-effects: none
 * Notes: Tests Unicode handling for length limits.
 * Links: src/core/chat/rules.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  assertMessageLength,
  assertUserMessage,
  ChatErrorCode,
  ChatValidationError,
  filterSystemMessages,
  MAX_MESSAGE_CHARS,
  type Message,
  markerDraft,
  messageText,
  renderToolCall,
  toolCallsDraft,
  toolResultContent,
  toolResultDraft,
} from "@/core";

function message(role: Message["role"], content: string, createdAt: number): Message {
  return { role, content, createdAt };
}

describe("core/chat/rules", () => {
  describe("assertUserMessage", () => {
    it("returns non-empty input unchanged", () => {
      expect(assertUserMessage("  What should I wear?  ")).toBe(
        "  What should I wear?  "
      );
    });

    it.each(["", "   ", "\n\t"])("rejects blank input %j", (input) => {
      expect(() => assertUserMessage(input)).toThrow(ChatValidationError);
      try {
        assertUserMessage(input);
      } catch (error) {
        expect(error).toBeInstanceOf(ChatValidationError);
        if (error instanceof ChatValidationError) {
          expect(error.code).toBe(ChatErrorCode.EMPTY_MESSAGE);
          expect(error.message).toBe("Message is required");
        }
      }
    });

    it("rejects input over the limit with MESSAGE_TOO_LONG", () => {
      try {
        assertUserMessage("a".repeat(MAX_MESSAGE_CHARS + 1));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ChatValidationError);
        if (error instanceof ChatValidationError) {
          expect(error.code).toBe(ChatErrorCode.MESSAGE_TOO_LONG);
          expect(error.message).toBe(
            `Message length ${MAX_MESSAGE_CHARS + 1} exceeds maximum ${MAX_MESSAGE_CHARS} characters`
          );
        }
      }
    });
  });

  describe("assertMessageLength", () => {
    it("passes for messages exactly at the limit", () => {
      expect(() =>
        assertMessageLength("a".repeat(MAX_MESSAGE_CHARS), MAX_MESSAGE_CHARS)
      ).not.toThrow();
    });

    it("counts code points, not UTF-16 units", () => {
      // Each emoji is two UTF-16 units but one code point
      const text = "🌧".repeat(10);
      expect(text.length).toBe(20);
      expect(() => assertMessageLength(text, 10)).not.toThrow();
      expect(() => assertMessageLength(text, 9)).toThrow(ChatValidationError);
    });
  });

  describe("filterSystemMessages", () => {
    it("drops system messages and keeps order", () => {
      const history = [
        message("system", "prompt", 0),
        message("user", "hi", 1),
        message("assistant", "hello", 2),
        message("system", "marker", 3),
        message("user", "bye", 4),
      ];
      expect(filterSystemMessages(history).map((m) => m.createdAt)).toEqual([
        1, 2, 4,
      ]);
    });
  });

  describe("renderToolCall", () => {
    it("renders name and JSON arguments", () => {
      expect(renderToolCall("get_weather", { city: "Seattle" })).toBe(
        'get_weather({"city":"Seattle"})'
      );
    });
  });

  describe("toolCallsDraft", () => {
    it("records every call in request order behind any leading text", () => {
      const draft = toolCallsDraft(
        [
          {
            id: "call-1",
            toolName: "get_weather",
            arguments: { city: "Seattle" },
            rawArguments: '{"city":"Seattle"}',
          },
          {
            id: "call-2",
            toolName: "get_air_quality",
            arguments: {},
            rawArguments: "",
          },
        ],
        "Checking both."
      );

      expect(draft.role).toBe("assistant");
      expect(draft.content).toEqual([
        { type: "text", text: "Checking both." },
        {
          type: "tool_call",
          toolCallId: "call-1",
          toolName: "get_weather",
          arguments: { city: "Seattle" },
          rawArguments: '{"city":"Seattle"}',
          text: 'get_weather({"city":"Seattle"})',
        },
        {
          type: "tool_call",
          toolCallId: "call-2",
          toolName: "get_air_quality",
          arguments: {},
          rawArguments: "",
          text: "get_air_quality({})",
        },
      ]);
    });

    it("omits blank leading text", () => {
      const draft = toolCallsDraft(
        [{ id: "c", toolName: "t", arguments: {}, rawArguments: "{}" }],
        "  "
      );
      expect(Array.isArray(draft.content) && draft.content.length).toBe(1);
    });
  });

  describe("toolResultDraft", () => {
    it("builds a tool message from a successful exchange", () => {
      const draft = toolResultDraft({
        toolCallId: "call-1",
        toolName: "get_weather",
        success: true,
        payload: { text: "12C, light rain", isError: false },
      });

      expect(draft).toEqual({
        role: "tool",
        toolCallId: "call-1",
        content: [
          {
            type: "tool_result",
            toolCallId: "call-1",
            toolName: "get_weather",
            success: true,
            isError: false,
            content: "12C, light rain",
          },
        ],
      });
    });

    it("keeps tool-side errors as successful exchanges", () => {
      const draft = toolResultDraft({
        toolCallId: "call-1",
        toolName: "get_weather",
        success: true,
        payload: { text: "Unknown city", isError: true },
      });
      expect(draft.content).toEqual([
        expect.objectContaining({ success: true, isError: true }),
      ]);
    });

    it("describes failed exchanges with their error code", () => {
      const result = {
        toolCallId: "call-9",
        toolName: "get_weather",
        success: false,
        errorCode: "unavailable",
        errorDetail: "server weather is not connected",
      } as const;

      expect(toolResultContent(result)).toBe(
        "Tool get_weather failed (unavailable): server weather is not connected"
      );
      expect(toolResultDraft(result).content).toEqual([
        {
          type: "tool_result",
          toolCallId: "call-9",
          toolName: "get_weather",
          success: false,
          isError: true,
          errorCode: "unavailable",
          content:
            "Tool get_weather failed (unavailable): server weather is not connected",
        },
      ]);
    });
  });

  describe("messageText", () => {
    it("returns plain string content as is", () => {
      expect(messageText({ content: "hello" })).toBe("hello");
    });

    it("joins part texts with newlines", () => {
      const draft = toolCallsDraft(
        [
          {
            id: "c1",
            toolName: "get_weather",
            arguments: { city: "Oslo" },
            rawArguments: '{"city":"Oslo"}',
          },
        ],
        "One moment."
      );
      expect(messageText(draft)).toBe('One moment.\nget_weather({"city":"Oslo"})');
    });
  });

  describe("markerDraft", () => {
    it("builds a system message carrying the marker", () => {
      expect(markerDraft("round_limit")).toEqual({
        role: "system",
        marker: "round_limit",
        content:
          "Tool-call round limit reached before the model produced a final answer.",
      });
      expect(markerDraft("model_failure", "model_auth").content).toBe(
        "The language model could not be reached for this turn. (model_auth)"
      );
    });
  });
});
