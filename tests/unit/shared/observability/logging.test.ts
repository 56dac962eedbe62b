// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server`
 * Purpose: Verifies structured event logging, secret redaction and status bucketing.
 * Scope: Uses a pino instance writing to an in-memory array. Does NOT test transport or log shipping.
 * Invariants: Events always carry reqId; keys and launch env never reach log output.
 * Side-effects: none
 * Links: src/shared/observability/server
 * @public
 */

import pino from "pino";
import { describe, expect, it } from "vitest";

import {
  EVENT_NAMES,
  logEvent,
  logRequestEnd,
  statusBucket,
} from "@/shared/observability";
import { REDACT_PATHS } from "@/shared/observability/server/redact";

function captureLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    {
      messageKey: "msg",
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    {
      write(line: string) {
        lines.push(JSON.parse(line));
      },
    }
  );
  return { logger, lines };
}

describe("logEvent", () => {
  it("writes the event name and fields at info level", () => {
    const { logger, lines } = captureLogger();

    logEvent(logger, EVENT_NAMES.CHAT_TURN_COMPLETED, {
      reqId: "req-1",
      status: "success",
      rounds: 2,
    });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      event: "chat.turn_completed",
      reqId: "req-1",
      status: "success",
      rounds: 2,
      msg: "chat.turn_completed",
    });
  });

  it("throws under the test runner when reqId is missing", () => {
    const { logger } = captureLogger();

    expect(() =>
      logEvent(logger, EVENT_NAMES.CHAT_HISTORY_CLEARED, { reqId: "" })
    ).toThrow('INVARIANT VIOLATION: logEvent("chat.history_cleared") called without reqId');
  });
});

describe("redaction", () => {
  it("censors model keys and tool-server launch env", () => {
    const { logger, lines } = captureLogger();

    logger.info(
      {
        MODEL_API_KEY: "test-key",
        server: { name: "weather", env: { ACCUWEATHER_API_KEY: "test-secret" } },
        headers: { authorization: "Bearer test-secret" },
      },
      "config"
    );

    expect(lines[0]).toMatchObject({
      MODEL_API_KEY: "[REDACTED]",
      server: { name: "weather", env: "[REDACTED]" },
      headers: { authorization: "[REDACTED]" },
    });
  });
});

describe("logRequestEnd", () => {
  it.each<[number, number]>([
    [200, 30],
    [409, 40],
    [503, 50],
  ])("logs status %i at level %i", (status, level) => {
    const { logger, lines } = captureLogger();

    logRequestEnd(logger, { status, durationMs: 12 });

    expect(lines[0]).toMatchObject({
      level,
      status,
      durationMs: 12,
      msg: "request complete",
    });
  });
});

describe("statusBucket", () => {
  it.each<[number, string]>([
    [200, "2xx"],
    [204, "2xx"],
    [400, "4xx"],
    [429, "4xx"],
    [500, "5xx"],
  ])("maps %i to %s", (status, bucket) => {
    expect(statusBucket(status)).toBe(bucket);
  });
});
