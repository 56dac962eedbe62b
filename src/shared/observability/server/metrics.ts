// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/metrics`
 * Purpose: Prometheus metrics registry and metric definitions for observability.
 * Scope: Shared observability singleton. Provides metrics registry and recording helpers. Does not implement HTTP transport or scrape endpoints.
 * Invariants: Single registry per process via globalThis; labels always low-cardinality; survives HMR.
 * Side-effects: global (module-scoped registry via globalThis)
 * Notes: Uses getOrCreate pattern to prevent duplicate registration errors during HMR/tests.
 * Links: Consumed by route wrapper, orchestrator and adapters; exposed via /api/metrics endpoint.
 * @public
 */

import type { Counter, Histogram, Registry } from "prom-client";
import client from "prom-client";

import { APP_LABEL } from "./logger";

// Singleton via globalThis to survive HMR/test reloads
const globalForMetrics = globalThis as typeof globalThis & {
  metricsRegistry?: Registry;
  metricsInitialized?: boolean;
};

export const metricsRegistry: Registry =
  globalForMetrics.metricsRegistry ?? new client.Registry();

if (!globalForMetrics.metricsInitialized) {
  globalForMetrics.metricsRegistry = metricsRegistry;
  globalForMetrics.metricsInitialized = true;

  metricsRegistry.setDefaultLabels({
    app: APP_LABEL,
    env: process.env.DEPLOY_ENVIRONMENT ?? "local",
  });
  client.collectDefaultMetrics({ register: metricsRegistry });
}

// =============================================================================
// Metric Factory Helpers (prevent duplicate registration)
// =============================================================================

function getOrCreateCounter<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[] = [] as readonly T[]
): Counter<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Counter<T>;
  return new client.Counter({
    name,
    help,
    labelNames: labelNames as T[],
    registers: [metricsRegistry],
  });
}

function getOrCreateHistogram<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[] = [] as readonly T[],
  buckets: number[]
): Histogram<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Histogram<T>;
  return new client.Histogram({
    name,
    help,
    labelNames: labelNames as T[],
    buckets,
    registers: [metricsRegistry],
  });
}

// =============================================================================
// HTTP Metrics
// =============================================================================

export const httpRequestsTotal = getOrCreateCounter(
  "http_requests_total",
  "Total number of HTTP requests",
  ["route", "method", "status"] as const
);

export const httpRequestDurationMs = getOrCreateHistogram(
  "http_request_duration_ms",
  "HTTP request duration in milliseconds",
  ["route", "method"] as const,
  [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000]
);

// =============================================================================
// Chat Turn Metrics
// =============================================================================

export const chatTurnsTotal = getOrCreateCounter(
  "chat_turns_total",
  "Total chat turns by final answer status",
  ["status"] as const
);

export const chatTurnDurationMs = getOrCreateHistogram(
  "chat_turn_duration_ms",
  "Chat turn duration in milliseconds (user message to final answer)",
  [] as const,
  [100, 500, 1000, 2500, 5000, 10000, 30000, 60000, 120000]
);

export const chatTurnRounds = getOrCreateHistogram(
  "chat_turn_rounds",
  "Model calls per chat turn",
  [] as const,
  [1, 2, 3, 4, 6, 8, 12, 16]
);

// =============================================================================
// Model Call Metrics
// =============================================================================

export const modelCallDurationMs = getOrCreateHistogram(
  "model_call_duration_ms",
  "Model gateway call duration in milliseconds",
  ["outcome"] as const,
  [100, 500, 1000, 2500, 5000, 10000, 30000, 60000]
);

/**
 * Error kinds for model failures (low cardinality).
 * Mirrors LlmErrorKind; used for alerting on provider issues.
 */
export const modelErrorsTotal = getOrCreateCounter(
  "model_errors_total",
  "Total model gateway errors by kind",
  ["kind"] as const
);

// =============================================================================
// Tool Call Metrics
// =============================================================================

export const toolCallsTotal = getOrCreateCounter(
  "tool_calls_total",
  "Total tool invocations by tool and result",
  ["tool", "result"] as const
);

export const toolCallDurationMs = getOrCreateHistogram(
  "tool_call_duration_ms",
  "Tool invocation duration in milliseconds",
  ["tool"] as const,
  [10, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000]
);

// =============================================================================
// Helpers
// =============================================================================

/**
 * Map HTTP status code to bucket for low-cardinality label.
 * Returns '2xx', '4xx', or '5xx'.
 */
export function statusBucket(status: number): "2xx" | "4xx" | "5xx" {
  if (status >= 200 && status < 300) return "2xx";
  if (status >= 400 && status < 500) return "4xx";
  return "5xx";
}
