// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability - events, logging, metrics, context.
 * Scope: Unified entry point for all observability utilities. Does not implement logic.
 * Invariants: No imports from bootstrap or ports (structural typing only).
 * Side-effects: none
 * Notes: Minimal public API - events registry + logEvent + context + metrics.
 * Links: Delegates to events, server, context submodules.
 * @public
 */

// Context
export type { Clock, RequestContext } from "./context";
export { createRequestContext, createSystemContext } from "./context";
export type { EventBase, EventName } from "./events";
// Event Registry
export { EVENT_NAMES } from "./events";
export type { Logger } from "./server";
// Server-side logging and metrics
export {
  APP_LABEL,
  chatTurnDurationMs,
  chatTurnRounds,
  chatTurnsTotal,
  httpRequestDurationMs,
  httpRequestsTotal,
  logEvent,
  logRequestEnd,
  logRequestError,
  logRequestStart,
  logRequestWarn,
  makeLogger,
  makeNoopLogger,
  metricsRegistry,
  modelCallDurationMs,
  modelErrorsTotal,
  statusBucket,
  toolCallDurationMs,
  toolCallsTotal,
} from "./server";
