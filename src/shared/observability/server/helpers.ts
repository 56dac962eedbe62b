// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/helpers`
 * Purpose: Standardized logging helpers to prevent log spam and drift.
 * Scope: Provide consistent request start/end/error logging. Does not handle domain-specific events.
 * Invariants: Same keys everywhere (routeId, reqId, method, status, durationMs).
 * Side-effects: IO (emits structured log entries via provided logger)
 * Notes: Use logRequestStart/logRequestEnd in every instrumented route.
 * Links: Used by the route wrapper and route-local error handlers.
 * @public
 */

import type { Logger } from "pino";

/**
 * Log request start with consistent fields.
 */
export function logRequestStart(log: Logger): void {
  log.info("request received");
}

/**
 * Log request end with consistent fields.
 *
 * @param log - Request-scoped child logger (with routeId, reqId, method already bound)
 * @param meta - Response metadata
 */
export function logRequestEnd(
  log: Logger,
  meta: {
    status: number;
    durationMs: number;
  }
): void {
  const level =
    meta.status >= 500 ? "error" : meta.status >= 400 ? "warn" : "info";
  log[level](
    { status: meta.status, durationMs: meta.durationMs },
    "request complete"
  );
}

/**
 * Log error with consistent fields: err, errorCode, routeId (already in ctx).
 *
 * @param errorCode - Stable app error code for classification
 */
export function logRequestError(
  log: Logger,
  error: unknown,
  errorCode: string
): void {
  log.error({ err: error, errorCode }, "request failed");
}

/**
 * Log an expected client-side failure (4xx) that the route handled.
 */
export function logRequestWarn(
  log: Logger,
  error: unknown,
  errorCode: string
): void {
  log.warn({ err: error, errorCode }, "request rejected");
}
