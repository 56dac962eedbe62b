// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/wrapRouteHandlerWithLogging`
 * Purpose: Route wrapper to eliminate boilerplate for request logging envelope and metrics.
 * Scope: Bootstrap-layer utility. Handles ctx creation, timing, envelope logging, and Prometheus metrics. Does not implement route-specific business logic.
 * Invariants: Always logs request start/end exactly once; always measures duration; catches unhandled errors; always records metrics (even on 5xx).
 * Side-effects: IO (creates request context, emits structured log entries, records Prometheus metrics)
 * Notes: Use this wrapper for all instrumented routes. Domain events go in facades/features, not here.
 *        logRequestEnd runs exactly once in the finally block for all paths (success, 4xx, 5xx).
 *        For unhandled errors: logs error, then rethrows in dev/test for diagnosis.
 *        In production, converts to 500 for safety.
 * Links: Used by route handlers; delegates to shared/observability helpers; records to shared/observability/server/metrics.
 * @public
 */

import { type NextRequest, NextResponse } from "next/server";

import { getContainer } from "@/bootstrap/container";
import {
  createRequestContext,
  httpRequestDurationMs,
  httpRequestsTotal,
  logRequestEnd,
  logRequestError,
  logRequestStart,
  type RequestContext,
  statusBucket,
} from "@/shared/observability";

type RouteHandler = (
  ctx: RequestContext,
  request: NextRequest
) => Promise<NextResponse>;

interface WrapOptions {
  routeId: string;
}

/**
 * Wraps a route handler with consistent request logging envelope.
 * Handles ctx creation, timing, logRequestStart/End/Error automatically.
 *
 * @param options.routeId - Route identifier for logging (e.g., "chat.send_message")
 *
 * @example
 * export const POST = wrapRouteHandlerWithLogging(
 *   { routeId: "chat.send_message" },
 *   async (ctx, request) => {
 *     const input = sendMessageOperation.input.parse(await request.json());
 *     const result = await sendMessageFacade(input, ctx);
 *     return NextResponse.json(sendMessageOperation.output.parse(result));
 *   }
 * );
 */
export function wrapRouteHandlerWithLogging(
  options: WrapOptions,
  handler: RouteHandler
): (request: NextRequest) => Promise<NextResponse> {
  return async (request: NextRequest): Promise<NextResponse> => {
    const container = getContainer();

    const ctx = createRequestContext(
      { baseLog: container.log, clock: container.clock },
      request,
      { routeId: options.routeId }
    );

    // Get config once before try block to avoid env failures masking real errors
    const { unhandledErrorPolicy } = container.config;

    logRequestStart(ctx.log);
    const start = performance.now();

    // Track response for metrics/logging (captured in try/catch, used in finally)
    let responseStatus = 500;

    try {
      const response = await handler(ctx, request);
      responseStatus = response.status;
      return response;
    } catch (error) {
      // Wrapper only catches unhandled errors - route should handle domain errors
      responseStatus = 500;
      logRequestError(ctx.log, error, "INTERNAL_SERVER_ERROR");

      if (unhandledErrorPolicy === "rethrow") {
        throw error;
      }

      return NextResponse.json(
        { error: "Internal server error" },
        { status: responseStatus }
      );
    } finally {
      const durationMs = performance.now() - start;

      logRequestEnd(ctx.log, { status: responseStatus, durationMs });

      httpRequestsTotal.inc({
        route: options.routeId,
        method: request.method,
        status: statusBucket(responseStatus),
      });
      httpRequestDurationMs.observe(
        { route: options.routeId, method: request.method },
        durationMs
      );
    }
  };
}
