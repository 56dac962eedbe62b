// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server`
 * Purpose: Server-side logging and metrics utilities (pino, prom-client).
 * Scope: Logger factory, helpers, logEvent() wrapper, metrics. Does not define events.
 * Invariants: none
 * Side-effects: IO (logging to stdout)
 * Notes: Use for server-side code only. Event names from ../events.
 * Links: Uses event registry from ../events; called by routes/features/adapters.
 * @public
 */

export {
  logRequestEnd,
  logRequestError,
  logRequestStart,
  logRequestWarn,
} from "./helpers";
export { logEvent } from "./logEvent";
export type { Logger } from "./logger";
export { APP_LABEL, makeLogger, makeNoopLogger } from "./logger";
export {
  chatTurnDurationMs,
  chatTurnRounds,
  chatTurnsTotal,
  httpRequestDurationMs,
  httpRequestsTotal,
  metricsRegistry,
  modelCallDurationMs,
  modelErrorsTotal,
  statusBucket,
  toolCallDurationMs,
  toolCallsTotal,
} from "./metrics";
export { REDACT_PATHS } from "./redact";
