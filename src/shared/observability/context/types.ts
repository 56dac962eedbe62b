// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/types`
 * Purpose: Per-request (or per-startup-task) context threaded from routes into the chat feature.
 * Scope: Types only.
 * Invariants: `log` already has reqId bound; features log through it rather than the root logger.
 * Side-effects: none
 * Links: `./factory`
 * @public
 */

import type { Logger } from "pino";

/** Structural subset of the Clock port; shared/ may not import ports. */
export interface Clock {
  now(): string;
}

export interface RequestContext {
  readonly log: Logger;
  readonly reqId: string;
  /** Unset for system contexts (startup, shutdown) */
  readonly routeId?: string;
  readonly clock: Clock;
}
