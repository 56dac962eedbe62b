// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context`
 * Purpose: Request and system context factories.
 * Links: `./types`, `./factory`
 * @public
 */

export { createRequestContext, createSystemContext } from "./factory";
export type { Clock, RequestContext } from "./types";
