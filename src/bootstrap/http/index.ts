// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http`
 * Purpose: HTTP route utilities for bootstrapping.
 * Scope: Bootstrap-layer exports. Does NOT handle request-scoped lifecycle or business logic.
 * Invariants: Container init deferred to first actual request, not module import.
 * Side-effects: none
 * Links: Re-exports from bootstrap/http/*
 * @public
 */

export { wrapRouteHandlerWithLogging } from "./wrapRouteHandlerWithLogging";
