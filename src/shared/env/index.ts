// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env`
 * Purpose: Public surface for environment configuration module.
 * Scope: Re-exports server env and its validation error. Does not export internal schemas.
 * Invariants: Only re-exports public APIs.
 * Side-effects: none
 * Links: src/shared/env/server.ts
 * @public
 */

export type { EnvValidationMeta, ServerEnv } from "./server";
export { EnvValidationError, resetServerEnv, serverEnv } from "./server";
