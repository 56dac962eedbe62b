// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/redact`
 * Purpose: pino redaction paths for model credentials, scrape tokens and tool-server launch settings.
 * Scope: Path list only; the logger applies it.
 * Invariants: Message content is never logged in the first place, so it has no path here.
 * Side-effects: none
 * Links: `@shared/observability/server/logger`
 * @public
 */

const CREDENTIAL_KEYS = ["MODEL_API_KEY", "METRICS_TOKEN", "apiKey", "api_key"];

const HEADER_PATHS = [
  "headers.authorization",
  "headers.Authorization",
  "req.headers.authorization",
];

/** Tool servers may receive provider keys through env or request headers */
const TOOL_SERVER_PATHS = [
  "env",
  "server.env",
  "server.headers",
  "servers[*].env",
  "servers[*].headers",
];

export const REDACT_PATHS: string[] = [
  ...CREDENTIAL_KEYS,
  ...CREDENTIAL_KEYS.map((key) => `config.${key}`),
  ...HEADER_PATHS,
  ...TOOL_SERVER_PATHS,
];
