// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config`
 * Purpose: Public surface for file-based configuration (tool-server registry).
 * Scope: Re-exports loader and schema types. Does not read env vars.
 * Invariants: Named exports only.
 * Side-effects: none
 * Links: toolServers.server.ts, toolServers.schema.ts
 * @public
 */

export {
  type SseToolServerConfig,
  type StdioToolServerConfig,
  type StreamableHttpToolServerConfig,
  type ToolServerConfig,
  type ToolServersConfig,
  toolServerSchema,
  toolServersConfigSchema,
} from "./toolServers.schema";
export {
  type LoadedToolServers,
  loadToolServersConfig,
  parseToolServersConfig,
  type PlaceholderEnv,
} from "./toolServers.server";
