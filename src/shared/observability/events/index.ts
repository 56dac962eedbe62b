// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry. Does not define full payload schemas.
 * Invariants: All event names registered here; logEvent() enforces base fields (reqId always).
 * Side-effects: none
 * Notes: Use EVENT_NAMES.* constants when logging.
 * Links: Used by logEvent(); consumed by features and adapters.
 * @public
 */

export const EVENT_NAMES = {
  // Chat Domain
  CHAT_TURN_RECEIVED: "chat.turn_received",
  CHAT_TURN_COMPLETED: "chat.turn_completed",
  CHAT_ROUND_TOOL_CALLS: "chat.round_tool_calls",
  CHAT_ROUND_LIMIT_REACHED: "chat.round_limit_reached",
  CHAT_MODEL_RETRY: "chat.model_retry",
  CHAT_MODEL_FAILED: "chat.model_failed",
  CHAT_TOOL_CALL_FAILED: "chat.tool_call_failed",
  CHAT_CATALOG_UNAVAILABLE: "chat.catalog_unavailable",
  CHAT_HISTORY_CLEARED: "chat.history_cleared",

  // Adapter Events
  ADAPTER_CHAT_COMPLETIONS_RESULT: "adapter.chat_completions.result",
  ADAPTER_MCP_SERVER_CONNECTED: "adapter.mcp.server_connected",
  ADAPTER_MCP_SERVER_FAILED: "adapter.mcp.server_failed",
  ADAPTER_MCP_SERVER_CLOSED: "adapter.mcp.server_closed",
  ADAPTER_MCP_DUPLICATE_TOOL: "adapter.mcp.duplicate_tool",
  ADAPTER_MCP_TOOL_CALL: "adapter.mcp.tool_call",

  // Lifecycle
  APP_STARTUP_TOOLS_READY: "app.startup.tools_ready",
  APP_SHUTDOWN: "app.shutdown",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/**
 * Required base fields for all events.
 * reqId is ALWAYS required; routeId required for HTTP request events.
 */
export interface EventBase {
  reqId: string;
  routeId?: string;
}
