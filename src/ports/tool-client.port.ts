// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/tool-client.port`
 * Purpose: Bridge to external tool servers: catalog discovery and single tool invocation.
 * Scope: Interface plus port-level errors. Does not decide which tools to call or how to present results.
 * Invariants:
 *   - listTools() is cached for the process lifetime once it succeeds
 *   - invoke() either resolves with a payload or throws one of the port errors below
 *   - Tool-side application errors resolve with payload.isError=true (not thrown)
 * Side-effects: none (interface only)
 * Links: Implemented by adapters/server/mcp, used by features/chat
 * @public
 */

import type { ToolPayload } from "@/core";
import type { ToolDescriptor } from "./model-gateway.port";

export type { ToolPayload } from "@/core";

export interface ToolCatalog {
  readonly tools: readonly ToolDescriptor[];
}

export interface ToolInvokeOptions {
  /** Per-call timeout; adapter default applies when omitted */
  readonly timeoutMs?: number;
}

export interface ToolServerHealth {
  readonly name: string;
  readonly connected: boolean;
  readonly toolCount: number;
}

export interface ToolClientHealth {
  readonly ready: boolean;
  readonly servers: readonly ToolServerHealth[];
  readonly toolCount: number;
}

export interface ToolClient {
  /** Connects configured servers. Individual server failures are logged, not thrown. */
  start(): Promise<void>;
  listTools(): Promise<ToolCatalog>;
  invoke(
    name: string,
    args: Readonly<Record<string, unknown>>,
    options?: ToolInvokeOptions
  ): Promise<ToolPayload>;
  health(): ToolClientHealth;
  /** Releases every connection; later calls fail with ToolUnavailablePortError. */
  close(): Promise<void>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Port Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Port-level error thrown when the server owning a tool is not connected.
 */
export class ToolUnavailablePortError extends Error {
  constructor(
    public readonly toolName: string,
    reason: string
  ) {
    super(`Tool ${toolName} unavailable: ${reason}`);
    this.name = "ToolUnavailablePortError";
  }
}

/**
 * Port-level error thrown when a tool call exceeds its timeout.
 */
export class ToolTimeoutPortError extends Error {
  constructor(
    public readonly toolName: string,
    public readonly timeoutMs: number
  ) {
    super(`Tool ${toolName} timed out after ${timeoutMs}ms`);
    this.name = "ToolTimeoutPortError";
  }
}

/**
 * Port-level error thrown when no configured server advertises the tool.
 */
export class UnknownToolPortError extends Error {
  constructor(public readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = "UnknownToolPortError";
  }
}

export function isToolUnavailablePortError(
  error: unknown
): error is ToolUnavailablePortError {
  return error instanceof ToolUnavailablePortError;
}

export function isToolTimeoutPortError(
  error: unknown
): error is ToolTimeoutPortError {
  return error instanceof ToolTimeoutPortError;
}

export function isUnknownToolPortError(
  error: unknown
): error is UnknownToolPortError {
  return error instanceof UnknownToolPortError;
}
