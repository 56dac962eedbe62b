// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/chat/public.server`
 * Purpose: Server-only exports for the chat feature.
 * Scope: Re-exports the orchestrator, session lock, feature errors and DTO mappers. Does not implement logic.
 * Invariants:
 *   - Only import from .server.ts files, bootstrap, or route handlers with runtime: "nodejs"
 * Side-effects: none
 * Links: Part of hexagonal architecture boundary enforcement
 * @public
 */

export { isSessionBusyError, SessionBusyError } from "./errors";
export { type MessageDto, toMessageDto } from "./services/mappers";
export {
  ChatOrchestrator,
  type ChatOrchestratorConfig,
  type ChatOrchestratorDeps,
  HISTORY_CLEARED_TEXT,
  MODEL_FAILURE_TEXT,
  NO_ANSWER_YET_TEXT,
  ROUND_LIMIT_TEXT,
} from "./services/orchestrator";
export { type BusyPolicy, SessionLock } from "./services/session-lock";
export {
  executeToolCalls,
  type ToolExecutionOptions,
} from "./services/tool-execution";
