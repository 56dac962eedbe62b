// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces and port-level errors - canonical import surface.
 * Scope: Re-exports public port interfaces and error classes. Does not export implementations or runtime objects.
 * Invariants: Named exports only, no runtime coupling except error classes, no export *
 * Side-effects: none
 * Notes: Features and adapters import ports from here, never from the individual files
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type { Clock } from "./clock.port";
export type { ConversationStore } from "./conversation-store.port";
export {
  classifyLlmErrorFromStatus,
  isLlmError,
  type JsonSchemaObject,
  LlmError,
  type LlmErrorKind,
  type ModelCallOptions,
  type ModelGateway,
  type ModelOutcome,
  type ToolDescriptor,
} from "./model-gateway.port";
export {
  isToolTimeoutPortError,
  isToolUnavailablePortError,
  isUnknownToolPortError,
  type ToolCatalog,
  type ToolClient,
  type ToolClientHealth,
  type ToolInvokeOptions,
  type ToolPayload,
  type ToolServerHealth,
  ToolTimeoutPortError,
  ToolUnavailablePortError,
  UnknownToolPortError,
} from "./tool-client.port";
