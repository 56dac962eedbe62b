// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/ai/errors`
 * Purpose: Domain error types and normalization for language-model failures.
 * Scope: Defines LlmError, status classification, retry classification and error-to-code normalization. Does not perform IO or logging.
 * Invariants:
 *   - LlmError captures kind + optional HTTP status at throw site (adapter boundary)
 *   - isRetryableLlmError is the single source of truth for retry decisions
 *   - normalizeLlmErrorToFailureCode maps once at the orchestrator; callers propagate the code
 * Side-effects: none
 * Links: Used by adapters (throw), orchestrator (catch + normalize), metrics (consume kind)
 * @public
 */

import type { ModelFailureCode } from "@/core/chat/model";

// ─────────────────────────────────────────────────────────────────────────────
// LLM Error Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Error classification kinds for model failures.
 * Derived from HTTP status codes or transport failures at adapter boundary.
 */
export type LlmErrorKind =
  | "auth"
  | "rate_limited"
  | "protocol"
  | "timeout"
  | "network"
  | "provider_4xx"
  | "provider_5xx"
  | "aborted"
  | "unknown";

/**
 * Typed error for model gateway failures.
 * Thrown by adapters on HTTP, transport and response-shape errors.
 */
export class LlmError extends Error {
  readonly kind: LlmErrorKind;
  readonly status: number | undefined;

  constructor(message: string, kind: LlmErrorKind, status?: number) {
    super(message);
    this.name = "LlmError";
    this.kind = kind;
    this.status = status;
  }
}

/**
 * Type guard for LlmError.
 */
export function isLlmError(error: unknown): error is LlmError {
  return error instanceof LlmError;
}

/**
 * Classify LlmError kind from HTTP status code.
 */
export function classifyLlmErrorFromStatus(status: number): LlmErrorKind {
  if (status === 401 || status === 403) return "auth";
  if (status === 408) return "timeout";
  if (status === 429) return "rate_limited";
  if (status >= 400 && status < 500) return "provider_4xx";
  if (status >= 500 && status < 600) return "provider_5xx";
  return "unknown";
}

const RETRYABLE_KINDS: ReadonlySet<LlmErrorKind> = new Set<LlmErrorKind>([
  "timeout",
  "network",
  "rate_limited",
  "provider_5xx",
]);

/**
 * Transient failures worth one more attempt.
 * Auth, protocol and other 4xx failures are terminal.
 */
export function isRetryableLlmError(error: unknown): error is LlmError {
  return isLlmError(error) && RETRYABLE_KINDS.has(error.kind);
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Normalization
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Normalize any error to a stable ModelFailureCode for the final answer.
 *
 * Priority:
 * 1. LlmError kind
 * 2. Default → "model_unavailable"
 */
export function normalizeLlmErrorToFailureCode(
  error: unknown
): ModelFailureCode {
  if (!isLlmError(error)) return "model_unavailable";

  switch (error.kind) {
    case "auth":
      return "model_auth";
    case "rate_limited":
      return "model_rate_limited";
    case "protocol":
      return "model_protocol";
    case "timeout":
      return "model_timeout";
    default:
      return "model_unavailable";
  }
}
