// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/chat/services/orchestrator`
 * Purpose: Drives one chat turn through a bounded loop of model calls and tool-call rounds.
 * Scope: Validates input, seeds the system prompt, appends every message of the turn, retries transient model failures once, tracks the latest answer. Does not know HTTP or wire formats.
 * Invariants:
 *   - Only imports core, ports, shared and feature-local modules
 *   - Invalid input throws ChatValidationError before anything is appended
 *   - Exactly one tool message per tool-call request, after the assistant message that requested it
 *   - Assistant message and its tool messages are appended with no await in between
 *   - At most maxRounds model calls per turn (retries not counted); exhaustion returns "incomplete"
 *   - Model failure returns "failed" with an errorCode and a model_failure marker; never throws LlmError
 *   - Turns and clears are serialized by the session lock
 * Side-effects: IO (via ports), metrics
 * Notes: A turn is not cancelled when the HTTP client disconnects; the result shows up on the next history read.
 * Links: ConversationStore, ModelGateway and ToolClient ports; tool-execution; session-lock
 * @public
 */

import {
  assertUserMessage,
  type FinalAnswer,
  filterSystemMessages,
  isRetryableLlmError,
  MAX_MESSAGE_CHARS,
  type Message,
  type MessageDraft,
  markerDraft,
  normalizeLlmErrorToFailureCode,
  systemPromptDraft,
  toolCallsDraft,
  toolResultDraft,
} from "@/core";
import type {
  Clock,
  ConversationStore,
  ModelGateway,
  ModelOutcome,
  ToolClient,
  ToolDescriptor,
} from "@/ports";
import {
  chatTurnDurationMs,
  chatTurnRounds,
  chatTurnsTotal,
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

import type { SessionLock } from "./session-lock";
import { executeToolCalls } from "./tool-execution";

export const NO_ANSWER_YET_TEXT =
  "No weather data available yet. Please request weather information first.";
export const HISTORY_CLEARED_TEXT =
  "Message history cleared. Please request weather information.";
export const ROUND_LIMIT_TEXT =
  "I could not finish gathering the information for this request. Please try again.";
export const MODEL_FAILURE_TEXT =
  "The assistant is unavailable right now. Please try again later.";

export interface ChatOrchestratorConfig {
  maxRounds: number;
  /** Seeded when the history is empty; null disables seeding */
  systemPrompt: string | null;
  parallelToolCalls: boolean;
  retryBackoffMs: number;
  toolTimeoutMs: number;
}

export interface ChatOrchestratorDeps {
  store: ConversationStore;
  gateway: ModelGateway;
  tools: ToolClient;
  clock: Clock;
  lock: SessionLock;
  config: ChatOrchestratorConfig;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class ChatOrchestrator {
  private readonly sleep: (ms: number) => Promise<void>;
  private latestAnswer = NO_ANSWER_YET_TEXT;

  constructor(private readonly deps: ChatOrchestratorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Runs one user turn to completion.
   * @throws ChatValidationError for empty or oversized input
   * @throws SessionBusyError when another turn holds the session (reject policy)
   */
  async handleUserMessage(
    text: string,
    ctx: RequestContext
  ): Promise<FinalAnswer> {
    const input = assertUserMessage(text, MAX_MESSAGE_CHARS);
    return this.deps.lock.run(() => this.runTurn(input, ctx));
  }

  /** Display history: every non-system message in insertion order. */
  getHistory(): Message[] {
    return filterSystemMessages(this.deps.store.snapshot());
  }

  getLatestAnswer(): string {
    return this.latestAnswer;
  }

  async clearHistory(ctx: RequestContext): Promise<void> {
    await this.deps.lock.run(async () => {
      const removed = this.deps.store.size;
      this.deps.store.clear();
      this.latestAnswer = HISTORY_CLEARED_TEXT;
      logEvent(ctx.log, EVENT_NAMES.CHAT_HISTORY_CLEARED, {
        reqId: ctx.reqId,
        routeId: ctx.routeId,
        removed,
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────────

  private append(draft: MessageDraft): Message {
    return this.deps.store.append({
      ...draft,
      timestamp: this.deps.clock.now(),
    });
  }

  private async runTurn(
    input: string,
    ctx: RequestContext
  ): Promise<FinalAnswer> {
    const { store, config } = this.deps;
    const start = this.deps.clock.monotonicMs();

    logEvent(ctx.log, EVENT_NAMES.CHAT_TURN_RECEIVED, {
      reqId: ctx.reqId,
      routeId: ctx.routeId,
      messageLength: Array.from(input).length,
      historySize: store.size,
    });

    if (store.size === 0 && config.systemPrompt) {
      this.append(systemPromptDraft(config.systemPrompt));
    }
    this.append({ role: "user", content: input });

    const catalog = await this.loadCatalog(ctx);
    const answer = await this.loop(catalog, ctx);

    this.latestAnswer = answer.text;
    chatTurnsTotal.inc({ status: answer.status });
    chatTurnRounds.observe(answer.rounds);
    chatTurnDurationMs.observe(this.deps.clock.monotonicMs() - start);
    logEvent(ctx.log, EVENT_NAMES.CHAT_TURN_COMPLETED, {
      reqId: ctx.reqId,
      routeId: ctx.routeId,
      status: answer.status,
      rounds: answer.rounds,
      errorCode: answer.errorCode,
      historySize: store.size,
    });
    return answer;
  }

  private async loop(
    catalog: readonly ToolDescriptor[],
    ctx: RequestContext
  ): Promise<FinalAnswer> {
    const { store, config } = this.deps;

    for (let round = 1; round <= config.maxRounds; round++) {
      let outcome: ModelOutcome;
      try {
        outcome = await this.completeWithRetry(catalog, ctx);
      } catch (error) {
        return this.fail(error, round, ctx);
      }

      if (outcome.kind === "final") {
        this.append({ role: "assistant", content: outcome.text });
        return { status: "success", text: outcome.text, rounds: round };
      }

      const results = await executeToolCalls(
        outcome.calls,
        this.deps.tools,
        {
          parallel: config.parallelToolCalls,
          timeoutMs: config.toolTimeoutMs,
        },
        ctx
      );

      // Request and results land together; nothing interleaves
      this.append(toolCallsDraft(outcome.calls, outcome.text));
      for (const result of results) {
        this.append(toolResultDraft(result));
      }

      ctx.log.info(
        {
          event: EVENT_NAMES.CHAT_ROUND_TOOL_CALLS,
          round,
          tools: outcome.calls.map((call) => call.toolName),
          failed: results.filter((result) => !result.success).length,
        },
        EVENT_NAMES.CHAT_ROUND_TOOL_CALLS
      );
    }

    ctx.log.warn(
      {
        event: EVENT_NAMES.CHAT_ROUND_LIMIT_REACHED,
        maxRounds: config.maxRounds,
        historySize: store.size,
      },
      EVENT_NAMES.CHAT_ROUND_LIMIT_REACHED
    );
    this.append(markerDraft("round_limit"));
    return {
      status: "incomplete",
      text: ROUND_LIMIT_TEXT,
      rounds: config.maxRounds,
    };
  }

  private async completeWithRetry(
    catalog: readonly ToolDescriptor[],
    ctx: RequestContext
  ): Promise<ModelOutcome> {
    const { gateway, store, config } = this.deps;
    try {
      return await gateway.complete(store.snapshot(), catalog, {
        requestId: ctx.reqId,
      });
    } catch (error) {
      if (!isRetryableLlmError(error)) throw error;
      ctx.log.warn(
        {
          event: EVENT_NAMES.CHAT_MODEL_RETRY,
          kind: error.kind,
          backoffMs: config.retryBackoffMs,
        },
        EVENT_NAMES.CHAT_MODEL_RETRY
      );
      await this.sleep(config.retryBackoffMs);
      return gateway.complete(store.snapshot(), catalog, {
        requestId: ctx.reqId,
      });
    }
  }

  private fail(error: unknown, round: number, ctx: RequestContext): FinalAnswer {
    const errorCode = normalizeLlmErrorToFailureCode(error);
    ctx.log.error(
      { event: EVENT_NAMES.CHAT_MODEL_FAILED, errorCode, round, err: error },
      EVENT_NAMES.CHAT_MODEL_FAILED
    );
    this.append(markerDraft("model_failure", errorCode));
    return {
      status: "failed",
      text: MODEL_FAILURE_TEXT,
      rounds: round,
      errorCode,
    };
  }

  private async loadCatalog(ctx: RequestContext): Promise<readonly ToolDescriptor[]> {
    try {
      const catalog = await this.deps.tools.listTools();
      return catalog.tools;
    } catch (error) {
      ctx.log.warn(
        { event: EVENT_NAMES.CHAT_CATALOG_UNAVAILABLE, err: error },
        EVENT_NAMES.CHAT_CATALOG_UNAVAILABLE
      );
      return [];
    }
  }
}
