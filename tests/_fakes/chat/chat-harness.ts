// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/chat/chat-harness`
 * Purpose: Builds a ChatOrchestrator over a scripted model, stub tools and the in-memory store.
 * Scope: Shared wiring for feature and contract tests. Does not mock the container itself.
 * Invariants: No backoff wait; busy policy is reject; no system prompt unless asked for.
 * Side-effects: none
 * @public
 */

import { InMemoryConversationStore } from "@/adapters/server";
import {
  ChatOrchestrator,
  type ChatOrchestratorConfig,
  SessionLock,
} from "@/features/chat/public.server";

import { FakeClock } from "../fake-clock";
import { type ScriptStep, ScriptedModelGateway } from "./scripted-model-gateway";
import { StubToolClient } from "./stub-tool-client";

export interface ChatHarness {
  orchestrator: ChatOrchestrator;
  store: InMemoryConversationStore;
  gateway: ScriptedModelGateway;
  tools: StubToolClient;
  clock: FakeClock;
}

export function makeChatHarness(
  steps: readonly ScriptStep[] = [],
  config: Partial<ChatOrchestratorConfig> = {}
): ChatHarness {
  const store = new InMemoryConversationStore();
  const gateway = new ScriptedModelGateway(steps);
  const tools = new StubToolClient();
  const clock = new FakeClock("2025-01-01T00:00:00.000Z");
  const orchestrator = new ChatOrchestrator({
    store,
    gateway,
    tools,
    clock,
    lock: new SessionLock("reject"),
    config: {
      maxRounds: 8,
      systemPrompt: null,
      parallelToolCalls: false,
      retryBackoffMs: 0,
      toolTimeoutMs: 1_000,
      ...config,
    },
    sleep: async () => {},
  });
  return { orchestrator, store, gateway, tools, clock };
}
