// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Unit tests for dependency injection container environment-based adapter wiring.
 * Scope: Tests adapter selection based on APP_ENV, singleton behavior and shutdown. Does NOT connect real tool servers or call a model.
 * Invariants: Module cache reset between tests; clean env state; container wiring matches expected adapter types.
 * Side-effects: process.env
 * Notes: Uses vi.resetModules() to force fresh imports; production wiring reads the committed config/tool-servers.yaml but never connects.
 * Links: src/bootstrap/container.ts
 * @public
 */

import { makeTestCtx } from "@tests/_fakes";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const ORIGINAL_ENV = process.env;

describe("bootstrap container DI wiring", () => {
  beforeEach(() => {
    vi.resetModules();
    process.env = { ...ORIGINAL_ENV };
    delete process.env.TOOL_SERVERS_CONFIG;
    delete process.env.CHAT_SYSTEM_PROMPT;
  });

  afterEach(async () => {
    const { shutdownContainer } = await import("@/bootstrap/container");
    await shutdownContainer();
    process.env = ORIGINAL_ENV;
  });

  describe("getContainer adapter selection", () => {
    it("wires fake model and tool adapters when APP_ENV=test", async () => {
      Object.assign(process.env, {
        NODE_ENV: "test",
        APP_ENV: "test",
        MODEL_API_KEY: "test-key",
      });

      const { getContainer } = await import("@/bootstrap/container");
      const { FakeModelGatewayAdapter, FakeToolClientAdapter } = await import(
        "@/adapters/test"
      );

      const container = getContainer();

      expect(container.modelGateway).toBeInstanceOf(FakeModelGatewayAdapter);
      expect(container.toolClient).toBeInstanceOf(FakeToolClientAdapter);
      expect(container.config).toEqual({
        unhandledErrorPolicy: "rethrow",
        DEPLOY_ENVIRONMENT: "local",
      });
    });

    it("wires the chat-completions and MCP adapters when APP_ENV=production", async () => {
      Object.assign(process.env, {
        NODE_ENV: "test",
        APP_ENV: "production",
        MODEL_API_KEY: "test-key",
        ACCUWEATHER_API_KEY: "test-secret",
      });

      const { getContainer } = await import("@/bootstrap/container");
      const { ChatCompletionsAdapter, McpToolClientAdapter } = await import(
        "@/adapters/server"
      );

      const container = getContainer();

      expect(container.modelGateway).toBeInstanceOf(ChatCompletionsAdapter);
      expect(container.toolClient).toBeInstanceOf(McpToolClientAdapter);
      // Only the enabled server in the committed registry is tracked
      expect(container.toolClient.health().servers).toEqual([
        { name: "weather", connected: false, toolCount: 0 },
      ]);
    });

    it("responds with 500 on unhandled errors in production", async () => {
      Object.assign(process.env, {
        NODE_ENV: "production",
        APP_ENV: "test",
        MODEL_API_KEY: "test-key",
        DEPLOY_ENVIRONMENT: "preview",
      });

      const { getContainer } = await import("@/bootstrap/container");

      expect(getContainer().config).toEqual({
        unhandledErrorPolicy: "respond_500",
        DEPLOY_ENVIRONMENT: "preview",
      });
    });

    it("fails fast when the tool-server registry is missing", async () => {
      Object.assign(process.env, {
        NODE_ENV: "test",
        APP_ENV: "production",
        MODEL_API_KEY: "test-key",
        TOOL_SERVERS_CONFIG: "config/does-not-exist.yaml",
      });

      const { getContainer } = await import("@/bootstrap/container");

      expect(() => getContainer()).toThrow("[tool-servers] Missing configuration");
    });
  });

  describe("container behavior", () => {
    beforeEach(() => {
      Object.assign(process.env, {
        NODE_ENV: "test",
        APP_ENV: "test",
        MODEL_API_KEY: "test-key",
      });
    });

    it("returns same container instance (singleton)", async () => {
      const { getContainer } = await import("@/bootstrap/container");

      const container1 = getContainer();
      const container2 = getContainer();

      expect(container1).toBe(container2);
      expect(container1.chatOrchestrator).toBe(container2.chatOrchestrator);
      expect(container1.conversationStore).toBe(container2.conversationStore);
    });

    it("resolveChatDeps and resolveHealthDeps use the singleton", async () => {
      const { getContainer, resolveChatDeps, resolveHealthDeps } = await import(
        "@/bootstrap/container"
      );

      const container = getContainer();

      expect(resolveChatDeps()).toEqual({
        chatOrchestrator: container.chatOrchestrator,
        clock: container.clock,
      });
      expect(resolveHealthDeps().toolClient).toBe(container.toolClient);
    });

    it("runs a full turn through the fake adapters", async () => {
      const { getContainer } = await import("@/bootstrap/container");
      const { FAKE_FINAL_TEXT } = await import("@/adapters/test");
      const { BASELINE_SYSTEM_PROMPT } = await import("@/core");
      const container = getContainer();

      const answer = await container.chatOrchestrator.handleUserMessage(
        "What should I wear in Seattle?",
        makeTestCtx()
      );

      expect(answer).toEqual({
        status: "success",
        text: FAKE_FINAL_TEXT,
        rounds: 2,
      });
      const roles = container.conversationStore
        .snapshot()
        .map((message) => message.role);
      expect(roles).toEqual(["system", "user", "assistant", "tool", "assistant"]);
      expect(container.conversationStore.snapshot()[0]?.content).toBe(
        BASELINE_SYSTEM_PROMPT
      );
    });

    it("shutdownContainer closes tool connections and drops the singleton", async () => {
      const { getContainer, shutdownContainer } = await import(
        "@/bootstrap/container"
      );
      const first = getContainer();

      await shutdownContainer();

      expect(first.toolClient.health().ready).toBe(false);
      expect(getContainer()).not.toBe(first);
    });
  });
});
