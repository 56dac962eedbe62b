// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for application composition root with environment-based adapter selection.
 * Scope: Wire adapters to ports and build the chat orchestrator. Does not handle request-scoped lifecycle.
 * Invariants: All ports wired; single container instance per process; config.unhandledErrorPolicy set by env; tool connections are process-wide.
 * Side-effects: IO (initializes logger, reads tool-server config on first access)
 * Notes: Uses serverEnv.isTestMode (APP_ENV=test) to wire fake model gateway and tool client; tool servers connect lazily or via instrumentation startup.
 * Links: Used by API routes, facades and instrumentation; configure adapters here for DI.
 * @public
 */

import type { Logger } from "pino";

import {
  ChatCompletionsAdapter,
  InMemoryConversationStore,
  McpToolClientAdapter,
  SystemClock,
} from "@/adapters/server";
import {
  FakeModelGatewayAdapter,
  FakeToolClientAdapter,
} from "@/adapters/test";
import { BASELINE_SYSTEM_PROMPT } from "@/core";
import { ChatOrchestrator, SessionLock } from "@/features/chat/public.server";
import type {
  Clock,
  ConversationStore,
  ModelGateway,
  ToolClient,
} from "@/ports";
import { loadToolServersConfig } from "@/shared/config";
import { type ServerEnv, serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";

export type UnhandledErrorPolicy = "rethrow" | "respond_500";

export interface ContainerConfig {
  /** How to handle unhandled errors in route wrappers: rethrow for dev/test, respond_500 for production safety */
  unhandledErrorPolicy: UnhandledErrorPolicy;
  /** Deploy environment for metrics/logging (e.g., "local", "preview", "production") */
  DEPLOY_ENVIRONMENT: string;
}

export interface Container {
  log: Logger;
  config: ContainerConfig;
  clock: Clock;
  conversationStore: ConversationStore;
  modelGateway: ModelGateway;
  toolClient: ToolClient;
  chatOrchestrator: ChatOrchestrator;
}

// Feature-specific dependency types
export type ChatDeps = Pick<Container, "chatOrchestrator" | "clock">;

export type HealthDeps = Pick<Container, "toolClient">;

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

/**
 * Releases process-wide resources (tool server connections) and drops the singleton.
 * Safe to call when the container was never built.
 */
export async function shutdownContainer(): Promise<void> {
  const container = _container;
  _container = null;
  if (!container) return;
  await container.toolClient.close();
}

function createToolClient(env: ServerEnv, log: Logger): ToolClient {
  if (env.isTestMode) {
    return new FakeToolClientAdapter();
  }

  const { config, unresolved } = loadToolServersConfig(env.TOOL_SERVERS_CONFIG);
  if (unresolved.length > 0) {
    // Placeholders resolve to "" so the server still starts; its calls may fail
    log.warn(
      { variables: unresolved },
      "tool server config references unset environment variables"
    );
  }
  return new McpToolClientAdapter(config.servers, {
    defaultTimeoutMs: env.TOOL_CALL_TIMEOUT_MS,
    logger: log.child({ component: "McpToolClient" }),
  });
}

function createModelGateway(env: ServerEnv): ModelGateway {
  if (env.isTestMode) {
    return new FakeModelGatewayAdapter();
  }
  return new ChatCompletionsAdapter({
    baseUrl: env.MODEL_BASE_URL,
    apiKey: env.MODEL_API_KEY,
    model: env.MODEL_NAME,
    apiVersion: env.MODEL_API_VERSION,
    temperature: env.MODEL_TEMPERATURE,
    topP: env.MODEL_TOP_P,
    timeoutMs: env.MODEL_TIMEOUT_MS,
  });
}

function createContainer(): Container {
  const env = serverEnv();
  const log = makeLogger({ service: env.SERVICE_NAME });

  // Startup log (no URLs/secrets)
  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      model: env.MODEL_NAME,
      maxRounds: env.CHAT_MAX_ROUNDS,
      busyPolicy: env.CHAT_BUSY_POLICY,
    },
    "container initialized"
  );

  // Environment-based adapter wiring - single source of truth
  const clock = new SystemClock();
  const conversationStore = new InMemoryConversationStore();
  const modelGateway = createModelGateway(env);
  const toolClient = createToolClient(env, log);

  const chatOrchestrator = new ChatOrchestrator({
    store: conversationStore,
    gateway: modelGateway,
    tools: toolClient,
    clock,
    lock: new SessionLock(env.CHAT_BUSY_POLICY),
    config: {
      maxRounds: env.CHAT_MAX_ROUNDS,
      systemPrompt: env.CHAT_SYSTEM_PROMPT ?? BASELINE_SYSTEM_PROMPT,
      parallelToolCalls: env.CHAT_PARALLEL_TOOL_CALLS,
      retryBackoffMs: env.CHAT_RETRY_BACKOFF_MS,
      toolTimeoutMs: env.TOOL_CALL_TIMEOUT_MS,
    },
  });

  // Config: rethrow in dev/test for diagnosis, respond_500 in production for safety
  const config: ContainerConfig = {
    unhandledErrorPolicy: env.isProd ? "respond_500" : "rethrow",
    DEPLOY_ENVIRONMENT: env.DEPLOY_ENVIRONMENT ?? "local",
  };

  return {
    log,
    config,
    clock,
    conversationStore,
    modelGateway,
    toolClient,
    chatOrchestrator,
  };
}

/**
 * Resolves dependencies for the chat feature
 * Returns subset of Container needed for chat operations
 */
export function resolveChatDeps(): ChatDeps {
  const container = getContainer();
  return {
    chatOrchestrator: container.chatOrchestrator,
    clock: container.clock,
  };
}

export function resolveHealthDeps(): HealthDeps {
  return { toolClient: getContainer().toolClient };
}
