// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/lifecycle`
 * Purpose: Process lifecycle for the chat runtime - connect tool servers at startup, release them on shutdown.
 * Scope: Startup connect with readiness logging and signal-driven graceful shutdown. Does not decide adapter wiring (container does).
 * Invariants: Shutdown hooks are installed at most once per process; shutdown closes every tool connection exactly once.
 * Side-effects: IO (tool server connections, process signal listeners, logging)
 * Links: Called by src/instrumentation.ts; uses bootstrap/container
 * @public
 */

import { getContainer, shutdownContainer } from "@/bootstrap/container";
import type { ToolClientHealth } from "@/ports";
import { createSystemContext, EVENT_NAMES, logEvent } from "@/shared/observability";

const SHUTDOWN_SIGNALS = ["SIGTERM", "SIGINT"] as const;

let hooksInstalled = false;

/**
 * Connects configured tool servers and logs the resulting catalog health.
 * Servers that fail to connect are reported, not thrown.
 */
export async function startChatRuntime(): Promise<ToolClientHealth> {
  const container = getContainer();
  const ctx = createSystemContext(
    { baseLog: container.log, clock: container.clock },
    "startup"
  );

  await container.toolClient.start();
  const health = container.toolClient.health();

  logEvent(ctx.log, EVENT_NAMES.APP_STARTUP_TOOLS_READY, {
    reqId: ctx.reqId,
    ready: health.ready,
    toolCount: health.toolCount,
    servers: health.servers,
  });
  if (!health.ready) {
    ctx.log.warn(
      { servers: health.servers.filter((server) => !server.connected) },
      "some tool servers are not connected; readiness will fail"
    );
  }
  return health;
}

/**
 * Closes tool connections and drops the container.
 */
export async function stopChatRuntime(reason: string): Promise<void> {
  const container = getContainer();
  const ctx = createSystemContext(
    { baseLog: container.log, clock: container.clock },
    "shutdown"
  );
  logEvent(ctx.log, EVENT_NAMES.APP_SHUTDOWN, { reqId: ctx.reqId, reason });
  await shutdownContainer();
}

/**
 * Registers SIGTERM/SIGINT handlers that release tool connections before exit.
 */
export function installShutdownHooks(
  target: Pick<NodeJS.Process, "once" | "exit"> = process
): void {
  if (hooksInstalled) return;
  hooksInstalled = true;

  for (const signal of SHUTDOWN_SIGNALS) {
    target.once(signal, () => {
      stopChatRuntime(signal).then(
        () => target.exit(0),
        (error: unknown) => {
          getContainer().log.error({ err: error }, "shutdown failed");
          target.exit(1);
        }
      );
    });
  }
}

/** For tests only. */
export function resetShutdownHooks(): void {
  hooksInstalled = false;
}
