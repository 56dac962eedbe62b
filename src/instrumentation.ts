// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@instrumentation`
 * Purpose: Next.js instrumentation hook that starts the chat runtime once per Node.js process.
 * Scope: Connect tool servers before the first request and install graceful-shutdown hooks. Does NOT run during build or in the Edge runtime.
 * Invariants:
 *   - Runtime startup happens ONLY here (not at container module-load)
 *   - Hard-fails in non-dev if startup throws (e.g. invalid env or tool-server config)
 * Side-effects: IO (tool server connections, process signal listeners)
 * Notes: Next.js calls register() once per Node.js process on startup. Bootstrap is imported dynamically so the Edge bundle never pulls in Node-only modules.
 * Links: bootstrap/lifecycle.ts
 * @public
 */

/**
 * Next.js instrumentation hook - called once per Node.js process.
 */
export async function register(): Promise<void> {
  // Only start in Node.js runtime (allowlist, not denylist)
  if (process.env.NEXT_RUNTIME !== "nodejs") {
    return;
  }

  const { installShutdownHooks, startChatRuntime } = await import(
    "@/bootstrap/lifecycle"
  );

  try {
    await startChatRuntime();
    installShutdownHooks();
  } catch (error) {
    const isDev = process.env.NODE_ENV === "development";

    console.error("[instrumentation] chat runtime startup failed:", error);

    if (!isDev) {
      throw error;
    }
  }
}
