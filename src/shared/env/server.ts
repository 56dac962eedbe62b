// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for server runtime; provides lazy server environment access. Does not read the tool-server YAML (see `@shared/config`).
 * Invariants: All required env vars validated on first access; provides boolean flags for runtime and test modes; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: APP_ENV for adapter wiring; SERVICE_NAME for observability; MODEL_* for the chat-completions endpoint; CHAT_* for the orchestrator loop.
 *        Lazy init prevents build-time access.
 * Links: src/bootstrap/container.ts
 * @public
 */

import { ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

// Server schema with all environment variables
const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Application environment (controls adapter wiring)
  APP_ENV: z.enum(["test", "production"]),

  // Service identity for observability
  SERVICE_NAME: z.string().default("app"),
  DEPLOY_ENVIRONMENT: z.string().optional(),

  // Model endpoint (OpenAI-compatible chat completions)
  MODEL_BASE_URL: z
    .string()
    .url()
    .default("https://models.inference.ai.azure.com"),
  MODEL_API_KEY: z.string().min(1),
  MODEL_NAME: z.string().min(1).default("gpt-4o"),
  MODEL_API_VERSION: z.string().min(1).optional(),
  MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(1),
  MODEL_TOP_P: z.coerce.number().gt(0).max(1).default(1),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Orchestrator loop
  CHAT_MAX_ROUNDS: z.coerce.number().int().min(1).max(32).default(8),
  CHAT_BUSY_POLICY: z.enum(["reject", "queue"]).default("reject"),
  CHAT_PARALLEL_TOOL_CALLS: booleanFlag,
  CHAT_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
  CHAT_SYSTEM_PROMPT: z.string().min(1).optional(),

  // Tool servers
  TOOL_SERVERS_CONFIG: z.string().min(1).default("config/tool-servers.yaml"),
  TOOL_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Metrics scrape auth
  METRICS_TOKEN: z.string().min(1).optional(),

  // Optional
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

let ENV: ServerEnv | null = null;

function toValidationError(error: ZodError): EnvValidationError {
  const missing = new Set<string>();
  const invalid = new Set<string>();

  for (const issue of error.issues) {
    const key = issue.path[0]?.toString();
    if (!key) continue;

    /*
     * Treat all invalid_type as missing (avoids any casting)
     */
    if (issue.code === "invalid_type") {
      missing.add(key);
    } else {
      invalid.add(key);
    }
  }

  return new EnvValidationError({
    code: "INVALID_ENV",
    missing: [...missing],
    invalid: [...invalid],
  });
}

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);

      ENV = {
        ...parsed,
        isDev: parsed.NODE_ENV === "development",
        isTest: parsed.NODE_ENV === "test",
        isProd: parsed.NODE_ENV === "production",
        isTestMode: parsed.APP_ENV === "test",
      };
    } catch (error) {
      if (error instanceof ZodError) {
        throw toValidationError(error);
      }
      throw error;
    }
  }
  return ENV;
}

/**
 * Drop the cached env so the next serverEnv() re-reads process.env.
 * For tests only.
 */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };
