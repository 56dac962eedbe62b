// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config/toolServers.server`
 * Purpose: Server-only loader for the MCP tool-server registry stored in config/tool-servers.yaml.
 * Scope: Reads YAML, resolves `${VAR}` placeholders from the environment, validates with zod. Does not connect to any server.
 * Invariants: Unset placeholders resolve to "" and are reported in `unresolved`; relative paths resolve against process.cwd().
 * Side-effects: IO (reads config file from disk)
 * Links: config/tool-servers.yaml, toolServers.schema.ts
 * @public
 */

import fs from "node:fs";
import path from "node:path";

import { parse } from "yaml";

import {
  type ToolServersConfig,
  toolServersConfigSchema,
} from "./toolServers.schema";

/** Placeholder source; `process.env` fits, as does a plain test record */
export type PlaceholderEnv = Readonly<Record<string, string | undefined>>;

const PLACEHOLDER = /\$\{([A-Z0-9_]+)\}/gi;

export interface LoadedToolServers {
  config: ToolServersConfig;
  /** Placeholder names with no value in the environment */
  unresolved: string[];
}

function interpolate(
  value: unknown,
  env: PlaceholderEnv,
  unresolved: Set<string>
): unknown {
  if (typeof value === "string") {
    return value.replace(PLACEHOLDER, (_match, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        unresolved.add(name);
        return "";
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => interpolate(item, env, unresolved));
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [
        key,
        interpolate(item, env, unresolved),
      ])
    );
  }
  return value;
}

/**
 * Parse and validate registry text. Exposed separately so callers can validate
 * content that did not come from disk.
 */
export function parseToolServersConfig(
  content: string,
  env: PlaceholderEnv = process.env
): LoadedToolServers {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch {
    throw new Error(
      "[tool-servers] Failed to parse tool server config; ensure valid YAML"
    );
  }

  const unresolved = new Set<string>();
  const result = toolServersConfigSchema.safeParse(
    interpolate(raw ?? { servers: [] }, env, unresolved)
  );
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`[tool-servers] Invalid tool server config: ${details}`);
  }

  return { config: result.data, unresolved: [...unresolved].sort() };
}

export function loadToolServersConfig(
  configPath: string,
  env: PlaceholderEnv = process.env
): LoadedToolServers {
  const resolvedPath = path.isAbsolute(configPath)
    ? configPath
    : path.join(process.cwd(), configPath);

  if (!fs.existsSync(resolvedPath)) {
    throw new Error(
      `[tool-servers] Missing configuration at ${resolvedPath}; set TOOL_SERVERS_CONFIG or commit config/tool-servers.yaml`
    );
  }

  return parseToolServersConfig(fs.readFileSync(resolvedPath, "utf8"), env);
}
