// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/config/toolServers.schema`
 * Purpose: Zod schemas and derived types for config/tool-servers.yaml validation.
 * Scope: Defines the registry of MCP tool servers and how to reach each one; validates structure at runtime; does not perform I/O.
 * Invariants: Server names are unique and slug-shaped; stdio servers need a command; enabled sse and streamable_http servers need an absolute URL.
 * Side-effects: none
 * Notes: `${VAR}` placeholders are resolved by the loader before validation.
 * Links: config/tool-servers.yaml, src/adapters/server/mcp
 * @public
 */

import { z } from "zod";

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

const serverName = z
  .string()
  .regex(
    /^[a-z0-9][a-z0-9_-]*$/i,
    "Server name must be alphanumeric with - or _"
  );

const stdioServerSchema = z.object({
  name: serverName,
  enabled: z.boolean().default(true),
  transport: z.literal("stdio"),
  /** Executable launched as a subprocess (e.g. "npx") */
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  /** Extra environment for the subprocess, merged over the SDK's safe default env */
  env: z.record(z.string()).default({}),
  cwd: z.string().min(1).optional(),
});

const remoteServerFields = {
  name: serverName,
  enabled: z.boolean().default(true),
  /** Checked as an absolute URL only when the server is enabled */
  url: z.string(),
  headers: z.record(z.string()).default({}),
};

const sseServerSchema = z.object({
  ...remoteServerFields,
  transport: z.literal("sse"),
});

const streamableHttpServerSchema = z.object({
  ...remoteServerFields,
  transport: z.literal("streamable_http"),
});

export const toolServerSchema = z.discriminatedUnion("transport", [
  stdioServerSchema,
  sseServerSchema,
  streamableHttpServerSchema,
]);

export const toolServersConfigSchema = z
  .object({
    servers: z.array(toolServerSchema),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.servers.forEach((server, index) => {
      if (seen.has(server.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["servers", index, "name"],
          message: `Duplicate server name: ${server.name}`,
        });
      }
      seen.add(server.name);

      if (
        server.transport !== "stdio" &&
        server.enabled &&
        !isAbsoluteUrl(server.url)
      ) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["servers", index, "url"],
          message: `Server ${server.name} needs an absolute URL`,
        });
      }
    });
  });

export type ToolServerConfig = z.infer<typeof toolServerSchema>;
export type StdioToolServerConfig = z.infer<typeof stdioServerSchema>;
export type SseToolServerConfig = z.infer<typeof sseServerSchema>;
export type StreamableHttpToolServerConfig = z.infer<
  typeof streamableHttpServerSchema
>;
export type ToolServersConfig = z.infer<typeof toolServersConfigSchema>;
