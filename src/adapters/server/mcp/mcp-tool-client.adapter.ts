// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/mcp/mcp-tool-client`
 * Purpose: ToolClient over the Model Context Protocol, aggregating the catalogs of several tool servers.
 * Scope: Connects configured servers (stdio subprocess, SSE, streamable HTTP), builds a tool→server routing table, invokes tools/call. Does not decide which tools to call.
 * Invariants:
 *   - One connection per server, shared by all concurrent invocations (the SDK multiplexes by JSON-RPC id)
 *   - Catalog is built once by start() and cached for the process lifetime
 *   - Duplicate tool names: first server in config order wins
 *   - After close(), every call fails with ToolUnavailablePortError
 * Side-effects: IO (spawns subprocesses, opens HTTP connections)
 * Notes: A server that fails to connect is logged and left out of the catalog; health() reports it so readiness fails.
 * Links: ToolClient port, `@shared/config` tool-server registry, @modelcontextprotocol/sdk
 * @internal
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import {
  getDefaultEnvironment,
  StdioClientTransport,
} from "@modelcontextprotocol/sdk/client/stdio.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import type {
  JsonSchemaObject,
  ToolCatalog,
  ToolClient,
  ToolClientHealth,
  ToolDescriptor,
  ToolInvokeOptions,
  ToolPayload,
} from "@/ports";
import {
  ToolTimeoutPortError,
  ToolUnavailablePortError,
  UnknownToolPortError,
} from "@/ports";
import type { ToolServerConfig } from "@/shared/config";
import { EVENT_NAMES, type Logger, makeLogger } from "@/shared/observability";

export type TransportFactory = (server: ToolServerConfig) => Transport;

export interface McpToolClientOptions {
  /** Default per-call timeout when invoke() gets none */
  defaultTimeoutMs: number;
  transportFactory?: TransportFactory;
  clientInfo?: { name: string; version: string };
  logger?: Logger;
}

interface ServerConnection {
  readonly config: ToolServerConfig;
  client: Client | null;
  connected: boolean;
  tools: ToolDescriptor[];
}

const DEFAULT_CLIENT_INFO = { name: "weather-chat", version: "0.1.0" };

/**
 * Result shape of tools/call, validated locally so content parts of any
 * type (text, image, resource) flatten the same way.
 */
const callToolResultSchema = z.object({
  content: z.array(z.object({ type: z.string() }).passthrough()).default([]),
  isError: z.boolean().optional(),
  structuredContent: z.record(z.unknown()).optional(),
});

const textPartSchema = z.object({ type: z.literal("text"), text: z.string() });

/** Builds the SDK transport for one configured server. */
export function createDefaultTransport(server: ToolServerConfig): Transport {
  switch (server.transport) {
    case "stdio":
      return new StdioClientTransport({
        command: server.command,
        args: server.args,
        env: { ...getDefaultEnvironment(), ...server.env },
        ...(server.cwd ? { cwd: server.cwd } : {}),
      });
    case "sse":
      return new SSEClientTransport(new URL(server.url), {
        requestInit: { headers: server.headers },
      });
    case "streamable_http":
      return new StreamableHTTPClientTransport(new URL(server.url), {
        requestInit: { headers: server.headers },
      });
  }
}

/** Text parts joined by newline; other parts as JSON. */
export function flattenToolContent(
  result: z.infer<typeof callToolResultSchema>
): string {
  if (result.content.length === 0 && result.structuredContent) {
    return JSON.stringify(result.structuredContent);
  }
  return result.content
    .map((part) => {
      const text = textPartSchema.safeParse(part);
      return text.success ? text.data.text : JSON.stringify(part);
    })
    .join("\n");
}

/** Keeps every keyword the server sent ($defs, additionalProperties, ...). */
export function toInputSchema(
  schema: Readonly<Record<string, unknown>>
): JsonSchemaObject {
  return { ...schema, type: "object" };
}

export class McpToolClientAdapter implements ToolClient {
  private readonly connections: ServerConnection[];
  private readonly routes = new Map<string, ServerConnection>();
  private readonly transportFactory: TransportFactory;
  private readonly log: Logger;
  private catalog: ToolCatalog = { tools: [] };
  private starting: Promise<void> | null = null;
  private closed = false;

  constructor(
    servers: readonly ToolServerConfig[],
    private readonly options: McpToolClientOptions
  ) {
    this.connections = servers
      .filter((server) => server.enabled)
      .map(
        (config): ServerConnection => ({
          config,
          client: null,
          connected: false,
          tools: [],
        })
      );
    this.transportFactory = options.transportFactory ?? createDefaultTransport;
    this.log = options.logger ?? makeLogger({ component: "McpToolClient" });
  }

  start(): Promise<void> {
    if (this.closed) {
      return Promise.reject(
        new ToolUnavailablePortError("*", "tool client closed")
      );
    }
    if (!this.starting) {
      this.starting = this.connectAll();
    }
    return this.starting;
  }

  async listTools(): Promise<ToolCatalog> {
    await this.start();
    return this.catalog;
  }

  async invoke(
    name: string,
    args: Readonly<Record<string, unknown>>,
    options: ToolInvokeOptions = {}
  ): Promise<ToolPayload> {
    if (this.closed) {
      throw new ToolUnavailablePortError(name, "tool client closed");
    }
    await this.start();

    const connection = this.routes.get(name);
    if (!connection) {
      throw new UnknownToolPortError(name);
    }
    const { client } = connection;
    if (!connection.connected || !client) {
      throw new ToolUnavailablePortError(
        name,
        `server ${connection.config.name} is not connected`
      );
    }

    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
    let raw: unknown;
    try {
      raw = await client.callTool({ name, arguments: { ...args } }, undefined, {
        timeout: timeoutMs,
      });
    } catch (error) {
      throw this.mapCallError(name, connection, timeoutMs, error);
    }

    const parsed = callToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(
        `Tool ${name} returned a result without a content list`
      );
    }

    this.log.debug(
      {
        tool: name,
        server: connection.config.name,
        isError: parsed.data.isError === true,
        partCount: parsed.data.content.length,
      },
      EVENT_NAMES.ADAPTER_MCP_TOOL_CALL
    );

    return {
      text: flattenToolContent(parsed.data),
      isError: parsed.data.isError === true,
    };
  }

  health(): ToolClientHealth {
    const servers = this.connections.map((connection) => ({
      name: connection.config.name,
      connected: connection.connected,
      toolCount: connection.tools.length,
    }));
    return {
      ready:
        !this.closed && servers.every((server) => server.connected),
      servers,
      toolCount: this.catalog.tools.length,
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await Promise.all(
      this.connections.map(async (connection) => {
        const { client } = connection;
        connection.connected = false;
        connection.client = null;
        if (!client) return;
        try {
          await client.close();
        } catch (error) {
          this.log.warn(
            { server: connection.config.name, err: error },
            "failed to close tool server connection"
          );
        }
      })
    );
  }

  // ───────────────────────────────────────────────────────────────────────────

  private async connectAll(): Promise<void> {
    await Promise.all(
      this.connections.map((connection) => this.connect(connection))
    );

    // Routing follows config order so duplicate resolution is deterministic
    const tools: ToolDescriptor[] = [];
    for (const connection of this.connections) {
      for (const tool of connection.tools) {
        const owner = this.routes.get(tool.name);
        if (owner) {
          this.log.warn(
            {
              tool: tool.name,
              server: connection.config.name,
              keptServer: owner.config.name,
            },
            EVENT_NAMES.ADAPTER_MCP_DUPLICATE_TOOL
          );
          continue;
        }
        this.routes.set(tool.name, connection);
        tools.push(tool);
      }
    }
    this.catalog = { tools };
  }

  private async connect(connection: ServerConnection): Promise<void> {
    const { config } = connection;
    const client = new Client(
      this.options.clientInfo ?? DEFAULT_CLIENT_INFO,
      { capabilities: {} }
    );
    client.onclose = () => {
      if (!connection.connected) return;
      connection.connected = false;
      this.log.warn({ server: config.name }, EVENT_NAMES.ADAPTER_MCP_SERVER_CLOSED);
    };

    try {
      await client.connect(this.transportFactory(config));
      connection.client = client;
      connection.tools = await this.fetchTools(client);
      connection.connected = !this.closed;
      this.log.info(
        {
          server: config.name,
          transport: config.transport,
          toolCount: connection.tools.length,
        },
        EVENT_NAMES.ADAPTER_MCP_SERVER_CONNECTED
      );
    } catch (error) {
      connection.connected = false;
      connection.client = null;
      connection.tools = [];
      this.log.error(
        { server: config.name, transport: config.transport, err: error },
        EVENT_NAMES.ADAPTER_MCP_SERVER_FAILED
      );
      await client.close().catch((closeError: unknown) => {
        this.log.debug(
          { server: config.name, err: closeError },
          "close after failed connect"
        );
      });
    }
  }

  private async fetchTools(client: Client): Promise<ToolDescriptor[]> {
    const tools: ToolDescriptor[] = [];
    let cursor: string | undefined;
    do {
      const page = await client.listTools(cursor ? { cursor } : undefined);
      for (const tool of page.tools) {
        tools.push({
          name: tool.name,
          description: tool.description ?? "",
          inputSchema: toInputSchema(tool.inputSchema),
        });
      }
      cursor = page.nextCursor;
    } while (cursor);
    return tools;
  }

  private mapCallError(
    name: string,
    connection: ServerConnection,
    timeoutMs: number,
    error: unknown
  ): unknown {
    if (error instanceof McpError) {
      if (error.code === ErrorCode.RequestTimeout) {
        return new ToolTimeoutPortError(name, timeoutMs);
      }
      if (error.code === ErrorCode.ConnectionClosed) {
        connection.connected = false;
        return new ToolUnavailablePortError(
          name,
          `server ${connection.config.name} closed the connection`
        );
      }
      return error;
    }
    if (error instanceof Error && error.message === "Not connected") {
      connection.connected = false;
      return new ToolUnavailablePortError(
        name,
        `server ${connection.config.name} is not connected`
      );
    }
    return error;
  }
}
