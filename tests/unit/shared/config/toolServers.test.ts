// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/config/toolServers`
 * Purpose: Validate loading of the MCP tool-server registry.
 * Scope: Unit tests for parseToolServersConfig and loadToolServersConfig; uses the committed config and temporary fixture files.
 * Invariants: Fail-fast on invalid YAML, duplicate names, bad URLs and missing files.
 * Side-effects: none (temp filesystem only)
 * Links: src/shared/config/toolServers.server.ts, config/tool-servers.yaml
 * @public
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import {
  loadToolServersConfig,
  parseToolServersConfig,
} from "@/shared/config";

function writeConfig(yaml: string): string {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "tool-servers-"));
  const file = path.join(tmpDir, "tool-servers.yaml");
  fs.writeFileSync(file, yaml);
  return file;
}

describe("parseToolServersConfig", () => {
  it("applies defaults to a minimal stdio server", () => {
    const { config, unresolved } = parseToolServersConfig(
      `
servers:
  - name: weather
    transport: stdio
    command: weather-mcp
`,
      {}
    );

    expect(config.servers).toEqual([
      {
        name: "weather",
        enabled: true,
        transport: "stdio",
        command: "weather-mcp",
        args: [],
        env: {},
      },
    ]);
    expect(unresolved).toEqual([]);
  });

  it("resolves placeholders inside nested strings", () => {
    const { config } = parseToolServersConfig(
      `
servers:
  - name: air
    transport: streamable_http
    url: \${AIR_URL}/mcp
    headers:
      Authorization: Bearer \${AIR_TOKEN}
`,
      { AIR_URL: "https://air.example.test", AIR_TOKEN: "test-secret" }
    );

    expect(config.servers[0]).toEqual({
      name: "air",
      enabled: true,
      transport: "streamable_http",
      url: "https://air.example.test/mcp",
      headers: { Authorization: "Bearer test-secret" },
    });
  });

  it("reports unset placeholders once each, sorted", () => {
    const { config, unresolved } = parseToolServersConfig(
      `
servers:
  - name: weather
    transport: stdio
    command: weather-mcp
    args: ["--key", "\${WEATHER_KEY}"]
    env:
      WEATHER_KEY: \${WEATHER_KEY}
      REGION: \${REGION}
`,
      {}
    );

    expect(unresolved).toEqual(["REGION", "WEATHER_KEY"]);
    expect(config.servers[0]).toMatchObject({
      args: ["--key", ""],
      env: { WEATHER_KEY: "", REGION: "" },
    });
  });

  it("treats an empty document as no servers", () => {
    expect(parseToolServersConfig("", {}).config).toEqual({ servers: [] });
  });

  it("rejects duplicate server names", () => {
    expect(() =>
      parseToolServersConfig(
        `
servers:
  - { name: weather, transport: stdio, command: a }
  - { name: weather, transport: stdio, command: b }
`,
        {}
      )
    ).toThrow("servers.1.name: Duplicate server name: weather");
  });

  it("requires an absolute URL for enabled remote servers", () => {
    expect(() =>
      parseToolServersConfig(
        `
servers:
  - { name: air, transport: sse, url: /relative }
`,
        {}
      )
    ).toThrow("servers.0.url: Server air needs an absolute URL");
  });

  it("accepts a disabled remote server whose URL is unset", () => {
    const { config } = parseToolServersConfig(
      `
servers:
  - { name: air, enabled: false, transport: sse, url: "\${AIR_URL}" }
`,
      {}
    );

    expect(config.servers[0]).toMatchObject({ enabled: false, url: "" });
  });

  it("rejects names that are not slugs", () => {
    expect(() =>
      parseToolServersConfig(
        `
servers:
  - { name: "weather server", transport: stdio, command: a }
`,
        {}
      )
    ).toThrow("[tool-servers] Invalid tool server config");
  });

  it("rejects unknown transports", () => {
    expect(() =>
      parseToolServersConfig(
        `
servers:
  - { name: weather, transport: websocket, url: "wss://x.example.test" }
`,
        {}
      )
    ).toThrow("[tool-servers] Invalid tool server config");
  });

  it("rejects malformed YAML", () => {
    expect(() => parseToolServersConfig("servers: [", {})).toThrow(
      "[tool-servers] Failed to parse tool server config; ensure valid YAML"
    );
  });
});

describe("loadToolServersConfig", () => {
  it("loads the committed registry relative to the working directory", () => {
    const { config, unresolved } = loadToolServersConfig(
      "config/tool-servers.yaml",
      { ACCUWEATHER_API_KEY: "test-secret" }
    );

    expect(config.servers.map((server) => server.name)).toEqual([
      "weather",
      "air-quality",
    ]);
    expect(config.servers[0]).toMatchObject({
      transport: "stdio",
      env: { ACCUWEATHER_API_KEY: "test-secret" },
    });
    expect(config.servers[1]).toMatchObject({ enabled: false, transport: "sse" });
    expect(unresolved).toEqual(["AIR_QUALITY_MCP_TOKEN", "AIR_QUALITY_MCP_URL"]);
  });

  it("reads an absolute path", () => {
    const file = writeConfig(
      "servers:\n  - { name: local, transport: stdio, command: local-mcp }\n"
    );
    try {
      const { config } = loadToolServersConfig(file, {});

      expect(config.servers[0]?.name).toBe("local");
    } finally {
      fs.rmSync(path.dirname(file), { recursive: true, force: true });
    }
  });

  it("fails fast when the file is missing", () => {
    const missing = path.join(os.tmpdir(), "no-such-dir", "tool-servers.yaml");

    expect(() => loadToolServersConfig(missing, {})).toThrow(
      `[tool-servers] Missing configuration at ${missing}`
    );
  });
});
