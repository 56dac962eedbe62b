// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/meta.readyz.read.v1.contract`
 * Purpose: Contract for readiness probe endpoint.
 * Scope: Readiness check - validates env and that every enabled tool server is connected. Does not call the model endpoint.
 * Invariants: HTTP status is primary truth: 200 = ready, 503 = not ready; body always carries per-server tool health.
 * Side-effects: none
 * Notes: Used by container orchestration readiness probes.
 * Links: /readyz endpoint
 * @internal
 */

import { z } from "zod";

export const readyzStatusSchema = z.enum(["ready", "not_ready"]);

export const toolServerHealthSchema = z.object({
  name: z.string(),
  connected: z.boolean(),
  toolCount: z.number().int().nonnegative(),
});

export const metaReadyzOutputSchema = z.object({
  status: readyzStatusSchema,
  timestamp: z.string(), // RFC3339/ISO-8601 format
  tools: z.object({
    servers: z.array(toolServerHealthSchema),
    toolCount: z.number().int().nonnegative(),
  }),
});

// Protocol-neutral operation metadata.
export const metaReadyzOperation = {
  id: "meta.readyz.read.v1",
  summary: "Readiness probe - tool servers connected",
  description:
    "Readiness check that connects configured tool servers on first probe and reports their health. HTTP status: 200 = ready, 503 = not ready.",
  input: null,
  output: metaReadyzOutputSchema,
} as const;
