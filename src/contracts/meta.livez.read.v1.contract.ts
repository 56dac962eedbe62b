// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/meta.livez.read.v1.contract`
 * Purpose: Liveness probe response: the process is up and serving HTTP.
 * Scope: Output schema only. Says nothing about tool servers or the model endpoint (see readyz).
 * Invariants: 200 means alive; there is no failure body.
 * Side-effects: none
 * Links: /livez
 * @internal
 */

import { z } from "zod";

export const metaLivezOutputSchema = z.object({
  status: z.literal("alive"),
  timestamp: z.string().datetime(),
  uptimeSeconds: z.number().nonnegative(),
});

export type MetaLivezOutput = z.infer<typeof metaLivezOutputSchema>;

export const metaLivezOperation = {
  id: "meta.livez.read.v1",
  summary: "Liveness probe",
  description:
    "Returns as soon as the HTTP stack answers. Never waits on the chat session lock or any dependency.",
  input: null,
  output: metaLivezOutputSchema,
} as const;
