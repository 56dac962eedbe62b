// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/chat.model-response.v1.contract`
 * Purpose: Contract for reading the latest final answer.
 * Scope: Edge IO definition. Does not contain business logic.
 * Invariants: Always returns text; a placeholder before the first turn and after clear.
 * Side-effects: none
 * Links: GET /api/model_response
 * @internal
 */

import { z } from "zod";

export const chatModelResponseOperation = {
  id: "chat.model_response.v1",
  summary: "Latest model response",
  description: "Returns the text of the most recent final answer.",
  input: null,
  output: z.object({
    modelResponse: z.string(),
  }),
} as const;
