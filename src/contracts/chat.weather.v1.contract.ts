// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/chat.weather.v1.contract`
 * Purpose: Contract for the leave-the-house convenience endpoint.
 * Scope: Edge IO definition. Does not contain business logic.
 * Invariants: Missing or blank city falls back to "Seattle".
 * Side-effects: none
 * Notes: Sends a fixed user message built from the city through the same chat loop as send_message.
 * Links: GET /api/weather
 * @internal
 */

import { z } from "zod";

import { finalAnswerStatusSchema } from "./chat.send-message.v1.contract";

export const DEFAULT_CITY = "Seattle";

export const chatWeatherOperation = {
  id: "chat.weather.v1",
  summary: "Ask what to do before leaving the house",
  description:
    "Sends \"I'm in {city}. What do I need to do before leaving the house?\" as a user turn and returns the final answer.",
  input: z.object({
    city: z
      .string()
      .trim()
      .max(100)
      .optional()
      .transform((city) => (city ? city : DEFAULT_CITY)),
  }),
  output: z.object({
    weatherInfo: z.string(),
    city: z.string(),
    status: finalAnswerStatusSchema,
  }),
} as const;
