// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/chat/turn.server`
 * Purpose: App-layer coordinator for chat turns - resolves the orchestrator and shapes contract output.
 * Scope: Runs a user turn (free text or the weather convenience message) and maps the FinalAnswer to the contract. Does not contain business logic or HTTP concerns.
 * Invariants:
 *   - Only app layer imports this; routes call this, not features/* directly
 *   - Must import features via public.server.ts ONLY
 *   - Propagates ChatValidationError and SessionBusyError to routes
 * Side-effects: IO (via resolved dependencies)
 * Links: Called by /api/send_message and /api/weather, delegates to features/chat/public.server.ts
 * @public
 */

import type { z } from "zod";

import { resolveChatDeps } from "@/bootstrap/container";
import type { chatSendMessageOperation } from "@/contracts/chat.send-message.v1.contract";
import type { chatWeatherOperation } from "@/contracts/chat.weather.v1.contract";
import type { RequestContext } from "@/shared/observability";

// Type-level enforcement: facade MUST return exact contract shape
type SendMessageInput = z.infer<typeof chatSendMessageOperation.input>;
type SendMessageOutput = z.infer<typeof chatSendMessageOperation.output>;
type WeatherInput = z.infer<typeof chatWeatherOperation.input>;
type WeatherOutput = z.infer<typeof chatWeatherOperation.output>;

export function weatherMessage(city: string): string {
  return `I'm in ${city}. What do I need to do before leaving the house?`;
}

export async function sendMessage(
  input: SendMessageInput,
  ctx: RequestContext
): Promise<SendMessageOutput> {
  const { chatOrchestrator } = resolveChatDeps();
  const answer = await chatOrchestrator.handleUserMessage(input.message, ctx);
  return {
    response: answer.text,
    message: input.message,
    status: answer.status,
    ...(answer.errorCode ? { errorCode: answer.errorCode } : {}),
  };
}

export async function askWeather(
  input: WeatherInput,
  ctx: RequestContext
): Promise<WeatherOutput> {
  const { chatOrchestrator } = resolveChatDeps();

  // Enrich context with the requested city
  const enrichedCtx: RequestContext = {
    ...ctx,
    log: ctx.log.child({ city: input.city }),
  };

  const answer = await chatOrchestrator.handleUserMessage(
    weatherMessage(input.city),
    enrichedCtx
  );
  return {
    weatherInfo: answer.text,
    city: input.city,
    status: answer.status,
  };
}
