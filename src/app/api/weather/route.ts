// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/weather`
 * Purpose: HTTP endpoint asking what to do before leaving the house in a given city.
 * Scope: Read the city query parameter, delegate to the turn facade, map feature errors to HTTP codes. Does not run the loop itself.
 * Invariants: City defaults to "Seattle"; 409 while another turn runs.
 * Side-effects: IO (HTTP request/response)
 * Links: `@contracts/chat.weather.v1.contract`, `@app/_facades/chat/turn.server`
 * @public
 */

import { NextResponse } from "next/server";
import { ZodError } from "zod";

import { askWeather } from "@/app/_facades/chat/turn.server";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { chatWeatherOperation } from "@/contracts/chat.weather.v1.contract";
import { isSessionBusyError } from "@/features/chat/public.server";
import { logRequestWarn, type RequestContext } from "@/shared/observability";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

function handleRouteError(
  ctx: RequestContext,
  error: unknown
): NextResponse | null {
  if (error instanceof ZodError) {
    logRequestWarn(ctx.log, error, "VALIDATION_ERROR");
    return NextResponse.json({ error: "Invalid city" }, { status: 400 });
  }

  if (isSessionBusyError(error)) {
    logRequestWarn(ctx.log, error, error.kind);
    return NextResponse.json({ error: error.message }, { status: 409 });
  }

  return null;
}

export const GET = wrapRouteHandlerWithLogging(
  { routeId: "chat.weather" },
  async (ctx, request) => {
    try {
      const input = chatWeatherOperation.input.parse({
        city: request.nextUrl.searchParams.get("city") ?? undefined,
      });
      const result = await askWeather(input, ctx);
      return NextResponse.json(chatWeatherOperation.output.parse(result));
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
