// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/send_message`
 * Purpose: HTTP endpoint for sending one user message through the tool-using chat loop.
 * Scope: Parse and validate input, delegate to the turn facade, map feature errors to HTTP codes. Does not run the loop itself.
 * Invariants: Validates with contract; 400 on invalid input (nothing appended); 409 while another turn runs; model and tool failures are 200 with a non-success status.
 * Side-effects: IO (HTTP request/response)
 * Notes: A client disconnect does not cancel the turn; the answer shows up in history.
 * Links: `@contracts/chat.send-message.v1.contract`, `@app/_facades/chat/turn.server`
 * @public
 */

import { NextResponse } from "next/server";
import { ZodError } from "zod";

import { sendMessage } from "@/app/_facades/chat/turn.server";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { chatSendMessageOperation } from "@/contracts/chat.send-message.v1.contract";
import { isChatValidationError } from "@/core";
import { isSessionBusyError } from "@/features/chat/public.server";
import { logRequestWarn, type RequestContext } from "@/shared/observability";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

/**
 * Local error handler for send_message route.
 * Maps domain errors to HTTP responses; returns null for unhandled errors.
 */
function handleRouteError(
  ctx: RequestContext,
  error: unknown
): NextResponse | null {
  if (error instanceof ZodError) {
    logRequestWarn(ctx.log, error, "VALIDATION_ERROR");
    return NextResponse.json(
      { error: "Invalid input format" },
      { status: 400 }
    );
  }

  if (isChatValidationError(error)) {
    logRequestWarn(ctx.log, error, error.code);
    return NextResponse.json({ error: error.message }, { status: 400 });
  }

  if (isSessionBusyError(error)) {
    logRequestWarn(ctx.log, error, error.kind);
    return NextResponse.json({ error: error.message }, { status: 409 });
  }

  return null; // Unhandled → let wrapper catch as 500
}

export const POST = wrapRouteHandlerWithLogging(
  { routeId: "chat.send_message" },
  async (ctx, request) => {
    try {
      let body: unknown;
      try {
        body = await request.json();
      } catch {
        return NextResponse.json(
          { error: "Invalid JSON body" },
          { status: 400 }
        );
      }

      const input = chatSendMessageOperation.input.parse(body);
      const result = await sendMessage(input, ctx);
      return NextResponse.json(chatSendMessageOperation.output.parse(result));
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error; // Unhandled → wrapper catches
    }
  }
);
