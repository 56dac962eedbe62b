// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/clear_history`
 * Purpose: HTTP endpoint clearing the chat session.
 * Scope: Delegates to the history facade, maps SessionBusyError to 409. Does not touch tool connections.
 * Invariants: Idempotent; 409 while a turn runs.
 * Side-effects: IO (HTTP request/response)
 * Links: `@contracts/chat.clear-history.v1.contract`
 * @public
 */

import { NextResponse } from "next/server";

import { clearHistory } from "@/app/_facades/chat/history.server";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { chatClearHistoryOperation } from "@/contracts/chat.clear-history.v1.contract";
import { isSessionBusyError } from "@/features/chat/public.server";
import { logRequestWarn } from "@/shared/observability";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const POST = wrapRouteHandlerWithLogging(
  { routeId: "chat.clear_history" },
  async (ctx) => {
    try {
      const result = await clearHistory(ctx);
      return NextResponse.json(chatClearHistoryOperation.output.parse(result));
    } catch (error) {
      if (isSessionBusyError(error)) {
        logRequestWarn(ctx.log, error, error.kind);
        return NextResponse.json({ error: error.message }, { status: 409 });
      }
      throw error;
    }
  }
);
