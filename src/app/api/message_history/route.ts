// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/message_history`
 * Purpose: HTTP endpoint returning the display history of the chat session.
 * Scope: Delegates to the history facade. Does not run a turn.
 * Invariants: System messages are never returned; never blocks on a running turn.
 * Side-effects: IO (HTTP response)
 * Links: `@contracts/chat.message-history.v1.contract`
 * @public
 */

import { NextResponse } from "next/server";

import { getMessageHistory } from "@/app/_facades/chat/history.server";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { chatMessageHistoryOperation } from "@/contracts/chat.message-history.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const GET = wrapRouteHandlerWithLogging(
  { routeId: "chat.message_history" },
  async () =>
    NextResponse.json(
      chatMessageHistoryOperation.output.parse(getMessageHistory())
    )
);
