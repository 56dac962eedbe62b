// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/model_response`
 * Purpose: HTTP endpoint returning the latest final answer.
 * Scope: Delegates to the history facade. Does not run a turn.
 * Invariants: Always 200; never blocks on a running turn.
 * Side-effects: IO (HTTP response)
 * Links: `@contracts/chat.model-response.v1.contract`
 * @public
 */

import { NextResponse } from "next/server";

import { getModelResponse } from "@/app/_facades/chat/history.server";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { chatModelResponseOperation } from "@/contracts/chat.model-response.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const GET = wrapRouteHandlerWithLogging(
  { routeId: "chat.model_response" },
  async () =>
    NextResponse.json(chatModelResponseOperation.output.parse(getModelResponse()))
);
