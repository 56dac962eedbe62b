// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/metrics`
 * Purpose: Prometheus scrape endpoint for chat, model, tool and HTTP metrics.
 * Scope: Bearer-token check plus registry exposition. Does not define or record metrics.
 * Invariants: Unset METRICS_TOKEN means 500, never an open endpoint; tokens compare by SHA-256 digest in constant time.
 * Side-effects: IO (reads metrics registry)
 * Links: `@shared/observability/server/metrics`
 * @public
 */

import { createHash, timingSafeEqual } from "node:crypto";
import { type NextRequest, NextResponse } from "next/server";

import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { serverEnv } from "@/shared/env";
import { metricsRegistry } from "@/shared/observability";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const MAX_AUTHORIZATION_LENGTH = 512;
const BEARER_PATTERN = /^bearer\s+(\S{1,256})\s*$/i;

type ScrapeAuth = "ok" | "unconfigured" | "denied";

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

function authorizeScrape(
  request: NextRequest,
  expected: string | undefined
): ScrapeAuth {
  if (!expected) return "unconfigured";
  const header = request.headers.get("authorization")?.trim();
  if (!header || header.length > MAX_AUTHORIZATION_LENGTH) return "denied";
  const token = BEARER_PATTERN.exec(header)?.[1];
  if (!token) return "denied";
  return timingSafeEqual(digest(token), digest(expected)) ? "ok" : "denied";
}

export const GET = wrapRouteHandlerWithLogging(
  { routeId: "meta.metrics" },
  async (_ctx, request) => {
    switch (authorizeScrape(request, serverEnv().METRICS_TOKEN)) {
      case "unconfigured":
        return NextResponse.json(
          { error: "METRICS_TOKEN not configured" },
          { status: 500 }
        );
      case "denied":
        return NextResponse.json({ error: "Unauthorized" }, { status: 401 });
      case "ok":
        break;
    }

    return new NextResponse(await metricsRegistry.metrics(), {
      headers: {
        "Content-Type": metricsRegistry.contentType,
        "Cache-Control": "no-store",
      },
    });
  }
);
