// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/contract/app/meta.livez`
 * Purpose: GET /livez answers without the container.
 * Side-effects: none
 * Links: src/app/(infra)/livez/route.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { GET } from "@/app/(infra)/livez/route";
import { metaLivezOutputSchema } from "@/contracts/meta.livez.read.v1.contract";

describe("/livez contract tests", () => {
  it("reports alive with a parseable body", async () => {
    const response = GET();

    expect(response.status).toBe(200);
    const body = metaLivezOutputSchema.parse(await response.json());
    expect(body.status).toBe("alive");
    expect(body.uptimeSeconds).toBeGreaterThanOrEqual(0);
  });
});
