// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/metrics`
 * Purpose: Unit tests for converting bigint reward amounts into counter increments.
 * Side-effects: none
 * Links: src/shared/observability/server/metrics.ts
 * @public
 */

import { AMOUNT_MAX } from "@reclaim/waste-core";
import { describe, expect, it } from "vitest";

import { amountForMetric } from "@/shared/observability";

describe("amountForMetric", () => {
  it("passes amounts within the safe integer range through exactly", () => {
    expect(amountForMetric(0n)).toBe(0);
    expect(amountForMetric(500n)).toBe(500);
    expect(amountForMetric(9_007_199_254_740_991n)).toBe(Number.MAX_SAFE_INTEGER);
  });

  it("clamps larger amounts to the largest safe integer", () => {
    expect(amountForMetric(9_007_199_254_740_992n)).toBe(Number.MAX_SAFE_INTEGER);
    expect(amountForMetric(AMOUNT_MAX)).toBe(Number.MAX_SAFE_INTEGER);
  });
});
