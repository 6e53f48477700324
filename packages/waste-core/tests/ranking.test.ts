// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@reclaim/waste-core/tests/ranking`
 * Purpose: Ordering tests for incentive ranking and best-program selection.
 * Scope: Pure functions only.
 * Side-effects: none
 * Links: packages/waste-core/src/ranking.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { pickBestIncentive, rankActiveIncentives } from "../src/ranking";
import { program } from "./fixtures";

describe("waste-core/ranking", () => {
  const programs = [
    program({ id: 1, rewardRate: 10n }),
    program({ id: 2, rewardRate: 30n }),
    program({ id: 3, rewardRate: 30n }),
    program({ id: 4, rewardRate: 50n, active: false }),
    program({ id: 5, rewardRate: 20n }),
  ];

  it("sorts active programs by rate, ties in creation order", () => {
    expect(rankActiveIncentives(programs).map((p) => p.id)).toEqual([
      2, 3, 5, 1,
    ]);
  });

  it("picks the earliest of the highest-rate active programs", () => {
    expect(pickBestIncentive(programs)?.id).toBe(2);
  });

  it("returns null when nothing is active", () => {
    expect(pickBestIncentive([program({ active: false })])).toBeNull();
    expect(rankActiveIncentives([])).toEqual([]);
  });
});
