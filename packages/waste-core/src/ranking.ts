// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@reclaim/waste-core/ranking`
 * Purpose: Ordering of incentive programs by reward rate.
 * Scope: Pure functions. Inputs are expected in creation order.
 * Invariants: Ties keep creation order (earliest first).
 * Side-effects: none
 * @public
 */

import type { IncentiveProgram } from "./model";

/** Active programs, rewardRate descending; ties in creation order. */
export function rankActiveIncentives(
  programs: readonly IncentiveProgram[]
): IncentiveProgram[] {
  return programs
    .filter((p) => p.active)
    .map((program, index) => ({ program, index }))
    .sort((a, b) => {
      if (a.program.rewardRate === b.program.rewardRate) {
        return a.index - b.index;
      }
      return a.program.rewardRate > b.program.rewardRate ? -1 : 1;
    })
    .map(({ program }) => program);
}

/** Highest-rate active program; a later program must be strictly better to win. */
export function pickBestIncentive(
  programs: readonly IncentiveProgram[]
): IncentiveProgram | null {
  let best: IncentiveProgram | null = null;
  for (const program of programs) {
    if (!program.active) continue;
    if (best === null || program.rewardRate > best.rewardRate) {
      best = program;
    }
  }
  return best;
}
