// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@reclaim/waste-core/tests/fixtures`
 * Purpose: Record builders for waste-core unit tests.
 * Scope: Test-only helpers.
 * Side-effects: none
 * @internal
 */

import { toParticipantId } from "@reclaim/ids";

import type { IncentiveProgram, TransferRecord } from "../src/model";

export const T0 = new Date("2025-03-01T00:00:00.000Z");

export function program(
  overrides: Partial<IncentiveProgram> = {}
): IncentiveProgram {
  return {
    id: 1,
    issuer: toParticipantId("maker-1"),
    category: "PLASTIC",
    rewardRate: 100n,
    totalBudget: 10_000n,
    remainingBudget: 10_000n,
    active: true,
    createdAt: T0,
    ...overrides,
  };
}

export function hop(
  id: number,
  from: string,
  to: string,
  wasteId = 1
): TransferRecord {
  return {
    id,
    wasteId,
    from: toParticipantId(from),
    to: toParticipantId(to),
    timestamp: T0,
    note: "",
  };
}
