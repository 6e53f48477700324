// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/participants/services/stats`
 * Purpose: Per-participant statistics and global supply-chain totals.
 * Scope: Read queries plus the two write helpers used inside submission and settlement transactions.
 * Invariants: Counters only grow; per-category counts sum to `submissions`; amount sums are checked against AMOUNT_MAX.
 * Side-effects: IO (store reads/writes)
 * @public
 */

import type { ParticipantId } from "@reclaim/ids";
import {
  checkedAdd,
  type ParticipantStats,
  type SupplyChainStats,
  type WasteCategory,
} from "@reclaim/waste-core";

import type { RecyclingLedgerStore } from "@/ports";

function zeroCounts(): Record<WasteCategory, number> {
  return { PAPER: 0, PET_PLASTIC: 0, PLASTIC: 0, METAL: 0, GLASS: 0 };
}

function emptyStats(participant: ParticipantId): ParticipantStats {
  return {
    participant,
    totalEarned: 0n,
    submissions: 0,
    totalSubmittedWeight: 0n,
    submissionsByCategory: zeroCounts(),
  };
}

export function statsOf(
  store: RecyclingLedgerStore,
  participant: ParticipantId
): ParticipantStats {
  return store.getParticipantStats(participant) ?? emptyStats(participant);
}

export function recordSubmission(
  store: RecyclingLedgerStore,
  participant: ParticipantId,
  category: WasteCategory,
  weight: bigint
): void {
  const current = statsOf(store, participant);
  const byCategory = current.submissionsByCategory;
  store.saveParticipantStats({
    ...current,
    submissions: current.submissions + 1,
    submissionsByCategory: {
      ...byCategory,
      [category]: byCategory[category] + 1,
    },
    totalSubmittedWeight: checkedAdd(
      current.totalSubmittedWeight,
      weight,
      "submitted weight"
    ),
  });
}

export function creditEarnings(
  store: RecyclingLedgerStore,
  participant: ParticipantId,
  amount: bigint
): void {
  const current = statsOf(store, participant);
  store.saveParticipantStats({
    ...current,
    totalEarned: checkedAdd(current.totalEarned, amount, "lifetime earnings"),
  });
}

export function supplyChainStats(
  store: RecyclingLedgerStore
): SupplyChainStats {
  return {
    totalWastes: store.countWastes(),
    activeWeight: store.sumActiveWasteWeight(),
    totalTokensDistributed: store.sumTotalEarned(),
  };
}
