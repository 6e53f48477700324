// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@reclaim/waste-core/rewards`
 * Purpose: Reward computation, payout apportionment across a transfer chain, and incentive budget arithmetic.
 * Scope: Pure functions over bigint. Does not perform I/O, pay anyone, or persist the program.
 * Invariants:
 * - totalReward = rewardRate x floor(weight / 1000), checked against AMOUNT_MAX.
 * - Percent shares round down; the current holder receives totalReward minus everything else.
 * - 0 <= remainingBudget <= totalBudget after every function here.
 * - A program whose remaining budget reaches 0 comes back inactive.
 * Side-effects: none
 * Links: packages/waste-core/src/amounts.ts
 * @public
 */

import type { ParticipantId } from "@reclaim/ids";

import { checkedAdd, checkedMul, checkedSub } from "./amounts";
import { InsufficientBudgetError } from "./errors";
import type { IncentiveProgram, SettlementPayout, TransferRecord } from "./model";

const GRAMS_PER_KG = 1000n;

export function computeTotalReward(rewardRate: bigint, weight: bigint): bigint {
  return checkedMul(rewardRate, weight / GRAMS_PER_KG, "reward computation");
}

export function percentShare(total: bigint, percent: number): bigint {
  return checkedMul(total, BigInt(percent), "percent share") / 100n;
}

/** Reward a program would pay for `weight` grams right now. Inactive programs preview 0. */
export function previewReward(
  program: IncentiveProgram,
  weight: bigint
): bigint {
  if (!program.active) return 0n;
  return computeTotalReward(program.rewardRate, weight);
}

export interface PayoutPlanInput {
  readonly totalReward: bigint;
  /** Transfer history of the unit, chronological. */
  readonly chain: readonly TransferRecord[];
  readonly isCollector: (participant: ParticipantId) => boolean;
  readonly submitter: ParticipantId;
  readonly holder: ParticipantId;
  readonly collectorPercent: number;
  readonly ownerPercent: number;
}

/**
 * Split a reward across the chain: one collector share per hop into a collector,
 * then the submitter share, then the remainder to the current holder.
 *
 * Every collector hop receives the full collector share. A chain long enough to
 * push the shares above totalReward throws OverflowError on the remainder.
 */
export function planPayouts(input: PayoutPlanInput): SettlementPayout[] {
  const payouts: SettlementPayout[] = [];
  let distributed = 0n;

  const collectorShare = percentShare(
    input.totalReward,
    input.collectorPercent
  );
  for (const hop of input.chain) {
    if (!input.isCollector(hop.to)) continue;
    payouts.push({ recipient: hop.to, role: "collector", amount: collectorShare });
    distributed = checkedAdd(distributed, collectorShare, "payout total");
  }

  const submitterShare = percentShare(input.totalReward, input.ownerPercent);
  payouts.push({
    recipient: input.submitter,
    role: "submitter",
    amount: submitterShare,
  });
  distributed = checkedAdd(distributed, submitterShare, "payout total");

  payouts.push({
    recipient: input.holder,
    role: "holder",
    amount: checkedSub(input.totalReward, distributed, "settlement remainder"),
  });

  return payouts;
}

/** Deduct a settled reward; deactivates the program when nothing remains. */
export function debitBudget(
  program: IncentiveProgram,
  amount: bigint
): IncentiveProgram {
  if (amount > program.remainingBudget) {
    throw new InsufficientBudgetError(
      program.id,
      amount,
      program.remainingBudget
    );
  }
  const remainingBudget = program.remainingBudget - amount;
  return {
    ...program,
    remainingBudget,
    active: remainingBudget === 0n ? false : program.active,
  };
}

/**
 * Replace rate and total budget, keeping what has already been spent.
 * remaining = max(newTotal - used, 0).
 */
export function rebudget(
  program: IncentiveProgram,
  rewardRate: bigint,
  totalBudget: bigint
): IncentiveProgram {
  const used = program.totalBudget - program.remainingBudget;
  const remainingBudget = totalBudget > used ? totalBudget - used : 0n;
  return {
    ...program,
    rewardRate,
    totalBudget,
    remainingBudget,
    active: remainingBudget === 0n ? false : program.active,
  };
}
