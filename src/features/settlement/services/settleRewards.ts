// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/settlement/services/settleRewards`
 * Purpose: Settle an incentive program's reward for one waste unit across its transfer chain.
 * Scope: Feature-layer orchestration of waste-core reward math, the ValueTransfer port and statistics. Does not choose which program to settle against.
 * Invariants:
 * - Every amount is computed and validated before the first write.
 * - Payments, earnings and the budget write share one store transaction; the budget write is last.
 * - Zero-amount lines appear on the receipt but are never paid.
 * - Payments flow issuer -> recipient.
 * Side-effects: IO (store, value transfer, event sink, metrics, logging)
 * Notes: Multiple collectors in one chain each receive the full collector share; a chain whose shares exceed the reward fails with OverflowError.
 * Links: packages/waste-core/src/rewards.ts
 * @public
 */

import { randomUUID } from "node:crypto";

import type { ParticipantId } from "@reclaim/ids";
import {
  checkedAdd,
  computeTotalReward,
  debitBudget,
  InvalidInputError,
  InvalidStateError,
  isEngineError,
  planPayouts,
  type SettlementReceipt,
  UnauthorizedError,
} from "@reclaim/waste-core";

import { loadIncentive } from "@/features/incentives/services/incentives";
import { creditEarnings } from "@/features/participants/services/stats";
import {
  emitAfterCommit,
  type LedgerDeps,
  nowDate,
} from "@/features/shared/deps";
import { loadWaste } from "@/features/waste/services/registry";
import type { ValueTransfer } from "@/ports";
import {
  amountForMetric,
  EVENT_NAMES,
  rewardUnitsDistributedTotal,
  settlementsTotal,
} from "@/shared/observability";

export interface SettlementPolicy {
  /** Refuse to settle units nobody has confirmed. */
  readonly requireConfirmed: boolean;
}

export interface SettlementDeps extends LedgerDeps {
  readonly valueTransfer: ValueTransfer;
  readonly policy: SettlementPolicy;
}

export interface SettleRewardsInput {
  wasteId: number;
  incentiveId: number;
  caller: ParticipantId;
}

function settle(
  deps: SettlementDeps,
  input: SettleRewardsInput
): SettlementReceipt {
  const unit = loadWaste(deps, input.wasteId);
  if (!unit.isActive) {
    throw new InvalidStateError("Waste", unit.id, "is deactivated");
  }
  if (unit.weight === 0n) {
    throw new InvalidStateError("Waste", unit.id, "weight is still pending");
  }
  if (deps.policy.requireConfirmed && !unit.isConfirmed) {
    throw new InvalidStateError("Waste", unit.id, "is not confirmed");
  }

  const program = loadIncentive(deps, input.incentiveId);
  if (!program.active) {
    throw new InvalidStateError("Incentive", program.id, "is not active");
  }
  if (program.issuer !== input.caller) {
    throw new UnauthorizedError(input.caller, "settle incentive rewards");
  }
  if (program.category !== unit.category) {
    throw new InvalidInputError(
      "category",
      `incentive ${program.id} covers ${program.category}, waste ${unit.id} is ${unit.category}`
    );
  }

  const totalReward = computeTotalReward(program.rewardRate, unit.weight);
  const debited = debitBudget(program, totalReward);
  const settings = deps.config.getSettings();
  const payouts = planPayouts({
    totalReward,
    chain: deps.store.listTransfers(unit.id),
    isCollector: (p) => deps.directory.hasCapability(p, "collect"),
    submitter: unit.submitter,
    holder: unit.currentOwner,
    collectorPercent: settings.collectorPercent,
    ownerPercent: settings.ownerPercent,
  });
  const settledAt = nowDate(deps);

  deps.store.transaction(() => {
    for (const line of payouts) {
      if (line.amount === 0n) continue;
      deps.valueTransfer.pay(program.issuer, line.recipient, line.amount);
      creditEarnings(deps.store, line.recipient, line.amount);
    }
    deps.store.saveIncentive(debited);
  });

  return {
    wasteId: unit.id,
    incentiveId: program.id,
    issuer: program.issuer,
    category: unit.category,
    totalReward,
    payouts,
    remainingBudget: debited.remainingBudget,
    incentiveActive: debited.active,
    settledAt,
  };
}

export function settleRewards(
  deps: SettlementDeps,
  input: SettleRewardsInput
): SettlementReceipt {
  let receipt: SettlementReceipt;
  try {
    receipt = settle(deps, input);
  } catch (error) {
    const outcome = isEngineError(error) ? error.code : "ERROR";
    settlementsTotal.inc({ outcome });
    deps.log.warn(
      {
        event: EVENT_NAMES.ENGINE_SETTLEMENT_REJECTED,
        reqId: randomUUID(),
        wasteId: input.wasteId,
        incentiveId: input.incentiveId,
        outcome,
      },
      "settlement rejected"
    );
    throw error;
  }

  const paid = receipt.payouts.reduce(
    (sum, line) => checkedAdd(sum, line.amount),
    0n
  );
  settlementsTotal.inc({ outcome: "OK" });
  rewardUnitsDistributedTotal.inc(
    { category: receipt.category },
    amountForMetric(paid)
  );

  emitAfterCommit(deps, {
    type: "incentive.settled",
    occurredAt: receipt.settledAt.toISOString(),
    incentiveId: receipt.incentiveId,
    wasteId: receipt.wasteId,
    totalReward: receipt.totalReward,
    payouts: receipt.payouts,
    remainingBudget: receipt.remainingBudget,
  });
  return receipt;
}
