// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/incentives/services/incentives`
 * Purpose: Incentive program store: creation, re-budgeting, activation and ranking queries.
 * Scope: Feature-layer orchestration. Settlement debits live in settlement/services/settleRewards.ts.
 * Invariants:
 * - 0 <= remainingBudget <= totalBudget after every operation.
 * - A failed create allocates no id (validation precedes the transaction).
 * - An exhausted program cannot be reactivated; only update() with a larger budget revives spending headroom.
 * Side-effects: IO (store, event sink)
 * Links: packages/waste-core/src/rewards.ts, packages/waste-core/src/ranking.ts
 * @public
 */

import type { ParticipantId } from "@reclaim/ids";
import {
  type IncentiveProgram,
  InvalidStateError,
  NotFoundError,
  pickBestIncentive,
  previewReward,
  rankActiveIncentives,
  rebudget,
  requireAmount,
  requirePositiveAmount,
  UnauthorizedError,
  type WasteCategory,
} from "@reclaim/waste-core";

import { requireCapability } from "@/features/participants/services/authorize";
import {
  emitAfterCommit,
  type LedgerDeps,
  nowDate,
} from "@/features/shared/deps";

export interface CreateIncentiveInput {
  issuer: ParticipantId;
  category: WasteCategory;
  /** Reward units per kilogram, > 0. */
  rewardRate: bigint;
  totalBudget: bigint;
}

export function loadIncentive(
  deps: Pick<LedgerDeps, "store">,
  id: number
): IncentiveProgram {
  const program = deps.store.getIncentive(id);
  if (!program) throw new NotFoundError("Incentive", id);
  return program;
}

function loadIssuedIncentive(
  deps: Pick<LedgerDeps, "store">,
  id: number,
  caller: ParticipantId,
  action: string
): IncentiveProgram {
  const program = loadIncentive(deps, id);
  if (program.issuer !== caller) {
    throw new UnauthorizedError(caller, action);
  }
  return program;
}

function loadMany(
  deps: Pick<LedgerDeps, "store">,
  ids: readonly number[]
): IncentiveProgram[] {
  return ids.map((id) => loadIncentive(deps, id));
}

export function createIncentive(
  deps: LedgerDeps,
  input: CreateIncentiveInput
): IncentiveProgram {
  requireCapability(deps.directory, input.issuer, "create_incentive");
  const rewardRate = requirePositiveAmount("rewardRate", input.rewardRate);
  const totalBudget = requirePositiveAmount("totalBudget", input.totalBudget);
  const createdAt = nowDate(deps);

  const program = deps.store.transaction(() => {
    const created: IncentiveProgram = {
      id: deps.store.allocateId("incentive"),
      issuer: input.issuer,
      category: input.category,
      rewardRate,
      totalBudget,
      remainingBudget: totalBudget,
      active: true,
      createdAt,
    };
    deps.store.insertIncentive(created);
    return created;
  });

  emitAfterCommit(deps, {
    type: "incentive.created",
    occurredAt: createdAt.toISOString(),
    incentiveId: program.id,
    issuer: program.issuer,
    category: program.category,
    rewardRate,
    totalBudget,
  });
  return program;
}

/** Replace rate and total budget; spent budget stays spent. */
export function updateIncentive(
  deps: LedgerDeps,
  id: number,
  caller: ParticipantId,
  rewardRate: bigint,
  totalBudget: bigint
): IncentiveProgram {
  const program = loadIssuedIncentive(deps, id, caller, "update incentive");
  if (!program.active) {
    throw new InvalidStateError("Incentive", id, "is not active");
  }
  const updated = rebudget(
    program,
    requirePositiveAmount("rewardRate", rewardRate),
    requirePositiveAmount("totalBudget", totalBudget)
  );

  deps.store.transaction(() => deps.store.saveIncentive(updated));
  emitAfterCommit(deps, {
    type: "incentive.updated",
    occurredAt: deps.clock.now(),
    incentiveId: id,
    rewardRate: updated.rewardRate,
    totalBudget: updated.totalBudget,
    remainingBudget: updated.remainingBudget,
    active: updated.active,
  });
  return updated;
}

export function setIncentiveActive(
  deps: LedgerDeps,
  id: number,
  caller: ParticipantId,
  active: boolean
): IncentiveProgram {
  const program = loadIssuedIncentive(
    deps,
    id,
    caller,
    "change incentive activation"
  );
  if (active && program.remainingBudget === 0n) {
    throw new InvalidStateError("Incentive", id, "has no remaining budget");
  }

  const updated: IncentiveProgram = { ...program, active };
  deps.store.transaction(() => deps.store.saveIncentive(updated));
  emitAfterCommit(deps, {
    type: "incentive.activation_changed",
    occurredAt: deps.clock.now(),
    incentiveId: id,
    active,
  });
  return updated;
}

export function getIncentive(
  deps: Pick<LedgerDeps, "store">,
  id: number
): IncentiveProgram | null {
  return deps.store.getIncentive(id);
}

export function incentiveExists(
  deps: Pick<LedgerDeps, "store">,
  id: number
): boolean {
  return deps.store.getIncentive(id) !== null;
}

export function incentivesByIssuer(
  deps: Pick<LedgerDeps, "store">,
  issuer: ParticipantId
): number[] {
  return deps.store.listIncentiveIdsByIssuer(issuer);
}

export function incentivesByCategory(
  deps: Pick<LedgerDeps, "store">,
  category: WasteCategory
): number[] {
  return deps.store.listIncentiveIdsByCategory(category);
}

/** Highest-rate active program of `issuer` for `category`; ties keep the earliest. */
export function bestActiveIncentiveFor(
  deps: Pick<LedgerDeps, "store">,
  issuer: ParticipantId,
  category: WasteCategory
): IncentiveProgram | null {
  const programs = loadMany(deps, incentivesByIssuer(deps, issuer)).filter(
    (p) => p.category === category
  );
  return pickBestIncentive(programs);
}

/** Active programs for `category`, rewardRate descending; ties in creation order. */
export function activeIncentivesSorted(
  deps: Pick<LedgerDeps, "store">,
  category: WasteCategory
): IncentiveProgram[] {
  return rankActiveIncentives(
    loadMany(deps, incentivesByCategory(deps, category))
  );
}

export function previewIncentiveReward(
  deps: Pick<LedgerDeps, "store">,
  id: number,
  weight: bigint
): bigint {
  return previewReward(
    loadIncentive(deps, id),
    requireAmount("weight", weight)
  );
}
