// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/waste/services/registry`
 * Purpose: Waste unit lifecycle: submission, status updates, confirmation, deactivation, bulk weight recording and queries.
 * Scope: Feature-layer orchestration over RecyclingLedgerStore. Does not move ownership (see transfers.ts).
 * Invariants:
 * - Every check runs before the first write; every mutation runs in one store transaction.
 * - An inactive unit rejects every mutation with InvalidStateError; nothing reactivates it.
 * - Confirmation is set at most once between resets and never by the current owner.
 * - Events are emitted after commit.
 * Side-effects: IO (store, event sink, metrics)
 * Links: packages/waste-core/src/rules.ts
 * @public
 */

import type { ParticipantId } from "@reclaim/ids";
import {
  InvalidStateError,
  isModifiableStatus,
  type Location,
  NotFoundError,
  requirePositiveAmount,
  UnauthorizedError,
  validateLocation,
  type WasteCategory,
  type WasteStatus,
  type WasteUnit,
} from "@reclaim/waste-core";

import {
  requireAdmin,
  requireCapability,
} from "@/features/participants/services/authorize";
import { recordSubmission } from "@/features/participants/services/stats";
import {
  emitAfterCommit,
  type LedgerDeps,
  nowDate,
} from "@/features/shared/deps";
import { wasteSubmissionsTotal } from "@/shared/observability";

export interface WasteSubmission {
  category: WasteCategory;
  /** Grams, > 0. */
  weight: bigint;
  location: Location;
}

export interface SubmitWasteInput extends WasteSubmission {
  submitter: ParticipantId;
}

/** Load an existing unit or throw NotFoundError. */
export function loadWaste(
  deps: Pick<LedgerDeps, "store">,
  id: number
): WasteUnit {
  const unit = deps.store.getWaste(id);
  if (!unit) throw new NotFoundError("Waste", id);
  return unit;
}

/** Load a unit that may still be mutated: exists and active. */
export function loadActiveWaste(
  deps: Pick<LedgerDeps, "store">,
  id: number
): WasteUnit {
  const unit = loadWaste(deps, id);
  if (!unit.isActive) {
    throw new InvalidStateError("Waste", id, "is deactivated");
  }
  return unit;
}

function validateSubmission(item: WasteSubmission): WasteSubmission {
  return {
    category: item.category,
    weight: requirePositiveAmount("weight", item.weight),
    location: validateLocation(item.location),
  };
}

function writeSubmission(
  deps: LedgerDeps,
  submitter: ParticipantId,
  item: WasteSubmission,
  createdAt: Date
): WasteUnit {
  const unit: WasteUnit = {
    id: deps.store.allocateId("waste"),
    category: item.category,
    weight: item.weight,
    submitter,
    currentOwner: submitter,
    status: "PENDING",
    isConfirmed: false,
    confirmer: submitter,
    isActive: true,
    location: item.location,
    createdAt,
  };
  deps.store.insertWaste(unit);
  deps.store.addHolding(submitter, unit.id);
  deps.store.recordAssociation(submitter, unit.id);
  recordSubmission(deps.store, submitter, unit.category, unit.weight);
  return unit;
}

function announceSubmission(deps: LedgerDeps, unit: WasteUnit): void {
  wasteSubmissionsTotal.inc({ category: unit.category });
  emitAfterCommit(deps, {
    type: "waste.submitted",
    occurredAt: unit.createdAt.toISOString(),
    wasteId: unit.id,
    category: unit.category,
    weight: unit.weight,
    submitter: unit.submitter,
  });
}

export function submitWaste(
  deps: LedgerDeps,
  input: SubmitWasteInput
): WasteUnit {
  requireCapability(deps.directory, input.submitter, "submit");
  const item = validateSubmission(input);
  const createdAt = nowDate(deps);

  const unit = deps.store.transaction(() =>
    writeSubmission(deps, input.submitter, item, createdAt)
  );
  announceSubmission(deps, unit);
  return unit;
}

/** All-or-nothing: every item is validated before the first unit is written. */
export function submitWasteBatch(
  deps: LedgerDeps,
  submitter: ParticipantId,
  items: readonly WasteSubmission[]
): WasteUnit[] {
  requireCapability(deps.directory, submitter, "submit");
  const validated = items.map(validateSubmission);
  if (validated.length === 0) return [];
  const createdAt = nowDate(deps);

  const units = deps.store.transaction(() =>
    validated.map((item) => writeSubmission(deps, submitter, item, createdAt))
  );
  for (const unit of units) announceSubmission(deps, unit);
  return units;
}

/**
 * Move a modifiable unit to `status`.
 * Returns false without writing when the current status is already final.
 */
export function updateWasteStatus(
  deps: LedgerDeps,
  id: number,
  status: WasteStatus
): boolean {
  const unit = loadActiveWaste(deps, id);
  if (!isModifiableStatus(unit.status)) return false;

  deps.store.transaction(() => deps.store.saveWaste({ ...unit, status }));
  emitAfterCommit(deps, {
    type: "waste.status_changed",
    occurredAt: deps.clock.now(),
    wasteId: id,
    from: unit.status,
    to: status,
  });
  return true;
}

export function confirmWaste(
  deps: LedgerDeps,
  id: number,
  confirmer: ParticipantId
): WasteUnit {
  const unit = loadActiveWaste(deps, id);
  requireCapability(deps.directory, confirmer, "confirm");
  if (unit.currentOwner === confirmer) {
    throw new UnauthorizedError(confirmer, "confirm own waste");
  }
  if (unit.isConfirmed) {
    throw new InvalidStateError("Waste", id, "is already confirmed");
  }

  const confirmed: WasteUnit = { ...unit, isConfirmed: true, confirmer };
  deps.store.transaction(() => deps.store.saveWaste(confirmed));
  emitAfterCommit(deps, {
    type: "waste.confirmed",
    occurredAt: deps.clock.now(),
    wasteId: id,
    confirmer,
  });
  return confirmed;
}

export function resetWasteConfirmation(
  deps: LedgerDeps,
  id: number,
  caller: ParticipantId
): WasteUnit {
  const unit = loadActiveWaste(deps, id);
  if (unit.currentOwner !== caller) {
    throw new UnauthorizedError(caller, "reset confirmation");
  }
  if (!unit.isConfirmed) {
    throw new InvalidStateError("Waste", id, "is not confirmed");
  }

  const reset: WasteUnit = {
    ...unit,
    isConfirmed: false,
    confirmer: unit.currentOwner,
  };
  deps.store.transaction(() => deps.store.saveWaste(reset));
  emitAfterCommit(deps, {
    type: "waste.confirmation_reset",
    occurredAt: deps.clock.now(),
    wasteId: id,
    owner: caller,
  });
  return reset;
}

export function deactivateWaste(
  deps: LedgerDeps,
  id: number,
  caller: ParticipantId
): WasteUnit {
  requireAdmin(deps.config, caller, "deactivate waste");
  const unit = loadActiveWaste(deps, id);

  const deactivated: WasteUnit = { ...unit, isActive: false };
  deps.store.transaction(() => deps.store.saveWaste(deactivated));
  emitAfterCommit(deps, {
    type: "waste.deactivated",
    occurredAt: deps.clock.now(),
    wasteId: id,
    admin: caller,
  });
  return deactivated;
}

/** Finalise a bulk-transferred unit: the receiving owner sets its weight once. */
export function recordBulkWeight(
  deps: LedgerDeps,
  id: number,
  caller: ParticipantId,
  weight: bigint
): WasteUnit {
  const unit = loadActiveWaste(deps, id);
  if (unit.weight !== 0n) {
    throw new InvalidStateError("Waste", id, "already has a recorded weight");
  }
  if (unit.currentOwner !== caller) {
    throw new UnauthorizedError(caller, "record bulk weight");
  }
  requirePositiveAmount("weight", weight);

  const weighed: WasteUnit = { ...unit, weight };
  deps.store.transaction(() => deps.store.saveWaste(weighed));
  emitAfterCommit(deps, {
    type: "waste.weight_recorded",
    occurredAt: deps.clock.now(),
    wasteId: id,
    weight,
    recordedBy: caller,
  });
  return weighed;
}

export function getWaste(
  deps: Pick<LedgerDeps, "store">,
  id: number
): WasteUnit | null {
  return deps.store.getWaste(id);
}

export function wasteExists(
  deps: Pick<LedgerDeps, "store">,
  id: number
): boolean {
  return deps.store.getWaste(id) !== null;
}

export function getWastes(
  deps: Pick<LedgerDeps, "store">,
  ids: readonly number[]
): (WasteUnit | null)[] {
  return ids.map((id) => deps.store.getWaste(id));
}

/** Ids the participant currently holds, in acquisition order. */
export function holdingsOf(
  deps: Pick<LedgerDeps, "store">,
  participant: ParticipantId
): number[] {
  return deps.store.listHoldings(participant);
}

/**
 * Ids the participant holds now or ever submitted, sent or received,
 * each once, in order of first association.
 */
export function participantWastes(
  deps: Pick<LedgerDeps, "store">,
  participant: ParticipantId
): number[] {
  return deps.store.listAssociations(participant);
}
