// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/waste/services/transfers`
 * Purpose: Ownership moves along the supply chain: single-unit transfers, bulk collector-to-manufacturer hand-offs, and history queries.
 * Scope: Feature-layer orchestration. Role-path rules come from ALLOWED_TRANSFERS via authorize.ts.
 * Invariants:
 * - Transfer history is append-only; records are never edited or removed.
 * - A transfer moves the unit id out of the sender's holdings and into the receiver's in the same transaction.
 * - Sender and receiver both keep a permanent association with the unit.
 * - Bulk units start with weight 0 until the manufacturer records it.
 * Side-effects: IO (store, event sink, metrics)
 * Links: src/features/waste/services/registry.ts (recordBulkWeight)
 * @public
 */

import type { ParticipantId } from "@reclaim/ids";
import {
  type Location,
  type TransferRecord,
  UnauthorizedError,
  validateLocation,
  type WasteCategory,
  type WasteUnit,
} from "@reclaim/waste-core";

import { requireTransferRoute } from "@/features/participants/services/authorize";
import {
  emitAfterCommit,
  type LedgerDeps,
  nowDate,
} from "@/features/shared/deps";
import { wasteTransfersTotal } from "@/shared/observability";

import { loadActiveWaste } from "./registry";

export interface TransferWasteInput {
  wasteId: number;
  from: ParticipantId;
  to: ParticipantId;
  note: string;
}

export interface TransferBulkInput {
  category: WasteCategory;
  collector: ParticipantId;
  manufacturer: ParticipantId;
  location: Location;
  note: string;
}

export function transferWaste(
  deps: LedgerDeps,
  input: TransferWasteInput
): WasteUnit {
  const unit = loadActiveWaste(deps, input.wasteId);
  if (unit.currentOwner !== input.from) {
    throw new UnauthorizedError(input.from, `transfer waste ${unit.id}`);
  }
  requireTransferRoute(deps.directory, input.from, input.to);
  const timestamp = nowDate(deps);

  const { moved, record } = deps.store.transaction(() => {
    const entry: TransferRecord = {
      id: deps.store.allocateId("transfer"),
      wasteId: unit.id,
      from: input.from,
      to: input.to,
      timestamp,
      note: input.note,
    };
    const next: WasteUnit = { ...unit, currentOwner: input.to };
    deps.store.appendTransfer(entry);
    deps.store.saveWaste(next);
    deps.store.removeHolding(input.from, unit.id);
    deps.store.addHolding(input.to, unit.id);
    deps.store.recordAssociation(input.from, unit.id);
    deps.store.recordAssociation(input.to, unit.id);
    return { moved: next, record: entry };
  });

  wasteTransfersTotal.inc({ kind: "single" });
  emitAfterCommit(deps, {
    type: "waste.transferred",
    occurredAt: timestamp.toISOString(),
    wasteId: unit.id,
    transferId: record.id,
    from: record.from,
    to: record.to,
  });
  return moved;
}

/**
 * Hand collected material to a manufacturer as a new weight-pending unit.
 * The manufacturer owns the unit and is set as its confirmer, but the unit
 * starts unconfirmed; its single history entry is the collector-to-manufacturer hop.
 */
export function transferBulkWaste(
  deps: LedgerDeps,
  input: TransferBulkInput
): WasteUnit {
  if (deps.directory.findRole(input.collector) !== "COLLECTOR") {
    throw new UnauthorizedError(input.collector, "hand off bulk waste");
  }
  if (deps.directory.findRole(input.manufacturer) !== "MANUFACTURER") {
    throw new UnauthorizedError(input.manufacturer, "receive bulk waste");
  }
  requireTransferRoute(deps.directory, input.collector, input.manufacturer);
  const location = validateLocation(input.location);
  const createdAt = nowDate(deps);

  const unit = deps.store.transaction(() => {
    const created: WasteUnit = {
      id: deps.store.allocateId("waste"),
      category: input.category,
      weight: 0n,
      submitter: input.collector,
      currentOwner: input.manufacturer,
      status: "PENDING",
      isConfirmed: false,
      confirmer: input.manufacturer,
      isActive: true,
      location,
      createdAt,
    };
    deps.store.insertWaste(created);
    deps.store.appendTransfer({
      id: deps.store.allocateId("transfer"),
      wasteId: created.id,
      from: input.collector,
      to: input.manufacturer,
      timestamp: createdAt,
      note: input.note,
    });
    deps.store.addHolding(input.manufacturer, created.id);
    deps.store.recordAssociation(input.collector, created.id);
    deps.store.recordAssociation(input.manufacturer, created.id);
    return created;
  });

  wasteTransfersTotal.inc({ kind: "bulk" });
  emitAfterCommit(deps, {
    type: "waste.bulk_transferred",
    occurredAt: createdAt.toISOString(),
    wasteId: unit.id,
    category: unit.category,
    collector: input.collector,
    manufacturer: input.manufacturer,
  });
  return unit;
}

/** Chronological history; empty for unknown ids. */
export function transferHistory(
  deps: Pick<LedgerDeps, "store">,
  wasteId: number
): TransferRecord[] {
  return deps.store.listTransfers(wasteId);
}
