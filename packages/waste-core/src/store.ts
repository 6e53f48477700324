// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@reclaim/waste-core/store`
 * Purpose: Port interface for the recycling ledger store. Implemented by the in-memory and SQLite adapters.
 * Scope: Type definitions only. Does not contain implementations or I/O.
 * Invariants:
 * - SYNCHRONOUS: every method returns a value, never a Promise. Operations run to completion without suspension.
 * - TRANSACTION_ATOMIC: a throw inside transaction() discards every write made inside it, counters included.
 * - APPEND_ONLY: appendTransfer and appendTokenTransfer never update or delete existing rows.
 * - INSERTION_ORDER: listTransfers, listHoldings, listAssociations and the incentive indices return ids in insertion order.
 * - ASSOCIATIONS_PERMANENT: an association is never removed; recording one twice keeps the first position.
 * - Getters return fresh objects; mutating a returned record never changes stored state.
 * Side-effects: none
 * Links: src/adapters/server/ledger/drizzle-ledger-store.adapter.ts, src/adapters/test/ledger/in-memory-ledger-store.adapter.ts
 * @public
 */

import type { ParticipantId } from "@reclaim/ids";

import type {
  IdSpace,
  IncentiveProgram,
  LedgerSettings,
  Participant,
  ParticipantStats,
  TransferRecord,
  WasteCategory,
  WasteUnit,
} from "./model";

/** Token movement recorded by the ledger-backed value transfer. */
export interface TokenTransfer {
  readonly from: ParticipantId;
  readonly to: ParticipantId;
  readonly amount: bigint;
  readonly createdAt: Date;
}

export interface RecyclingLedgerStore {
  /** Run `work` atomically. Nested calls join the outer transaction. */
  transaction<T>(work: () => T): T;

  // Identifier allocation
  /** Advance the counter for `space` and return the new value (previous + 1, starting at 1). */
  allocateId(space: IdSpace): number;
  /** Last allocated id for `space`, 0 when nothing was allocated. */
  peekCounter(space: IdSpace): number;

  // Waste units
  insertWaste(unit: WasteUnit): void;
  saveWaste(unit: WasteUnit): void;
  getWaste(id: number): WasteUnit | null;
  countWastes(): number;
  sumActiveWasteWeight(): bigint;

  // Holdings
  addHolding(participant: ParticipantId, wasteId: number): void;
  removeHolding(participant: ParticipantId, wasteId: number): void;
  listHoldings(participant: ParticipantId): number[];

  // Associations (submitted, sent or received; never removed)
  recordAssociation(participant: ParticipantId, wasteId: number): void;
  listAssociations(participant: ParticipantId): number[];

  // Transfers
  appendTransfer(record: TransferRecord): void;
  listTransfers(wasteId: number): TransferRecord[];

  // Incentive programs
  insertIncentive(program: IncentiveProgram): void;
  saveIncentive(program: IncentiveProgram): void;
  getIncentive(id: number): IncentiveProgram | null;
  listIncentiveIdsByIssuer(issuer: ParticipantId): number[];
  listIncentiveIdsByCategory(category: WasteCategory): number[];

  // Participants and statistics
  getParticipant(id: ParticipantId): Participant | null;
  saveParticipant(participant: Participant): void;
  getParticipantStats(participant: ParticipantId): ParticipantStats | null;
  saveParticipantStats(stats: ParticipantStats): void;
  sumTotalEarned(): bigint;

  // Settings
  getSettings(): LedgerSettings | null;
  saveSettings(settings: LedgerSettings): void;

  // Token movements
  appendTokenTransfer(transfer: TokenTransfer): void;
  listTokenTransfersTo(participant: ParticipantId): TokenTransfer[];
}
