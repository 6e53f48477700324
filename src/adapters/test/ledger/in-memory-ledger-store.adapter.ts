// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/test/ledger/in-memory-ledger-store`
 * Purpose: In-memory RecyclingLedgerStore for APP_ENV=test wiring and unit tests.
 * Scope: Map-backed persistence with snapshot/rollback transactions. Does not persist across processes.
 * Invariants:
 * - Each transaction() level snapshots state; a throw restores that snapshot and rethrows.
 * - Reads return deep copies; stored state is only changed through port methods.
 * - Map iteration order gives insertion order for every list method.
 * Side-effects: none (in-memory only)
 * Links: Implements RecyclingLedgerStore port; shares tests/ports/harness/ledger-store.port.harness.ts with the SQLite adapter
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
} from "@reclaim/waste-core";

import type { RecyclingLedgerStore, TokenTransfer } from "@/ports";

interface MemoryState {
  counters: Map<IdSpace, number>;
  wastes: Map<number, WasteUnit>;
  holdings: Map<ParticipantId, number[]>;
  associations: Map<ParticipantId, number[]>;
  transfers: Map<number, TransferRecord[]>;
  incentives: Map<number, IncentiveProgram>;
  participants: Map<ParticipantId, Participant>;
  stats: Map<ParticipantId, ParticipantStats>;
  settings: LedgerSettings | null;
  tokenTransfers: TokenTransfer[];
}

function emptyState(): MemoryState {
  return {
    counters: new Map(),
    wastes: new Map(),
    holdings: new Map(),
    associations: new Map(),
    transfers: new Map(),
    incentives: new Map(),
    participants: new Map(),
    stats: new Map(),
    settings: null,
    tokenTransfers: [],
  };
}

export class InMemoryRecyclingLedgerStore implements RecyclingLedgerStore {
  private state: MemoryState = emptyState();

  transaction<T>(work: () => T): T {
    const snapshot = structuredClone(this.state);
    try {
      return work();
    } catch (error) {
      this.state = snapshot;
      throw error;
    }
  }

  allocateId(space: IdSpace): number {
    const next = (this.state.counters.get(space) ?? 0) + 1;
    this.state.counters.set(space, next);
    return next;
  }

  peekCounter(space: IdSpace): number {
    return this.state.counters.get(space) ?? 0;
  }

  insertWaste(unit: WasteUnit): void {
    if (this.state.wastes.has(unit.id)) {
      throw new Error(`Waste ${unit.id} already stored`);
    }
    this.state.wastes.set(unit.id, structuredClone(unit));
  }

  saveWaste(unit: WasteUnit): void {
    this.state.wastes.set(unit.id, structuredClone(unit));
  }

  getWaste(id: number): WasteUnit | null {
    const unit = this.state.wastes.get(id);
    return unit ? structuredClone(unit) : null;
  }

  countWastes(): number {
    return this.state.wastes.size;
  }

  sumActiveWasteWeight(): bigint {
    let total = 0n;
    for (const unit of this.state.wastes.values()) {
      if (unit.isActive) total += unit.weight;
    }
    return total;
  }

  addHolding(participant: ParticipantId, wasteId: number): void {
    const ids = this.state.holdings.get(participant) ?? [];
    ids.push(wasteId);
    this.state.holdings.set(participant, ids);
  }

  removeHolding(participant: ParticipantId, wasteId: number): void {
    const ids = this.state.holdings.get(participant);
    if (!ids) return;
    this.state.holdings.set(
      participant,
      ids.filter((id) => id !== wasteId)
    );
  }

  listHoldings(participant: ParticipantId): number[] {
    return [...(this.state.holdings.get(participant) ?? [])];
  }

  recordAssociation(participant: ParticipantId, wasteId: number): void {
    const ids = this.state.associations.get(participant) ?? [];
    if (!ids.includes(wasteId)) ids.push(wasteId);
    this.state.associations.set(participant, ids);
  }

  listAssociations(participant: ParticipantId): number[] {
    return [...(this.state.associations.get(participant) ?? [])];
  }

  appendTransfer(record: TransferRecord): void {
    const history = this.state.transfers.get(record.wasteId) ?? [];
    history.push(structuredClone(record));
    this.state.transfers.set(record.wasteId, history);
  }

  listTransfers(wasteId: number): TransferRecord[] {
    return structuredClone(this.state.transfers.get(wasteId) ?? []);
  }

  insertIncentive(program: IncentiveProgram): void {
    if (this.state.incentives.has(program.id)) {
      throw new Error(`Incentive ${program.id} already stored`);
    }
    this.state.incentives.set(program.id, structuredClone(program));
  }

  saveIncentive(program: IncentiveProgram): void {
    this.state.incentives.set(program.id, structuredClone(program));
  }

  getIncentive(id: number): IncentiveProgram | null {
    const program = this.state.incentives.get(id);
    return program ? structuredClone(program) : null;
  }

  listIncentiveIdsByIssuer(issuer: ParticipantId): number[] {
    return [...this.state.incentives.values()]
      .filter((p) => p.issuer === issuer)
      .map((p) => p.id);
  }

  listIncentiveIdsByCategory(category: WasteCategory): number[] {
    return [...this.state.incentives.values()]
      .filter((p) => p.category === category)
      .map((p) => p.id);
  }

  getParticipant(id: ParticipantId): Participant | null {
    const participant = this.state.participants.get(id);
    return participant ? structuredClone(participant) : null;
  }

  saveParticipant(participant: Participant): void {
    this.state.participants.set(participant.id, structuredClone(participant));
  }

  getParticipantStats(participant: ParticipantId): ParticipantStats | null {
    const stats = this.state.stats.get(participant);
    return stats ? structuredClone(stats) : null;
  }

  saveParticipantStats(stats: ParticipantStats): void {
    this.state.stats.set(stats.participant, structuredClone(stats));
  }

  sumTotalEarned(): bigint {
    let total = 0n;
    for (const stats of this.state.stats.values()) total += stats.totalEarned;
    return total;
  }

  getSettings(): LedgerSettings | null {
    return this.state.settings ? { ...this.state.settings } : null;
  }

  saveSettings(settings: LedgerSettings): void {
    this.state.settings = { ...settings };
  }

  appendTokenTransfer(transfer: TokenTransfer): void {
    this.state.tokenTransfers.push(structuredClone(transfer));
  }

  listTokenTransfersTo(participant: ParticipantId): TokenTransfer[] {
    return structuredClone(
      this.state.tokenTransfers.filter((t) => t.to === participant)
    );
  }
}
