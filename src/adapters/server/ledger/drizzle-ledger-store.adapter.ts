// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ledger/drizzle-ledger-store`
 * Purpose: Drizzle-based implementation of RecyclingLedgerStore over better-sqlite3.
 * Scope: Row mapping and persistence for every ledger record. Does not validate lifecycle rules or perform business logic.
 * Invariants:
 * - transaction() wraps better-sqlite3 transactions; nested calls become savepoints.
 * - Amounts round-trip through decimal TEXT columns via BigInt().
 * - List methods order by id (insertion order).
 * Side-effects: IO (database operations)
 * Notes: Participant ids read back from rows are re-validated with toParticipantId().
 * Links: Implements RecyclingLedgerStore port, schema in @reclaim/db-schema
 * @public
 */

import { toParticipantId, type ParticipantId } from "@reclaim/ids";
import {
  incentives,
  ledgerCounters,
  ledgerSettings,
  participantStats,
  participants,
  tokenTransfers,
  wasteAssociations,
  wasteHoldings,
  wasteTransfers,
  wasteUnits,
} from "@reclaim/db-schema";
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
import { and, asc, eq, sql } from "drizzle-orm";

import type { LedgerDb } from "@/adapters/server/db/client";
import type { RecyclingLedgerStore, TokenTransfer } from "@/ports";

type WasteRow = typeof wasteUnits.$inferSelect;
type TransferRow = typeof wasteTransfers.$inferSelect;
type IncentiveRow = typeof incentives.$inferSelect;
type ParticipantRow = typeof participants.$inferSelect;
type StatsRow = typeof participantStats.$inferSelect;
type TokenTransferRow = typeof tokenTransfers.$inferSelect;

const SETTINGS_ROW_ID = 1;

export class DrizzleRecyclingLedgerStore implements RecyclingLedgerStore {
  constructor(private readonly ledgerDb: LedgerDb) {}

  private get db() {
    return this.ledgerDb.db;
  }

  transaction<T>(work: () => T): T {
    return this.ledgerDb.sqlite.transaction(work)();
  }

  allocateId(space: IdSpace): number {
    const row = this.db
      .insert(ledgerCounters)
      .values({ space, value: 1 })
      .onConflictDoUpdate({
        target: ledgerCounters.space,
        set: { value: sql`${ledgerCounters.value} + 1` },
      })
      .returning({ value: ledgerCounters.value })
      .get();
    if (!row) {
      throw new Error(`Failed to allocate ${space} id`);
    }
    return row.value;
  }

  peekCounter(space: IdSpace): number {
    const row = this.db
      .select({ value: ledgerCounters.value })
      .from(ledgerCounters)
      .where(eq(ledgerCounters.space, space))
      .get();
    return row?.value ?? 0;
  }

  // ---------------------------------------------------------------------------
  // Waste units
  // ---------------------------------------------------------------------------

  insertWaste(unit: WasteUnit): void {
    this.db.insert(wasteUnits).values(this.toWasteRow(unit)).run();
  }

  saveWaste(unit: WasteUnit): void {
    const { id, ...rest } = this.toWasteRow(unit);
    this.db.update(wasteUnits).set(rest).where(eq(wasteUnits.id, id)).run();
  }

  getWaste(id: number): WasteUnit | null {
    const row = this.db
      .select()
      .from(wasteUnits)
      .where(eq(wasteUnits.id, id))
      .get();
    return row ? this.mapWaste(row) : null;
  }

  countWastes(): number {
    const row = this.db
      .select({ n: sql<number>`count(*)` })
      .from(wasteUnits)
      .get();
    return row?.n ?? 0;
  }

  sumActiveWasteWeight(): bigint {
    const rows = this.db
      .select({ weight: wasteUnits.weightGrams })
      .from(wasteUnits)
      .where(eq(wasteUnits.isActive, true))
      .all();
    return rows.reduce((sum, row) => sum + BigInt(row.weight), 0n);
  }

  // ---------------------------------------------------------------------------
  // Holdings
  // ---------------------------------------------------------------------------

  addHolding(participant: ParticipantId, wasteId: number): void {
    this.db.insert(wasteHoldings).values({ participant, wasteId }).run();
  }

  removeHolding(participant: ParticipantId, wasteId: number): void {
    this.db
      .delete(wasteHoldings)
      .where(
        and(
          eq(wasteHoldings.participant, participant),
          eq(wasteHoldings.wasteId, wasteId)
        )
      )
      .run();
  }

  listHoldings(participant: ParticipantId): number[] {
    return this.db
      .select({ wasteId: wasteHoldings.wasteId })
      .from(wasteHoldings)
      .where(eq(wasteHoldings.participant, participant))
      .orderBy(asc(wasteHoldings.id))
      .all()
      .map((row) => row.wasteId);
  }

  // ---------------------------------------------------------------------------
  // Associations
  // ---------------------------------------------------------------------------

  recordAssociation(participant: ParticipantId, wasteId: number): void {
    this.db
      .insert(wasteAssociations)
      .values({ participant, wasteId })
      .onConflictDoNothing()
      .run();
  }

  listAssociations(participant: ParticipantId): number[] {
    return this.db
      .select({ wasteId: wasteAssociations.wasteId })
      .from(wasteAssociations)
      .where(eq(wasteAssociations.participant, participant))
      .orderBy(asc(wasteAssociations.id))
      .all()
      .map((row) => row.wasteId);
  }

  // ---------------------------------------------------------------------------
  // Transfers
  // ---------------------------------------------------------------------------

  appendTransfer(record: TransferRecord): void {
    this.db
      .insert(wasteTransfers)
      .values({
        id: record.id,
        wasteId: record.wasteId,
        fromParticipant: record.from,
        toParticipant: record.to,
        transferredAt: record.timestamp,
        note: record.note,
      })
      .run();
  }

  listTransfers(wasteId: number): TransferRecord[] {
    return this.db
      .select()
      .from(wasteTransfers)
      .where(eq(wasteTransfers.wasteId, wasteId))
      .orderBy(asc(wasteTransfers.id))
      .all()
      .map((row) => this.mapTransfer(row));
  }

  // ---------------------------------------------------------------------------
  // Incentive programs
  // ---------------------------------------------------------------------------

  insertIncentive(program: IncentiveProgram): void {
    this.db.insert(incentives).values(this.toIncentiveRow(program)).run();
  }

  saveIncentive(program: IncentiveProgram): void {
    const { id, ...rest } = this.toIncentiveRow(program);
    this.db.update(incentives).set(rest).where(eq(incentives.id, id)).run();
  }

  getIncentive(id: number): IncentiveProgram | null {
    const row = this.db
      .select()
      .from(incentives)
      .where(eq(incentives.id, id))
      .get();
    return row ? this.mapIncentive(row) : null;
  }

  listIncentiveIdsByIssuer(issuer: ParticipantId): number[] {
    return this.db
      .select({ id: incentives.id })
      .from(incentives)
      .where(eq(incentives.issuer, issuer))
      .orderBy(asc(incentives.id))
      .all()
      .map((row) => row.id);
  }

  listIncentiveIdsByCategory(category: WasteCategory): number[] {
    return this.db
      .select({ id: incentives.id })
      .from(incentives)
      .where(eq(incentives.category, category))
      .orderBy(asc(incentives.id))
      .all()
      .map((row) => row.id);
  }

  // ---------------------------------------------------------------------------
  // Participants and statistics
  // ---------------------------------------------------------------------------

  getParticipant(id: ParticipantId): Participant | null {
    const row = this.db
      .select()
      .from(participants)
      .where(eq(participants.id, id))
      .get();
    return row ? this.mapParticipant(row) : null;
  }

  saveParticipant(participant: Participant): void {
    const update = {
      role: participant.role,
      name: participant.name,
      latitude: participant.location.latitude,
      longitude: participant.location.longitude,
      isRegistered: participant.isRegistered,
      registeredAt: participant.registeredAt,
    };
    this.db
      .insert(participants)
      .values({ id: participant.id, ...update })
      .onConflictDoUpdate({ target: participants.id, set: update })
      .run();
  }

  getParticipantStats(participant: ParticipantId): ParticipantStats | null {
    const row = this.db
      .select()
      .from(participantStats)
      .where(eq(participantStats.participant, participant))
      .get();
    return row ? this.mapStats(row) : null;
  }

  saveParticipantStats(stats: ParticipantStats): void {
    const { participant, ...update } = this.toStatsRow(stats);
    this.db
      .insert(participantStats)
      .values({ participant, ...update })
      .onConflictDoUpdate({ target: participantStats.participant, set: update })
      .run();
  }

  sumTotalEarned(): bigint {
    return this.db
      .select({ earned: participantStats.totalEarned })
      .from(participantStats)
      .all()
      .reduce((sum, row) => sum + BigInt(row.earned), 0n);
  }

  // ---------------------------------------------------------------------------
  // Settings
  // ---------------------------------------------------------------------------

  getSettings(): LedgerSettings | null {
    const row = this.db
      .select()
      .from(ledgerSettings)
      .where(eq(ledgerSettings.id, SETTINGS_ROW_ID))
      .get();
    if (!row) return null;
    return {
      admin: toParticipantId(row.admin),
      collectorPercent: row.collectorPercent,
      ownerPercent: row.ownerPercent,
    };
  }

  saveSettings(settings: LedgerSettings): void {
    const update = {
      admin: settings.admin,
      collectorPercent: settings.collectorPercent,
      ownerPercent: settings.ownerPercent,
    };
    this.db
      .insert(ledgerSettings)
      .values({ id: SETTINGS_ROW_ID, ...update })
      .onConflictDoUpdate({ target: ledgerSettings.id, set: update })
      .run();
  }

  // ---------------------------------------------------------------------------
  // Token movements
  // ---------------------------------------------------------------------------

  appendTokenTransfer(transfer: TokenTransfer): void {
    this.db
      .insert(tokenTransfers)
      .values({
        fromParticipant: transfer.from,
        toParticipant: transfer.to,
        amount: transfer.amount.toString(),
        createdAt: transfer.createdAt,
      })
      .run();
  }

  listTokenTransfersTo(participant: ParticipantId): TokenTransfer[] {
    return this.db
      .select()
      .from(tokenTransfers)
      .where(eq(tokenTransfers.toParticipant, participant))
      .orderBy(asc(tokenTransfers.id))
      .all()
      .map((row) => this.mapTokenTransfer(row));
  }

  // ---------------------------------------------------------------------------
  // Row mapping
  // ---------------------------------------------------------------------------

  private toWasteRow(unit: WasteUnit): WasteRow {
    return {
      id: unit.id,
      category: unit.category,
      weightGrams: unit.weight.toString(),
      submitter: unit.submitter,
      currentOwner: unit.currentOwner,
      status: unit.status,
      isConfirmed: unit.isConfirmed,
      confirmer: unit.confirmer,
      isActive: unit.isActive,
      latitude: unit.location.latitude,
      longitude: unit.location.longitude,
      createdAt: unit.createdAt,
    };
  }

  private mapWaste(row: WasteRow): WasteUnit {
    return {
      id: row.id,
      category: row.category,
      weight: BigInt(row.weightGrams),
      submitter: toParticipantId(row.submitter),
      currentOwner: toParticipantId(row.currentOwner),
      status: row.status,
      isConfirmed: row.isConfirmed,
      confirmer: toParticipantId(row.confirmer),
      isActive: row.isActive,
      location: { latitude: row.latitude, longitude: row.longitude },
      createdAt: row.createdAt,
    };
  }

  private mapTransfer(row: TransferRow): TransferRecord {
    return {
      id: row.id,
      wasteId: row.wasteId,
      from: toParticipantId(row.fromParticipant),
      to: toParticipantId(row.toParticipant),
      timestamp: row.transferredAt,
      note: row.note,
    };
  }

  private toIncentiveRow(program: IncentiveProgram): IncentiveRow {
    return {
      id: program.id,
      issuer: program.issuer,
      category: program.category,
      rewardRate: program.rewardRate.toString(),
      totalBudget: program.totalBudget.toString(),
      remainingBudget: program.remainingBudget.toString(),
      active: program.active,
      createdAt: program.createdAt,
    };
  }

  private mapIncentive(row: IncentiveRow): IncentiveProgram {
    return {
      id: row.id,
      issuer: toParticipantId(row.issuer),
      category: row.category,
      rewardRate: BigInt(row.rewardRate),
      totalBudget: BigInt(row.totalBudget),
      remainingBudget: BigInt(row.remainingBudget),
      active: row.active,
      createdAt: row.createdAt,
    };
  }

  private mapParticipant(row: ParticipantRow): Participant {
    return {
      id: toParticipantId(row.id),
      role: row.role,
      name: row.name,
      location: { latitude: row.latitude, longitude: row.longitude },
      isRegistered: row.isRegistered,
      registeredAt: row.registeredAt,
    };
  }

  private toStatsRow(stats: ParticipantStats): StatsRow {
    const counts = stats.submissionsByCategory;
    return {
      participant: stats.participant,
      totalEarned: stats.totalEarned.toString(),
      submissions: stats.submissions,
      submittedWeight: stats.totalSubmittedWeight.toString(),
      paperCount: counts.PAPER,
      petPlasticCount: counts.PET_PLASTIC,
      plasticCount: counts.PLASTIC,
      metalCount: counts.METAL,
      glassCount: counts.GLASS,
    };
  }

  private mapStats(row: StatsRow): ParticipantStats {
    return {
      participant: toParticipantId(row.participant),
      totalEarned: BigInt(row.totalEarned),
      submissions: row.submissions,
      totalSubmittedWeight: BigInt(row.submittedWeight),
      submissionsByCategory: {
        PAPER: row.paperCount,
        PET_PLASTIC: row.petPlasticCount,
        PLASTIC: row.plasticCount,
        METAL: row.metalCount,
        GLASS: row.glassCount,
      },
    };
  }

  private mapTokenTransfer(row: TokenTransferRow): TokenTransfer {
    return {
      from: toParticipantId(row.fromParticipant),
      to: toParticipantId(row.toParticipant),
      amount: BigInt(row.amount),
      createdAt: row.createdAt,
    };
  }
}
