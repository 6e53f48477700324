// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/engine`
 * Purpose: Host-facing recycling engine: every waste, transfer, incentive, settlement, participant, admin and statistics operation bound to one set of ports.
 * Scope: Thin binding over feature services. Does not add behavior of its own.
 * Invariants: Each operation runs synchronously to completion; errors surface as typed engine errors from @reclaim/waste-core.
 * Side-effects: IO (through the bound ports)
 * Links: src/bootstrap/container.ts
 * @public
 */

import type { ParticipantId } from "@reclaim/ids";
import type {
  Location,
  ParticipantRole,
  WasteCategory,
  WasteStatus,
} from "@reclaim/waste-core";

import { getContainer } from "@/bootstrap/container";
import {
  activeIncentivesSorted,
  bestActiveIncentiveFor,
  type CreateIncentiveInput,
  createIncentive,
  getIncentive,
  incentiveExists,
  incentivesByCategory,
  incentivesByIssuer,
  previewIncentiveReward,
  setIncentiveActive,
  updateIncentive,
} from "@/features/incentives/services/incentives";
import { isValidTransfer } from "@/features/participants/services/authorize";
import {
  deregisterParticipant,
  getParticipant,
  type RegisterParticipantInput,
  registerParticipant,
  updateParticipantLocation,
  updateParticipantRole,
} from "@/features/participants/services/participants";
import {
  getSettings,
  setCollectorPercent,
  setOwnerPercent,
  setPercentages,
  transferAdmin,
} from "@/features/participants/services/settings";
import {
  statsOf,
  supplyChainStats,
} from "@/features/participants/services/stats";
import {
  type SettleRewardsInput,
  type SettlementDeps,
  settleRewards,
} from "@/features/settlement/services/settleRewards";
import {
  confirmWaste,
  deactivateWaste,
  getWaste,
  getWastes,
  holdingsOf,
  participantWastes,
  recordBulkWeight,
  resetWasteConfirmation,
  type SubmitWasteInput,
  submitWaste,
  submitWasteBatch,
  updateWasteStatus,
  type WasteSubmission,
  wasteExists,
} from "@/features/waste/services/registry";
import {
  type TransferBulkInput,
  type TransferWasteInput,
  transferBulkWaste,
  transferHistory,
  transferWaste,
} from "@/features/waste/services/transfers";

export function createRecyclingEngine(deps: SettlementDeps) {
  return {
    // Waste registry
    submitWaste: (input: SubmitWasteInput) => submitWaste(deps, input),
    submitWasteBatch: (
      submitter: ParticipantId,
      items: readonly WasteSubmission[]
    ) => submitWasteBatch(deps, submitter, items),
    recordBulkWeight: (
      wasteId: number,
      caller: ParticipantId,
      weight: bigint
    ) => recordBulkWeight(deps, wasteId, caller, weight),
    confirmWaste: (wasteId: number, confirmer: ParticipantId) =>
      confirmWaste(deps, wasteId, confirmer),
    resetWasteConfirmation: (wasteId: number, caller: ParticipantId) =>
      resetWasteConfirmation(deps, wasteId, caller),
    deactivateWaste: (wasteId: number, caller: ParticipantId) =>
      deactivateWaste(deps, wasteId, caller),
    updateWasteStatus: (wasteId: number, status: WasteStatus) =>
      updateWasteStatus(deps, wasteId, status),
    getWaste: (wasteId: number) => getWaste(deps, wasteId),
    getWastes: (wasteIds: readonly number[]) => getWastes(deps, wasteIds),
    wasteExists: (wasteId: number) => wasteExists(deps, wasteId),
    getParticipantWastes: (participant: ParticipantId) =>
      participantWastes(deps, participant),
    getParticipantHoldings: (participant: ParticipantId) =>
      holdingsOf(deps, participant),

    // Transfer ledger
    transferWaste: (input: TransferWasteInput) => transferWaste(deps, input),
    transferBulkWaste: (input: TransferBulkInput) =>
      transferBulkWaste(deps, input),
    getWasteTransferHistory: (wasteId: number) =>
      transferHistory(deps, wasteId),
    isValidTransfer: (from: ParticipantId, to: ParticipantId) =>
      isValidTransfer(deps.directory, from, to),

    // Incentive programs
    createIncentive: (input: CreateIncentiveInput) =>
      createIncentive(deps, input),
    updateIncentive: (
      incentiveId: number,
      caller: ParticipantId,
      rewardRate: bigint,
      totalBudget: bigint
    ) => updateIncentive(deps, incentiveId, caller, rewardRate, totalBudget),
    setIncentiveActive: (
      incentiveId: number,
      caller: ParticipantId,
      active: boolean
    ) => setIncentiveActive(deps, incentiveId, caller, active),
    getIncentiveById: (incentiveId: number) => getIncentive(deps, incentiveId),
    incentiveExists: (incentiveId: number) =>
      incentiveExists(deps, incentiveId),
    getIncentivesByIssuer: (issuer: ParticipantId) =>
      incentivesByIssuer(deps, issuer),
    getIncentivesByCategory: (category: WasteCategory) =>
      incentivesByCategory(deps, category),
    getBestActiveIncentiveFor: (
      issuer: ParticipantId,
      category: WasteCategory
    ) => bestActiveIncentiveFor(deps, issuer, category),
    getActiveIncentivesSorted: (category: WasteCategory) =>
      activeIncentivesSorted(deps, category),
    previewIncentiveReward: (incentiveId: number, weight: bigint) =>
      previewIncentiveReward(deps, incentiveId, weight),

    // Settlement
    settleRewards: (input: SettleRewardsInput) => settleRewards(deps, input),

    // Participants & administration
    registerParticipant: (input: RegisterParticipantInput) =>
      registerParticipant(deps, input),
    getParticipant: (id: ParticipantId) => getParticipant(deps, id),
    updateParticipantRole: (id: ParticipantId, role: ParticipantRole) =>
      updateParticipantRole(deps, id, role),
    updateParticipantLocation: (id: ParticipantId, location: Location) =>
      updateParticipantLocation(deps, id, location),
    deregisterParticipant: (id: ParticipantId) =>
      deregisterParticipant(deps, id),
    getSettings: () => getSettings(deps),
    setPercentages: (
      caller: ParticipantId,
      collectorPercent: number,
      ownerPercent: number
    ) => setPercentages(deps, caller, collectorPercent, ownerPercent),
    setCollectorPercent: (caller: ParticipantId, collectorPercent: number) =>
      setCollectorPercent(deps, caller, collectorPercent),
    setOwnerPercent: (caller: ParticipantId, ownerPercent: number) =>
      setOwnerPercent(deps, caller, ownerPercent),
    transferAdmin: (caller: ParticipantId, newAdmin: ParticipantId) =>
      transferAdmin(deps, caller, newAdmin),

    // Statistics
    getParticipantStats: (participant: ParticipantId) =>
      statsOf(deps.store, participant),
    getSupplyChainStats: () => supplyChainStats(deps.store),
  };
}

export type RecyclingEngine = ReturnType<typeof createRecyclingEngine>;

/** Engine bound to the process-wide container. */
export function getRecyclingEngine(): RecyclingEngine {
  return createRecyclingEngine(getContainer());
}
