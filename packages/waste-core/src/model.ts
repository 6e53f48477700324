// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@reclaim/waste-core/model`
 * Purpose: Record types for waste units, transfers, incentive programs, participants and settlement results.
 * Scope: Pure types and const tuples. Does not perform I/O.
 * Invariants:
 * - Weights, rates, budgets and payouts are bigint in [0, AMOUNT_MAX].
 * - Record ids are safe positive integers from the matching id space.
 * - Coordinates are integer micro-degrees.
 * Side-effects: none
 * Links: packages/waste-core/src/rules.ts, packages/waste-core/src/rewards.ts
 * @public
 */

import type { ParticipantId } from "@reclaim/ids";

export const WASTE_CATEGORIES = [
  "PAPER",
  "PET_PLASTIC",
  "PLASTIC",
  "METAL",
  "GLASS",
] as const;
export type WasteCategory = (typeof WASTE_CATEGORIES)[number];

export const WASTE_STATUSES = [
  "PENDING",
  "PROCESSING",
  "PROCESSED",
  "REJECTED",
] as const;
export type WasteStatus = (typeof WASTE_STATUSES)[number];

export const PARTICIPANT_ROLES = [
  "RECYCLER",
  "COLLECTOR",
  "MANUFACTURER",
] as const;
export type ParticipantRole = (typeof PARTICIPANT_ROLES)[number];

export const CAPABILITIES = [
  "submit",
  "confirm",
  "process",
  "collect",
  "manufacture",
  "create_incentive",
] as const;
export type Capability = (typeof CAPABILITIES)[number];

/** Counter namespaces for monotonic id allocation. */
export const ID_SPACES = ["waste", "incentive", "transfer"] as const;
export type IdSpace = (typeof ID_SPACES)[number];

/** Integer micro-degrees (degrees x 1e6). */
export interface Location {
  readonly latitude: number;
  readonly longitude: number;
}

export interface WasteUnit {
  readonly id: number;
  readonly category: WasteCategory;
  /** Grams. Zero only while a bulk transfer awaits its weight. */
  readonly weight: bigint;
  readonly submitter: ParticipantId;
  readonly currentOwner: ParticipantId;
  readonly status: WasteStatus;
  readonly isConfirmed: boolean;
  readonly confirmer: ParticipantId;
  readonly isActive: boolean;
  readonly location: Location;
  readonly createdAt: Date;
}

export interface TransferRecord {
  readonly id: number;
  readonly wasteId: number;
  readonly from: ParticipantId;
  readonly to: ParticipantId;
  readonly timestamp: Date;
  readonly note: string;
}

export interface IncentiveProgram {
  readonly id: number;
  readonly issuer: ParticipantId;
  readonly category: WasteCategory;
  /** Reward units per kilogram. */
  readonly rewardRate: bigint;
  readonly totalBudget: bigint;
  readonly remainingBudget: bigint;
  readonly active: boolean;
  readonly createdAt: Date;
}

export interface Participant {
  readonly id: ParticipantId;
  readonly role: ParticipantRole;
  readonly name: string;
  readonly location: Location;
  readonly isRegistered: boolean;
  readonly registeredAt: Date;
}

export interface ParticipantStats {
  readonly participant: ParticipantId;
  readonly totalEarned: bigint;
  readonly submissions: number;
  readonly totalSubmittedWeight: bigint;
  /** Submission count per category; sums to `submissions`. */
  readonly submissionsByCategory: Readonly<Record<WasteCategory, number>>;
}

export interface LedgerSettings {
  readonly admin: ParticipantId;
  readonly collectorPercent: number;
  readonly ownerPercent: number;
}

export interface SupplyChainStats {
  readonly totalWastes: number;
  readonly activeWeight: bigint;
  readonly totalTokensDistributed: bigint;
}

export type PayoutRole = "collector" | "submitter" | "holder";

export interface SettlementPayout {
  readonly recipient: ParticipantId;
  readonly role: PayoutRole;
  readonly amount: bigint;
}

export interface SettlementReceipt {
  readonly wasteId: number;
  readonly incentiveId: number;
  readonly issuer: ParticipantId;
  readonly category: WasteCategory;
  readonly totalReward: bigint;
  /** Every computed line, zero amounts included. Only non-zero lines are paid. */
  readonly payouts: readonly SettlementPayout[];
  readonly remainingBudget: bigint;
  readonly incentiveActive: boolean;
  readonly settledAt: Date;
}
