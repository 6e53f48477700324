// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@reclaim/db-schema/recycling`
 * Purpose: SQLite schema for waste units, holdings, associations, transfers, incentive programs, participants, statistics, settings and id counters.
 * Scope: Table definitions only. Does not contain queries, business logic, or I/O.
 * Invariants:
 * - Amount columns (weights, rates, budgets, earnings) are decimal TEXT; unsigned 64-bit values do not fit SQLite's signed INTEGER.
 * - waste_transfers and token_transfers are append-only.
 * - Holdings and transfers are read back in insertion order (by id).
 * - DDL in src/adapters/server/db/ledger.sql must match these definitions.
 * Side-effects: none (schema definitions only)
 * Links: src/adapters/server/ledger/drizzle-ledger-store.adapter.ts
 * @public
 */

import {
  index,
  integer,
  sqliteTable,
  text,
  uniqueIndex,
} from "drizzle-orm/sqlite-core";

const CATEGORY_VALUES = [
  "PAPER",
  "PET_PLASTIC",
  "PLASTIC",
  "METAL",
  "GLASS",
] as const;

const ROLE_VALUES = ["RECYCLER", "COLLECTOR", "MANUFACTURER"] as const;

export const ledgerCounters = sqliteTable("ledger_counters", {
  space: text("space", { enum: ["waste", "incentive", "transfer"] }).primaryKey(),
  value: integer("value").notNull(),
});

export const wasteUnits = sqliteTable(
  "waste_units",
  {
    id: integer("id").primaryKey(),
    category: text("category", { enum: CATEGORY_VALUES }).notNull(),
    weightGrams: text("weight_grams").notNull(),
    submitter: text("submitter").notNull(),
    currentOwner: text("current_owner").notNull(),
    status: text("status", {
      enum: ["PENDING", "PROCESSING", "PROCESSED", "REJECTED"],
    }).notNull(),
    isConfirmed: integer("is_confirmed", { mode: "boolean" }).notNull(),
    confirmer: text("confirmer").notNull(),
    isActive: integer("is_active", { mode: "boolean" }).notNull(),
    latitude: integer("latitude").notNull(),
    longitude: integer("longitude").notNull(),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => [index("waste_units_active_idx").on(table.isActive)]
);

/** Current holdings per participant. Rows move on transfer. */
export const wasteHoldings = sqliteTable(
  "waste_holdings",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    participant: text("participant").notNull(),
    wasteId: integer("waste_id").notNull(),
  },
  (table) => [index("waste_holdings_participant_idx").on(table.participant)]
);

/** Every unit a participant submitted, sent or received. Rows are never deleted. */
export const wasteAssociations = sqliteTable(
  "waste_associations",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    participant: text("participant").notNull(),
    wasteId: integer("waste_id").notNull(),
  },
  (table) => [
    uniqueIndex("waste_associations_participant_waste_idx").on(
      table.participant,
      table.wasteId
    ),
  ]
);

export const wasteTransfers = sqliteTable(
  "waste_transfers",
  {
    id: integer("id").primaryKey(),
    wasteId: integer("waste_id").notNull(),
    fromParticipant: text("from_participant").notNull(),
    toParticipant: text("to_participant").notNull(),
    transferredAt: integer("transferred_at", { mode: "timestamp_ms" }).notNull(),
    note: text("note").notNull(),
  },
  (table) => [index("waste_transfers_waste_idx").on(table.wasteId)]
);

export const incentives = sqliteTable(
  "incentives",
  {
    id: integer("id").primaryKey(),
    issuer: text("issuer").notNull(),
    category: text("category", { enum: CATEGORY_VALUES }).notNull(),
    rewardRate: text("reward_rate").notNull(),
    totalBudget: text("total_budget").notNull(),
    remainingBudget: text("remaining_budget").notNull(),
    active: integer("active", { mode: "boolean" }).notNull(),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => [
    index("incentives_issuer_idx").on(table.issuer),
    index("incentives_category_idx").on(table.category),
  ]
);

export const participants = sqliteTable("participants", {
  id: text("id").primaryKey(),
  role: text("role", { enum: ROLE_VALUES }).notNull(),
  name: text("name").notNull(),
  latitude: integer("latitude").notNull(),
  longitude: integer("longitude").notNull(),
  isRegistered: integer("is_registered", { mode: "boolean" }).notNull(),
  registeredAt: integer("registered_at", { mode: "timestamp_ms" }).notNull(),
});

export const participantStats = sqliteTable("participant_stats", {
  participant: text("participant").primaryKey(),
  totalEarned: text("total_earned").notNull(),
  submissions: integer("submissions").notNull(),
  submittedWeight: text("submitted_weight").notNull(),
  paperCount: integer("paper_count").notNull(),
  petPlasticCount: integer("pet_plastic_count").notNull(),
  plasticCount: integer("plastic_count").notNull(),
  metalCount: integer("metal_count").notNull(),
  glassCount: integer("glass_count").notNull(),
});

/** Single-row table (id = 1). */
export const ledgerSettings = sqliteTable("ledger_settings", {
  id: integer("id").primaryKey(),
  admin: text("admin").notNull(),
  collectorPercent: integer("collector_percent").notNull(),
  ownerPercent: integer("owner_percent").notNull(),
});

export const tokenTransfers = sqliteTable(
  "token_transfers",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    fromParticipant: text("from_participant").notNull(),
    toParticipant: text("to_participant").notNull(),
    amount: text("amount").notNull(),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => [index("token_transfers_to_idx").on(table.toParticipant)]
);
