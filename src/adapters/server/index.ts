// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Hex entry file for server adapters - canonical import surface.
 * Scope: Re-exports only public server adapter implementations with named exports. Does not export test doubles or internal utilities.
 * Invariants: Named exports only, no export *, runtime implementations
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Links: Used by bootstrap layer for DI container assembly
 * @public
 */

export { StoreSettlementConfig } from "./config/store-settlement-config.adapter";
export { type LedgerDb, openLedgerDb } from "./db/client";
export { PinoWasteEventSink } from "./events/pino-event-sink.adapter";
export { DrizzleRecyclingLedgerStore } from "./ledger/drizzle-ledger-store.adapter";
export { StoreParticipantDirectory } from "./participants/store-participant-directory.adapter";
export { LedgerValueTransfer } from "./payments/ledger-value-transfer.adapter";
export { SystemClock } from "./time/system.adapter";
