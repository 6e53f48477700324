// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/ledger-store`
 * Purpose: Re-exports RecyclingLedgerStore port and related types from @reclaim/waste-core.
 * Scope: Type re-exports only. Does not contain implementations.
 * Invariants: Named exports only, no runtime coupling.
 * Side-effects: none
 * Links: packages/waste-core/src/store.ts
 * @public
 */

export type {
  RecyclingLedgerStore,
  TokenTransfer,
} from "@reclaim/waste-core";
