// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/config/store-settlement-config`
 * Purpose: SettlementConfigSource reading the settings row of the ledger store.
 * Scope: Read-only. Seeding happens in bootstrap/container.
 * Invariants: Settings exist once the container has started; a missing row is a wiring bug.
 * Side-effects: IO (store reads)
 * Links: Implements SettlementConfigSource port
 * @public
 */

import type { LedgerSettings } from "@reclaim/waste-core";

import type { RecyclingLedgerStore, SettlementConfigSource } from "@/ports";

export class StoreSettlementConfig implements SettlementConfigSource {
  constructor(private readonly store: RecyclingLedgerStore) {}

  getSettings(): LedgerSettings {
    const settings = this.store.getSettings();
    if (!settings) {
      throw new Error("Ledger settings have not been seeded");
    }
    return settings;
  }
}
