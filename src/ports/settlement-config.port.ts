// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/settlement-config`
 * Purpose: Source of the administrator identity and reward split percentages.
 * Scope: Read-only interface. Updates go through features/participants/services/settings.
 * Invariants: collectorPercent + ownerPercent <= 100.
 * Side-effects: none (interface definition only)
 * @public
 */

import type { LedgerSettings } from "@reclaim/waste-core";

export interface SettlementConfigSource {
  getSettings(): LedgerSettings;
}
