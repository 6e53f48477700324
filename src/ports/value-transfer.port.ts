// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/value-transfer`
 * Purpose: Token payout facility used by reward settlement.
 * Scope: Interface only.
 * Invariants:
 * - pay() is called inside the settlement transaction; throwing aborts the whole settlement.
 * - amount is always > 0; zero payouts are never requested.
 * Side-effects: none (interface definition only)
 * Links: Implemented by LedgerValueTransfer and RecordingValueTransfer
 * @public
 */

import type { ParticipantId } from "@reclaim/ids";

export interface ValueTransfer {
  pay(from: ParticipantId, to: ParticipantId, amount: bigint): void;
}
