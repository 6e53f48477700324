// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/payments/ledger-value-transfer`
 * Purpose: ValueTransfer that books each payout as a token movement row in the ledger store.
 * Scope: Appends token_transfers rows. Does not hold balances or move funds on any external system.
 * Invariants: Runs inside the caller's store transaction, so a failed settlement leaves no movement behind.
 * Side-effects: IO (store writes)
 * Links: Implements ValueTransfer port
 * @public
 */

import type { ParticipantId } from "@reclaim/ids";

import type { Clock, RecyclingLedgerStore, ValueTransfer } from "@/ports";

export class LedgerValueTransfer implements ValueTransfer {
  constructor(
    private readonly store: RecyclingLedgerStore,
    private readonly clock: Clock
  ) {}

  pay(from: ParticipantId, to: ParticipantId, amount: bigint): void {
    this.store.appendTokenTransfer({
      from,
      to,
      amount,
      createdAt: new Date(this.clock.now()),
    });
  }
}
