// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces - canonical import surface.
 * Scope: Re-exports public port interfaces and event shapes. Does not export implementations or runtime objects.
 * Invariants: Named exports only, no runtime coupling, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type { Clock } from "./clock.port";
export type {
  IncentiveActivationChangedEvent,
  IncentiveCreatedEvent,
  IncentiveSettledEvent,
  IncentiveUpdatedEvent,
  WasteBulkTransferredEvent,
  WasteConfirmationResetEvent,
  WasteConfirmedEvent,
  WasteDeactivatedEvent,
  WasteDomainEvent,
  WasteDomainEventType,
  WasteEventSink,
  WasteStatusChangedEvent,
  WasteSubmittedEvent,
  WasteTransferredEvent,
  WasteWeightRecordedEvent,
} from "./event-sink.port";
export type {
  RecyclingLedgerStore,
  TokenTransfer,
} from "./ledger-store.port";
export type { ParticipantDirectory } from "./participant-directory.port";
export type { SettlementConfigSource } from "./settlement-config.port";
export type { ValueTransfer } from "./value-transfer.port";
