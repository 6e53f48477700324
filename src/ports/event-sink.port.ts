// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/event-sink`
 * Purpose: Domain event types and the sink that receives them after each successful mutation.
 * Scope: Interface and event shapes only.
 * Invariants:
 * - Events are emitted only after the store transaction commits.
 * - emit() is fire-and-forget; callers log and swallow sink failures.
 * Side-effects: none (interface definition only)
 * Links: Implemented by PinoWasteEventSink and RecordingEventSink
 * @public
 */

import type { ParticipantId } from "@reclaim/ids";
import type {
  SettlementPayout,
  WasteCategory,
  WasteStatus,
} from "@reclaim/waste-core";

interface EventBase {
  readonly occurredAt: string;
}

export interface WasteSubmittedEvent extends EventBase {
  readonly type: "waste.submitted";
  readonly wasteId: number;
  readonly category: WasteCategory;
  readonly weight: bigint;
  readonly submitter: ParticipantId;
}

export interface WasteBulkTransferredEvent extends EventBase {
  readonly type: "waste.bulk_transferred";
  readonly wasteId: number;
  readonly category: WasteCategory;
  readonly collector: ParticipantId;
  readonly manufacturer: ParticipantId;
}

export interface WasteTransferredEvent extends EventBase {
  readonly type: "waste.transferred";
  readonly wasteId: number;
  readonly transferId: number;
  readonly from: ParticipantId;
  readonly to: ParticipantId;
}

export interface WasteConfirmedEvent extends EventBase {
  readonly type: "waste.confirmed";
  readonly wasteId: number;
  readonly confirmer: ParticipantId;
}

export interface WasteConfirmationResetEvent extends EventBase {
  readonly type: "waste.confirmation_reset";
  readonly wasteId: number;
  readonly owner: ParticipantId;
}

export interface WasteDeactivatedEvent extends EventBase {
  readonly type: "waste.deactivated";
  readonly wasteId: number;
  readonly admin: ParticipantId;
}

export interface WasteStatusChangedEvent extends EventBase {
  readonly type: "waste.status_changed";
  readonly wasteId: number;
  readonly from: WasteStatus;
  readonly to: WasteStatus;
}

export interface WasteWeightRecordedEvent extends EventBase {
  readonly type: "waste.weight_recorded";
  readonly wasteId: number;
  readonly weight: bigint;
  readonly recordedBy: ParticipantId;
}

export interface IncentiveCreatedEvent extends EventBase {
  readonly type: "incentive.created";
  readonly incentiveId: number;
  readonly issuer: ParticipantId;
  readonly category: WasteCategory;
  readonly rewardRate: bigint;
  readonly totalBudget: bigint;
}

export interface IncentiveUpdatedEvent extends EventBase {
  readonly type: "incentive.updated";
  readonly incentiveId: number;
  readonly rewardRate: bigint;
  readonly totalBudget: bigint;
  readonly remainingBudget: bigint;
  readonly active: boolean;
}

export interface IncentiveActivationChangedEvent extends EventBase {
  readonly type: "incentive.activation_changed";
  readonly incentiveId: number;
  readonly active: boolean;
}

export interface IncentiveSettledEvent extends EventBase {
  readonly type: "incentive.settled";
  readonly incentiveId: number;
  readonly wasteId: number;
  readonly totalReward: bigint;
  readonly payouts: readonly SettlementPayout[];
  readonly remainingBudget: bigint;
}

export type WasteDomainEvent =
  | WasteSubmittedEvent
  | WasteBulkTransferredEvent
  | WasteTransferredEvent
  | WasteConfirmedEvent
  | WasteConfirmationResetEvent
  | WasteDeactivatedEvent
  | WasteStatusChangedEvent
  | WasteWeightRecordedEvent
  | IncentiveCreatedEvent
  | IncentiveUpdatedEvent
  | IncentiveActivationChangedEvent
  | IncentiveSettledEvent;

export type WasteDomainEventType = WasteDomainEvent["type"];

export interface WasteEventSink {
  emit(event: WasteDomainEvent): void;
}
