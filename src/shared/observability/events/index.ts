// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry. Does not define payload schemas; domain payloads live in @ports/event-sink.
 * Invariants: All event names registered here; logEvent() enforces base fields (reqId always).
 *             Every WasteDomainEvent type appears verbatim as a value.
 * Side-effects: none
 * Links: Used by logEvent(); consumed by the event sink adapter and feature services.
 * @public
 */

export const EVENT_NAMES = {
  // Waste lifecycle
  WASTE_SUBMITTED: "waste.submitted",
  WASTE_BULK_TRANSFERRED: "waste.bulk_transferred",
  WASTE_TRANSFERRED: "waste.transferred",
  WASTE_CONFIRMED: "waste.confirmed",
  WASTE_CONFIRMATION_RESET: "waste.confirmation_reset",
  WASTE_DEACTIVATED: "waste.deactivated",
  WASTE_STATUS_CHANGED: "waste.status_changed",
  WASTE_WEIGHT_RECORDED: "waste.weight_recorded",

  // Incentives
  INCENTIVE_CREATED: "incentive.created",
  INCENTIVE_UPDATED: "incentive.updated",
  INCENTIVE_ACTIVATION_CHANGED: "incentive.activation_changed",
  INCENTIVE_SETTLED: "incentive.settled",

  // Participants & administration
  PARTICIPANT_REGISTERED: "participant.registered",
  PARTICIPANT_DEREGISTERED: "participant.deregistered",
  PARTICIPANT_LOCATION_UPDATED: "participant.location_updated",
  SETTINGS_UPDATED: "settings.updated",

  // Engine lifecycle
  ENGINE_SETTINGS_SEEDED: "engine.settings_seeded",
  ENGINE_SETTLEMENT_REJECTED: "engine.settlement_rejected",

  // Adapter Events
  ADAPTER_EVENT_SINK_ERROR: "adapter.event_sink.error",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/**
 * Required base fields for all events.
 * reqId is ALWAYS required.
 */
export interface EventBase {
  reqId: string;
}
