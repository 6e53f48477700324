// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/shared/deps`
 * Purpose: Port bundle handed to every ledger feature service.
 * Scope: Type definition and the clock/event helpers every service shares. Does not wire adapters.
 * Invariants:
 * - emitAfterCommit() is called only after the store transaction returned; sink failures are logged, never rethrown.
 * Side-effects: IO (logging on sink failure)
 * Links: src/bootstrap/container.ts builds the bundle
 * @public
 */

import { randomUUID } from "node:crypto";

import type {
  Clock,
  ParticipantDirectory,
  RecyclingLedgerStore,
  SettlementConfigSource,
  WasteDomainEvent,
  WasteEventSink,
} from "@/ports";
import { EVENT_NAMES, type Logger } from "@/shared/observability";

export interface LedgerDeps {
  readonly store: RecyclingLedgerStore;
  readonly directory: ParticipantDirectory;
  readonly config: SettlementConfigSource;
  readonly events: WasteEventSink;
  readonly clock: Clock;
  readonly log: Logger;
}

export function nowDate(deps: Pick<LedgerDeps, "clock">): Date {
  return new Date(deps.clock.now());
}

export function emitAfterCommit(
  deps: Pick<LedgerDeps, "events" | "log">,
  event: WasteDomainEvent
): void {
  try {
    deps.events.emit(event);
  } catch (error) {
    deps.log.warn(
      {
        event: EVENT_NAMES.ADAPTER_EVENT_SINK_ERROR,
        reqId: randomUUID(),
        eventType: event.type,
        err: error,
      },
      "event sink rejected domain event"
    );
  }
}
