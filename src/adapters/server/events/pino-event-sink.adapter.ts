// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/events/pino-event-sink`
 * Purpose: WasteEventSink that writes every domain event as a structured log line.
 * Scope: Serialises bigint fields to decimal strings and logs via logEvent(). Does not publish anywhere else.
 * Invariants: Event name in the log equals the domain event type.
 * Side-effects: IO (logging)
 * Links: Implements WasteEventSink port
 * @public
 */

import { randomUUID } from "node:crypto";

import type { WasteDomainEvent, WasteEventSink } from "@/ports";
import { type Logger, logEvent } from "@/shared/observability";

function toLogValue(value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) return value.map(toLogValue);
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, toLogValue(v)])
    );
  }
  return value;
}

export class PinoWasteEventSink implements WasteEventSink {
  constructor(private readonly log: Logger) {}

  emit(event: WasteDomainEvent): void {
    const { type, ...payload } = event;
    const fields: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(payload)) {
      fields[key] = toLogValue(value);
    }
    logEvent(this.log, type, { reqId: randomUUID(), ...fields });
  }
}
