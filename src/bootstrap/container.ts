// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for the engine composition root with environment-based adapter selection.
 * Scope: Wire adapters to ports and seed settings. Does not expose operations (see engine.ts).
 * Invariants: All ports wired; single container instance per process; settings exist once the container is built.
 * Side-effects: IO (opens the SQLite file in production mode, initializes logger and emits startup log on first access)
 * Notes: Uses serverEnv.isTestMode (APP_ENV=test) to wire the in-memory store and recording event sink.
 * Links: Used by engine.ts and host entry points.
 * @public
 */

import { toParticipantId } from "@reclaim/ids";
import type { Logger } from "pino";

import {
  DrizzleRecyclingLedgerStore,
  LedgerValueTransfer,
  openLedgerDb,
  PinoWasteEventSink,
  StoreParticipantDirectory,
  StoreSettlementConfig,
  SystemClock,
} from "@/adapters/server";
import {
  InMemoryRecyclingLedgerStore,
  RecordingEventSink,
} from "@/adapters/test";
import { seedSettings } from "@/features/participants/services/settings";
import type { SettlementPolicy } from "@/features/settlement/services/settleRewards";
import type {
  Clock,
  ParticipantDirectory,
  RecyclingLedgerStore,
  SettlementConfigSource,
  ValueTransfer,
  WasteEventSink,
} from "@/ports";
import { serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";

export interface Container {
  log: Logger;
  store: RecyclingLedgerStore;
  directory: ParticipantDirectory;
  config: SettlementConfigSource;
  valueTransfer: ValueTransfer;
  events: WasteEventSink;
  clock: Clock;
  policy: SettlementPolicy;
  /** Release the database handle, if any. */
  dispose(): void;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container?.dispose();
  _container = null;
}

function createContainer(): Container {
  const env = serverEnv();
  const log = makeLogger({ component: "recycling-engine" });

  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      requireConfirmed: env.SETTLEMENT_REQUIRE_CONFIRMED,
    },
    "container initialized"
  );

  // Environment-based adapter wiring - single source of truth
  const ledgerDb = env.isTestMode ? null : openLedgerDb(env.DATABASE_PATH);
  const store: RecyclingLedgerStore = ledgerDb
    ? new DrizzleRecyclingLedgerStore(ledgerDb)
    : new InMemoryRecyclingLedgerStore();
  const events: WasteEventSink = env.isTestMode
    ? new RecordingEventSink()
    : new PinoWasteEventSink(log);
  const clock = new SystemClock();

  seedSettings(
    store,
    {
      admin: toParticipantId(env.ADMIN_ID),
      collectorPercent: env.COLLECTOR_PERCENT,
      ownerPercent: env.OWNER_PERCENT,
    },
    log
  );

  return {
    log,
    store,
    directory: new StoreParticipantDirectory(store),
    config: new StoreSettlementConfig(store),
    valueTransfer: new LedgerValueTransfer(store, clock),
    events,
    clock,
    policy: { requireConfirmed: env.SETTLEMENT_REQUIRE_CONFIRMED },
    dispose: () => {
      ledgerDb?.sqlite.close();
    },
  };
}
