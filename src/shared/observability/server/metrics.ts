// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/metrics`
 * Purpose: Prometheus metrics registry and metric definitions for the recycling engine.
 * Scope: Shared observability singleton. Provides metrics registry and counters. Does not implement scrape endpoints.
 * Invariants: Single registry per process via globalThis; labels always low-cardinality (no participant ids).
 * Side-effects: global (module-scoped registry via globalThis)
 * Notes: Uses getOrCreate pattern to prevent duplicate registration errors across test reloads.
 * Links: Consumed by feature services.
 * @public
 */

import type { Counter, Registry } from "prom-client";
import client from "prom-client";

// Singleton via globalThis to survive test reloads
const globalForMetrics = globalThis as typeof globalThis & {
  metricsRegistry?: Registry;
  metricsInitialized?: boolean;
};

export const metricsRegistry: Registry =
  globalForMetrics.metricsRegistry ?? new client.Registry();

if (!globalForMetrics.metricsInitialized) {
  globalForMetrics.metricsRegistry = metricsRegistry;
  globalForMetrics.metricsInitialized = true;

  metricsRegistry.setDefaultLabels({
    app: "recycling-ledger",
    // biome-ignore lint/style/noProcessEnv: Module-level init runs before serverEnv() available
    env: process.env.APP_ENV ?? "local",
  });
  client.collectDefaultMetrics({ register: metricsRegistry });
}

function getOrCreateCounter<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[] = [] as readonly T[]
): Counter<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Counter<T>;
  return new client.Counter({
    name,
    help,
    labelNames: labelNames as T[],
    registers: [metricsRegistry],
  });
}

// =============================================================================
// Waste Lifecycle Metrics
// =============================================================================

export const wasteSubmissionsTotal = getOrCreateCounter(
  "waste_submissions_total",
  "Waste units registered, by category",
  ["category"] as const
);

export const wasteTransfersTotal = getOrCreateCounter(
  "waste_transfers_total",
  "Ownership transfers recorded, single hop or bulk",
  ["kind"] as const
);

// =============================================================================
// Settlement Metrics
// =============================================================================

export const settlementsTotal = getOrCreateCounter(
  "incentive_settlements_total",
  "Settlement attempts by outcome (ok or engine error code)",
  ["outcome"] as const
);

export const rewardUnitsDistributedTotal = getOrCreateCounter(
  "reward_units_distributed_total",
  "Reward units paid out across all settlements (per-settlement amounts clamped to 2^53-1)",
  ["category"] as const
);

const MAX_METRIC_AMOUNT = BigInt(Number.MAX_SAFE_INTEGER);

/** Counter increment for a bigint amount; clamps at Number.MAX_SAFE_INTEGER. */
export function amountForMetric(amount: bigint): number {
  return Number(amount > MAX_METRIC_AMOUNT ? MAX_METRIC_AMOUNT : amount);
}
