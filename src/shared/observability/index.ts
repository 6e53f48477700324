// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability - event registry, logging, metrics.
 * Scope: Unified entry point for all observability utilities. Does not implement logic.
 * Invariants: No imports from bootstrap or ports.
 * Side-effects: none
 * @public
 */

export type { EventBase, EventName } from "./events";
export { EVENT_NAMES } from "./events";
export type { Logger } from "./server";
export {
  amountForMetric,
  logEvent,
  makeLogger,
  makeNoopLogger,
  metricsRegistry,
  rewardUnitsDistributedTotal,
  settlementsTotal,
  wasteSubmissionsTotal,
  wasteTransfersTotal,
} from "./server";
