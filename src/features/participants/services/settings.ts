// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/participants/services/settings`
 * Purpose: Administrative settings: reward split percentages and the admin identity.
 * Scope: Admin-only writes to the settings record, plus first-start seeding.
 * Invariants: collectorPercent + ownerPercent <= 100, each an integer in [0, 100].
 * Side-effects: IO (store, logging)
 * Links: src/adapters/server/config/store-settlement-config.adapter.ts reads what this writes
 * @public
 */

import { randomUUID } from "node:crypto";

import type { ParticipantId } from "@reclaim/ids";
import { type LedgerSettings, validatePercentages } from "@reclaim/waste-core";

import { requireAdmin } from "@/features/participants/services/authorize";
import type { LedgerDeps } from "@/features/shared/deps";
import type { RecyclingLedgerStore } from "@/ports";
import { EVENT_NAMES, type Logger, logEvent } from "@/shared/observability";

type SettingsDeps = Pick<LedgerDeps, "store" | "config" | "log">;

function save(deps: SettingsDeps, settings: LedgerSettings): LedgerSettings {
  deps.store.transaction(() => deps.store.saveSettings(settings));
  logEvent(deps.log, EVENT_NAMES.SETTINGS_UPDATED, {
    reqId: randomUUID(),
    admin: settings.admin,
    collectorPercent: settings.collectorPercent,
    ownerPercent: settings.ownerPercent,
  });
  return settings;
}

export function getSettings(
  deps: Pick<LedgerDeps, "config">
): LedgerSettings {
  return deps.config.getSettings();
}

export function setPercentages(
  deps: SettingsDeps,
  caller: ParticipantId,
  collectorPercent: number,
  ownerPercent: number
): LedgerSettings {
  requireAdmin(deps.config, caller, "change reward percentages");
  validatePercentages(collectorPercent, ownerPercent);
  return save(deps, {
    ...deps.config.getSettings(),
    collectorPercent,
    ownerPercent,
  });
}

export function setCollectorPercent(
  deps: SettingsDeps,
  caller: ParticipantId,
  collectorPercent: number
): LedgerSettings {
  const { ownerPercent } = deps.config.getSettings();
  return setPercentages(deps, caller, collectorPercent, ownerPercent);
}

export function setOwnerPercent(
  deps: SettingsDeps,
  caller: ParticipantId,
  ownerPercent: number
): LedgerSettings {
  const { collectorPercent } = deps.config.getSettings();
  return setPercentages(deps, caller, collectorPercent, ownerPercent);
}

export function transferAdmin(
  deps: SettingsDeps,
  caller: ParticipantId,
  newAdmin: ParticipantId
): LedgerSettings {
  requireAdmin(deps.config, caller, "transfer admin rights");
  return save(deps, { ...deps.config.getSettings(), admin: newAdmin });
}

/** Write `defaults` when the store holds no settings yet. Returns what is stored afterwards. */
export function seedSettings(
  store: RecyclingLedgerStore,
  defaults: LedgerSettings,
  log: Logger
): LedgerSettings {
  const existing = store.getSettings();
  if (existing) return existing;

  validatePercentages(defaults.collectorPercent, defaults.ownerPercent);
  store.transaction(() => store.saveSettings(defaults));
  logEvent(log, EVENT_NAMES.ENGINE_SETTINGS_SEEDED, {
    reqId: randomUUID(),
    admin: defaults.admin,
    collectorPercent: defaults.collectorPercent,
    ownerPercent: defaults.ownerPercent,
  });
  return defaults;
}
