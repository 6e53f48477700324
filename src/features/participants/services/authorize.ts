// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/participants/services/authorize`
 * Purpose: Central authorization predicates: capability checks, admin checks and legal transfer routes.
 * Scope: Read-only checks against ParticipantDirectory and SettlementConfigSource. Throws UnauthorizedError; never mutates.
 * Invariants: Every capability decision in the engine goes through requireCapability(); every role-path decision through isValidTransfer().
 * Side-effects: IO (directory and config reads)
 * Links: packages/waste-core/src/rules.ts (ROLE_CAPABILITIES, ALLOWED_TRANSFERS)
 * @public
 */

import type { ParticipantId } from "@reclaim/ids";
import {
  type Capability,
  isAllowedTransfer,
  UnauthorizedError,
} from "@reclaim/waste-core";

import type { ParticipantDirectory, SettlementConfigSource } from "@/ports";

export function requireCapability(
  directory: ParticipantDirectory,
  actor: ParticipantId,
  capability: Capability
): void {
  if (!directory.hasCapability(actor, capability)) {
    throw new UnauthorizedError(actor, capability);
  }
}

export function requireAdmin(
  config: SettlementConfigSource,
  caller: ParticipantId,
  action: string
): void {
  if (config.getSettings().admin !== caller) {
    throw new UnauthorizedError(caller, action);
  }
}

/** Both parties registered and the role pair listed in ALLOWED_TRANSFERS. */
export function isValidTransfer(
  directory: ParticipantDirectory,
  from: ParticipantId,
  to: ParticipantId
): boolean {
  const fromRole = directory.findRole(from);
  const toRole = directory.findRole(to);
  if (fromRole === null || toRole === null) return false;
  return isAllowedTransfer(fromRole, toRole);
}

export function requireTransferRoute(
  directory: ParticipantDirectory,
  from: ParticipantId,
  to: ParticipantId
): void {
  if (!isValidTransfer(directory, from, to)) {
    throw new UnauthorizedError(from, `transfer waste to ${to}`);
  }
}
