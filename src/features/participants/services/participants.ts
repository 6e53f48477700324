// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/participants/services/participants`
 * Purpose: Participant registration, role and location changes, and deregistration.
 * Scope: Writes participant records read by StoreParticipantDirectory. Does not check capabilities.
 * Invariants:
 * - Raw ids and roles are validated at this edge with parseParticipantId() and parseParticipantRole().
 * - Only a registered participant may move its location.
 * - A deregistered participant keeps its record but resolves to no role.
 * Side-effects: IO (store, logging)
 * @public
 */

import { randomUUID } from "node:crypto";

import type { ParticipantId } from "@reclaim/ids";
import {
  InvalidStateError,
  type Location,
  NotFoundError,
  type Participant,
  type ParticipantRole,
  parseParticipantId,
  parseParticipantRole,
  validateLocation,
} from "@reclaim/waste-core";

import { type LedgerDeps, nowDate } from "@/features/shared/deps";
import { EVENT_NAMES, logEvent } from "@/shared/observability";

export interface RegisterParticipantInput {
  /** Raw id, validated here. */
  id: string;
  /** Raw role name, validated here. */
  role: string;
  name: string;
  location: Location;
}

function loadParticipant(
  deps: Pick<LedgerDeps, "store">,
  id: ParticipantId
): Participant {
  const participant = deps.store.getParticipant(id);
  if (!participant) throw new NotFoundError("Participant", id);
  return participant;
}

export function registerParticipant(
  deps: LedgerDeps,
  input: RegisterParticipantInput
): Participant {
  const id = parseParticipantId(input.id);
  const role = parseParticipantRole(input.role);
  const location = validateLocation(input.location);
  if (deps.store.getParticipant(id)?.isRegistered) {
    throw new InvalidStateError("Participant", id, "is already registered");
  }

  const participant: Participant = {
    id,
    role,
    name: input.name,
    location,
    isRegistered: true,
    registeredAt: nowDate(deps),
  };
  deps.store.transaction(() => deps.store.saveParticipant(participant));
  logEvent(deps.log, EVENT_NAMES.PARTICIPANT_REGISTERED, {
    reqId: randomUUID(),
    participant: id,
    role,
  });
  return participant;
}

export function getParticipant(
  deps: Pick<LedgerDeps, "store">,
  id: ParticipantId
): Participant | null {
  return deps.store.getParticipant(id);
}

export function updateParticipantRole(
  deps: LedgerDeps,
  id: ParticipantId,
  role: ParticipantRole
): Participant {
  const updated: Participant = { ...loadParticipant(deps, id), role };
  deps.store.transaction(() => deps.store.saveParticipant(updated));
  return updated;
}

export function deregisterParticipant(
  deps: LedgerDeps,
  id: ParticipantId
): Participant {
  const updated: Participant = {
    ...loadParticipant(deps, id),
    isRegistered: false,
  };
  deps.store.transaction(() => deps.store.saveParticipant(updated));
  logEvent(deps.log, EVENT_NAMES.PARTICIPANT_DEREGISTERED, {
    reqId: randomUUID(),
    participant: id,
  });
  return updated;
}

export function updateParticipantLocation(
  deps: LedgerDeps,
  id: ParticipantId,
  location: Location
): Participant {
  const current = loadParticipant(deps, id);
  if (!current.isRegistered) {
    throw new InvalidStateError("Participant", id, "is not registered");
  }
  const updated: Participant = {
    ...current,
    location: validateLocation(location),
  };
  deps.store.transaction(() => deps.store.saveParticipant(updated));
  logEvent(deps.log, EVENT_NAMES.PARTICIPANT_LOCATION_UPDATED, {
    reqId: randomUUID(),
    participant: id,
  });
  return updated;
}
