// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@reclaim/waste-core/rules`
 * Purpose: Pure lifecycle rules: status modifiability, role capabilities, legal transfer paths, location and percentage validation.
 * Scope: Pure functions and lookup tables. Does not perform I/O or read stored state.
 * Invariants:
 * - ROLE_CAPABILITIES is the only capability table; authorization checks must consult it.
 * - ALLOWED_TRANSFERS is the only role-to-role transition table. MANUFACTURER has no outgoing hop.
 * Side-effects: none
 * @public
 */

import { isParticipantId, type ParticipantId } from "@reclaim/ids";

import { InvalidInputError } from "./errors";
import type {
  Capability,
  Location,
  ParticipantRole,
  WasteCategory,
  WasteStatus,
} from "./model";
import {
  PARTICIPANT_ROLES,
  WASTE_CATEGORIES,
} from "./model";

export const MAX_LATITUDE = 90_000_000;
export const MAX_LONGITUDE = 180_000_000;

export const ROLE_CAPABILITIES: Readonly<
  Record<ParticipantRole, readonly Capability[]>
> = {
  RECYCLER: ["submit", "confirm", "process"],
  COLLECTOR: ["submit", "confirm", "collect"],
  MANUFACTURER: ["submit", "confirm", "manufacture", "create_incentive"],
};

export const ALLOWED_TRANSFERS: Readonly<
  Record<ParticipantRole, readonly ParticipantRole[]>
> = {
  RECYCLER: ["COLLECTOR", "MANUFACTURER"],
  COLLECTOR: ["MANUFACTURER"],
  MANUFACTURER: [],
};

export function roleHasCapability(
  role: ParticipantRole,
  capability: Capability
): boolean {
  return ROLE_CAPABILITIES[role].includes(capability);
}

export function isAllowedTransfer(
  from: ParticipantRole,
  to: ParticipantRole
): boolean {
  return ALLOWED_TRANSFERS[from].includes(to);
}

/** PENDING and PROCESSING may still change; PROCESSED and REJECTED are final. */
export function isModifiableStatus(status: WasteStatus): boolean {
  return status === "PENDING" || status === "PROCESSING";
}

export function isFinalStatus(status: WasteStatus): boolean {
  return !isModifiableStatus(status);
}

export function isPlastic(category: WasteCategory): boolean {
  return category === "PET_PLASTIC" || category === "PLASTIC";
}

export function isBiodegradable(category: WasteCategory): boolean {
  return category === "PAPER";
}

export function isInfinitelyRecyclable(category: WasteCategory): boolean {
  return category === "METAL" || category === "GLASS";
}

export function validateLocation(location: Location): Location {
  const { latitude, longitude } = location;
  if (!Number.isSafeInteger(latitude) || Math.abs(latitude) > MAX_LATITUDE) {
    throw new InvalidInputError(
      "latitude",
      `must be an integer within +/-${MAX_LATITUDE}`
    );
  }
  if (
    !Number.isSafeInteger(longitude) ||
    Math.abs(longitude) > MAX_LONGITUDE
  ) {
    throw new InvalidInputError(
      "longitude",
      `must be an integer within +/-${MAX_LONGITUDE}`
    );
  }
  return { latitude, longitude };
}

function isPercent(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 100;
}

export function validatePercentages(
  collectorPercent: number,
  ownerPercent: number
): void {
  if (!isPercent(collectorPercent)) {
    throw new InvalidInputError(
      "collectorPercent",
      "must be an integer between 0 and 100"
    );
  }
  if (!isPercent(ownerPercent)) {
    throw new InvalidInputError(
      "ownerPercent",
      "must be an integer between 0 and 100"
    );
  }
  if (collectorPercent + ownerPercent > 100) {
    throw new InvalidInputError(
      "percentages",
      `collector ${collectorPercent} + owner ${ownerPercent} exceeds 100`
    );
  }
}

/** Edge parser for caller-supplied ids; raises the domain error instead of a bare Error. */
export function parseParticipantId(
  raw: string,
  field = "participant"
): ParticipantId {
  if (!isParticipantId(raw)) {
    throw new InvalidInputError(field, `malformed id ${JSON.stringify(raw)}`);
  }
  return raw;
}

export function parseWasteCategory(raw: string): WasteCategory {
  const match = WASTE_CATEGORIES.find((c) => c === raw);
  if (match === undefined) {
    throw new InvalidInputError("category", `unknown category ${raw}`);
  }
  return match;
}

export function parseParticipantRole(raw: string): ParticipantRole {
  const match = PARTICIPANT_ROLES.find((r) => r === raw);
  if (match === undefined) {
    throw new InvalidInputError("role", `unknown role ${raw}`);
  }
  return match;
}
