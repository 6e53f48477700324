// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/participant-directory`
 * Purpose: Read-only role and capability lookup for authorization decisions.
 * Scope: Interface only. Does not register or mutate participants.
 * Invariants:
 * - Unknown or deregistered participants have no role and no capability.
 * - hasCapability() agrees with ROLE_CAPABILITIES for the participant's current role.
 * Side-effects: none (interface definition only)
 * Links: Implemented by StoreParticipantDirectory, used by features/participants/services/authorize
 * @public
 */

import type { ParticipantId } from "@reclaim/ids";
import type { Capability, ParticipantRole } from "@reclaim/waste-core";

export interface ParticipantDirectory {
  findRole(id: ParticipantId): ParticipantRole | null;
  hasCapability(id: ParticipantId, capability: Capability): boolean;
}
