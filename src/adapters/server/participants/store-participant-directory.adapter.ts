// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/participants/store-participant-directory`
 * Purpose: ParticipantDirectory backed by participant records in the ledger store.
 * Scope: Role and capability lookup. Does not register participants.
 * Invariants: Deregistered participants resolve to no role.
 * Side-effects: IO (store reads)
 * Links: Implements ParticipantDirectory port
 * @public
 */

import type { ParticipantId } from "@reclaim/ids";
import {
  type Capability,
  type ParticipantRole,
  roleHasCapability,
} from "@reclaim/waste-core";

import type { ParticipantDirectory, RecyclingLedgerStore } from "@/ports";

export class StoreParticipantDirectory implements ParticipantDirectory {
  constructor(private readonly store: RecyclingLedgerStore) {}

  findRole(id: ParticipantId): ParticipantRole | null {
    const participant = this.store.getParticipant(id);
    if (!participant?.isRegistered) return null;
    return participant.role;
  }

  hasCapability(id: ParticipantId, capability: Capability): boolean {
    const role = this.findRole(id);
    return role !== null && roleHasCapability(role, capability);
  }
}
