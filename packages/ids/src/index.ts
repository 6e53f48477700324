// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@reclaim/ids`
 * Purpose: Branded participant identity shared by the domain package, the store adapters and the engine surface.
 * Scope: Type definitions and boundary constructors only. Does not look participants up or check roles.
 * Invariants:
 * - toParticipantId() / isParticipantId() are the only ways to obtain a ParticipantId
 * - PARTICIPANT_ID_RE is the single source of truth for id validation
 * - Only edge code (engine callers, store row mappers, test fixtures) should call toParticipantId()
 * Side-effects: none
 * Links: packages/waste-core/src/model.ts
 * @public
 */

import type { Tagged } from "type-fest";

/** 1-64 chars of letters, digits and `:_.-`. Covers account keys and readable test handles alike. */
export const PARTICIPANT_ID_RE = /^[A-Za-z0-9:_.-]{1,64}$/;

/** Branded participant identity (recycler, collector, manufacturer or admin). */
export type ParticipantId = Tagged<string, "ParticipantId">;

export function isParticipantId(raw: string): raw is ParticipantId {
  return PARTICIPANT_ID_RE.test(raw);
}

/** Validate and brand a raw string as ParticipantId. Boundary constructor: call at edges only. */
export function toParticipantId(raw: string): ParticipantId {
  if (!isParticipantId(raw)) {
    throw new Error(`Invalid ParticipantId: ${JSON.stringify(raw)}`);
  }
  return raw;
}
