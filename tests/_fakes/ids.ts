// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/ids`
 * Purpose: Deterministic participant identities for unit and contract tests.
 * Scope: Branded ParticipantId fixtures. Does not register anyone (see ledger-deps.ts).
 * Invariants: Uses toParticipantId(), the same path as production edges.
 * Side-effects: none
 * Links: packages/ids/src/index.ts
 * @public
 */

import { type ParticipantId, toParticipantId } from "@reclaim/ids";

export const ADMIN: ParticipantId = toParticipantId("admin");
export const RECYCLER: ParticipantId = toParticipantId("recycler-1");
export const RECYCLER_2: ParticipantId = toParticipantId("recycler-2");
export const COLLECTOR: ParticipantId = toParticipantId("collector-1");
export const COLLECTOR_2: ParticipantId = toParticipantId("collector-2");
export const MANUFACTURER: ParticipantId = toParticipantId("maker-1");
export const MANUFACTURER_2: ParticipantId = toParticipantId("maker-2");
/** Never registered. */
export const STRANGER: ParticipantId = toParticipantId("stranger");

export const ORIGIN = { latitude: 52_370_216, longitude: 4_895_168 } as const;
