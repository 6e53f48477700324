// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@/index`
 * Purpose: Public entry for hosts embedding the recycling engine.
 * Scope: Re-exports the engine factory, container accessors, domain types and error guards.
 * Side-effects: none
 * @public
 */

export {
  type Container,
  getContainer,
  resetContainer,
} from "@/bootstrap/container";
export {
  createRecyclingEngine,
  getRecyclingEngine,
  type RecyclingEngine,
} from "@/bootstrap/engine";
export type { WasteDomainEvent } from "@/ports";
export {
  isParticipantId,
  type ParticipantId,
  toParticipantId,
} from "@reclaim/ids";
export * from "@reclaim/waste-core";
