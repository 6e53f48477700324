// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@reclaim/waste-core`
 * Purpose: Pure domain model, rules and reward math for the waste lifecycle and settlement engine.
 * Scope: Re-exports only. Does not perform I/O.
 * Side-effects: none
 * @public
 */

export {
  AMOUNT_MAX,
  checkedAdd,
  checkedMul,
  checkedSub,
  requireAmount,
  requirePositiveAmount,
} from "./amounts";
export type { EngineError } from "./errors";
export {
  InsufficientBudgetError,
  InvalidInputError,
  InvalidStateError,
  isEngineError,
  isInsufficientBudgetError,
  isInvalidInputError,
  isInvalidStateError,
  isNotFoundError,
  isOverflowError,
  isUnauthorizedError,
  NotFoundError,
  OverflowError,
  UnauthorizedError,
} from "./errors";
export type {
  Capability,
  IdSpace,
  IncentiveProgram,
  LedgerSettings,
  Location,
  Participant,
  ParticipantRole,
  ParticipantStats,
  PayoutRole,
  SettlementPayout,
  SettlementReceipt,
  SupplyChainStats,
  TransferRecord,
  WasteCategory,
  WasteStatus,
  WasteUnit,
} from "./model";
export {
  CAPABILITIES,
  ID_SPACES,
  PARTICIPANT_ROLES,
  WASTE_CATEGORIES,
  WASTE_STATUSES,
} from "./model";
export { pickBestIncentive, rankActiveIncentives } from "./ranking";
export type { PayoutPlanInput } from "./rewards";
export {
  computeTotalReward,
  debitBudget,
  percentShare,
  planPayouts,
  previewReward,
  rebudget,
} from "./rewards";
export {
  ALLOWED_TRANSFERS,
  isAllowedTransfer,
  isBiodegradable,
  isFinalStatus,
  isInfinitelyRecyclable,
  isModifiableStatus,
  isPlastic,
  MAX_LATITUDE,
  MAX_LONGITUDE,
  parseParticipantId,
  parseParticipantRole,
  parseWasteCategory,
  ROLE_CAPABILITIES,
  roleHasCapability,
  validateLocation,
  validatePercentages,
} from "./rules";
export type { RecyclingLedgerStore, TokenTransfer } from "./store";
