// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@reclaim/waste-core/errors`
 * Purpose: Domain error classes for the waste lifecycle and settlement engine.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

export class NotFoundError extends Error {
  public readonly code = "NOT_FOUND" as const;
  constructor(
    public readonly entity: string,
    public readonly id: string | number
  ) {
    super(`${entity} ${id} not found`);
    this.name = "NotFoundError";
  }
}

export class UnauthorizedError extends Error {
  public readonly code = "UNAUTHORIZED" as const;
  constructor(
    public readonly actor: string,
    public readonly action: string
  ) {
    super(`${actor} is not allowed to ${action}`);
    this.name = "UnauthorizedError";
  }
}

export class InvalidInputError extends Error {
  public readonly code = "INVALID_INPUT" as const;
  constructor(
    public readonly field: string,
    public readonly reason: string
  ) {
    super(`Invalid ${field}: ${reason}`);
    this.name = "InvalidInputError";
  }
}

export class InvalidStateError extends Error {
  public readonly code = "INVALID_STATE" as const;
  constructor(
    public readonly entity: string,
    public readonly id: string | number,
    public readonly reason: string
  ) {
    super(`${entity} ${id} ${reason}`);
    this.name = "InvalidStateError";
  }
}

export class InsufficientBudgetError extends Error {
  public readonly code = "INSUFFICIENT_BUDGET" as const;
  constructor(
    public readonly incentiveId: number,
    public readonly required: bigint,
    public readonly remaining: bigint
  ) {
    super(
      `Incentive ${incentiveId} has ${remaining} remaining, ${required} required`
    );
    this.name = "InsufficientBudgetError";
  }
}

export class OverflowError extends Error {
  public readonly code = "OVERFLOW" as const;
  constructor(public readonly operation: string) {
    super(`Arithmetic overflow in ${operation}`);
    this.name = "OverflowError";
  }
}

export type EngineError =
  | NotFoundError
  | UnauthorizedError
  | InvalidInputError
  | InvalidStateError
  | InsufficientBudgetError
  | OverflowError;

// Type guards

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof Error && error.name === "NotFoundError";
}

export function isUnauthorizedError(
  error: unknown
): error is UnauthorizedError {
  return error instanceof Error && error.name === "UnauthorizedError";
}

export function isInvalidInputError(
  error: unknown
): error is InvalidInputError {
  return error instanceof Error && error.name === "InvalidInputError";
}

export function isInvalidStateError(
  error: unknown
): error is InvalidStateError {
  return error instanceof Error && error.name === "InvalidStateError";
}

export function isInsufficientBudgetError(
  error: unknown
): error is InsufficientBudgetError {
  return error instanceof Error && error.name === "InsufficientBudgetError";
}

export function isOverflowError(error: unknown): error is OverflowError {
  return error instanceof Error && error.name === "OverflowError";
}

export function isEngineError(error: unknown): error is EngineError {
  return (
    isNotFoundError(error) ||
    isUnauthorizedError(error) ||
    isInvalidInputError(error) ||
    isInvalidStateError(error) ||
    isInsufficientBudgetError(error) ||
    isOverflowError(error)
  );
}
