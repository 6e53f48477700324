// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@reclaim/waste-core/amounts`
 * Purpose: Checked unsigned 64-bit arithmetic over bigint amounts.
 * Scope: Pure functions. Does not perform I/O.
 * Invariants: Every result lies in [0, AMOUNT_MAX]; anything outside throws OverflowError.
 * Side-effects: none
 * @public
 */

import { InvalidInputError, OverflowError } from "./errors";

export const AMOUNT_MAX = 2n ** 64n - 1n;

function inRange(value: bigint): boolean {
  return value >= 0n && value <= AMOUNT_MAX;
}

export function checkedAdd(a: bigint, b: bigint, operation = "add"): bigint {
  const result = a + b;
  if (!inRange(result)) throw new OverflowError(operation);
  return result;
}

export function checkedSub(a: bigint, b: bigint, operation = "sub"): bigint {
  const result = a - b;
  if (!inRange(result)) throw new OverflowError(operation);
  return result;
}

export function checkedMul(a: bigint, b: bigint, operation = "mul"): bigint {
  const result = a * b;
  if (!inRange(result)) throw new OverflowError(operation);
  return result;
}

/** Rejects negative or oversized amounts as caller input. */
export function requireAmount(field: string, value: bigint): bigint {
  if (!inRange(value)) {
    throw new InvalidInputError(field, `must be between 0 and ${AMOUNT_MAX}`);
  }
  return value;
}

export function requirePositiveAmount(field: string, value: bigint): bigint {
  requireAmount(field, value);
  if (value === 0n) {
    throw new InvalidInputError(field, "must be greater than zero");
  }
  return value;
}
