// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock`
 * Purpose: Time source for submission, transfer, settlement and payment timestamps.
 * Scope: Interface only. Does not convert time zones.
 * Invariants: now() returns an ISO 8601 UTC string; services turn it into a Date with nowDate().
 * Side-effects: none (interface only)
 * Links: src/features/shared/deps.ts, SystemClock, tests/_fakes/fake-clock.ts
 * @public
 */

export interface Clock {
  /** Current instant, ISO 8601. */
  now(): string;
}
