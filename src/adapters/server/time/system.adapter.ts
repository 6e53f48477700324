// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/time/system`
 * Purpose: Wall-clock Clock used by the container for every ledger timestamp.
 * Scope: Reads system time. Does not smooth or adjust it.
 * Side-effects: IO (reads system time)
 * Links: Implements Clock port; FakeClock replaces it in tests
 * @internal
 */

import type { Clock } from "@/ports";

export class SystemClock implements Clock {
  now(): string {
    return new Date().toISOString();
  }
}
