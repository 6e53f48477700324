// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db`
 * Purpose: Database adapter entry point for server-side database access.
 * Scope: Re-exports database client and types. Does not contain implementation logic.
 * Side-effects: none (re-exports only)
 * Links: Used by other adapters and bootstrap
 * @public
 */

export { type Database, type LedgerDb, openLedgerDb } from "./drizzle.client";
