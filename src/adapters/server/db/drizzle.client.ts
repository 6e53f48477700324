// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/drizzle.client`
 * Purpose: Drizzle database client over better-sqlite3 and schema bootstrap.
 * Scope: Opens the SQLite file, applies ledger.sql, returns the Drizzle instance. Does not handle business logic.
 * Invariants: DDL is idempotent (CREATE ... IF NOT EXISTS); the raw connection is returned for transaction control.
 * Side-effects: IO (opens or creates the database file, creates its directory)
 * Notes: better-sqlite3 is synchronous, matching the synchronous RecyclingLedgerStore port.
 * Links: Used by DrizzleRecyclingLedgerStore and bootstrap/container
 * @internal
 */

import { mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";

import * as schema from "@reclaim/db-schema";
import Sqlite from "better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";

// Schema-aware database type
export type Database = BetterSQLite3Database<typeof schema>;

export interface LedgerDb {
  readonly sqlite: Sqlite.Database;
  readonly db: Database;
}

const IN_MEMORY = ":memory:";

export function openLedgerDb(path: string): LedgerDb {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true });
  }
  const sqlite = new Sqlite(path);
  sqlite.pragma("journal_mode = WAL");
  sqlite.exec(readFileSync(new URL("./ledger.sql", import.meta.url), "utf8"));
  return { sqlite, db: drizzle(sqlite, { schema }) };
}
