// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/ports/sqlite-ledger-store`
 * Purpose: Runs the RecyclingLedgerStore contract against the Drizzle adapter on an in-memory SQLite database.
 * Scope: Contract wiring, the schema bootstrap being idempotent, and ledger.sql matching the drizzle table definitions.
 * Side-effects: IO (in-process SQLite, no files)
 * Links: src/adapters/server/ledger/drizzle-ledger-store.adapter.ts
 * @internal
 */

import { readFileSync } from "node:fs";

import * as schema from "@reclaim/db-schema";
import { is } from "drizzle-orm";
import { getTableConfig, SQLiteTable } from "drizzle-orm/sqlite-core";
import { describe, expect, it } from "vitest";

import { DrizzleRecyclingLedgerStore, openLedgerDb } from "@/adapters/server";

import { registerLedgerStoreContract } from "./harness/ledger-store.port.harness";

registerLedgerStoreContract((h) => {
  const ledgerDb = openLedgerDb(":memory:");
  h.cleanup.push(() => ledgerDb.sqlite.close());
  return new DrizzleRecyclingLedgerStore(ledgerDb);
});

describe("openLedgerDb", () => {
  it("can re-apply the schema to an existing database", () => {
    const ledgerDb = openLedgerDb(":memory:");
    const ddl = readFileSync(
      new URL("../../src/adapters/server/db/ledger.sql", import.meta.url),
      "utf8"
    );

    expect(() => ledgerDb.sqlite.exec(ddl)).not.toThrow();
    ledgerDb.sqlite.close();
  });

  it("creates every column and index the drizzle schema declares", () => {
    const ledgerDb = openLedgerDb(":memory:");
    const names = (query: string, ...params: string[]): string[] =>
      ledgerDb.sqlite
        .prepare(query)
        .pluck()
        .all(...params)
        .filter((name): name is string => typeof name === "string");
    const tables = Object.values(schema).filter((value) =>
      is(value, SQLiteTable)
    );
    const indexes = names("SELECT name FROM sqlite_master WHERE type = 'index'");

    expect(tables.length).toBeGreaterThan(0);
    for (const table of tables) {
      const config = getTableConfig(table);
      const columns = names("SELECT name FROM pragma_table_info(?)", config.name);

      expect(columns.sort(), config.name).toEqual(
        config.columns.map((column) => column.name).sort()
      );
      for (const index of config.indexes) {
        expect(indexes, config.name).toContain(index.config.name);
      }
    }
    ledgerDb.sqlite.close();
  });
});
