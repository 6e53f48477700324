// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Verifies server env parsing: defaults, settlement policy flag, percentage bounds and missing/invalid classification.
 * Scope: Covers the Zod schema and EnvValidationError meta. Does NOT test adapter wiring (see bootstrap tests).
 * Invariants: process.env restored and the cached env dropped between tests.
 * Side-effects: process.env
 * Links: src/shared/env/server.ts
 * @public
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { EnvValidationError, resetServerEnv, serverEnv } from "@/shared/env";

const ORIGINAL_ENV = { ...process.env };

function setEnv(vars: Record<string, string>): void {
  process.env = { ...ORIGINAL_ENV };
  for (const key of [
    "APP_ENV",
    "ADMIN_ID",
    "COLLECTOR_PERCENT",
    "OWNER_PERCENT",
    "SETTLEMENT_REQUIRE_CONFIRMED",
    "DATABASE_PATH",
    "SERVICE_NAME",
    "PINO_LOG_LEVEL",
  ]) {
    delete process.env[key];
  }
  Object.assign(process.env, { NODE_ENV: "test" }, vars);
}

function captureEnvError(): EnvValidationError {
  try {
    serverEnv();
  } catch (error) {
    if (error instanceof EnvValidationError) return error;
    throw error;
  }
  throw new Error("expected serverEnv() to throw");
}

beforeEach(() => {
  resetServerEnv();
});

afterEach(() => {
  process.env = ORIGINAL_ENV;
});

describe("serverEnv", () => {
  it("applies defaults to a minimal env", () => {
    setEnv({ APP_ENV: "test", ADMIN_ID: "admin" });

    const env = serverEnv();

    expect(env.SERVICE_NAME).toBe("recycling-ledger");
    expect(env.PINO_LOG_LEVEL).toBe("info");
    expect(env.DATABASE_PATH).toBe("./data/ledger.db");
    expect(env.COLLECTOR_PERCENT).toBe(5);
    expect(env.OWNER_PERCENT).toBe(50);
    expect(env.SETTLEMENT_REQUIRE_CONFIRMED).toBe(false);
    expect(env.isTestMode).toBe(true);
    expect(env.isTest).toBe(true);
  });

  it("coerces percentages and the confirmation policy", () => {
    setEnv({
      APP_ENV: "production",
      ADMIN_ID: "GADMIN:ops",
      COLLECTOR_PERCENT: "10",
      OWNER_PERCENT: "40",
      SETTLEMENT_REQUIRE_CONFIRMED: "true",
    });

    const env = serverEnv();

    expect(env.COLLECTOR_PERCENT).toBe(10);
    expect(env.OWNER_PERCENT).toBe(40);
    expect(env.SETTLEMENT_REQUIRE_CONFIRMED).toBe(true);
    expect(env.isTestMode).toBe(false);
  });

  it("caches until reset", () => {
    setEnv({ APP_ENV: "test", ADMIN_ID: "admin" });
    const first = serverEnv();
    process.env.ADMIN_ID = "someone-else";

    expect(serverEnv()).toBe(first);
    resetServerEnv();
    expect(serverEnv().ADMIN_ID).toBe("someone-else");
  });

  it("reports absent required vars as missing", () => {
    setEnv({});

    const error = captureEnvError();

    expect(error.meta.code).toBe("INVALID_ENV");
    expect([...error.meta.missing].sort()).toEqual(["ADMIN_ID", "APP_ENV"]);
    expect(error.meta.invalid).toEqual([]);
  });

  it("reports malformed values as invalid", () => {
    setEnv({
      APP_ENV: "staging",
      ADMIN_ID: "not an id",
      OWNER_PERCENT: "150",
    });

    const error = captureEnvError();

    expect([...error.meta.invalid].sort()).toEqual([
      "ADMIN_ID",
      "APP_ENV",
      "OWNER_PERCENT",
    ]);
    expect(error.meta.missing).toEqual([]);
  });

  it("rejects percentages that sum above 100", () => {
    setEnv({
      APP_ENV: "test",
      ADMIN_ID: "admin",
      COLLECTOR_PERCENT: "60",
      OWNER_PERCENT: "50",
    });

    expect(captureEnvError().meta.invalid).toEqual(["COLLECTOR_PERCENT"]);
  });
});
