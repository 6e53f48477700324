// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/setup`
 * Purpose: Global test environment setup.
 * Scope: Sets the env vars the engine validates. Does NOT mock specific services or ports.
 * Invariants: APP_ENV=test everywhere, so the container wires in-memory adapters.
 * Side-effects: process.env
 * Links: vitest.config.mts
 * @public
 */

import { afterEach, beforeAll } from "vitest";

import { resetContainer } from "@/bootstrap/container";
import { resetServerEnv } from "@/shared/env";

/**
 * Unit tests: no I/O, no time, no RNG (use _fakes).
 * Contract tests: port compliance verification against every adapter.
 */
beforeAll(() => {
  Object.assign(process.env, {
    NODE_ENV: "test",
    APP_ENV: "test",
    ADMIN_ID: "admin",
  });
});

afterEach(() => {
  resetContainer();
  resetServerEnv();
});
