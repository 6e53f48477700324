// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the engine runtime; provides lazy environment access. Does not read stored settings.
 * Invariants: All env vars validated on first access; provides boolean flags for runtime and test modes; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: APP_ENV selects adapter wiring; ADMIN_ID and percentages only seed settings on first start.
 *        Lazy init keeps module import free of validation.
 * Links: src/bootstrap/container.ts
 * @public
 */

import { PARTICIPANT_ID_RE } from "@reclaim/ids";
import { ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const percent = z.coerce.number().int().min(0).max(100);

const serverSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),

    // Application environment (controls adapter wiring)
    APP_ENV: z.enum(["test", "production"]),

    // Service identity for observability
    SERVICE_NAME: z.string().default("recycling-ledger"),
    PINO_LOG_LEVEL: z
      .enum(["trace", "debug", "info", "warn", "error"])
      .default("info"),

    // SQLite file for APP_ENV=production
    DATABASE_PATH: z.string().min(1).default("./data/ledger.db"),

    // Settings seed
    ADMIN_ID: z.string().regex(PARTICIPANT_ID_RE),
    COLLECTOR_PERCENT: percent.default(5),
    OWNER_PERCENT: percent.default(50),

    SETTLEMENT_REQUIRE_CONFIRMED: z
      .enum(["true", "false"])
      .default("false")
      .transform((v) => v === "true"),
  })
  .superRefine((env, ctx) => {
    if (env.COLLECTOR_PERCENT + env.OWNER_PERCENT > 100) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COLLECTOR_PERCENT"],
        message: "COLLECTOR_PERCENT + OWNER_PERCENT must not exceed 100",
      });
    }
  });

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

let ENV: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);
      ENV = {
        ...parsed,
        isDev: parsed.NODE_ENV === "development",
        isTest: parsed.NODE_ENV === "test",
        isProd: parsed.NODE_ENV === "production",
        isTestMode: parsed.APP_ENV === "test",
      };
    } catch (error) {
      if (error instanceof ZodError) {
        const missing = new Set<string>();
        const invalid = new Set<string>();

        for (const issue of error.issues) {
          const key = issue.path[0]?.toString();
          if (!key) continue;

          /*
           * Treat all invalid_type as missing (avoids any casting)
           */
          if (issue.code === "invalid_type") {
            missing.add(key);
          } else {
            invalid.add(key);
          }
        }

        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: [...missing],
          invalid: [...invalid],
        });
      }

      throw error;
    }
  }
  return ENV;
}

/** Drop the cached env so the next serverEnv() re-reads process.env. Tests only. */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };
