// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for server runtime; provides lazy server environment access.
 * Invariants: All env vars validated on first access; fails fast on invalid env; APP_ENV=test is refused when NODE_ENV=production.
 * Side-effects: process.env
 * Notes: APP_ENV for adapter wiring; SERVICE_NAME for observability; LLM and retrieval config; conversation limits.
 *        Lazy init keeps module import free of validation.
 * Links: invariants.ts, bootstrap/container.ts
 * @public
 */

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

const serverSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),

    // Application environment (controls adapter wiring)
    APP_ENV: z.enum(["test", "production"]),

    // Service identity for observability
    SERVICE_NAME: z.string().default("app"),
    PINO_LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),

    // LLM gateway - app only needs proxy access, not provider keys
    LITELLM_BASE_URL: z
      .string()
      .url()
      .default(
        process.env.NODE_ENV === "production"
          ? "http://litellm:4000"
          : "http://localhost:4000"
      ),
    LITELLM_MASTER_KEY: z.string().min(1).optional(),
    DEFAULT_MODEL: z.string().default("gpt-4o-mini"),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(800),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

    // Retrieval service (vector search over course chunks)
    COURSE_CATALOG_URL: z.string().url().optional(),
    COURSE_CATALOG_API_KEY: z.string().min(1).optional(),
    COURSE_CATALOG_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    COURSE_SEARCH_MAX_RESULTS: z.coerce.number().int().positive().default(5),

    // Conversation limits
    MAX_HISTORY: z.coerce.number().int().min(0).default(2),
    MAX_TOOL_ROUNDS: z.coerce.number().int().min(0).default(2),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === "production" && env.APP_ENV === "test") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["APP_ENV"],
        message: "APP_ENV=test is not allowed when NODE_ENV=production",
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

          // Treat all invalid_type as missing (avoids any casting)
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

export type { ServerEnv };
