// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/capabilities/course-catalog`
 * Purpose: Verifies catalog capability selection from env.
 * Scope: Tests createCourseCatalogCapability() branches and the unconfigured stub. Does NOT make HTTP calls.
 * Invariants: Test mode always wins; missing URL yields the throwing stub.
 * Side-effects: none
 * Links: src/bootstrap/capabilities/course-catalog.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { HttpCourseCatalogAdapter } from "@/adapters/server";
import { FakeCourseCatalogAdapter } from "@/adapters/test";
import {
  createCourseCatalogCapability,
  stubCourseCatalogCapability,
} from "@/bootstrap/capabilities/course-catalog";
import type { ServerEnv } from "@/shared/env";

function makeEnv(overrides: Partial<ServerEnv> = {}): ServerEnv {
  return {
    NODE_ENV: "test",
    APP_ENV: "production",
    SERVICE_NAME: "app",
    PINO_LOG_LEVEL: "info",
    LITELLM_BASE_URL: "http://localhost:4000",
    DEFAULT_MODEL: "gpt-4o-mini",
    LLM_MAX_TOKENS: 800,
    LLM_TIMEOUT_MS: 30_000,
    COURSE_CATALOG_TIMEOUT_MS: 10_000,
    COURSE_SEARCH_MAX_RESULTS: 5,
    MAX_HISTORY: 2,
    MAX_TOOL_ROUNDS: 2,
    isDev: false,
    isTest: true,
    isProd: false,
    isTestMode: false,
    ...overrides,
  };
}

describe("createCourseCatalogCapability", () => {
  it("uses the fake catalog in test mode", () => {
    const capability = createCourseCatalogCapability(
      makeEnv({
        APP_ENV: "test",
        isTestMode: true,
        COURSE_CATALOG_URL: "https://catalog.test",
      })
    );

    expect(capability).toBeInstanceOf(FakeCourseCatalogAdapter);
  });

  it("uses the HTTP adapter when a catalog URL is set", () => {
    const capability = createCourseCatalogCapability(
      makeEnv({ COURSE_CATALOG_URL: "https://catalog.test" })
    );

    expect(capability).toBeInstanceOf(HttpCourseCatalogAdapter);
  });

  it("falls back to the stub without a catalog URL", async () => {
    const capability = createCourseCatalogCapability(makeEnv());

    expect(capability).toBe(stubCourseCatalogCapability);
    await expect(capability.search({ query: "python" })).rejects.toThrow(
      "CourseCatalogCapability not configured. Set COURSE_CATALOG_URL environment variable."
    );
    await expect(capability.getCourseOutline("Python")).rejects.toThrow(
      "not configured"
    );
  });
});
