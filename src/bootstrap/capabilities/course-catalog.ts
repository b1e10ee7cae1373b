// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/capabilities/course-catalog`
 * Purpose: Factory for CourseCatalogCapability - bridges ai-tools capability interface to the retrieval adapters.
 * Scope: Creates CourseCatalogCapability from server environment. Does not implement transport.
 * Invariants:
 *   - NO_SECRETS_IN_CONTEXT: retrieval API key resolved from env, never passed to tools
 * Side-effects: none (factory only)
 * Links: Called by bootstrap container; consumed by the course search and outline tools.
 *        Uses COURSE_CATALOG_URL, COURSE_CATALOG_API_KEY.
 * @internal
 */

import type { CourseCatalogCapability } from "@coursemate/ai-tools";

import { HttpCourseCatalogAdapter } from "@/adapters/server";
import { FakeCourseCatalogAdapter } from "@/adapters/test";
import type { ServerEnv } from "@/shared/env";

const NOT_CONFIGURED =
  "CourseCatalogCapability not configured. Set COURSE_CATALOG_URL environment variable.";

/**
 * Stub CourseCatalogCapability that throws when not configured.
 * Used when COURSE_CATALOG_URL is not set.
 */
export const stubCourseCatalogCapability: CourseCatalogCapability = {
  search: async () => {
    throw new Error(NOT_CONFIGURED);
  },
  getCourseOutline: async () => {
    throw new Error(NOT_CONFIGURED);
  },
  getLessonLink: async () => {
    throw new Error(NOT_CONFIGURED);
  },
};

/**
 * Create CourseCatalogCapability from server environment.
 *
 * - APP_ENV=test: FakeCourseCatalogAdapter
 * - Configured: HttpCourseCatalogAdapter (real retrieval service)
 * - Not configured: stub that throws on use
 */
export function createCourseCatalogCapability(
  env: ServerEnv
): CourseCatalogCapability {
  if (env.isTestMode) {
    return new FakeCourseCatalogAdapter();
  }

  if (!env.COURSE_CATALOG_URL) {
    return stubCourseCatalogCapability;
  }

  return new HttpCourseCatalogAdapter({
    baseUrl: env.COURSE_CATALOG_URL,
    apiKey: env.COURSE_CATALOG_API_KEY,
    timeoutMs: env.COURSE_CATALOG_TIMEOUT_MS,
    maxResults: env.COURSE_SEARCH_MAX_RESULTS,
  });
}
