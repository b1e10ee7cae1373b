// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for application composition root with environment-based adapter selection.
 * Scope: Wire adapters to ports and build the course query service. Does not handle request-scoped lifecycle.
 * Invariants: All ports wired; single container instance per process; tool registry read-only after creation.
 * Side-effects: IO (initializes logger and emits startup log on first access)
 * Notes: Uses serverEnv.isTestMode (APP_ENV=test) to wire FakeLlmAdapter and FakeCourseCatalogAdapter.
 * Links: Entry points resolve courseQuery / sessionHistory from here.
 * @public
 */

import type { StaticToolSource } from "@coursemate/ai-core";
import type { Logger } from "pino";

import { InMemorySessionAdapter, LiteLlmAdapter } from "@/adapters/server";
import { FakeLlmAdapter } from "@/adapters/test";
import {
  type CourseQueryConfig,
  type CourseQueryService,
  createCourseQueryService,
} from "@/features/ai/public.server";
import type { LlmService, SessionHistoryPort } from "@/ports";
import { serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";

import { createCourseToolSource } from "./ai/tool-source.factory";
import { createCourseCatalogCapability } from "./capabilities/course-catalog";

export interface Container {
  log: Logger;
  config: CourseQueryConfig;
  llmService: LlmService;
  sessionHistory: SessionHistoryPort;
  toolSource: StaticToolSource;
  courseQuery: CourseQueryService;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

function createContainer(): Container {
  const env = serverEnv();
  const log = makeLogger({ component: "container" });

  // Environment-based adapter wiring - single source of truth
  const llmService: LlmService = env.isTestMode
    ? new FakeLlmAdapter()
    : new LiteLlmAdapter();

  const courseCatalog = createCourseCatalogCapability(env);
  const toolSource = createCourseToolSource(courseCatalog);
  const sessionHistory = new InMemorySessionAdapter({
    capacity: env.MAX_HISTORY,
  });

  const config: CourseQueryConfig = {
    model: env.DEFAULT_MODEL,
    maxTokens: env.LLM_MAX_TOKENS,
    maxRounds: env.MAX_TOOL_ROUNDS,
  };

  // Startup log - confirm config (no URLs/secrets)
  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      model: config.model,
      tools: toolSource.getToolIds(),
      catalogConfigured: env.isTestMode || !!env.COURSE_CATALOG_URL,
      maxHistory: env.MAX_HISTORY,
      maxRounds: config.maxRounds,
    },
    "container initialized"
  );

  return {
    log,
    config,
    llmService,
    sessionHistory,
    toolSource,
    courseQuery: createCourseQueryService({
      llmService,
      sessionHistory,
      toolSource,
      log,
      config,
    }),
  };
}
