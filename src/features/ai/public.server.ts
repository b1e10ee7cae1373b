// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/public.server`
 * Purpose: Server-only exports for AI feature.
 * Scope: Re-exports the query service, tool loop and tool-definition mapper. Does not implement logic.
 * Invariants: Named exports only
 * Side-effects: none
 * Notes: Depends on prom-client through observability; server use only.
 * Links: Part of hexagonal architecture boundary enforcement
 * @public
 */

export {
  executeToolLoopGraph,
  TOOL_LOOP_TEMPERATURE,
  type ToolLoopExit,
  type ToolLoopGraphDeps,
  type ToolLoopGraphInput,
  type ToolLoopGraphResult,
} from "./graphs/tool-loop.graph";
export {
  type CourseQueryConfig,
  type CourseQueryDeps,
  type CourseQueryResult,
  type CourseQueryRunOptions,
  type CourseQueryService,
  createCourseQueryService,
} from "./services/course-query";
export { toLlmToolDefinitions } from "./tool-definitions";
