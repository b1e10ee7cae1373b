// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-tools/catalog`
 * Purpose: Canonical list of course tools, bound to a catalog capability.
 * Scope: Exports tool names and the runtime factory. Does NOT register tools (bootstrap does).
 * Invariants:
 *   - TOOL_CATALOG_IS_CANONICAL: Single source of truth for which tools exist
 *   - Order is stable: search first, outline second
 * Side-effects: none
 * @public
 */

import type { BoundToolRuntime } from "@coursemate/ai-core";

import type { CourseCatalogCapability } from "./capabilities/course-catalog";
import { toBoundToolRuntime } from "./runtime-adapter";
import {
  COURSE_OUTLINE_NAME,
  createCourseOutlineBoundTool,
} from "./tools/course-outline";
import {
  COURSE_SEARCH_NAME,
  createCourseSearchBoundTool,
} from "./tools/course-search";

export const COURSE_TOOL_NAMES = [
  COURSE_SEARCH_NAME,
  COURSE_OUTLINE_NAME,
] as const;

export type CourseToolName = (typeof COURSE_TOOL_NAMES)[number];

export interface CourseToolDeps {
  courseCatalog: CourseCatalogCapability;
}

/**
 * Build executable runtimes for every course tool.
 *
 * To add a tool: create contract + implementation in tools/<name>.ts,
 * then add it here and to COURSE_TOOL_NAMES.
 */
export function createCourseToolRuntimes(
  deps: CourseToolDeps
): BoundToolRuntime[] {
  return [
    toBoundToolRuntime(createCourseSearchBoundTool(deps)),
    toBoundToolRuntime(createCourseOutlineBoundTool(deps)),
  ];
}
