// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-tools`
 * Purpose: Barrel export for course tool contracts, schema compilation and catalog.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export type {
  CourseCatalogCapability,
  CourseChunkMetadata,
  CourseLesson,
  CourseOutline,
  CourseSearchParams,
  CourseSearchResult,
} from "./capabilities";
export {
  COURSE_TOOL_NAMES,
  type CourseToolDeps,
  type CourseToolName,
  createCourseToolRuntimes,
} from "./catalog";
export { contractToRuntime, toBoundToolRuntime } from "./runtime-adapter";
export { CitationSchema, ToolOutputSchema, toToolSpec } from "./schema";
export {
  COURSE_OUTLINE_NAME,
  type CourseOutlineInput,
  CourseOutlineInputSchema,
  courseOutlineContract,
  createCourseOutlineImplementation,
  formatOutline,
} from "./tools/course-outline";
export {
  COURSE_SEARCH_NAME,
  type CourseSearchInput,
  CourseSearchInputSchema,
  courseSearchContract,
  createCourseSearchImplementation,
  emptyResultMessage,
} from "./tools/course-search";
export type { BoundTool, ToolContract, ToolImplementation } from "./types";
