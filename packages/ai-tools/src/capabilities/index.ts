// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-tools/capabilities`
 * Purpose: Barrel export for capability interfaces.
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
} from "./course-catalog";
