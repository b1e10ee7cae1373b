// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-tools/capabilities/course-catalog`
 * Purpose: Retrieval capability interface the course tools delegate to.
 * Scope: Defines CourseCatalogCapability (semantic search over lesson chunks, course outlines, lesson links). Does NOT implement transport.
 * Invariants:
 *   - Course-name resolution (fuzzy/partial matching) belongs to the implementation
 *   - search() reports store-level failures in `error` rather than throwing
 * Side-effects: none (interface only)
 * @public
 */

/**
 * Parameters for a content search.
 */
export interface CourseSearchParams {
  query: string;
  /** Course title or partial title to filter by */
  courseName?: string | undefined;
  lessonNumber?: number | undefined;
}

/**
 * Metadata stored alongside each chunk.
 */
export interface CourseChunkMetadata {
  readonly course_title?: string | undefined;
  readonly lesson_number?: number | null | undefined;
}

/**
 * Result of a content search. `documents[i]` pairs with `metadata[i]`.
 */
export interface CourseSearchResult {
  readonly documents: readonly string[];
  readonly metadata: readonly CourseChunkMetadata[];
  /** Set when the search could not run (unknown course, store failure) */
  readonly error?: string | undefined;
}

export interface CourseLesson {
  readonly lessonNumber: number;
  readonly title: string;
  readonly lessonLink?: string | undefined;
}

export interface CourseOutline {
  readonly title: string;
  readonly courseLink?: string | undefined;
  readonly instructor?: string | undefined;
  readonly lessons: readonly CourseLesson[];
}

/**
 * Course retrieval capability for AI tools.
 */
export interface CourseCatalogCapability {
  search(params: CourseSearchParams): Promise<CourseSearchResult>;

  /**
   * Outline of the course best matching `courseName`.
   * @returns undefined when no course matches
   */
  getCourseOutline(courseName: string): Promise<CourseOutline | undefined>;

  getLessonLink(
    courseTitle: string,
    lessonNumber: number
  ): Promise<string | undefined>;
}
