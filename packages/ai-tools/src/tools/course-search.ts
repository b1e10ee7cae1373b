// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-tools/tools/course-search`
 * Purpose: AI tool for semantic search over course lesson content.
 * Scope: Formats retrieval hits as model-readable blocks and collects their citations. Does NOT implement transport.
 * Invariants:
 *   - Name is `search_course_content`
 *   - Never throws: search failures become "Search error: …" text
 *   - A failed lesson-link lookup drops only that citation's url, never the hits
 *   - Empty results produce the "No relevant content found…" sentinel, naming the filters used
 * Side-effects: IO (via CourseCatalogCapability)
 * @public
 */

import type { Citation, ToolOutput } from "@coursemate/ai-core";
import { z } from "zod";

import type {
  CourseCatalogCapability,
  CourseSearchParams,
} from "../capabilities/course-catalog";
import type { BoundTool, ToolContract, ToolImplementation } from "../types";

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const CourseSearchInputSchema = z.object({
  query: z.string().min(1).describe("What to search for in the course content"),
  course_name: z
    .string()
    .min(1)
    .optional()
    .describe("Course title; partial matches work (e.g. 'MCP', 'Intro')"),
  lesson_number: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe("Lesson number to search within (e.g. 1, 2, 3)"),
});
export type CourseSearchInput = z.infer<typeof CourseSearchInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Contract
// ─────────────────────────────────────────────────────────────────────────────

export const COURSE_SEARCH_NAME = "search_course_content" as const;

export const courseSearchContract: ToolContract<
  typeof COURSE_SEARCH_NAME,
  CourseSearchInput
> = {
  name: COURSE_SEARCH_NAME,
  description:
    "Search course materials for specific content. Supports filtering by course " +
    "(partial names work) and lesson number. Use for questions about what a lesson teaches.",
  inputSchema: CourseSearchInputSchema,
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export function emptyResultMessage(input: CourseSearchInput): string {
  let filter = "";
  if (input.course_name !== undefined) filter += ` in course '${input.course_name}'`;
  if (input.lesson_number !== undefined) filter += ` in lesson ${input.lesson_number}`;
  return `No relevant content found${filter}.`;
}

function withLesson(courseTitle: string, lessonNumber: number | undefined): string {
  return lessonNumber === undefined
    ? courseTitle
    : `${courseTitle} - Lesson ${lessonNumber}`;
}

function lessonKey(courseTitle: string, lessonNumber: number): string {
  return JSON.stringify([courseTitle, lessonNumber]);
}

/**
 * Look up each distinct (course, lesson) link once, concurrently.
 * A failed lookup leaves that lesson without a url; the hits themselves stand.
 * Adapters log their own transport failures.
 */
async function resolveLessonLinks(
  courseCatalog: CourseCatalogCapability,
  hits: readonly { courseTitle: string; lessonNumber: number | undefined }[]
): Promise<Map<string, string | undefined>> {
  const lessons = new Map<string, { courseTitle: string; lessonNumber: number }>();
  for (const { courseTitle, lessonNumber } of hits) {
    if (lessonNumber === undefined) continue;
    lessons.set(lessonKey(courseTitle, lessonNumber), { courseTitle, lessonNumber });
  }

  const entries = await Promise.all(
    [...lessons].map(async ([key, { courseTitle, lessonNumber }]) => {
      const url = await courseCatalog
        .getLessonLink(courseTitle, lessonNumber)
        .catch((): undefined => undefined);
      return [key, url] as const;
    })
  );
  return new Map(entries);
}

export interface CourseSearchDeps {
  courseCatalog: CourseCatalogCapability;
}

export function createCourseSearchImplementation(
  deps: CourseSearchDeps
): ToolImplementation<CourseSearchInput> {
  const { courseCatalog } = deps;

  return {
    execute: async (input: CourseSearchInput): Promise<ToolOutput> => {
      const params: CourseSearchParams = {
        query: input.query,
        courseName: input.course_name,
        lessonNumber: input.lesson_number,
      };

      try {
        const result = await courseCatalog.search(params);

        if (result.error !== undefined) {
          return { text: result.error, citations: [] };
        }
        if (result.documents.length === 0) {
          return { text: emptyResultMessage(input), citations: [] };
        }

        const hits = result.documents.map((document, i) => {
          const meta = result.metadata[i];
          return {
            document,
            courseTitle: meta?.course_title ?? "unknown",
            lessonNumber: meta?.lesson_number ?? undefined,
          };
        });
        const links = await resolveLessonLinks(courseCatalog, hits);

        const blocks: string[] = [];
        const citations: Citation[] = [];

        for (const { document, courseTitle, lessonNumber } of hits) {
          const label = withLesson(courseTitle, lessonNumber);
          blocks.push(`[${label}]\n${document}`);

          const url =
            lessonNumber === undefined
              ? undefined
              : links.get(lessonKey(courseTitle, lessonNumber));
          citations.push(url === undefined ? { text: label } : { text: label, url });
        }

        return { text: blocks.join("\n\n"), citations };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return { text: `Search error: ${message}`, citations: [] };
      }
    },
  };
}

/**
 * Bound tool factory; the capability is injected at bootstrap.
 */
export function createCourseSearchBoundTool(
  deps: CourseSearchDeps
): BoundTool<typeof COURSE_SEARCH_NAME, CourseSearchInput> {
  return {
    contract: courseSearchContract,
    implementation: createCourseSearchImplementation(deps),
  };
}
