// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-tools/tools/course-outline`
 * Purpose: AI tool returning a course's title, link, instructor and full lesson list.
 * Scope: Formats CourseOutline as text. Does NOT implement transport or name matching.
 * Invariants:
 *   - Name is `get_course_outline`
 *   - Never throws: capability failures become "Outline error: …" text
 *   - Lessons listed in lesson-number order, each with its link when known
 * Side-effects: IO (via CourseCatalogCapability)
 * @public
 */

import type { ToolOutput } from "@coursemate/ai-core";
import { z } from "zod";

import type {
  CourseCatalogCapability,
  CourseOutline,
} from "../capabilities/course-catalog";
import type { BoundTool, ToolContract, ToolImplementation } from "../types";

export const CourseOutlineInputSchema = z.object({
  course_name: z
    .string()
    .min(1)
    .describe("Course title; partial matches work (e.g. 'MCP', 'Intro')"),
});
export type CourseOutlineInput = z.infer<typeof CourseOutlineInputSchema>;

export const COURSE_OUTLINE_NAME = "get_course_outline" as const;

export const courseOutlineContract: ToolContract<
  typeof COURSE_OUTLINE_NAME,
  CourseOutlineInput
> = {
  name: COURSE_OUTLINE_NAME,
  description:
    "Get the outline of a course: its title, link, instructor and every lesson " +
    "with its number and title. Use for questions about a course's structure.",
  inputSchema: CourseOutlineInputSchema,
};

export function formatOutline(outline: CourseOutline): string {
  const lines = [`Course: ${outline.title}`];
  if (outline.courseLink) lines.push(`Course Link: ${outline.courseLink}`);
  if (outline.instructor) lines.push(`Instructor: ${outline.instructor}`);
  lines.push(`Lessons (${outline.lessons.length} total):`);
  const ordered = [...outline.lessons].sort(
    (a, b) => a.lessonNumber - b.lessonNumber
  );
  for (const lesson of ordered) {
    const link = lesson.lessonLink ? ` (${lesson.lessonLink})` : "";
    lines.push(`Lesson ${lesson.lessonNumber}: ${lesson.title}${link}`);
  }
  return lines.join("\n");
}

export interface CourseOutlineDeps {
  courseCatalog: CourseCatalogCapability;
}

export function createCourseOutlineImplementation(
  deps: CourseOutlineDeps
): ToolImplementation<CourseOutlineInput> {
  return {
    execute: async (input: CourseOutlineInput): Promise<ToolOutput> => {
      try {
        const outline = await deps.courseCatalog.getCourseOutline(
          input.course_name
        );
        if (!outline) {
          return {
            text: `No course found matching '${input.course_name}'.`,
            citations: [],
          };
        }
        return {
          text: formatOutline(outline),
          citations: [
            outline.courseLink
              ? { text: outline.title, url: outline.courseLink }
              : { text: outline.title },
          ],
        };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return { text: `Outline error: ${message}`, citations: [] };
      }
    },
  };
}

export function createCourseOutlineBoundTool(
  deps: CourseOutlineDeps
): BoundTool<typeof COURSE_OUTLINE_NAME, CourseOutlineInput> {
  return {
    contract: courseOutlineContract,
    implementation: createCourseOutlineImplementation(deps),
  };
}
