// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/retrieval/http-course-catalog.adapter`
 * Purpose: HTTP adapter implementing CourseCatalogCapability against the course retrieval service.
 * Scope: JSON transport to the vector-search service (search, outline, lesson link). Does NOT define tool contracts or format tool text.
 * Invariants:
 *   - AUTH_VIA_ADAPTER: API key resolved from config, never from tool arguments
 *   - 404 on outline / lesson-link means "no match" (undefined), not an error
 *   - Responses are validated with zod; shape mismatches throw
 *   - search() result count capped at maxResults regardless of what the service returns
 * Side-effects: IO (HTTP requests to COURSE_CATALOG_URL)
 * @internal
 */

import type {
  CourseCatalogCapability,
  CourseOutline,
  CourseSearchParams,
  CourseSearchResult,
} from "@coursemate/ai-tools";
import { z } from "zod";

import { EVENT_NAMES, makeLogger } from "@/shared/observability";

const logger = makeLogger({ component: "HttpCourseCatalogAdapter" });

const SearchResponseSchema = z.object({
  documents: z.array(z.string()),
  metadata: z.array(
    z.object({
      course_title: z.string().nullish(),
      lesson_number: z.number().int().nullish(),
    })
  ),
  error: z.string().nullish(),
});

const OutlineResponseSchema = z.object({
  title: z.string(),
  course_link: z.string().nullish(),
  instructor: z.string().nullish(),
  lessons: z.array(
    z.object({
      lesson_number: z.number().int(),
      title: z.string(),
      lesson_link: z.string().nullish(),
    })
  ),
});

const LessonLinkResponseSchema = z.object({
  lesson_link: z.string().nullish(),
});

export interface HttpCourseCatalogConfig {
  /** Base URL of the retrieval service, without trailing slash */
  baseUrl: string;
  apiKey?: string | undefined;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Chunks requested per search (default: 5) */
  maxResults?: number;
}

type Operation = "search" | "outline" | "lesson_link";

export class HttpCourseCatalogAdapter implements CourseCatalogCapability {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly maxResults: number;

  constructor(config: HttpCourseCatalogConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? 10000;
    this.maxResults = config.maxResults ?? 5;
  }

  async search(params: CourseSearchParams): Promise<CourseSearchResult> {
    const response = await this.request("search", "/search", {
      method: "POST",
      body: JSON.stringify({
        query: params.query,
        limit: this.maxResults,
        ...(params.courseName !== undefined && {
          course_name: params.courseName,
        }),
        ...(params.lessonNumber !== undefined && {
          lesson_number: params.lessonNumber,
        }),
      }),
    });
    const data = SearchResponseSchema.parse(await response.json());

    if (data.error) {
      return { documents: [], metadata: [], error: data.error };
    }

    const count = Math.min(
      data.documents.length,
      data.metadata.length,
      this.maxResults
    );
    return {
      documents: data.documents.slice(0, count),
      metadata: data.metadata.slice(0, count).map((m) => ({
        ...(m.course_title != null && { course_title: m.course_title }),
        lesson_number: m.lesson_number ?? null,
      })),
    };
  }

  async getCourseOutline(
    courseName: string
  ): Promise<CourseOutline | undefined> {
    const query = new URLSearchParams({ name: courseName });
    const response = await this.request(
      "outline",
      `/courses/outline?${query.toString()}`,
      { method: "GET" },
      true
    );
    if (response.status === 404) return undefined;

    const data = OutlineResponseSchema.parse(await response.json());
    return {
      title: data.title,
      ...(data.course_link != null && { courseLink: data.course_link }),
      ...(data.instructor != null && { instructor: data.instructor }),
      lessons: data.lessons.map((lesson) => ({
        lessonNumber: lesson.lesson_number,
        title: lesson.title,
        ...(lesson.lesson_link != null && { lessonLink: lesson.lesson_link }),
      })),
    };
  }

  async getLessonLink(
    courseTitle: string,
    lessonNumber: number
  ): Promise<string | undefined> {
    const query = new URLSearchParams({
      course_title: courseTitle,
      lesson_number: String(lessonNumber),
    });
    const response = await this.request(
      "lesson_link",
      `/courses/lesson-link?${query.toString()}`,
      { method: "GET" },
      true
    );
    if (response.status === 404) return undefined;

    const data = LessonLinkResponseSchema.parse(await response.json());
    return data.lesson_link ?? undefined;
  }

  /**
   * Issue one request with timeout, auth and error logging.
   * @param allowNotFound - return 404 responses to the caller instead of throwing
   */
  private async request(
    operation: Operation,
    path: string,
    init: { method: "GET" | "POST"; body?: string },
    allowNotFound = false
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: init.method,
        headers: {
          Accept: "application/json",
          ...(init.body !== undefined && {
            "Content-Type": "application/json",
          }),
          ...(this.apiKey !== undefined && {
            Authorization: `Bearer ${this.apiKey}`,
          }),
        },
        ...(init.body !== undefined && { body: init.body }),
        signal: controller.signal,
      });

      if (allowNotFound && response.status === 404) return response;

      if (!response.ok) {
        logger.error(
          {
            event: EVENT_NAMES.ADAPTER_COURSE_CATALOG_ERROR,
            dep: "course_catalog",
            operation,
            reasonCode: "http_error",
            status: response.status,
          },
          EVENT_NAMES.ADAPTER_COURSE_CATALOG_ERROR
        );
        throw new CourseCatalogHttpError(
          `Course catalog error (${response.status})`,
          response.status
        );
      }
      return response;
    } catch (error) {
      if (error instanceof CourseCatalogHttpError) throw error;

      const reasonCode =
        error instanceof Error && error.name === "AbortError"
          ? "timeout"
          : error instanceof Error && error.message === "fetch failed"
            ? "network_error"
            : "unknown_error";
      logger.error(
        {
          event: EVENT_NAMES.ADAPTER_COURSE_CATALOG_ERROR,
          dep: "course_catalog",
          operation,
          reasonCode,
          ...(reasonCode === "timeout" && { durationMs: this.timeoutMs }),
        },
        EVENT_NAMES.ADAPTER_COURSE_CATALOG_ERROR
      );
      if (reasonCode === "timeout") {
        throw new Error(`Course catalog timed out after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Non-2xx response from the retrieval service.
 */
export class CourseCatalogHttpError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "CourseCatalogHttpError";
    this.status = status;
  }
}
