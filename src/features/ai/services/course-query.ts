// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/services/course-query`
 * Purpose: Answer one course question: validate, read session history, run the tool loop, record the exchange.
 * Scope: Entry point for queries. Owns run identity and session bookkeeping. Does not import adapters.
 * Invariants:
 *   - History is read once, before the first LLM call
 *   - With a session ID the exchange is appended after the run, even when the answer is error text
 *   - Without a session ID nothing is read or recorded
 *   - A run whose abort signal fired is not recorded
 *   - Only ChatValidationError / RangeError (bad input) escape; LLM and tool failures become answer text
 * Side-effects: IO (via injected ports)
 * Links: graphs/tool-loop.graph.ts, ports/session-history.port.ts
 * @public
 */

import { randomUUID } from "node:crypto";

import {
  type Citation,
  createToolRunner,
  type ToolSourcePort,
} from "@coursemate/ai-core";
import type { Logger } from "pino";

import { assertQueryContent, MAX_QUERY_CHARS } from "@/core";
import type { LlmService, SessionHistoryPort } from "@/ports";
import { aiQueryRounds, EVENT_NAMES, logEvent } from "@/shared/observability";

import { executeToolLoopGraph } from "../graphs/tool-loop.graph";
import { toLlmToolDefinitions } from "../tool-definitions";

export interface CourseQueryConfig {
  readonly model: string;
  readonly maxTokens: number;
  /** Round budget when run() is called without one */
  readonly maxRounds: number;
}

export interface CourseQueryDeps {
  readonly llmService: LlmService;
  readonly sessionHistory: SessionHistoryPort;
  readonly toolSource: ToolSourcePort;
  readonly log: Logger;
  readonly config: CourseQueryConfig;
}

export interface CourseQueryResult {
  readonly answer: string;
  readonly sources: Citation[];
}

export interface CourseQueryRunOptions {
  /** Cancels the run's in-flight model call */
  readonly abortSignal?: AbortSignal;
}

export interface CourseQueryService {
  /**
   * @param query - The user's question, verbatim
   * @param sessionId - Session to read history from and record into
   * @param maxRounds - Tool rounds allowed before the forced final call
   * @param options - Per-run cancellation
   * @throws ChatValidationError for an empty or oversized query
   * @throws RangeError when maxRounds is not a non-negative integer
   */
  run(
    query: string,
    sessionId?: string,
    maxRounds?: number,
    options?: CourseQueryRunOptions
  ): Promise<CourseQueryResult>;
}

export function createCourseQueryService(
  deps: CourseQueryDeps
): CourseQueryService {
  const { llmService, sessionHistory, toolSource, log, config } = deps;

  return {
    async run(query, sessionId, maxRounds = config.maxRounds, options = {}) {
      const { abortSignal } = options;
      assertQueryContent(query, MAX_QUERY_CHARS);
      if (!Number.isInteger(maxRounds) || maxRounds < 0) {
        throw new RangeError(
          `maxRounds must be a non-negative integer, got ${maxRounds}`
        );
      }

      const reqId = randomUUID();
      const history =
        sessionId === undefined
          ? undefined
          : await sessionHistory.getHistory(sessionId);

      logEvent(log, EVENT_NAMES.AI_QUERY_RECEIVED, {
        reqId,
        hasSession: sessionId !== undefined,
        hasHistory: history !== undefined,
        maxRounds,
      });

      const result = await executeToolLoopGraph(
        {
          query,
          history,
          model: config.model,
          maxTokens: config.maxTokens,
          maxRounds,
          caller: { requestId: reqId, sessionId },
          abortSignal,
        },
        {
          llmService,
          toolRunner: createToolRunner(toolSource, { runId: reqId }),
          tools: toLlmToolDefinitions(toolSource.listToolSpecs()),
          log,
        }
      );

      if (sessionId !== undefined && !abortSignal?.aborted) {
        await sessionHistory.append(sessionId, query, result.answer);
        logEvent(log, EVENT_NAMES.SESSION_EXCHANGE_RECORDED, { reqId });
      }

      aiQueryRounds.observe({ exit: result.exit }, result.rounds);
      logEvent(log, EVENT_NAMES.AI_QUERY_COMPLETED, {
        reqId,
        rounds: result.rounds,
        llmCalls: result.llmCalls,
        exit: result.exit,
        sourceCount: result.citations.length,
      });

      return { answer: result.answer, sources: result.citations };
    },
  };
}
