// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/graphs/tool-loop.graph`
 * Purpose: Bounded multi-round tool loop (LLM → tools → LLM) that always ends in a textual answer.
 * Scope: Orchestrates one query's rounds, tool dispatch and forced final call. Does not import adapters or touch sessions.
 * Invariants:
 *   - GRAPHS_NO_IO: No IO/adapter imports; all effects via injected deps
 *   - GRAPHS_USE_TOOLRUNNER_ONLY: Tools invoked exclusively via toolRunner.exec()
 *   - LLM calls per run <= maxRounds + 1
 *   - Every assistant tool call is answered by exactly one `tool` message before the next LLM call
 *   - The forced final call never carries tool definitions
 *   - Never throws for LLM or tool failures; they become the answer text or tool outcome text
 * Side-effects: none (pure logic; effects via injected deps)
 * Notes: Tool calls within a round run sequentially, in the model's order.
 * Links: services/course-query.ts, @coursemate/ai-core (createToolRunner)
 * @internal
 */

import {
  type Citation,
  normalizeErrorToExecutionCode,
  type ToolRunner,
} from "@coursemate/ai-core";
import type { Logger } from "pino";

import { buildSystemPrompt, type Message } from "@/core";
import type {
  LlmCaller,
  LlmCompletionResult,
  LlmService,
  LlmToolCall,
  LlmToolDefinition,
} from "@/ports";
import {
  aiLlmCallDurationMs,
  aiLlmErrorsTotal,
  aiToolCallsTotal,
  EVENT_NAMES,
  logEvent,
} from "@/shared/observability";

/** Deterministic answers: the loop never samples */
export const TOOL_LOOP_TEMPERATURE = 0;

/**
 * How the loop ended.
 * - answered: a round's response requested no tools
 * - exhausted: every round requested tools; forced final call answered
 * - tool_failure: a round had a failed tool call; forced final call answered
 * - llm_error: an LLM call failed; the answer is the error text
 */
export type ToolLoopExit = "answered" | "exhausted" | "tool_failure" | "llm_error";

/**
 * Per-run mutable state. Owned by one in-flight query, never shared or persisted.
 */
interface RunState {
  /** Conversation after the system message; append-only */
  readonly messages: Message[];
  round: number;
  terminated: boolean;
  lastError?: string;
}

export interface ToolLoopGraphDeps {
  readonly llmService: LlmService;
  readonly toolRunner: ToolRunner;
  /** LLM tool definitions; empty disables tool use */
  readonly tools: readonly LlmToolDefinition[];
  readonly log: Logger;
}

export interface ToolLoopGraphInput {
  readonly query: string;
  /** Rendered session history, if any */
  readonly history?: string | undefined;
  readonly model: string;
  readonly maxTokens: number;
  readonly maxRounds: number;
  readonly caller: LlmCaller;
  /** Cancels in-flight model calls; an aborted call ends the run like any LLM failure */
  readonly abortSignal?: AbortSignal | undefined;
}

export interface ToolLoopGraphResult {
  readonly answer: string;
  /** Citations from successful tool outputs, in collection order, unique on (text, url) */
  readonly citations: Citation[];
  readonly rounds: number;
  readonly llmCalls: number;
  readonly exit: ToolLoopExit;
}

type ToolCallOutcome =
  | { ok: true; text: string }
  | { ok: false; text: string };

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseToolArguments(raw: string): unknown {
  // Some providers send "" for a call without arguments
  return raw.trim() === "" ? {} : JSON.parse(raw);
}

/**
 * Run the tool loop for one query.
 *
 * Flow:
 * 1. Call the LLM with tools (while any are registered)
 * 2. No tool calls → that text is the answer
 * 3. Otherwise run each call through the tool runner and append the outcomes
 * 4. A failed tool call ends the loop after its round
 * 5. Rounds exhausted or round failed → one final call without tools
 */
export async function executeToolLoopGraph(
  input: ToolLoopGraphInput,
  deps: ToolLoopGraphDeps
): Promise<ToolLoopGraphResult> {
  const { llmService, toolRunner, tools, log } = deps;
  const { caller, maxRounds } = input;
  const reqId = caller.requestId;

  const systemMessage: Message = {
    role: "system",
    content: buildSystemPrompt(input.history),
  };
  const state: RunState = {
    messages: [{ role: "user", content: input.query }],
    round: 0,
    terminated: false,
  };

  const citations: Citation[] = [];
  const seenCitations = new Set<string>();
  let llmCalls = 0;

  const collect = (found: readonly Citation[]): void => {
    for (const citation of found) {
      const key = JSON.stringify([citation.text, citation.url ?? null]);
      if (seenCitations.has(key)) continue;
      seenCitations.add(key);
      citations.push(citation);
    }
  };

  const finish = (answer: string, exit: ToolLoopExit): ToolLoopGraphResult => ({
    answer,
    citations,
    rounds: state.round,
    llmCalls,
    exit,
  });

  const callLlm = async (
    phase: "round" | "final",
    withTools: boolean
  ): Promise<LlmCompletionResult> => {
    llmCalls++;
    const started = performance.now();
    try {
      return await llmService.completion({
        messages: [systemMessage, ...state.messages],
        model: input.model,
        temperature: TOOL_LOOP_TEMPERATURE,
        maxTokens: input.maxTokens,
        caller,
        ...(input.abortSignal !== undefined && {
          abortSignal: input.abortSignal,
        }),
        ...(withTools &&
          tools.length > 0 && {
            tools: [...tools],
            toolChoice: "auto" as const,
          }),
      });
    } catch (error) {
      const code = normalizeErrorToExecutionCode(error);
      aiLlmErrorsTotal.inc({ phase, code });
      logEvent(
        log,
        EVENT_NAMES.AI_LLM_CALL_FAILED,
        { reqId, phase, round: state.round, code },
        "error"
      );
      throw error;
    } finally {
      aiLlmCallDurationMs.observe({ phase }, performance.now() - started);
    }
  };

  const runToolCall = async (
    toolCall: LlmToolCall,
    round: number
  ): Promise<ToolCallOutcome> => {
    const toolName = toolCall.function.name;
    const fail = (reason: string): ToolCallOutcome => ({
      ok: false,
      text: `Tool execution failed in round ${round}: ${reason}`,
    });

    let args: unknown;
    try {
      args = parseToolArguments(toolCall.function.arguments);
    } catch (error) {
      aiToolCallsTotal.inc({ tool: toolName, outcome: "invalid_json" });
      logEvent(
        log,
        EVENT_NAMES.AI_TOOL_CALL_FAILED,
        { reqId, round, tool: toolName, errorCode: "invalid_json" },
        "warn"
      );
      return fail(`Invalid tool arguments JSON: ${messageOf(error)}`);
    }

    // Per GRAPHS_USE_TOOLRUNNER_ONLY: always go through toolRunner.exec()
    const result = await toolRunner.exec(toolName, args, {
      modelToolCallId: toolCall.id,
    });

    if (result.ok) {
      aiToolCallsTotal.inc({ tool: toolName, outcome: "ok" });
      collect(result.value.citations);
      return { ok: true, text: result.value.text };
    }

    if (result.errorCode === "unavailable") {
      // Unknown names are not registry labels; keep metric cardinality bounded
      aiToolCallsTotal.inc({ tool: "unknown", outcome: "unavailable" });
      logEvent(
        log,
        EVENT_NAMES.AI_TOOL_NOT_FOUND,
        { reqId, round, tool: toolName },
        "error"
      );
    } else {
      aiToolCallsTotal.inc({ tool: toolName, outcome: result.errorCode });
      logEvent(
        log,
        EVENT_NAMES.AI_TOOL_CALL_FAILED,
        { reqId, round, tool: toolName, errorCode: result.errorCode },
        "warn"
      );
    }
    return fail(result.safeMessage);
  };

  while (state.round < maxRounds && !state.terminated) {
    state.round++;

    let response: LlmCompletionResult;
    try {
      response = await callLlm("round", true);
    } catch (error) {
      return finish(
        `Error in round ${state.round}: ${messageOf(error)}`,
        "llm_error"
      );
    }

    const toolCalls = response.toolCalls ?? [];
    if (response.finishReason !== "tool_calls" || toolCalls.length === 0) {
      return finish(response.message.content, "answered");
    }

    state.messages.push({
      role: "assistant",
      content: response.message.content,
      toolCalls: toolCalls.map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      })),
    });

    for (const toolCall of toolCalls) {
      const outcome = await runToolCall(toolCall, state.round);
      state.messages.push({
        role: "tool",
        content: outcome.text,
        toolCallId: toolCall.id,
      });
      if (!outcome.ok) {
        state.terminated = true;
        state.lastError = outcome.text;
      }
    }
  }

  const exit: ToolLoopExit = state.terminated ? "tool_failure" : "exhausted";

  let finalResponse: LlmCompletionResult;
  try {
    finalResponse = await callLlm("final", false);
  } catch (error) {
    return finish(
      `Error generating final response: ${messageOf(error)}`,
      "llm_error"
    );
  }
  return finish(finalResponse.message.content, exit);
}
