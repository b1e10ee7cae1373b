// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/graphs/tool-loop.graph`
 * Purpose: Verifies the bounded tool loop: round limits, forced final call, tool-call pairing, failures and citations.
 * Scope: Drives executeToolLoopGraph with a scripted LLM and test tools. Does NOT test adapters or sessions.
 * Invariants: LLM calls <= maxRounds + 1; final call without tools; one tool message per tool call.
 * Side-effects: none
 * Links: src/features/ai/graphs/tool-loop.graph.ts
 * @public
 */

import {
  type BoundToolRuntime,
  createStaticToolSource,
  createToolRunner,
  LlmError,
} from "@coursemate/ai-core";
import {
  createInMemoryTestLogger,
  createLlmToolCall,
  createTestToolRuntime,
  FakeLlmService,
  LOG_LEVELS,
  type ScriptedStep,
  textResponse,
  toolCallResponse,
} from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import { COURSE_SYSTEM_PROMPT, findUnpairedToolCalls } from "@/core";
import {
  executeToolLoopGraph,
  type ToolLoopGraphInput,
} from "@/features/ai/graphs/tool-loop.graph";
import { toLlmToolDefinitions } from "@/features/ai/tool-definitions";

const QUERY = "What does lesson 1 cover?";

function setup(
  script: ScriptedStep[],
  tools: BoundToolRuntime[] = [createTestToolRuntime()]
) {
  const llm = new FakeLlmService(script);
  const source = createStaticToolSource(tools);
  const { logger, lines } = createInMemoryTestLogger();

  const input: ToolLoopGraphInput = {
    query: QUERY,
    model: "test-model",
    maxTokens: 800,
    maxRounds: 2,
    caller: { requestId: "req-1" },
  };

  const run = (overrides: Partial<ToolLoopGraphInput> = {}) =>
    executeToolLoopGraph(
      { ...input, ...overrides },
      {
        llmService: llm,
        toolRunner: createToolRunner(source, { runId: "req-1" }),
        tools: toLlmToolDefinitions(source.listToolSpecs()),
        log: logger,
      }
    );

  return { llm, lines, run };
}

describe("executeToolLoopGraph", () => {
  describe("direct answers", () => {
    it("returns the first response when the model requests no tools", async () => {
      const { llm, run } = setup([textResponse("Lesson 1 covers variables.")]);

      const result = await run();

      expect(result).toEqual({
        answer: "Lesson 1 covers variables.",
        citations: [],
        rounds: 1,
        llmCalls: 1,
        exit: "answered",
      });
      expect(llm.callCount).toBe(1);
    });

    it("sends system prompt, the raw query, tools and fixed sampling settings", async () => {
      const { llm, run } = setup([textResponse("ok")]);

      await run();

      const [call] = llm.callLog;
      expect(call?.messages).toEqual([
        { role: "system", content: COURSE_SYSTEM_PROMPT },
        { role: "user", content: QUERY },
      ]);
      expect(call?.model).toBe("test-model");
      expect(call?.temperature).toBe(0);
      expect(call?.maxTokens).toBe(800);
      expect(call?.requestId).toBe("req-1");
      expect(call?.toolChoice).toBe("auto");
      expect(call?.tools?.map((t) => t.function.name)).toEqual(["test_tool"]);
    });

    it("omits tools and tool choice when no tools are registered", async () => {
      const { llm, run } = setup([textResponse("4")], []);

      const result = await run({ query: "What is 2+2?" });

      expect(result.answer).toBe("4");
      expect(llm.callCount).toBe(1);
      expect(llm.callLog[0]?.tools).toBeUndefined();
      expect(llm.callLog[0]?.toolChoice).toBeUndefined();
    });

    it("appends session history to the system prompt", async () => {
      const { llm, run } = setup([textResponse("ok")]);

      await run({ history: "User: hi\nAssistant: hello" });

      expect(llm.callLog[0]?.messages[0]).toEqual({
        role: "system",
        content: `${COURSE_SYSTEM_PROMPT}\n\nPrevious conversation:\nUser: hi\nAssistant: hello`,
      });
    });

    it("treats tool calls without finish reason tool_calls as an answer", async () => {
      const { llm, run } = setup([
        { ...toolCallResponse([createLlmToolCall()], "plain"), finishReason: "stop" },
      ]);

      const result = await run();

      expect(result.answer).toBe("plain");
      expect(result.exit).toBe("answered");
      expect(llm.callCount).toBe(1);
    });
  });

  describe("tool rounds", () => {
    it("runs the tool and feeds its output back before the answer", async () => {
      const { llm, run } = setup([
        toolCallResponse([createLlmToolCall({ arguments: { value: "abc" } })]),
        textResponse("Done"),
      ]);

      const result = await run();

      expect(result.answer).toBe("Done");
      expect(result.rounds).toBe(2);
      expect(result.exit).toBe("answered");
      expect(llm.callCount).toBe(2);

      const second = llm.callLog[1]?.messages;
      expect(second?.[2]).toEqual({
        role: "assistant",
        content: "",
        toolCalls: [
          { id: "call_test_123", name: "test_tool", arguments: '{"value":"abc"}' },
        ],
      });
      expect(second?.[3]).toEqual({
        role: "tool",
        content: "Processed: abc",
        toolCallId: "call_test_123",
      });
    });

    it("forces one final call without tools after exhausting rounds", async () => {
      const { llm, run } = setup([
        toolCallResponse([createLlmToolCall({ id: "call_1" })]),
        toolCallResponse([createLlmToolCall({ id: "call_2" })]),
        textResponse("Final answer"),
      ]);

      const result = await run();

      expect(result.answer).toBe("Final answer");
      expect(result.exit).toBe("exhausted");
      expect(result.rounds).toBe(2);
      expect(llm.callCount).toBe(3);
      expect(llm.callLog[2]?.tools).toBeUndefined();
      expect(llm.callLog[2]?.toolChoice).toBeUndefined();
      expect(llm.callLog[2]?.messages).toHaveLength(6);
    });

    it("never makes more than maxRounds + 1 calls", async () => {
      const { llm, run } = setup([
        toolCallResponse([createLlmToolCall({ id: "call_1" })]),
        toolCallResponse([createLlmToolCall({ id: "call_2" })]),
        toolCallResponse([createLlmToolCall({ id: "call_3" })]),
        textResponse("Final"),
      ]);

      const result = await run({ maxRounds: 3 });

      expect(result.llmCalls).toBe(4);
      expect(llm.callCount).toBe(4);
    });

    it("makes only the final call when maxRounds is 0", async () => {
      const { llm, run } = setup([textResponse("No tools used")]);

      const result = await run({ maxRounds: 0 });

      expect(result).toEqual({
        answer: "No tools used",
        citations: [],
        rounds: 0,
        llmCalls: 1,
        exit: "exhausted",
      });
      expect(llm.callLog[0]?.tools).toBeUndefined();
    });

    it("answers every tool call before the next LLM call, in model order", async () => {
      const { llm, run } = setup([
        toolCallResponse([
          createLlmToolCall({ id: "call_a", arguments: { value: "a" } }),
          createLlmToolCall({ id: "call_b", arguments: { value: "b" } }),
        ]),
        toolCallResponse([createLlmToolCall({ id: "call_c" })]),
        textResponse("Final"),
      ]);

      await run();

      for (const call of llm.callLog) {
        expect(findUnpairedToolCalls(call.messages)).toEqual([]);
      }
      const toolMessages = llm.callLog[1]?.messages.filter(
        (m) => m.role === "tool"
      );
      expect(toolMessages).toEqual([
        { role: "tool", content: "Processed: a", toolCallId: "call_a" },
        { role: "tool", content: "Processed: b", toolCallId: "call_b" },
      ]);
    });
  });

  describe("tool failures", () => {
    it("ends the loop after a failed round and makes exactly one more call", async () => {
      const { llm, lines, run } = setup(
        [
          toolCallResponse([createLlmToolCall()]),
          textResponse("Sorry, the tool failed."),
        ],
        [createTestToolRuntime({ throws: true, errorMessage: "boom" })]
      );

      const result = await run();

      expect(result.answer).toBe("Sorry, the tool failed.");
      expect(result.exit).toBe("tool_failure");
      expect(llm.callCount).toBe(2);
      expect(llm.callLog[1]?.tools).toBeUndefined();
      expect(llm.callLog[1]?.messages[3]).toEqual({
        role: "tool",
        content: "Tool execution failed in round 1: boom",
        toolCallId: "call_test_123",
      });

      const failure = lines.find((l) => l.event === "ai.tool_call_failed");
      expect(failure?.level).toBe(LOG_LEVELS.warn);
      expect(failure?.errorCode).toBe("execution");
    });

    it("reports invalid JSON arguments as a failed tool call", async () => {
      const { llm, run } = setup([
        toolCallResponse([createLlmToolCall({ arguments: "{not json" })]),
        textResponse("Final"),
      ]);

      await run();

      expect(llm.callLog[1]?.messages[3]?.content).toMatch(
        /^Tool execution failed in round 1: Invalid tool arguments JSON: /
      );
    });

    it("reports arguments that fail schema validation", async () => {
      const { llm, run } = setup([
        toolCallResponse([createLlmToolCall({ arguments: { value: "" } })]),
        textResponse("Final"),
      ]);

      const result = await run();

      expect(result.exit).toBe("tool_failure");
      expect(llm.callLog[1]?.messages[3]?.content).toMatch(
        /^Tool execution failed in round 1: /
      );
    });

    it("logs unknown tools at error level", async () => {
      const { llm, lines, run } = setup([
        toolCallResponse([createLlmToolCall({ name: "nope" })]),
        textResponse("Final"),
      ]);

      await run();

      expect(llm.callLog[1]?.messages[3]?.content).toBe(
        "Tool execution failed in round 1: Tool 'nope' is not available"
      );
      const notFound = lines.find((l) => l.event === "ai.tool_not_found");
      expect(notFound?.level).toBe(LOG_LEVELS.error);
      expect(notFound?.tool).toBe("nope");
    });

    it("still runs the remaining calls of a failed round", async () => {
      const { llm, run } = setup([
        toolCallResponse([
          createLlmToolCall({ id: "call_1", name: "nope" }),
          createLlmToolCall({ id: "call_2", arguments: { value: "x" } }),
        ]),
        textResponse("Final"),
      ]);

      const result = await run();

      expect(result.exit).toBe("tool_failure");
      expect(llm.callCount).toBe(2);
      expect(llm.callLog[1]?.messages.slice(3)).toEqual([
        {
          role: "tool",
          content: "Tool execution failed in round 1: Tool 'nope' is not available",
          toolCallId: "call_1",
        },
        { role: "tool", content: "Processed: x", toolCallId: "call_2" },
      ]);
    });

    it("passes tool-reported failure text through as a successful outcome", async () => {
      const { llm, run } = setup(
        [toolCallResponse([createLlmToolCall()]), textResponse("Final")],
        [createTestToolRuntime({ text: "Search error: index offline" })]
      );

      const result = await run();

      expect(result.exit).toBe("answered");
      expect(llm.callLog[1]?.messages[3]?.content).toBe(
        "Search error: index offline"
      );
    });
  });

  describe("LLM failures", () => {
    it("returns the round error text when a round call fails", async () => {
      const { llm, lines, run } = setup([
        new LlmError(
          "LiteLLM API error: 500 Internal Server Error",
          "provider_5xx",
          500
        ),
      ]);

      const result = await run();

      expect(result.answer).toBe(
        "Error in round 1: LiteLLM API error: 500 Internal Server Error"
      );
      expect(result.exit).toBe("llm_error");
      expect(llm.callCount).toBe(1);

      const failure = lines.find((l) => l.event === "ai.llm_call_failed");
      expect(failure?.level).toBe(LOG_LEVELS.error);
      expect(failure?.code).toBe("upstream");
      expect(failure?.phase).toBe("round");
    });

    it("names the round that failed", async () => {
      const { run } = setup([
        toolCallResponse([createLlmToolCall()]),
        new Error("rate limited"),
      ]);

      const result = await run();

      expect(result.answer).toBe("Error in round 2: rate limited");
      expect(result.llmCalls).toBe(2);
    });

    it("returns the final-call error text when the forced call fails", async () => {
      const { run } = setup([
        toolCallResponse([createLlmToolCall({ id: "call_1" })]),
        toolCallResponse([createLlmToolCall({ id: "call_2" })]),
        new Error("gateway down"),
      ]);

      const result = await run();

      expect(result.answer).toBe(
        "Error generating final response: gateway down"
      );
      expect(result.exit).toBe("llm_error");
      expect(result.llmCalls).toBe(3);
    });
  });

  describe("citations", () => {
    it("collects citations in order without duplicates", async () => {
      const lesson0 = {
        text: "Intro to Python - Lesson 0",
        url: "https://example.com/python/lesson-0",
      };
      const { run } = setup(
        [
          toolCallResponse([
            createLlmToolCall({ id: "call_1" }),
            createLlmToolCall({ id: "call_2" }),
          ]),
          textResponse("Python is dynamically typed."),
        ],
        [
          createTestToolRuntime({
            citations: [
              lesson0,
              { text: "Intro to Python - Lesson 0" },
              lesson0,
            ],
          }),
        ]
      );

      const result = await run();

      expect(result.citations).toEqual([
        lesson0,
        { text: "Intro to Python - Lesson 0" },
      ]);
    });

    it("collects nothing from failed tool calls", async () => {
      const { run } = setup([
        toolCallResponse([createLlmToolCall({ name: "nope" })]),
        textResponse("Final"),
      ]);

      const result = await run();

      expect(result.citations).toEqual([]);
    });
  });
});
