// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/litellm`
 * Purpose: Unit tests for LiteLLM adapter with mocked HTTP calls and error handling.
 * Scope: Tests request shape, tool-call wire mapping, response parsing and LlmError classification. Does NOT test real LiteLLM service.
 * Invariants: No real HTTP calls; deterministic responses; validates LlmService contract compliance
 * Side-effects: none (mocked fetch)
 * Links: src/adapters/server/ai/litellm.adapter.ts, LlmService port
 * @public
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

import {
  LiteLlmAdapter,
  toWireMessage,
} from "@/adapters/server/ai/litellm.adapter";
import {
  type LlmCompletionParams,
  LlmError,
  type LlmToolDefinition,
} from "@/ports";

// Mock the serverEnv module
vi.mock("@/shared/env", () => ({
  serverEnv: () => ({
    APP_ENV: "test",
    LITELLM_BASE_URL: "https://api.test-litellm.com",
    LITELLM_MASTER_KEY: "test-key",
    LLM_TIMEOUT_MS: 30000,
  }),
}));

const SEARCH_TOOL: LlmToolDefinition = {
  type: "function",
  function: {
    name: "search_course_content",
    description: "Search course materials",
    parameters: {
      type: "object",
      properties: { query: { type: "string" } },
      required: ["query"],
    },
  },
};

function okResponse(body: unknown) {
  return { ok: true, status: 200, statusText: "OK", json: async () => body };
}

function requestBodyOf(mockFetch: ReturnType<typeof vi.fn>): unknown {
  const init = mockFetch.mock.calls[0]?.[1];
  return JSON.parse(String(init?.body));
}

describe("LiteLlmAdapter", () => {
  let adapter: LiteLlmAdapter;
  const mockFetch = vi.fn();

  const basicParams: LlmCompletionParams = {
    messages: [
      { role: "system", content: "You answer course questions." },
      { role: "user", content: "Hello world" },
    ],
    model: "gpt-4o-mini",
    temperature: 0,
    maxTokens: 800,
    caller: { requestId: "req-1" },
  };

  const textBody = {
    id: "chatcmpl-test-123",
    model: "gpt-4o-mini-2024-07-18",
    choices: [
      {
        message: { role: "assistant", content: "Hello! How can I help?" },
        finish_reason: "stop",
      },
    ],
    usage: { prompt_tokens: 10, completion_tokens: 8, total_tokens: 18 },
  };

  beforeEach(() => {
    adapter = new LiteLlmAdapter();
    vi.clearAllMocks();
    global.fetch = mockFetch;
  });

  describe("request", () => {
    it("posts the chat completion request with bearer auth", async () => {
      mockFetch.mockResolvedValueOnce(okResponse(textBody));

      await adapter.completion(basicParams);

      expect(mockFetch).toHaveBeenCalledWith(
        "https://api.test-litellm.com/v1/chat/completions",
        expect.objectContaining({
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: "Bearer test-key",
          },
          signal: expect.any(AbortSignal),
        })
      );
      expect(requestBodyOf(mockFetch)).toEqual({
        model: "gpt-4o-mini",
        messages: [
          { role: "system", content: "You answer course questions." },
          { role: "user", content: "Hello world" },
        ],
        temperature: 0,
        max_tokens: 800,
        metadata: { request_id: "req-1" },
      });
    });

    it("includes tools with auto tool choice and the session ID", async () => {
      mockFetch.mockResolvedValueOnce(okResponse(textBody));

      await adapter.completion({
        ...basicParams,
        tools: [SEARCH_TOOL],
        toolChoice: "auto",
        caller: { requestId: "req-1", sessionId: "session-9" },
      });

      expect(requestBodyOf(mockFetch)).toMatchObject({
        tools: [SEARCH_TOOL],
        tool_choice: "auto",
        metadata: { request_id: "req-1", session_id: "session-9" },
      });
    });

    it("omits tools entirely when none are given", async () => {
      mockFetch.mockResolvedValueOnce(okResponse(textBody));

      await adapter.completion({ ...basicParams, tools: [] });

      expect(requestBodyOf(mockFetch)).not.toHaveProperty("tools");
      expect(requestBodyOf(mockFetch)).not.toHaveProperty("tool_choice");
    });
  });

  describe("toWireMessage", () => {
    it("maps assistant tool calls to tool_calls with null content", () => {
      expect(
        toWireMessage({
          role: "assistant",
          content: "",
          toolCalls: [
            { id: "call_1", name: "search_course_content", arguments: '{"query":"x"}' },
          ],
        })
      ).toEqual({
        role: "assistant",
        content: null,
        tool_calls: [
          {
            id: "call_1",
            type: "function",
            function: { name: "search_course_content", arguments: '{"query":"x"}' },
          },
        ],
      });
    });

    it("maps tool outcomes with tool_call_id", () => {
      expect(
        toWireMessage({ role: "tool", content: "result", toolCallId: "call_1" })
      ).toEqual({ role: "tool", content: "result", tool_call_id: "call_1" });
    });

    it("passes plain messages through", () => {
      expect(toWireMessage({ role: "user", content: "hi" })).toEqual({
        role: "user",
        content: "hi",
      });
    });
  });

  describe("response", () => {
    it("maps a text answer with usage and resolved model", async () => {
      mockFetch.mockResolvedValueOnce(okResponse(textBody));

      const result = await adapter.completion(basicParams);

      expect(result).toEqual({
        message: { role: "assistant", content: "Hello! How can I help?" },
        finishReason: "stop",
        usage: { promptTokens: 10, completionTokens: 8, totalTokens: 18 },
        resolvedModel: "gpt-4o-mini-2024-07-18",
      });
    });

    it("maps tool calls in order", async () => {
      mockFetch.mockResolvedValueOnce(
        okResponse({
          choices: [
            {
              message: {
                role: "assistant",
                content: null,
                tool_calls: [
                  {
                    id: "call_1",
                    type: "function",
                    function: {
                      name: "get_course_outline",
                      arguments: '{"course_name":"Python"}',
                    },
                  },
                  {
                    id: "call_2",
                    type: "function",
                    function: {
                      name: "search_course_content",
                      arguments: '{"query":"types"}',
                    },
                  },
                ],
              },
              finish_reason: "tool_calls",
            },
          ],
        })
      );

      const result = await adapter.completion(basicParams);

      expect(result.finishReason).toBe("tool_calls");
      expect(result.message.content).toBe("");
      expect(result.toolCalls?.map((c) => c.id)).toEqual(["call_1", "call_2"]);
      expect(result.message.toolCalls).toEqual([
        { id: "call_1", name: "get_course_outline", arguments: '{"course_name":"Python"}' },
        { id: "call_2", name: "search_course_content", arguments: '{"query":"types"}' },
      ]);
      expect(result.resolvedModel).toBe("gpt-4o-mini");
      expect(result.usage).toBeUndefined();
    });

    it("derives total tokens when the gateway omits them", async () => {
      mockFetch.mockResolvedValueOnce(
        okResponse({
          ...textBody,
          usage: { prompt_tokens: 3, completion_tokens: 4 },
        })
      );

      const result = await adapter.completion(basicParams);

      expect(result.usage?.totalTokens).toBe(7);
    });
  });

  describe("errors", () => {
    it("classifies HTTP status into LlmError", async () => {
      mockFetch.mockResolvedValueOnce({
        ok: false,
        status: 429,
        statusText: "Too Many Requests",
      });

      const error = await adapter.completion(basicParams).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LlmError);
      expect(error).toMatchObject({
        message: "LiteLLM API error: 429 Too Many Requests",
        kind: "rate_limited",
        status: 429,
      });
    });

    it("maps timeouts to kind timeout with status 408", async () => {
      mockFetch.mockRejectedValueOnce(
        Object.assign(new Error("The operation timed out"), {
          name: "TimeoutError",
        })
      );

      await expect(adapter.completion(basicParams)).rejects.toMatchObject({
        message: "LiteLLM request timed out",
        kind: "timeout",
        status: 408,
      });
    });

    it("maps other fetch failures to kind network", async () => {
      mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

      await expect(adapter.completion(basicParams)).rejects.toMatchObject({
        message: "LiteLLM network error: fetch failed",
        kind: "network",
      });
    });

    it("rejects a response without choices", async () => {
      mockFetch.mockResolvedValueOnce(okResponse({ choices: [] }));

      await expect(adapter.completion(basicParams)).rejects.toMatchObject({
        message: "Invalid response from LiteLLM",
        kind: "invalid_response",
      });
    });

    it("rejects a body that is not JSON", async () => {
      mockFetch.mockResolvedValueOnce({
        ok: true,
        status: 200,
        json: async () => {
          throw new SyntaxError("Unexpected token < in JSON");
        },
      });

      await expect(adapter.completion(basicParams)).rejects.toMatchObject({
        kind: "invalid_response",
      });
    });
  });
});
