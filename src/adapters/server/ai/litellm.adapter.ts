// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/litellm`
 * Purpose: LiteLLM service implementation for tool-calling chat completions with runtime secret validation.
 * Scope: Implements LlmService port over the OpenAI-compatible /v1/chat/completions endpoint. Does not handle auth or rate-limiting.
 * Invariants: Never logs prompts/keys/content; timeout from LLM_TIMEOUT_MS; model required; every failure is an LlmError.
 * Side-effects: IO (HTTP calls to LiteLLM)
 * Notes: assertRuntimeSecrets() before fetch; response validated with zod; logs only bounded metadata (no content).
 * Links: LlmService port, serverEnv, assertRuntimeSecrets
 * @internal
 */

import { z } from "zod";

import type { Message } from "@/core";
import {
  classifyLlmErrorFromStatus,
  LlmError,
  type LlmCompletionParams,
  type LlmCompletionResult,
  type LlmService,
  type LlmToolCall,
} from "@/ports";
import { serverEnv } from "@/shared/env";
import { assertRuntimeSecrets } from "@/shared/env/invariants";
import { EVENT_NAMES, logEvent, makeLogger } from "@/shared/observability";

const logger = makeLogger({ component: "LiteLlmAdapter" });

const ChatCompletionResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({
                  name: z.string(),
                  arguments: z.string(),
                }),
              })
            )
            .nullish(),
        }),
        finish_reason: z.string().nullish(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number().optional(),
    })
    .nullish(),
});

/**
 * Core Message → OpenAI wire message.
 * Assistant tool calls become `tool_calls`; tool outcomes carry `tool_call_id`.
 */
export function toWireMessage(msg: Message): Record<string, unknown> {
  if (msg.role === "assistant" && msg.toolCalls && msg.toolCalls.length > 0) {
    return {
      role: "assistant",
      content: msg.content.length > 0 ? msg.content : null,
      tool_calls: msg.toolCalls.map((call) => ({
        id: call.id,
        type: "function",
        function: { name: call.name, arguments: call.arguments },
      })),
    };
  }
  if (msg.role === "tool") {
    return {
      role: "tool",
      content: msg.content,
      tool_call_id: msg.toolCallId,
    };
  }
  return { role: msg.role, content: msg.content };
}

export class LiteLlmAdapter implements LlmService {
  async completion(params: LlmCompletionParams): Promise<LlmCompletionResult> {
    if (!params.model) {
      throw new Error("LiteLLM completion requires model parameter");
    }
    const { model, temperature, maxTokens } = params;
    const { requestId, sessionId } = params.caller;

    const requestBody = {
      model,
      messages: params.messages.map(toWireMessage),
      temperature,
      max_tokens: maxTokens,
      ...(params.tools &&
        params.tools.length > 0 && {
          tools: params.tools,
          tool_choice: params.toolChoice ?? "auto",
        }),
      metadata: {
        request_id: requestId,
        ...(sessionId !== undefined && { session_id: sessionId }),
      },
    };

    const env = serverEnv();
    // Validate runtime secrets at adapter boundary (not in serverEnv, which must stay import-safe)
    assertRuntimeSecrets(env);

    const timeoutSignal = AbortSignal.timeout(env.LLM_TIMEOUT_MS);
    const signal = params.abortSignal
      ? AbortSignal.any([timeoutSignal, params.abortSignal])
      : timeoutSignal;

    let response: Response;
    try {
      // Uses LITELLM_MASTER_KEY (server-only secret)
      response = await fetch(`${env.LITELLM_BASE_URL}/v1/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...(env.LITELLM_MASTER_KEY !== undefined && {
            Authorization: `Bearer ${env.LITELLM_MASTER_KEY}`,
          }),
        },
        body: JSON.stringify(requestBody),
        signal,
      });
    } catch (error) {
      if (params.abortSignal?.aborted) {
        throw new LlmError("LiteLLM request aborted", "aborted");
      }
      if (error instanceof Error) {
        if (error.name === "AbortError" || error.name === "TimeoutError") {
          throw new LlmError("LiteLLM request timed out", "timeout", 408);
        }
        throw new LlmError(
          `LiteLLM network error: ${error.message}`,
          "network"
        );
      }
      throw new LlmError("LiteLLM completion failed: Unknown error", "unknown");
    }

    if (!response.ok) {
      const kind = classifyLlmErrorFromStatus(response.status);
      throw new LlmError(
        `LiteLLM API error: ${response.status} ${response.statusText}`,
        kind,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new LlmError(
        "Invalid response from LiteLLM: body is not JSON",
        "invalid_response"
      );
    }

    const parsed = ChatCompletionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new LlmError("Invalid response from LiteLLM", "invalid_response");
    }
    const data = parsed.data;
    const [choice] = data.choices;
    if (!choice) {
      throw new LlmError("Invalid response from LiteLLM", "invalid_response");
    }

    const content = choice.message.content ?? "";
    const toolCalls: LlmToolCall[] = (choice.message.tool_calls ?? []).map(
      (call) => ({
        id: call.id,
        type: "function",
        function: {
          name: call.function.name,
          arguments: call.function.arguments,
        },
      })
    );

    const resolvedModel = data.model ?? model;

    // Build result object conditionally to satisfy exactOptionalPropertyTypes
    const result: LlmCompletionResult = {
      message: {
        role: "assistant",
        content,
        ...(toolCalls.length > 0 && {
          toolCalls: toolCalls.map((call) => ({
            id: call.id,
            name: call.function.name,
            arguments: call.function.arguments,
          })),
        }),
      },
      resolvedModel,
    };

    if (choice.finish_reason) {
      result.finishReason = choice.finish_reason;
    }
    if (toolCalls.length > 0) {
      result.toolCalls = toolCalls;
    }
    if (data.usage) {
      const promptTokens = data.usage.prompt_tokens;
      const completionTokens = data.usage.completion_tokens;
      result.usage = {
        promptTokens,
        completionTokens,
        totalTokens: data.usage.total_tokens ?? promptTokens + completionTokens,
      };
    }

    // Sanitized adapter log (no content, bounded fields only)
    logEvent(logger, EVENT_NAMES.ADAPTER_LITELLM_COMPLETION_RESULT, {
      reqId: requestId,
      model: resolvedModel,
      tokensUsed: result.usage?.totalTokens,
      finishReason: result.finishReason,
      toolCallCount: toolCalls.length,
      contentLength: content.length,
    });

    return result;
  }
}
