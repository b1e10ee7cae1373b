// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/llm.port`
 * Purpose: LLM service abstraction for hexagonal architecture.
 * Scope: One non-streaming chat completion with optional tool definitions. Does not handle authentication or rate limiting.
 * Invariants: Only depends on core domain types, no infrastructure concerns
 * Side-effects: none (interface only)
 * Notes: Failures surface as LlmError (re-exported from @coursemate/ai-core) so callers can classify them.
 * Links: Implemented by adapters/server/ai/litellm.adapter.ts, used by features/ai
 * @public
 */

import type { JSONSchema7 } from "json-schema";

import type { Message } from "@/core";

// Re-export Message for adapters
export type { Message } from "@/core";

// ─────────────────────────────────────────────────────────────────────────────
// Tool Types (OpenAI-compatible format for LiteLLM)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Tool definition in OpenAI function-calling format.
 * Used to declare tools to the LLM.
 */
export interface LlmToolDefinition {
  readonly type: "function";
  readonly function: {
    readonly name: string;
    readonly description?: string;
    readonly parameters: JSONSchema7;
  };
}

/**
 * Completed tool call from LLM response.
 */
export interface LlmToolCall {
  readonly id: string;
  readonly type: "function";
  readonly function: {
    readonly name: string;
    readonly arguments: string; // JSON string, needs parsing
  };
}

/**
 * Tool choice specification for LLM request.
 * - "auto": LLM decides whether to use tools
 * - "none": Disable tool use
 * - "required": Force tool use
 * - {function: {name}}: Force specific tool
 */
export type LlmToolChoice =
  | "auto"
  | "none"
  | "required"
  | { readonly type: "function"; readonly function: { readonly name: string } };

/**
 * Who is asking. Propagated to the gateway as request metadata.
 */
export interface LlmCaller {
  /** Request correlation ID (one per answered query) */
  requestId: string;
  sessionId?: string | undefined;
}

export interface LlmCompletionParams {
  messages: Message[];
  model: string;
  temperature: number;
  maxTokens: number;
  caller: LlmCaller;
  abortSignal?: AbortSignal;
  /** Tool definitions for function calling */
  tools?: LlmToolDefinition[];
  /** Tool choice strategy */
  toolChoice?: LlmToolChoice;
}

/**
 * Result type for LLM completion operations.
 */
export interface LlmCompletionResult {
  message: Message;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  finishReason?: "stop" | "length" | "tool_calls" | "content_filter" | string;
  /** Tool calls requested by the model (when finish_reason == "tool_calls") */
  toolCalls?: LlmToolCall[];
  /** Resolved model ID (e.g., "gpt-4o-mini-2024-07-18") from LiteLLM response */
  resolvedModel?: string;
}

export interface LlmService {
  /** @throws LlmError on transport, provider or response-shape failures */
  completion(params: LlmCompletionParams): Promise<LlmCompletionResult>;
}
