// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/model`
 * Purpose: Domain entities for a tool-calling conversation and its remembered exchanges.
 * Scope: Types only. Does not contain validation or I/O.
 * Invariants: A `tool` message always names the tool call it answers via toolCallId.
 * Side-effects: none
 * Links: rules.ts, ports/llm.port.ts
 * @public
 */

/**
 * Tool call embedded in assistant message.
 * Represents a request from the LLM to invoke a tool.
 */
export interface MessageToolCall {
  /** Unique ID for this tool call (model-provided) */
  readonly id: string;
  /** Tool name (snake_case) */
  readonly name: string;
  /** JSON-encoded arguments string */
  readonly arguments: string;
}

export type MessageRole = "user" | "assistant" | "system" | "tool";

export interface Message {
  role: MessageRole;
  content: string;
  /** Tool calls requested by assistant (present when role="assistant" and LLM wants to use tools) */
  toolCalls?: MessageToolCall[];
  /** Tool call ID this message responds to (present when role="tool") */
  toolCallId?: string;
}

/**
 * One answered question, as remembered by a session.
 */
export interface Exchange {
  readonly question: string;
  readonly answer: string;
}
