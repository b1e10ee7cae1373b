// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/rules`
 * Purpose: Pure business rules for queries and tool-call conversations.
 * Scope: Deterministic validation with actionable errors. Does not handle I/O or time dependencies.
 * Invariants: All functions are pure and deterministic
 * Side-effects: none (throws on validation failure)
 * Links: Used by features/ai for query validation and tool-call pairing checks
 * @public
 */

import type { Exchange, Message } from "./model";

export const MAX_QUERY_CHARS = 4000;

export enum ChatErrorCode {
  EMPTY_QUERY = "EMPTY_QUERY",
  QUERY_TOO_LONG = "QUERY_TOO_LONG",
}

export class ChatValidationError extends Error {
  constructor(
    public code: ChatErrorCode,
    message: string
  ) {
    super(message);
    this.name = "ChatValidationError";
  }
}

/**
 * @throws ChatValidationError when the query is blank or longer than maxChars
 */
export function assertQueryContent(query: string, maxChars: number): void {
  if (query.trim().length === 0) {
    throw new ChatValidationError(
      ChatErrorCode.EMPTY_QUERY,
      "Query must not be empty"
    );
  }

  // Count code points, not UTF-16 units
  const actualLength = Array.from(query).length;
  if (actualLength > maxChars) {
    throw new ChatValidationError(
      ChatErrorCode.QUERY_TOO_LONG,
      `Query length ${actualLength} exceeds maximum ${maxChars} characters`
    );
  }
}

/**
 * IDs of assistant tool calls that have no `tool` message answering them.
 * An empty result means the conversation is well-formed for the next model call.
 */
export function findUnpairedToolCalls(messages: readonly Message[]): string[] {
  const answered = new Set<string>();
  for (const message of messages) {
    if (message.role === "tool" && message.toolCallId !== undefined) {
      answered.add(message.toolCallId);
    }
  }

  const unpaired: string[] = [];
  for (const message of messages) {
    for (const call of message.toolCalls ?? []) {
      if (!answered.has(call.id)) unpaired.push(call.id);
    }
  }
  return unpaired;
}

/**
 * Render exchanges oldest first as alternating `User:` / `Assistant:` lines.
 * @returns undefined when there is nothing to render
 */
export function formatExchanges(
  exchanges: readonly Exchange[]
): string | undefined {
  if (exchanges.length === 0) return undefined;
  return exchanges
    .map((e) => `User: ${e.question}\nAssistant: ${e.answer}`)
    .join("\n");
}
