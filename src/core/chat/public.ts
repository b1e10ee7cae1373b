// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/public`
 * Purpose: Public API for chat domain - allowed entry point for features.
 * Scope: Exposes core domain entities and business rules.
 * Side-effects: none
 * @public
 */

export type { Exchange, Message, MessageRole, MessageToolCall } from "./model";
export {
  assertQueryContent,
  ChatErrorCode,
  ChatValidationError,
  findUnpairedToolCalls,
  formatExchanges,
  MAX_QUERY_CHARS,
} from "./rules";
