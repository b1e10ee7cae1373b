// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces. Does not modify or transform exports.
 * Invariants: Named exports only, no export *
 * Side-effects: none
 * Links: Used by features, ports and adapters via \@/core alias
 * @public
 */

export {
  buildSystemPrompt,
  COURSE_SYSTEM_PROMPT,
} from "./ai/system-prompt.server";
export {
  assertQueryContent,
  ChatErrorCode,
  ChatValidationError,
  type Exchange,
  findUnpairedToolCalls,
  formatExchanges,
  MAX_QUERY_CHARS,
  type Message,
  type MessageRole,
  type MessageToolCall,
} from "./chat/public";
