// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/session-history.port`
 * Purpose: Conversation memory keyed by session ID.
 * Scope: Create, read, append and clear bounded exchange histories. Does not format prompts.
 * Invariants:
 *   - A session never holds more than its configured capacity; oldest exchanges are evicted first
 *   - Reading an unknown session yields undefined, never an error
 *   - append() to an unknown session creates it
 * Side-effects: none (interface only)
 * Links: adapters/server/session/in-memory-session.adapter.ts
 * @public
 */

export interface SessionHistoryPort {
  /** Mint a fresh, empty session and return its ID. */
  createSession(): Promise<string>;

  /**
   * History rendered as `User: …` / `Assistant: …` lines, oldest first.
   * @returns undefined when the session is unknown or empty
   */
  getHistory(sessionId: string): Promise<string | undefined>;

  append(sessionId: string, question: string, answer: string): Promise<void>;

  /** Forget every exchange in the session. Unknown IDs are a no-op. */
  clear(sessionId: string): Promise<void>;
}
