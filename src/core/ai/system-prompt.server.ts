// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/ai/system-prompt.server`
 * Purpose: Course-assistant system prompt and its per-session history suffix.
 * Scope: Pure string construction. Does not read sessions.
 * Invariants: History, when present, follows the fixed prompt after a "Previous conversation:" header.
 * Side-effects: none
 * Links: Used by features/ai/graphs/tool-loop.graph.ts
 * @internal
 */

/**
 * Fixed instructions for answering questions about course materials.
 */
export const COURSE_SYSTEM_PROMPT = `You are an assistant for questions about course materials and educational content.

Tools:
- search_course_content: finds specific content inside course lessons.
- get_course_outline: returns a course's title, link, instructor and complete lesson list.

Tool use:
- Use get_course_outline for questions about a course's structure, outline or lessons; include the course title, course link and every lesson number with its title, plus the lesson link when available.
- Use search_course_content for questions about what a course or lesson teaches.
- You may use tools over at most two rounds; a second round is for following up on what the first returned.
- Answer general knowledge questions from what you know, without tools.
- If a tool finds nothing, say so plainly.

Answers:
- Give the answer only: no description of your search, your reasoning or the tools you used.
- Be brief, educational and clear; include examples when they help.
`;

/**
 * System instruction for one run, with the session's rendered history appended.
 */
export function buildSystemPrompt(history?: string): string {
  return history
    ? `${COURSE_SYSTEM_PROMPT}\n\nPrevious conversation:\n${history}`
    : COURSE_SYSTEM_PROMPT;
}
