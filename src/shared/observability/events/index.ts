// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry. Does not define full payload schemas.
 * Invariants: All event names registered here; logEvent() enforces base fields (reqId always).
 * Side-effects: none
 * Links: Used by logEvent(); consumed by features/ai and adapters.
 * @public
 */

export const EVENT_NAMES = {
  // AI Domain
  AI_QUERY_RECEIVED: "ai.query_received",
  AI_QUERY_COMPLETED: "ai.query_completed",
  AI_LLM_CALL_FAILED: "ai.llm_call_failed",
  AI_TOOL_CALL_FAILED: "ai.tool_call_failed",
  AI_TOOL_NOT_FOUND: "ai.tool_not_found",

  // Session Domain
  SESSION_EXCHANGE_RECORDED: "session.exchange_recorded",

  // Adapter Events
  ADAPTER_LITELLM_COMPLETION_RESULT: "adapter.litellm.completion_result",
  ADAPTER_COURSE_CATALOG_ERROR: "adapter.course_catalog.error",

  // Test Events
  TEST_EVENT: "TEST_EVENT",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/**
 * Required base fields for all events.
 * reqId is ALWAYS required (the run ID for query-scoped events).
 */
export interface EventBase {
  reqId: string;
}
