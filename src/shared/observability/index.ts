// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability - event registry, logging, metrics.
 * Scope: Unified entry point for observability utilities. Does not implement logic.
 * Invariants: No imports from bootstrap or ports.
 * Side-effects: none
 * @public
 */

export { EVENT_NAMES, type EventBase, type EventName } from "./events";
export {
  type Logger,
  makeLogger,
  makeNoopLogger,
  REDACT_PATHS,
} from "./logging";
export {
  aiLlmCallDurationMs,
  aiLlmErrorsTotal,
  aiQueryRounds,
  aiToolCallsTotal,
  type EventLevel,
  logEvent,
  metricsRegistry,
} from "./server";
