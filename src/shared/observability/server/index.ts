// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server`
 * Purpose: Server-side observability surface: event logging and metrics.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export { type EventLevel, logEvent } from "./logEvent";
export {
  aiLlmCallDurationMs,
  aiLlmErrorsTotal,
  aiQueryRounds,
  aiToolCallsTotal,
  metricsRegistry,
} from "./metrics";
