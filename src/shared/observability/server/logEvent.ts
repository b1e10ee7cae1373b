// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/logEvent`
 * Purpose: Type-safe structured event logging with enforced base fields.
 * Scope: Emit registry-named events through a pino logger. Does not create loggers.
 * Invariants: eventName from EVENT_NAMES; reqId always present (throws under Vitest when missing).
 * Side-effects: IO (log output)
 * @public
 */

import type { Logger } from "pino";

import type { EventBase, EventName } from "../events";

export type EventLevel = "info" | "warn" | "error";

/**
 * @param logger - Pino logger instance
 * @param eventName - Event name from EVENT_NAMES registry
 * @param fields - Event-specific fields (MUST include reqId)
 * @param level - Log level (default info)
 */
export function logEvent(
  logger: Logger,
  eventName: EventName,
  fields: EventBase & Record<string, unknown>,
  level: EventLevel = "info"
): void {
  if (!fields.reqId) {
    const isStrict =
      typeof process !== "undefined" && process.env.VITEST === "true";

    if (isStrict) {
      throw new Error(
        `INVARIANT VIOLATION: logEvent("${eventName}") called without reqId`
      );
    }
    logger.error(
      { event: eventName, missingField: "reqId" },
      "inv_missing_reqId_in_logEvent"
    );
    return;
  }

  logger[level]({ event: eventName, ...fields }, eventName);
}
