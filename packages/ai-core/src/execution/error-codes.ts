// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-core/execution/error-codes`
 * Purpose: Stable error codes for failed model calls, used in logs and metrics labels.
 * Scope: Code list and normalization. Does NOT decide what the caller is told.
 * Invariants:
 *   - ERROR_NORMALIZATION_ONCE: normalizeErrorToExecutionCode() is the canonical normalizer
 *   - Recognizes AbortError, errors carrying a known `.code`, and LlmError (.status, .kind)
 * Side-effects: none
 * Links: llm-errors.ts
 * @public
 */

import { isLlmError } from "./llm-errors";

/**
 * - invalid_request: Request rejected by the provider as malformed (4xx)
 * - unauthorized: Gateway refused our credentials
 * - timeout: Request exceeded time limit
 * - aborted: Request was cancelled
 * - rate_limit: Provider rate limit exceeded (HTTP 429)
 * - upstream: Provider or gateway fault (5xx, network, unreadable response)
 * - internal: Anything else
 */
export const AI_EXECUTION_ERROR_CODES = [
  "invalid_request",
  "unauthorized",
  "timeout",
  "aborted",
  "rate_limit",
  "upstream",
  "internal",
] as const;

export type AiExecutionErrorCode = (typeof AI_EXECUTION_ERROR_CODES)[number];

export function isAiExecutionErrorCode(x: unknown): x is AiExecutionErrorCode {
  return (
    typeof x === "string" &&
    AI_EXECUTION_ERROR_CODES.some((code) => code === x)
  );
}

/**
 * Normalize any error to stable AiExecutionErrorCode.
 *
 * Priority:
 * 1. AbortError → "aborted"
 * 2. Error with a known `.code` → that code
 * 3. LlmError (.status first, then .kind)
 * 4. Default → "internal"
 */
export function normalizeErrorToExecutionCode(
  error: unknown
): AiExecutionErrorCode {
  if (error instanceof Error && error.name === "AbortError") {
    return "aborted";
  }

  if (error instanceof Error && "code" in error) {
    if (isAiExecutionErrorCode(error.code)) {
      return error.code;
    }
  }

  if (isLlmError(error)) {
    if (error.status === 429) return "rate_limit";
    if (error.status === 408) return "timeout";

    switch (error.kind) {
      case "rate_limited":
        return "rate_limit";
      case "timeout":
        return "timeout";
      case "aborted":
        return "aborted";
      case "auth":
        return "unauthorized";
      case "provider_4xx":
        return "invalid_request";
      case "provider_5xx":
      case "network":
      case "invalid_response":
        return "upstream";
      default:
        return "internal";
    }
  }

  return "internal";
}
