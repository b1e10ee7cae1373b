// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-core/execution/llm-errors`
 * Purpose: Typed failure raised by LLM adapters at the HTTP boundary.
 * Scope: Defines LlmError and status classification. Does not implement normalization (see error-codes.ts).
 * Invariants:
 *   - LlmError captures kind + optional HTTP status at throw site (adapter boundary)
 *   - message is safe to show to an end user (no keys, no request bodies)
 * Side-effects: none
 * Links: error-codes.ts (normalizeErrorToExecutionCode)
 * @public
 */

/**
 * Error classification kinds for LLM failures.
 */
export type LlmErrorKind =
  | "timeout"
  | "rate_limited"
  | "auth"
  | "provider_4xx"
  | "provider_5xx"
  | "network"
  | "invalid_response"
  | "aborted"
  | "unknown";

export class LlmError extends Error {
  readonly kind: LlmErrorKind;
  readonly status: number | undefined;

  constructor(message: string, kind: LlmErrorKind, status?: number) {
    super(message);
    this.name = "LlmError";
    this.kind = kind;
    this.status = status;
  }
}

export function isLlmError(error: unknown): error is LlmError {
  return error instanceof LlmError;
}

/**
 * Classify LlmError kind from HTTP status code.
 */
export function classifyLlmErrorFromStatus(status: number): LlmErrorKind {
  if (status === 408) return "timeout";
  if (status === 429) return "rate_limited";
  if (status === 401 || status === 403) return "auth";
  if (status >= 400 && status < 500) return "provider_4xx";
  if (status >= 500 && status < 600) return "provider_5xx";
  return "unknown";
}
