// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-core`
 * Purpose: Barrel export for executor-agnostic tool runtime primitives.
 * Scope: Re-exports public types and functions from submodules. Does NOT implement logic.
 * Invariants: SINGLE_SOURCE_OF_TRUTH - these are the canonical definitions.
 * Side-effects: none
 * @public
 */

// Execution errors
export {
  AI_EXECUTION_ERROR_CODES,
  type AiExecutionErrorCode,
  isAiExecutionErrorCode,
  normalizeErrorToExecutionCode,
} from "./execution/error-codes";
export {
  classifyLlmErrorFromStatus,
  isLlmError,
  LlmError,
  type LlmErrorKind,
} from "./execution/llm-errors";
// Tool source
export type { ToolSourcePort } from "./tooling/ports/tool-source.port";
export {
  createStaticToolSource,
  StaticToolSource,
} from "./tooling/sources/static.source";
// Tool runner
export {
  createToolRunner,
  type ToolExecOptions,
  type ToolRunner,
  type ToolRunnerConfig,
} from "./tooling/tool-runner";
// Tooling types
export type {
  BoundToolRuntime,
  Citation,
  ToolErrorCode,
  ToolInvocationContext,
  ToolOutput,
  ToolResult,
  ToolSpec,
} from "./tooling/types";
