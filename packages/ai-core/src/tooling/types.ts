// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-core/tooling/types`
 * Purpose: Canonical semantic types for tool definitions, invocations, and execution results.
 * Scope: Framework-agnostic types. Does NOT import Zod — uses JSONSchema7 for wire formats.
 * Invariants:
 *   - TOOL_SEMANTICS_CANONICAL: These are the canonical types; wire formats are adapters
 *   - ToolSpec uses JSONSchema7 for inputSchema (compiled from Zod in @coursemate/ai-tools)
 *   - TOOL_OUTPUT_IS_TEXT: Every tool answers with text for the model plus the citations behind it
 * Side-effects: none (types only)
 * @public
 */

import type { JSONSchema7 } from "json-schema";

/**
 * Tool specification — the definition advertised to the model.
 *
 * This is the compiled form of a ToolContract (Zod → JSONSchema7).
 */
export interface ToolSpec {
  /** Stable tool name (snake_case); unique within a source */
  readonly name: string;
  /** Human-readable description for the model */
  readonly description: string;
  /** JSONSchema7 for input (compiled from Zod) */
  readonly inputSchema: JSONSchema7;
}

/**
 * Known error codes for tool execution failures.
 */
export type ToolErrorCode =
  | "validation"
  | "execution"
  | "unavailable"
  | "invalid_json";

/**
 * One source reference surfaced to the caller alongside an answer.
 * e.g. `{ text: "Intro to Python - Lesson 0", url: "https://…/lesson-0" }`
 */
export interface Citation {
  readonly text: string;
  readonly url?: string | undefined;
}

/**
 * Validated tool output.
 * `text` is what the model sees; `citations` are the sources it was built from.
 */
export interface ToolOutput {
  readonly text: string;
  readonly citations: readonly Citation[];
}

/**
 * Tool execution result shape.
 * Per TOOLRUNNER_RESULT_SHAPE: exec() returns this discriminated union.
 */
export type ToolResult<T> =
  | { readonly ok: true; readonly value: T }
  | {
      readonly ok: false;
      readonly errorCode: ToolErrorCode;
      readonly safeMessage: string;
    };

/**
 * Context for tool invocation — references only, NO secrets.
 */
export interface ToolInvocationContext {
  /** Run ID for correlation (one per answered query) */
  readonly runId: string;
  /** Stable tool call ID (model-provided or generated) */
  readonly toolCallId: string;
}

/**
 * Executable tool as seen by the runner.
 *
 * Owns validation and execution; the runner orchestrates the pipeline but
 * never imports Zod. Produced by `toBoundToolRuntime()` in @coursemate/ai-tools.
 */
export interface BoundToolRuntime {
  /** Tool name; same as spec.name */
  readonly id: string;
  readonly spec: ToolSpec;
  /** Parse raw model arguments. Throws on invalid input. */
  validateInput(rawArgs: unknown): unknown;
  /** Execute with validated input. */
  exec(validatedArgs: unknown, ctx: ToolInvocationContext): Promise<unknown>;
  /** Parse raw output into a ToolOutput. Throws on invalid output. */
  validateOutput(rawOutput: unknown): ToolOutput;
}
