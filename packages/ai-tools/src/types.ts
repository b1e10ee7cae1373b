// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-tools/types`
 * Purpose: Core type definitions for tool contracts and implementations.
 * Scope: Defines ToolContract, ToolImplementation, BoundTool. Pure types, no runtime logic.
 * Invariants:
 *   - inputSchema is the source of truth; validateInput and the advertised JSONSchema derive from it
 *   - Every tool answers with a ToolOutput (text + citations)
 * Side-effects: none (types only)
 * @public
 */

import type { ToolInvocationContext, ToolOutput } from "@coursemate/ai-core";
import type { z } from "zod";

/**
 * Tool contract definition.
 * Schema and description of a tool without its implementation.
 */
export interface ToolContract<TName extends string, TInput> {
  /** Stable tool name (snake_case) */
  readonly name: TName;
  /** Human-readable description for the model */
  readonly description: string;
  /** Zod schema for input validation; compiled to JSONSchema7 by toToolSpec() */
  readonly inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
}

/**
 * Tool implementation interface.
 * Receives validated input; should report its own failures as text rather than throw.
 */
export interface ToolImplementation<TInput> {
  readonly execute: (
    input: TInput,
    ctx: ToolInvocationContext
  ) => Promise<ToolOutput>;
}

/**
 * Bound tool: contract + implementation together.
 */
export interface BoundTool<TName extends string, TInput> {
  readonly contract: ToolContract<TName, TInput>;
  readonly implementation: ToolImplementation<TInput>;
}
