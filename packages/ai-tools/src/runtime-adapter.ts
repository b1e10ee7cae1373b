// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-tools/runtime-adapter`
 * Purpose: Convert BoundTool (ai-tools) to BoundToolRuntime (ai-core interface).
 * Scope: Adapter creation only. Does not execute tools.
 * Invariants:
 *   - TOOL_SOURCE_RETURNS_BOUND_TOOL: Returns executable BoundToolRuntime
 *   - Zod validation stays in this layer; ai-core sees only the interface
 *   - Spec compiled once per runtime
 * Side-effects: none
 * @public
 */

import type {
  BoundToolRuntime,
  ToolInvocationContext,
  ToolOutput,
} from "@coursemate/ai-core";

import { ToolOutputSchema, toToolSpec } from "./schema";
import type { BoundTool, ToolContract, ToolImplementation } from "./types";

/**
 * Convert a BoundTool to the BoundToolRuntime interface.
 *
 * The returned runtime owns validation and execution; the tool runner
 * orchestrates but never imports Zod.
 */
export function toBoundToolRuntime<TInput>(
  boundTool: BoundTool<string, TInput>
): BoundToolRuntime {
  const { contract, implementation } = boundTool;
  const spec = toToolSpec(contract);

  return {
    id: contract.name,
    spec,

    validateInput(rawArgs: unknown): unknown {
      return contract.inputSchema.parse(rawArgs);
    },

    async exec(
      validatedArgs: unknown,
      ctx: ToolInvocationContext
    ): Promise<unknown> {
      // parse is idempotent on validated input and gives us TInput back
      return implementation.execute(
        contract.inputSchema.parse(validatedArgs),
        ctx
      );
    },

    validateOutput(rawOutput: unknown): ToolOutput {
      return ToolOutputSchema.parse(rawOutput);
    },
  };
}

/**
 * Create BoundToolRuntime from a contract and an implementation built at bootstrap
 * (with its capabilities injected).
 */
export function contractToRuntime<TInput>(
  contract: ToolContract<string, TInput>,
  implementation: ToolImplementation<TInput>
): BoundToolRuntime {
  return toBoundToolRuntime({ contract, implementation });
}
