// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/tool-definitions`
 * Purpose: Map registry ToolSpecs to the OpenAI-compatible definitions sent with LLM requests.
 * Scope: Pure mapping. Does not register or execute tools.
 * Invariants: Output order equals registry order.
 * Side-effects: none
 * Links: @coursemate/ai-core (ToolSpec), ports/llm.port.ts
 * @public
 */

import type { ToolSpec } from "@coursemate/ai-core";

import type { LlmToolDefinition } from "@/ports";

export function toLlmToolDefinitions(
  specs: readonly ToolSpec[]
): LlmToolDefinition[] {
  return specs.map((spec) => ({
    type: "function",
    function: {
      name: spec.name,
      description: spec.description,
      parameters: spec.inputSchema,
    },
  }));
}
