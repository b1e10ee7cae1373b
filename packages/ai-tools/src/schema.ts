// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-tools/schema`
 * Purpose: Compile ToolContract (Zod) to ToolSpec (JSONSchema7); validate tool output.
 * Scope: Schema compilation and output schema only. Does not execute tools or touch IO.
 * Invariants:
 *   - NO_MANUAL_SCHEMA_DUPLICATION: JSONSchema derived from Zod, never hand-written
 *   - Compiled schemas carry no `$schema` key (providers reject or ignore it)
 * Side-effects: none
 * @public
 */

import type { ToolSpec } from "@coursemate/ai-core";
import type { JSONSchema7 } from "json-schema";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

import type { ToolContract } from "./types";

export const CitationSchema = z.object({
  text: z.string().min(1),
  url: z.string().optional(),
});

/**
 * Output schema shared by every tool.
 */
export const ToolOutputSchema = z.object({
  text: z.string(),
  citations: z.array(CitationSchema),
});

/**
 * Compile a ToolContract to a ToolSpec.
 */
export function toToolSpec<TInput>(
  contract: ToolContract<string, TInput>
): ToolSpec {
  const rawSchema = zodToJsonSchema(contract.inputSchema, {
    $refStrategy: "none",
  });

  const compiled: JSONSchema7 =
    typeof rawSchema === "object" && rawSchema !== null
      ? (rawSchema as JSONSchema7)
      : { type: "object" };
  const { $schema: _dialect, ...inputSchema } = compiled;

  return {
    name: contract.name,
    description: contract.description,
    inputSchema,
  };
}
