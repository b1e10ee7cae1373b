// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-core/tooling/sources/static.source`
 * Purpose: In-process tool registry keyed by tool name.
 * Scope: Implements ToolSourcePort for tools registered at bootstrap. Does NOT import Zod or modify tools.
 * Invariants:
 *   - TOOL_SOURCE_RETURNS_BOUND_TOOL: Returns BoundToolRuntime from map
 *   - TOOL_ID_STABILITY: Duplicate names throw at registration; never silently overwrite
 *   - Specs listed in registration order
 * Side-effects: none
 * @public
 */

import type { ToolSourcePort } from "../ports/tool-source.port";
import type { BoundToolRuntime, ToolSpec } from "../types";

/**
 * Static tool source: the tool registry for one process.
 *
 * Tools are registered during bootstrap and only read afterwards, so a
 * single instance can be shared by concurrent runs.
 */
export class StaticToolSource implements ToolSourcePort {
  private readonly toolMap = new Map<string, BoundToolRuntime>();
  private specs: readonly ToolSpec[] = [];

  /**
   * Register a tool under its name.
   *
   * @throws If a tool with the same name is already registered (per TOOL_ID_STABILITY)
   */
  register(tool: BoundToolRuntime): void {
    if (this.toolMap.has(tool.id)) {
      throw new Error(
        `TOOL_ID_STABILITY violation: Duplicate tool ID "${tool.id}". ` +
          "Tool IDs must be unique within a source."
      );
    }
    this.toolMap.set(tool.id, tool);
    this.specs = Object.freeze([...this.specs, tool.spec]);
  }

  getBoundTool(toolId: string): BoundToolRuntime | undefined {
    return this.toolMap.get(toolId);
  }

  listToolSpecs(): readonly ToolSpec[] {
    return this.specs;
  }

  hasToolId(toolId: string): boolean {
    return this.toolMap.has(toolId);
  }

  get size(): number {
    return this.toolMap.size;
  }

  getToolIds(): readonly string[] {
    return Array.from(this.toolMap.keys());
  }
}

/**
 * Create a StaticToolSource from an array of BoundToolRuntime.
 *
 * @throws If duplicate tool IDs are detected (per TOOL_ID_STABILITY)
 */
export function createStaticToolSource(
  tools: readonly BoundToolRuntime[]
): StaticToolSource {
  const source = new StaticToolSource();
  for (const tool of tools) {
    source.register(tool);
  }
  return source;
}
