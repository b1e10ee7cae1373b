// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-core/tooling/ports/tool-source.port`
 * Purpose: Port for tool lookup and spec listing.
 * Scope: Interface only. Does NOT execute tools.
 * Invariants:
 *   - TOOL_SOURCE_RETURNS_BOUND_TOOL: getBoundTool returns an executable BoundToolRuntime
 *   - TOOL_ID_STABILITY: The set of tool names does not change while a run is in flight
 * Side-effects: none (interface only)
 * @public
 */

import type { BoundToolRuntime, ToolSpec } from "../types";

export interface ToolSourcePort {
  /** Executable tool by name, or undefined when unknown. */
  getBoundTool(toolId: string): BoundToolRuntime | undefined;
  /** Definitions to advertise to the model, in registration order. */
  listToolSpecs(): readonly ToolSpec[];
  hasToolId(toolId: string): boolean;
}
