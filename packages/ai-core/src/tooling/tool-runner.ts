// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@coursemate/ai-core/tooling/tool-runner`
 * Purpose: Dispatch a model tool call to a registered tool through a fixed validation pipeline.
 * Scope: Sole owner of toolCallId generation; executes tools via ToolSourcePort. Does not import from src/ or log.
 * Invariants:
 *   - GRAPHS_USE_TOOLRUNNER_ONLY: Graphs invoke tools exclusively through toolRunner.exec()
 *   - TOOLRUNNER_RESULT_SHAPE: Returns {ok:true, value} | {ok:false, errorCode, safeMessage}
 *   - TOOLRUNNER_PIPELINE_ORDER: tool lookup → validate args → execute → validate result → return
 *   - Never throws; every failure is a ToolResult
 * Side-effects: whatever the executed tool does
 * Links: @coursemate/ai-tools (runtime-adapter)
 * @public
 */

import type { ToolSourcePort } from "./ports/tool-source.port";
import type { ToolOutput, ToolResult } from "./types";

/** Charset for provider-compatible tool call IDs */
const TOOL_ID_CHARS =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

/** Generate 9-char alphanumeric tool call ID (provider-compatible) */
function generateToolCallId(): string {
  const bytes = new Uint8Array(9);
  crypto.getRandomValues(bytes);
  let id = "";
  for (const b of bytes) id += TOOL_ID_CHARS[b % TOOL_ID_CHARS.length];
  return id;
}

function messageOf(err: unknown, fallback: string): string {
  return err instanceof Error ? err.message : fallback;
}

/**
 * Options for tool execution.
 */
export interface ToolExecOptions {
  /** Model-provided tool call ID (used if available, else generated) */
  readonly modelToolCallId?: string;
}

/**
 * Configuration for tool runner creation.
 */
export interface ToolRunnerConfig {
  /** Run ID handed to tools for correlation. Default: "toolrunner_default" */
  readonly runId?: string;
}

/**
 * Create a tool runner over the given tool source.
 *
 * @param source - Tool source providing getBoundTool() lookup
 * @param config - Optional configuration (runId)
 * @returns Tool runner with exec method
 */
export function createToolRunner(
  source: ToolSourcePort,
  config?: ToolRunnerConfig
) {
  const runId = config?.runId ?? "toolrunner_default";

  /**
   * Execute a tool by name with given arguments.
   * Follows fixed pipeline per TOOLRUNNER_PIPELINE_ORDER.
   *
   * @param toolName - Name of the tool to execute
   * @param rawArgs - Parsed (but unvalidated) arguments from the model
   * @param options - Execution options (e.g., model-provided toolCallId)
   */
  async function exec(
    toolName: string,
    rawArgs: unknown,
    options?: ToolExecOptions
  ): Promise<ToolResult<ToolOutput>> {
    const toolCallId = options?.modelToolCallId ?? generateToolCallId();

    const boundTool = source.getBoundTool(toolName);
    if (!boundTool) {
      return {
        ok: false,
        errorCode: "unavailable",
        safeMessage: `Tool '${toolName}' is not available`,
      };
    }

    // 1. Validate args
    let validatedInput: unknown;
    try {
      validatedInput = boundTool.validateInput(rawArgs);
    } catch (err) {
      return {
        ok: false,
        errorCode: "validation",
        safeMessage: messageOf(err, "Invalid tool arguments"),
      };
    }

    // 2. Execute
    let rawOutput: unknown;
    try {
      rawOutput = await boundTool.exec(validatedInput, { runId, toolCallId });
    } catch (err) {
      return {
        ok: false,
        errorCode: "execution",
        safeMessage: messageOf(err, "Tool execution failed"),
      };
    }

    // 3. Validate result
    try {
      return { ok: true, value: boundTool.validateOutput(rawOutput) };
    } catch (err) {
      return {
        ok: false,
        errorCode: "validation",
        safeMessage: messageOf(err, "Invalid tool output"),
      };
    }
  }

  return { exec };
}

/**
 * Type for the tool runner instance.
 */
export type ToolRunner = ReturnType<typeof createToolRunner>;
