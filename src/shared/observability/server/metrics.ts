// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/metrics`
 * Purpose: Prometheus metrics for model calls, tool calls and query runs.
 * Scope: Registry + metric definitions. Does not expose an HTTP endpoint.
 * Invariants: Single registry per process (survives test module reloads); labels carry no user content.
 * Side-effects: global (metrics registry)
 * @public
 */

import type { Counter, Histogram, Registry } from "prom-client";
import client from "prom-client";

// Singleton via globalThis to survive test reloads
const globalForMetrics = globalThis as typeof globalThis & {
  metricsRegistry?: Registry;
};

export const metricsRegistry: Registry =
  globalForMetrics.metricsRegistry ?? new client.Registry();
globalForMetrics.metricsRegistry = metricsRegistry;

metricsRegistry.setDefaultLabels({ app: "coursemate" });

function getOrCreateCounter<T extends string>(
  name: string,
  help: string,
  labelNames: T[]
): Counter<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Counter<T>;
  return new client.Counter({
    name,
    help,
    labelNames,
    registers: [metricsRegistry],
  });
}

function getOrCreateHistogram<T extends string>(
  name: string,
  help: string,
  labelNames: T[],
  buckets: number[]
): Histogram<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Histogram<T>;
  return new client.Histogram({
    name,
    help,
    labelNames,
    buckets,
    registers: [metricsRegistry],
  });
}

export const aiLlmCallDurationMs = getOrCreateHistogram(
  "ai_llm_call_duration_ms",
  "LLM call duration in milliseconds",
  ["phase"],
  [100, 500, 1000, 2500, 5000, 10000, 30000]
);

export const aiLlmErrorsTotal = getOrCreateCounter(
  "ai_llm_errors_total",
  "LLM call errors by normalized code",
  ["phase", "code"]
);

export const aiToolCallsTotal = getOrCreateCounter(
  "ai_tool_calls_total",
  "Tool calls by tool and outcome",
  ["tool", "outcome"]
);

export const aiQueryRounds = getOrCreateHistogram(
  "ai_query_rounds",
  "Tool rounds used per answered query",
  ["exit"],
  [0, 1, 2, 3, 5]
);
