// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/session/in-memory-session`
 * Purpose: Process-local SessionHistoryPort with FIFO-bounded exchange lists.
 * Scope: Holds exchanges in a Map for the lifetime of the process. Does not persist or expire sessions.
 * Invariants:
 *   - exchanges.length <= capacity after every append
 *   - append mutates synchronously (no await before the write), so appends to one session never interleave
 * Side-effects: global (in-process state)
 * Links: ports/session-history.port.ts, core/chat/rules.ts (formatExchanges)
 * @public
 */

import { randomUUID } from "node:crypto";

import { type Exchange, formatExchanges } from "@/core";
import type { SessionHistoryPort } from "@/ports";

export interface InMemorySessionConfig {
  /** Exchanges kept per session; oldest evicted first */
  capacity: number;
}

export class InMemorySessionAdapter implements SessionHistoryPort {
  private readonly sessions = new Map<string, Exchange[]>();
  private readonly capacity: number;

  constructor(config: InMemorySessionConfig) {
    if (!Number.isInteger(config.capacity) || config.capacity < 0) {
      throw new Error(
        `Session capacity must be a non-negative integer, got ${config.capacity}`
      );
    }
    this.capacity = config.capacity;
  }

  async createSession(): Promise<string> {
    const id = randomUUID();
    this.sessions.set(id, []);
    return id;
  }

  async getHistory(sessionId: string): Promise<string | undefined> {
    const exchanges = this.sessions.get(sessionId);
    return exchanges ? formatExchanges(exchanges) : undefined;
  }

  async append(
    sessionId: string,
    question: string,
    answer: string
  ): Promise<void> {
    const exchanges = this.sessions.get(sessionId) ?? [];
    exchanges.push({ question, answer });
    while (exchanges.length > this.capacity) {
      exchanges.shift();
    }
    this.sessions.set(sessionId, exchanges);
  }

  async clear(sessionId: string): Promise<void> {
    if (this.sessions.has(sessionId)) {
      this.sessions.set(sessionId, []);
    }
  }

  /** Number of sessions currently held */
  get size(): number {
    return this.sessions.size;
  }
}
