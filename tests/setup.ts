// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/setup`
 * Purpose: Global test environment setup.
 * Scope: Sets the env vars every suite needs for env validation. Does NOT mock specific services or ports.
 * Invariants: Tests run in isolation; APP_ENV=test so the container wires in-process fakes; no network.
 * Side-effects: process.env
 * Links: vitest.config.mts
 * @public
 */

import { beforeAll } from "vitest";

/**
 * Global test setup for deterministic, isolated testing.
 *
 * - Unit tests: no I/O, no time, no RNG (use _fakes)
 * - HTTP adapters: stubbed global fetch
 */
beforeAll(() => {
  // Minimal env for validation; suites that test env itself override these
  Object.assign(process.env, {
    NODE_ENV: "test",
    APP_ENV: "test",
    LITELLM_MASTER_KEY: "test-key",
  });
});
