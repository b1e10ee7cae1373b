// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env`
 * Purpose: Public surface for environment configuration.
 * Scope: Re-exports server env, its error types and runtime secret checks. Does not export internal schemas.
 * Side-effects: none
 * @public
 */

export { assertRuntimeSecrets, RuntimeSecretError } from "./invariants";
export type { ServerEnv } from "./server";
export { EnvValidationError, serverEnv } from "./server";
