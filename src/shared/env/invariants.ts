// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/invariants`
 * Purpose: Fail-fast validation of runtime secrets beyond the Zod schema.
 * Scope: Runtime secret checks at adapter boundaries only. Does NOT run at module init.
 * Invariants: Throws RuntimeSecretError on missing secrets; memoizes production only.
 * Side-effects: none
 * Notes: Call assertRuntimeSecrets() from adapter methods, never from import-time code.
 * Links: src/shared/env/server.ts, src/adapters/server/ai/litellm.adapter.ts
 * @public
 */

/**
 * Minimal type for env invariant validation.
 * Kept inline to avoid circular imports with server.ts
 */
interface ParsedEnv {
  APP_ENV: "test" | "production";
  LITELLM_MASTER_KEY?: string | undefined;
}

/**
 * Only memoizes in production; tests change env vars between runs.
 */
let _prodSecretsValidated = false;

/**
 * Asserts runtime secrets are present when required.
 *
 * @throws RuntimeSecretError if runtime secrets are missing
 */
export function assertRuntimeSecrets(env: ParsedEnv): void {
  if (env.APP_ENV === "production" && _prodSecretsValidated) return;

  if (
    env.APP_ENV === "production" &&
    (!env.LITELLM_MASTER_KEY || env.LITELLM_MASTER_KEY.trim() === "")
  ) {
    throw new RuntimeSecretError(
      "APP_ENV=production requires non-empty LITELLM_MASTER_KEY"
    );
  }

  if (env.APP_ENV === "production") {
    _prodSecretsValidated = true;
  }
}

/**
 * Typed error for runtime secret validation failures.
 * Allows consumers to detect secret issues without string matching.
 */
export class RuntimeSecretError extends Error {
  readonly code = "MISSING_RUNTIME_SECRET" as const;

  constructor(message: string) {
    super(message);
    this.name = "RuntimeSecretError";
  }
}
