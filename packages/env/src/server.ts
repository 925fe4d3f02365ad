/**
 * Environment validation for the installer process
 *
 * @example
 * ```typescript
 * import { parseInstallerEnv } from "@erpstack/env/server"
 *
 * const env = parseInstallerEnv(process.env)
 * const domain = env.ERPNEXT_DOMAIN // undefined when not set
 * ```
 */

import { createEnv } from "@t3-oss/env-core"
import { installerSchema } from "./schema.js"

/**
 * Validate the installer's environment variables.
 *
 * Takes the source explicitly (no module-level `env` object) so the CLI can
 * validate once at startup and tests can pass a plain record. Empty strings
 * count as unset. Throws on invalid values, naming every offending variable.
 */
export function parseInstallerEnv(source: Record<string, string | undefined>) {
  return createEnv({
    server: installerSchema,
    runtimeEnv: source,
    isServer: true,

    /**
     * Custom error handling
     */
    onValidationError: error => {
      const fields = Object.entries(error.flatten().fieldErrors)
        .map(([key, messages]) => `${key} (${(messages ?? []).join(", ")})`)
        .join("; ")
      throw new Error(`Invalid environment variables: ${fields}`)
    },

    emptyStringAsUndefined: true,
  })
}

export type InstallerEnv = ReturnType<typeof parseInstallerEnv>
