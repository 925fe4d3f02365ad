/**
 * @erpstack/env
 *
 * Centralized environment variable validation using @t3-oss/env-core
 *
 * ## Usage
 *
 * ### Installer process
 * ```typescript
 * import { parseInstallerEnv } from "@erpstack/env/server"
 *
 * const env = parseInstallerEnv(process.env)
 * const adminPassword = env.ERPNEXT_ADMIN_PASSWORD
 * ```
 *
 * ### Schemas only (tests, docs)
 * ```typescript
 * import { installerSchema } from "@erpstack/env"
 * ```
 *
 * ## Architecture
 *
 * - `/server` - Validation entry point, returns a typed env object
 * - `/` (this file) - Schema exports only, safe for any context
 */

// Export ONLY schemas - no env object, no side effects
export { installerSchema, looseValue, password } from "./schema.js"
