/**
 * @erpstack/shared
 *
 * Shared constants and the installer config used across all packages in the monorepo.
 *
 * @example
 * ```typescript
 * import { DEFAULTS, loadInstallerConfig, resolveConfigPath } from "@erpstack/shared"
 *
 * const { config } = loadInstallerConfig(resolveConfigPath())
 * const domain = config.defaultDomain // "erp.local" unless overridden
 * ```
 */

export {
  ADDON_APPS,
  type AddonApp,
  DEFAULTS,
  getBenchDir,
  PATHS,
  SUPPORTED_NODE_VERSIONS,
  TARGET_HOST,
} from "./constants.js"
export {
  defaultInstallerConfig,
  type InstallerConfig,
  installerConfigSchema,
  type LogLevelName,
  parseInstallerConfig,
  type RawInstallerConfig,
} from "./config-schema.js"
export { type LoadedConfig, loadInstallerConfig, resolveConfigPath } from "./config.js"
