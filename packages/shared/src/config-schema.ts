/**
 * Installer Config Zod Schema - SINGLE SOURCE OF TRUTH
 *
 * Validates the optional erpstack.conf file at parse time. The file is a flat
 * shell-style `KEY=VALUE` mapping (comments and quotes allowed), every key is
 * optional and falls back to DEFAULTS. Unknown keys cause errors.
 */

import { parse as parseDotenv } from "dotenv"
import { z } from "zod"
import { ADDON_APPS, DEFAULTS, PATHS } from "./constants.js"

// ---------------------------------------------------------------------------
// Reusable validators
// ---------------------------------------------------------------------------

const positiveInt = z.coerce.number().int().positive()
const pathStr = z.string().min(1).startsWith("/")
const branchStr = z.string().regex(/^[\w.-]+$/)

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .refine(value => ["true", "false", "yes", "no", "1", "0"].includes(value), {
    message: "Expected true or false",
  })
  .transform(value => value === "true" || value === "yes" || value === "1")

const logLevel = z
  .string()
  .trim()
  .toUpperCase()
  .pipe(z.enum(["DEBUG", "INFO", "WARN", "ERROR"]))

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const installerConfigSchema = z
  .object({
    CONFIG_MIN_RAM_GB: positiveInt.default(DEFAULTS.MIN_RAM_GB),
    CONFIG_MIN_DISK_GB: positiveInt.default(DEFAULTS.MIN_DISK_GB),

    CONFIG_FRAPPE_VERSION: branchStr.default(DEFAULTS.FRAPPE_BRANCH),
    CONFIG_ERPNEXT_VERSION: branchStr.default(DEFAULTS.ERPNEXT_BRANCH),
    CONFIG_NODE_VERSION: z.string().regex(/^\d+$/).default(DEFAULTS.NODE_VERSION),

    // Domain and account values are checked by the provisioner's field
    // validators, which fall back to the built-in default with a warning.
    CONFIG_DEFAULT_DOMAIN: z.string().trim().default(DEFAULTS.DOMAIN),
    CONFIG_QUICK_DOMAIN: z.string().trim().default(DEFAULTS.QUICK_DOMAIN),
    CONFIG_DEFAULT_USER: z.string().trim().default(DEFAULTS.SERVICE_ACCOUNT),

    CONFIG_DB_ROOT_PASSWORD_LENGTH: positiveInt.min(12).max(128).default(DEFAULTS.DB_ROOT_PASSWORD_LENGTH),
    CONFIG_ADMIN_PASSWORD_LENGTH: positiveInt.min(8).max(128).default(DEFAULTS.ADMIN_PASSWORD_LENGTH),

    CONFIG_DB_SECURE: flag.default(String(DEFAULTS.DB_SECURE)),
    CONFIG_SUDO_LIMITED: flag.default(String(DEFAULTS.SUDO_LIMITED)),
    CONFIG_FIREWALL_ENABLED: flag.default(String(DEFAULTS.FIREWALL_ENABLED)),
    CONFIG_PRODUCTION_MODE: flag.default(String(DEFAULTS.PRODUCTION_MODE)),

    CONFIG_INSTALL_HRMS: flag.default("false"),
    CONFIG_INSTALL_PAYMENTS: flag.default("false"),
    CONFIG_INSTALL_WEBSHOP: flag.default("false"),
    CONFIG_INSTALL_WIKI: flag.default("false"),
    CONFIG_INSTALL_HELPDESK: flag.default("false"),
    CONFIG_INSTALL_LMS: flag.default("false"),
    CONFIG_INSTALL_BUILDER: flag.default("false"),
    CONFIG_INSTALL_PRINT_DESIGNER: flag.default("false"),

    CONFIG_LOG_LEVEL: logLevel.default(DEFAULTS.LOG_LEVEL),
    CONFIG_LOG_FILE: pathStr.default(PATHS.LOG_FILE),
    CONFIG_CREDENTIALS_DIR: pathStr.default(PATHS.CREDENTIALS_DIR),
    CONFIG_SUMMARY_FILE: pathStr.default(PATHS.SUMMARY_FILE),
  })
  .strict()

// ---------------------------------------------------------------------------
// Derived types
// ---------------------------------------------------------------------------

export type RawInstallerConfig = z.infer<typeof installerConfigSchema>

export type LogLevelName = RawInstallerConfig["CONFIG_LOG_LEVEL"]

export interface InstallerConfig {
  minRamGb: number
  minDiskGb: number
  frappeBranch: string
  erpnextBranch: string
  nodeVersion: string
  defaultDomain: string
  quickDomain: string
  defaultAccount: string
  dbRootPasswordLength: number
  adminPasswordLength: number
  dbSecure: boolean
  sudoLimited: boolean
  firewallEnabled: boolean
  productionMode: boolean
  /** App names from ADDON_APPS selected by default */
  addons: string[]
  logLevel: LogLevelName
  logFile: string
  credentialsDir: string
  summaryFile: string
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Shell configs written for the old installer prefix assignments with
 * `export`. dotenv ignores those lines, so strip the keyword first.
 */
function stripExportKeyword(raw: string): string {
  return raw.replace(/^[ \t]*export[ \t]+/gm, "")
}

function toInstallerConfig(raw: RawInstallerConfig): InstallerConfig {
  const selected = new Set(
    Object.entries(raw)
      .filter(([key, value]) => key.startsWith("CONFIG_INSTALL_") && value === true)
      .map(([key]) => key),
  )

  return {
    minRamGb: raw.CONFIG_MIN_RAM_GB,
    minDiskGb: raw.CONFIG_MIN_DISK_GB,
    frappeBranch: raw.CONFIG_FRAPPE_VERSION,
    erpnextBranch: raw.CONFIG_ERPNEXT_VERSION,
    nodeVersion: raw.CONFIG_NODE_VERSION,
    defaultDomain: raw.CONFIG_DEFAULT_DOMAIN,
    quickDomain: raw.CONFIG_QUICK_DOMAIN,
    defaultAccount: raw.CONFIG_DEFAULT_USER,
    dbRootPasswordLength: raw.CONFIG_DB_ROOT_PASSWORD_LENGTH,
    adminPasswordLength: raw.CONFIG_ADMIN_PASSWORD_LENGTH,
    dbSecure: raw.CONFIG_DB_SECURE,
    sudoLimited: raw.CONFIG_SUDO_LIMITED,
    firewallEnabled: raw.CONFIG_FIREWALL_ENABLED,
    productionMode: raw.CONFIG_PRODUCTION_MODE,
    addons: ADDON_APPS.filter(app => selected.has(app.configKey)).map(app => app.name),
    logLevel: raw.CONFIG_LOG_LEVEL,
    logFile: raw.CONFIG_LOG_FILE,
    credentialsDir: raw.CONFIG_CREDENTIALS_DIR,
    summaryFile: raw.CONFIG_SUMMARY_FILE,
  }
}

/**
 * Parse and validate the raw text of a config file.
 * Throws a ZodError on schema validation failure (unknown key, bad value).
 */
export function parseInstallerConfig(raw: string): InstallerConfig {
  const data = parseDotenv(stripExportKeyword(raw))
  return toInstallerConfig(installerConfigSchema.parse(data))
}

/** Built-in configuration, used when no config file is present */
export function defaultInstallerConfig(): InstallerConfig {
  return toInstallerConfig(installerConfigSchema.parse({}))
}
