/**
 * Installer config loading (server-side only)
 *
 * The config file is optional: a missing file yields the built-in defaults.
 * A file that exists but does not validate is a fatal precondition - the
 * operator fixes it before anything touches the host.
 */

import { existsSync, readFileSync } from "node:fs"
import { isAbsolute, resolve } from "node:path"
import { ZodError } from "zod"
import { defaultInstallerConfig, type InstallerConfig, parseInstallerConfig } from "./config-schema.js"
import { PATHS } from "./constants.js"

export interface LoadedConfig {
  config: InstallerConfig
  /** Absolute path of the file that was read, undefined when defaults were used */
  source?: string
}

/**
 * Resolve which config file to read.
 * Precedence: explicit path (--config) > ERPSTACK_CONFIG > ./erpstack.conf
 */
export function resolveConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): string {
  const candidate = explicit || env.ERPSTACK_CONFIG || PATHS.CONFIG_FILE
  return isAbsolute(candidate) ? candidate : resolve(cwd, candidate)
}

/** Turn a ZodError into one line per offending key */
function describeConfigIssues(error: ZodError): string {
  return error.issues
    .map(issue => {
      if (issue.code === "unrecognized_keys") {
        return `unknown option(s): ${issue.keys.join(", ")}`
      }
      const key = issue.path.join(".") || "(root)"
      return `${key}: ${issue.message}`
    })
    .join("; ")
}

/**
 * Load the installer config - STRICT MODE
 * Missing file: defaults. Unreadable or invalid file: throws with the file path
 * and every offending key in the message.
 */
export function loadInstallerConfig(path: string): LoadedConfig {
  if (!existsSync(path)) {
    return { config: defaultInstallerConfig() }
  }

  let raw: string
  try {
    raw = readFileSync(path, "utf8")
  } catch (err) {
    throw new Error(`Failed to read ${path}: ${err instanceof Error ? err.message : String(err)}`)
  }

  try {
    return { config: parseInstallerConfig(raw), source: path }
  } catch (err) {
    if (err instanceof ZodError) {
      throw new Error(`Invalid config in ${path}: ${describeConfigIssues(err)}`)
    }
    throw err
  }
}
