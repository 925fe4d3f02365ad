/**
 * Pure Zod schemas for environment variable validation
 *
 * This file contains ONLY schema definitions - no runtime code, no side effects.
 * Safe to import anywhere (installer, tests).
 */

import { z } from "zod"

/**
 * Custom validators for common patterns
 *
 * IMPORTANT: Do NOT use .refine() here: it wraps the schema in ZodEffects
 * which breaks type inference in @t3-oss/env-core (all fields resolve to {}).
 * Use .regex() or other ZodString chainable methods instead.
 */
export const password = z.string().min(8, "Must be at least 8 characters")

/**
 * Domain and account values are NOT validated here. The provisioner's field
 * validators check them and fall back to the built-in default with a warning,
 * so a bad value never aborts an automated run.
 */
export const looseValue = z.string().trim().min(1)

/**
 * Automated-mode environment variables. Every variable is optional: when one
 * is absent the installer generates or defaults the value.
 */
export const installerSchema = {
  /** Site domain to provision */
  ERPNEXT_DOMAIN: looseValue.optional(),
  /** Framework administrator password */
  ERPNEXT_ADMIN_PASSWORD: password.optional(),
  /** MariaDB root password */
  MARIADB_ROOT_PASSWORD: password.optional(),
  /** Service account that owns the bench */
  FRAPPE_USER: looseValue.optional(),
  /** Config file location (see resolveConfigPath in @erpstack/shared) */
  ERPSTACK_CONFIG: looseValue.optional(),
}
