/**
 * ============================================================================
 * INSTALLER DEFAULTS - SINGLE SOURCE OF TRUTH
 * ============================================================================
 *
 * Built-in values used when the config file or the environment does not
 * override them. Always import from here - never hardcode values in steps.
 *
 * Organization:
 * - PATHS: Filesystem locations written by the installer
 * - TARGET_HOST: The host profile the stack is built for
 * - DEFAULTS: Default values for every config option
 * - ADDON_APPS: Optional Frappe apps and where they come from
 */

// =============================================================================
// Path Constants
// =============================================================================

export const PATHS = {
  /** Default config file, resolved against the working directory */
  CONFIG_FILE: "erpstack.conf",

  /** Credentials directory (0700, one 0600 file per secret purpose) */
  CREDENTIALS_DIR: "/root/.erpnext-install",

  /** Plaintext summary of the generated credentials, for the operator */
  SUMMARY_FILE: "/root/erpnext_credentials.txt",

  /** Append-only run log */
  LOG_FILE: "/var/log/erpstack/install.log",

  /** Site record written by the site step, read by uninstall */
  SITE_RECORD: "site.json",

  /** MariaDB drop-in with the framework's charset settings */
  MARIADB_CONFIG: "/etc/mysql/mariadb.conf.d/z_frappe.cnf",

  /** Deb822 style apt sources (Debian 12+) */
  APT_SOURCES_DEB822: "/etc/apt/sources.list.d/debian.sources",

  /** Legacy one-line apt sources */
  APT_SOURCES_LEGACY: "/etc/apt/sources.list",

  /** Drop-in directory for per-account sudo rules */
  SUDOERS_DIR: "/etc/sudoers.d",

  /** Host identity */
  OS_RELEASE: "/etc/os-release",
} as const

// =============================================================================
// Target Host
// =============================================================================

export const TARGET_HOST = {
  OS_ID: "debian",
  OS_VERSION: "13",
  /** Suite used for the backports fallback of optional packages */
  BACKPORTS_SUITE: "trixie-backports",
} as const

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULTS = {
  MIN_RAM_GB: 4,
  MIN_DISK_GB: 20,

  FRAPPE_BRANCH: "version-15",
  ERPNEXT_BRANCH: "version-15",
  NODE_VERSION: "22",

  /** Domain for full and automated runs */
  DOMAIN: "erp.local",
  /** Domain for --quick runs */
  QUICK_DOMAIN: "site1.local",
  SERVICE_ACCOUNT: "frappe",

  DB_ROOT_PASSWORD_LENGTH: 24,
  ADMIN_PASSWORD_LENGTH: 16,

  DB_SECURE: true,
  SUDO_LIMITED: true,
  FIREWALL_ENABLED: true,
  PRODUCTION_MODE: true,

  LOG_LEVEL: "INFO",

  /** Framework administrator login shown in the summary */
  ADMIN_USERNAME: "Administrator",
} as const

/** Node.js majors offered by the interactive runtime prompt */
export const SUPPORTED_NODE_VERSIONS = ["22", "24"] as const

// =============================================================================
// Optional Frappe apps
// =============================================================================

export interface AddonApp {
  /** App name as used by `bench install-app` */
  name: string
  /** GitHub repository passed to `bench get-app` */
  repo: string
  branch: string
  /** Config key that selects the app by default */
  configKey: string
}

export const ADDON_APPS: readonly AddonApp[] = [
  { name: "hrms", repo: "frappe/hrms", branch: "version-15", configKey: "CONFIG_INSTALL_HRMS" },
  { name: "payments", repo: "frappe/payments", branch: "version-15", configKey: "CONFIG_INSTALL_PAYMENTS" },
  { name: "webshop", repo: "frappe/webshop", branch: "version-15", configKey: "CONFIG_INSTALL_WEBSHOP" },
  { name: "wiki", repo: "frappe/wiki", branch: "version-15", configKey: "CONFIG_INSTALL_WIKI" },
  { name: "helpdesk", repo: "frappe/helpdesk", branch: "version-15", configKey: "CONFIG_INSTALL_HELPDESK" },
  { name: "lms", repo: "frappe/lms", branch: "version-15", configKey: "CONFIG_INSTALL_LMS" },
  { name: "builder", repo: "frappe/builder", branch: "main", configKey: "CONFIG_INSTALL_BUILDER" },
  {
    name: "print_designer",
    repo: "frappe/print_designer",
    branch: "main",
    configKey: "CONFIG_INSTALL_PRINT_DESIGNER",
  },
]

/** Bench directory for a service account */
export function getBenchDir(account: string): string {
  return `/home/${account}/frappe-bench`
}
