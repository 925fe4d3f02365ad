import { PATHS } from "@erpstack/shared"
import { SECRET_PURPOSES } from "../secrets.js"
import type { StepDefinition, UndoAction } from "../types.js"
import { installPackages, run, tryRun } from "./common.js"

export const DATABASE_PACKAGES = ["mariadb-server", "mariadb-client", "libmariadb-dev"] as const

export const MARIADB_FRAPPE_CONFIG = `[server]
innodb_file_per_table = 1

[mysqld]
character-set-client-handshake = FALSE
character-set-server = utf8mb4
collation-server = utf8mb4_unicode_ci

[mysql]
default-character-set = utf8mb4
`

const SECURE_SQL = `DELETE FROM mysql.global_priv WHERE User='';
DROP DATABASE IF EXISTS test;
DELETE FROM mysql.db WHERE Db='test' OR Db='test\\\\_%';
FLUSH PRIVILEGES;
`

/** Escape a value for a single-quoted SQL string literal */
export function sqlLiteral(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "''")}'`
}

export const databaseStep: StepDefinition = {
  name: "database",
  kind: "database",
  title: "Install and configure MariaDB",
  criticality: "fatal",

  async precheck(ctx) {
    const done =
      (await ctx.host.packageInstalled("mariadb-server")) &&
      (await ctx.host.pathExists(PATHS.MARIADB_CONFIG)) &&
      (await ctx.secrets.load(SECRET_PURPOSES.DB_ROOT)) !== undefined
    return done ? "already-done" : "not-done"
  },

  async apply(ctx) {
    const { config, host, logger, prompter } = ctx

    await installPackages(ctx, DATABASE_PACKAGES)
    const secret = await ctx.secrets.resolve({
      purpose: SECRET_PURPOSES.DB_ROOT,
      label: "MariaDB root password",
      length: config.dbRootPasswordLength,
      override: ctx.env.MARIADB_ROOT_PASSWORD,
    })

    await run(ctx, "systemctl", ["start", "mariadb"])
    await run(ctx, "systemctl", ["enable", "mariadb"])

    // Fresh installs authenticate root over the unix socket without a password
    const probe = await host.exec("mysql", ["-u", "root", "-e", "SELECT 1;"])
    if (probe.exitCode === 0) {
      await run(ctx, "mysql", ["-u", "root"], {
        input: `ALTER USER 'root'@'localhost' IDENTIFIED BY ${sqlLiteral(secret.value)};\nFLUSH PRIVILEGES;\n`,
      })
      logger.success("MariaDB root password set")
    } else {
      logger.info("MariaDB root password already set")
    }

    if (config.dbSecure && (await prompter.confirm("Remove anonymous users and the test database?", true))) {
      await run(ctx, "mysql", ["-u", "root"], { env: { MYSQL_PWD: secret.value }, input: SECURE_SQL })
      logger.success("MariaDB secured")
    }

    await host.writeFile(PATHS.MARIADB_CONFIG, MARIADB_FRAPPE_CONFIG, 0o644)
    await run(ctx, "systemctl", ["restart", "mariadb"])
  },
}

export const undoDatabase: UndoAction = async ctx => {
  await tryRun(ctx, "systemctl", ["stop", "mariadb"], "Could not stop MariaDB")
  await run(ctx, "apt-get", ["remove", "-y", ...DATABASE_PACKAGES])
}
