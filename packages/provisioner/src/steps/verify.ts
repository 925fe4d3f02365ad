import { requireIdentity } from "../context.js"
import { SECRET_PURPOSES } from "../secrets.js"
import type { StepDefinition } from "../types.js"
import { inBench } from "./common.js"

export const verifyStep: StepDefinition = {
  name: "verify",
  kind: "verify",
  title: "Verify the installation",
  criticality: "recoverable",

  async precheck() {
    return "not-done"
  },

  async apply(ctx) {
    const { account, benchDir, domain } = requireIdentity(ctx)
    const problems: string[] = []

    const dbRoot = await ctx.secrets.require(SECRET_PURPOSES.DB_ROOT)
    const mysql = await ctx.host.exec("mysql", ["-u", "root", "-e", "SELECT 1;"], { env: { MYSQL_PWD: dbRoot.value } })
    if (mysql.exitCode === 0) {
      ctx.logger.success("MariaDB is accepting connections")
    } else {
      problems.push("MariaDB connection failed")
    }

    const redis = await ctx.host.exec("redis-cli", ["ping"])
    if (redis.exitCode === 0 && redis.stdout.includes("PONG")) {
      ctx.logger.success("Redis is responding")
    } else {
      problems.push("Redis did not answer PONG")
    }

    const doctor = await ctx.host.runAs(account, `${inBench(benchDir)}bench --site "$SITE_DOMAIN" doctor`, {
      env: { SITE_DOMAIN: domain },
    })
    if (doctor.exitCode === 0) {
      ctx.logger.success("bench doctor passed")
    } else {
      problems.push("bench doctor reported problems")
    }

    if (problems.length > 0) {
      throw new Error(problems.join("; "))
    }
  },
}
