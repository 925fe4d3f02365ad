import { TARGET_HOST } from "@erpstack/shared"
import type { RunContext, StepDefinition, UndoAction } from "../types.js"
import { installPackages, missingPackages, run, tryRun } from "./common.js"

export const PYTHON_PACKAGES = ["python3-dev", "python3-venv", "python3-pip", "python3-setuptools"] as const
export const SUPPORT_PACKAGES = [
  "redis-server",
  "xvfb",
  "libfontconfig1",
  "libssl-dev",
  "libcrypto++-dev",
  "nginx",
  "supervisor",
] as const

/** wkhtmltopdf is missing from some releases; PDF output degrades without it */
async function installWkhtmltopdf(ctx: RunContext): Promise<void> {
  if (await ctx.host.packageInstalled("wkhtmltopdf")) return

  const fromMain = await ctx.host.exec("apt-get", ["install", "-y", "wkhtmltopdf"], {
    env: { DEBIAN_FRONTEND: "noninteractive" },
  })
  if (fromMain.exitCode === 0) {
    ctx.logger.success("wkhtmltopdf installed")
    return
  }

  const fromBackports = await ctx.host.exec(
    "apt-get",
    ["install", "-y", "-t", TARGET_HOST.BACKPORTS_SUITE, "wkhtmltopdf"],
    { env: { DEBIAN_FRONTEND: "noninteractive" } },
  )
  if (fromBackports.exitCode === 0) {
    ctx.logger.success("wkhtmltopdf installed from backports")
    return
  }

  ctx.logger.warn("wkhtmltopdf not available, skipping (PDF generation may not work)")
  ctx.notes.push({ step: "python-cache", message: "wkhtmltopdf is not installed" })
}

export const pythonCacheStep: StepDefinition = {
  name: "python-cache",
  kind: "python-cache",
  title: "Install Python, Redis and Nginx",
  criticality: "fatal",

  async precheck(ctx) {
    const missing = await missingPackages(ctx, [...PYTHON_PACKAGES, ...SUPPORT_PACKAGES])
    const done = missing.length === 0 && (await ctx.host.serviceActive("redis-server"))
    return done ? "already-done" : "not-done"
  },

  async apply(ctx) {
    await installPackages(ctx, PYTHON_PACKAGES)
    await installPackages(ctx, SUPPORT_PACKAGES)
    await installWkhtmltopdf(ctx)

    await run(ctx, "systemctl", ["enable", "redis-server"])
    await run(ctx, "systemctl", ["start", "redis-server"])
  },
}

export const undoPythonCache: UndoAction = async ctx => {
  await tryRun(ctx, "systemctl", ["stop", "redis-server"], "Could not stop Redis")
  await run(ctx, "apt-get", ["remove", "-y", "redis-server"])
}
