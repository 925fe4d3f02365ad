import { SUPPORTED_NODE_VERSIONS } from "@erpstack/shared"
import type { RunContext, StepDefinition } from "../types.js"
import { run } from "./common.js"

/** Major version of the installed node, undefined when node is absent */
async function installedNodeMajor(ctx: RunContext): Promise<string | undefined> {
  const result = await ctx.host.exec("node", ["-v"]).catch(() => undefined)
  if (!result || result.exitCode !== 0) return undefined
  return /^v?(\d+)\./.exec(result.stdout.trim())?.[1]
}

async function chooseNodeVersion(ctx: RunContext): Promise<string> {
  const configured = ctx.config.nodeVersion
  const choices = SUPPORTED_NODE_VERSIONS.map(version => ({
    value: version,
    label: `Node.js ${version}${version === configured ? " (configured)" : ""}`,
  }))
  const fallback = SUPPORTED_NODE_VERSIONS.find(version => version === configured) ?? SUPPORTED_NODE_VERSIONS[0]
  if (!ctx.prompter.interactive) return configured
  return ctx.prompter.choose("Choose Node.js version", choices, fallback)
}

export const runtimeStep: StepDefinition = {
  name: "runtime",
  kind: "runtime",
  title: "Install Node.js and Yarn",
  criticality: "fatal",

  async precheck(ctx) {
    const major = await installedNodeMajor(ctx)
    const done = major === ctx.config.nodeVersion && (await ctx.host.commandExists("yarn"))
    return done ? "already-done" : "not-done"
  },

  async apply(ctx) {
    const version = await chooseNodeVersion(ctx)
    const installed = await installedNodeMajor(ctx)

    if (installed !== undefined && installed !== version) {
      const replace = await ctx.prompter.confirm(
        `Node.js ${installed} is installed. Replace it with Node.js ${version}?`,
        true,
      )
      if (!replace) {
        throw new Error(`Node.js ${installed} kept; ${version} is required`)
      }
      await run(ctx, "apt-get", ["remove", "-y", "nodejs", "npm"])
    }

    if (installed !== version) {
      await run(ctx, "bash", ["-c", `curl -fsSL https://deb.nodesource.com/setup_${version}.x | bash -`])
      await run(ctx, "apt-get", ["install", "-y", "nodejs"])
      ctx.logger.success(`Node.js ${version} installed`)
    }

    if (!(await ctx.host.commandExists("yarn"))) {
      await run(ctx, "npm", ["install", "-g", "yarn"])
      ctx.logger.success("Yarn installed")
    }
  },
}
