import { requireIdentity } from "../context.js"
import type { StepDefinition, UndoAction } from "../types.js"
import { run, sudoersPath } from "./common.js"

const LIMITED_COMMANDS = ["/usr/bin/systemctl", "/usr/sbin/nginx", "/usr/bin/supervisorctl"]

export function sudoersRule(account: string, limited: boolean): string {
  const commands = limited ? LIMITED_COMMANDS.join(", ") : "ALL"
  return `${account} ALL=(ALL) NOPASSWD: ${commands}\n`
}

export const serviceAccountStep: StepDefinition = {
  name: "service-account",
  kind: "service-account",
  title: "Create the service account",
  criticality: "fatal",

  async precheck(ctx) {
    const { account } = requireIdentity(ctx)
    const done = (await ctx.host.userExists(account)) && (await ctx.host.pathExists(sudoersPath(account)))
    return done ? "already-done" : "not-done"
  },

  async apply(ctx) {
    const { account } = requireIdentity(ctx)

    if (await ctx.host.userExists(account)) {
      ctx.logger.info(`Account ${account} already exists`)
    } else {
      await run(ctx, "adduser", ["--disabled-password", "--gecos", "", account])
      ctx.logger.success(`Created account ${account}`)
    }
    await run(ctx, "usermod", ["-aG", "sudo", account])

    const path = sudoersPath(account)
    await ctx.host.writeFile(path, sudoersRule(account, ctx.config.sudoLimited), 0o440)
    const check = await ctx.host.exec("visudo", ["-cf", path])
    if (check.exitCode !== 0) {
      await ctx.host.removePath(path)
      throw new Error(`Generated sudo rule ${path} did not validate`)
    }
    if (!ctx.config.sudoLimited) {
      ctx.logger.warn(`${account} has unrestricted passwordless sudo`)
    }
  },
}

export const undoServiceAccount: UndoAction = async ctx => {
  const { account } = requireIdentity(ctx)
  if (await ctx.host.userExists(account)) {
    await run(ctx, "userdel", ["-r", account])
  }
  await ctx.host.removePath(sudoersPath(account))
}
