import { requireIdentity } from "../context.js"
import type { StepDefinition, UndoAction } from "../types.js"
import { runAsAccount, shellQuote } from "./common.js"

export const benchStep: StepDefinition = {
  name: "bench",
  kind: "bench",
  title: "Install Frappe Bench",
  criticality: "fatal",

  async precheck(ctx) {
    const { benchDir } = requireIdentity(ctx)
    return (await ctx.host.pathExists(benchDir)) ? "already-done" : "not-done"
  },

  async apply(ctx) {
    const branch = shellQuote(ctx.config.frappeBranch)
    await runAsAccount(
      ctx,
      [
        "pip3 install --user frappe-bench --break-system-packages || pip3 install --user frappe-bench",
        `grep -q '.local/bin' ~/.bashrc || echo 'export PATH="$HOME/.local/bin:$PATH"' >> ~/.bashrc`,
        'export PATH="$HOME/.local/bin:$PATH"',
        "yarn config set registry https://registry.npmjs.org/",
        "yarn cache clean",
        "cd ~",
        `bench init frappe-bench --frappe-branch ${branch} --python python3`,
      ].join("\n"),
    )
  },
}

export const undoBench: UndoAction = async ctx => {
  const { benchDir } = requireIdentity(ctx)
  await ctx.host.removePath(benchDir)
}
