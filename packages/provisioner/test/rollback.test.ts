import { existsSync } from "node:fs"
import { afterEach, describe, expect, it } from "vitest"
import { rollback, uninstall } from "../src/rollback.js"
import { SECRET_PURPOSES } from "../src/secrets.js"
import { writeSiteRecord } from "../src/site-record.js"
import type { LedgerEntry, StepKind } from "../src/types.js"
import { type TestContextOptions, createTestContext, removeTempDir } from "./helpers/context.js"
import { ScriptedPrompter } from "./helpers/prompter.js"

const entry = (name: string, kind: StepKind): LedgerEntry => ({ name, kind, completedAt: new Date(2026, 0, 1) })

describe("rollback", () => {
  const dirs: string[] = []
  const context = (options: TestContextOptions = {}) => {
    const test = createTestContext(options)
    dirs.push(test.dir)
    return test
  }

  afterEach(() => {
    for (const dir of dirs.splice(0)) removeTempDir(dir)
  })

  it("undoes in reverse order and keeps going past a failing undo", async () => {
    const { ctx } = context()
    const calls: string[] = []
    const ledger = [entry("A", "repositories"), entry("B", "database"), entry("C", "bench")]

    const report = await rollback(ledger, ctx, {
      repositories: async () => void calls.push("A"),
      database: async () => {
        calls.push("B")
        throw new Error("apt-get remove failed")
      },
      bench: async () => void calls.push("C"),
    })

    expect(calls).toEqual(["C", "B", "A"])
    expect(report).toEqual({ undone: ["C", "A"], failed: ["B"], noUndo: [] })
  })

  it("reports steps that have no undo", async () => {
    const { ctx } = context()

    const report = await rollback([entry("runtime", "runtime"), entry("bench", "bench")], ctx, {
      bench: async () => {},
    })

    expect(report).toEqual({ undone: ["bench"], failed: [], noUndo: ["runtime"] })
  })
})

describe("uninstall", () => {
  const dirs: string[] = []
  afterEach(() => {
    for (const dir of dirs.splice(0)) removeTempDir(dir)
  })

  it("removes the recorded account, its bench and every credential", async () => {
    const { ctx, host, dir, config } = createTestContext()
    dirs.push(dir)
    await ctx.secrets.resolve({ purpose: SECRET_PURPOSES.ADMIN, label: "administrator password", length: 16 })
    await writeSiteRecord(config.credentialsDir, {
      domain: "erp.company.com",
      account: "erp",
      benchDir: "/home/erp/frappe-bench",
      installedAt: "2026-01-01T00:00:00.000Z",
    })
    host.users.add("erp")

    const report = await uninstall(ctx)

    expect(report).toEqual({ account: "erp", confirmed: true, failed: [] })
    expect(host.lines()).toEqual(["supervisorctl stop all", "systemctl stop nginx", "userdel -r erp"])
    expect(host.removed).toEqual(["/home/erp/frappe-bench", "/etc/sudoers.d/erp"])
    expect(existsSync(config.credentialsDir)).toBe(false)
  })

  it("falls back to the configured account without a site record", async () => {
    const { ctx, host, dir } = createTestContext({ config: { defaultAccount: "erpuser" } })
    dirs.push(dir)

    const report = await uninstall(ctx)

    expect(report.account).toBe("erpuser")
    expect(host.removed[0]).toBe("/home/erpuser/frappe-bench")
  })

  it("keeps going when a removal fails", async () => {
    const { ctx, host, dir } = createTestContext()
    dirs.push(dir)
    host.respond("supervisorctl", { exitCode: 2 })

    const report = await uninstall(ctx)

    expect(report.failed).toEqual(["Stopped supervisor programs"])
    expect(host.lines()).toEqual(["supervisorctl stop all", "systemctl stop nginx"])
  })

  it("does nothing when the operator declines", async () => {
    const prompter = new ScriptedPrompter([false])
    const { ctx, host, dir } = createTestContext({ mode: "interactive", prompter })
    dirs.push(dir)

    const report = await uninstall(ctx)

    expect(report.confirmed).toBe(false)
    expect(prompter.asked).toEqual([
      "This will remove the frappe account, /home/frappe/frappe-bench and all stored credentials. Continue?",
    ])
    expect(host.calls).toEqual([])
    expect(host.removed).toEqual([])
  })
})
