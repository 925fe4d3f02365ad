import { DEFAULTS } from "@erpstack/shared"
import { requireIdentity } from "./context.js"
import { type RunOptions, type RunReport, runSteps } from "./engine.js"
import { OperatorAbortError } from "./errors.js"
import type { StepRegistry } from "./registry.js"
import { type RollbackReport, type UninstallReport, rollback, uninstall } from "./rollback.js"
import { SECRET_PURPOSES, type SummaryEntry } from "./secrets.js"
import { createDefaultRegistry } from "./steps/index.js"
import type { RunContext } from "./types.js"
import { gatherHostProfile, resolveIdentity, runPreflight } from "./validation.js"

export interface InstallResult {
  exitCode: number
  report?: RunReport
  rollback?: RollbackReport
}

/**
 * ERPNext installer
 * Pre-flight, identity, steps in registry order, then the credentials summary.
 * Any fatal error lands in a single handler that may offer a rollback.
 */
export class Installer {
  constructor(
    private readonly ctx: RunContext,
    private readonly registry: StepRegistry = createDefaultRegistry(),
  ) {}

  async install(options: RunOptions = {}): Promise<InstallResult> {
    const { ctx } = this
    let report: RunReport | undefined

    ctx.logger.info(`=== Starting ERPNext installation (${ctx.mode} mode) ===`)

    try {
      const profile = await gatherHostProfile(ctx.host)
      await runPreflight(ctx, profile)
      await resolveIdentity(ctx)

      report = await runSteps(this.registry, ctx, options)
      if (report.fatal) {
        throw report.fatal
      }

      const summaryFile = await this.writeCredentialsSummary()
      this.logCompletion(summaryFile)
      return { exitCode: 0, report }
    } catch (error) {
      return this.fail(error, report)
    }
  }

  /** Pre-flight only, nothing is changed */
  async check(): Promise<number> {
    const { ctx } = this
    try {
      const profile = await gatherHostProfile(ctx.host)
      await runPreflight(ctx, profile)
      ctx.logger.success("Pre-flight checks passed")
      return 0
    } catch (error) {
      ctx.logger.error("Pre-flight checks failed", error)
      return 1
    }
  }

  async uninstall(): Promise<UninstallReport> {
    return uninstall(this.ctx)
  }

  private async fail(error: unknown, report: RunReport | undefined): Promise<InstallResult> {
    const { ctx } = this
    ctx.logger.error("Installation failed", error)
    ctx.logger.error(`Check log at ${ctx.config.logFile}`)

    if (error instanceof OperatorAbortError || ctx.ledger.size === 0) {
      return { exitCode: 1, report }
    }

    if (ctx.mode === "automated") {
      ctx.logger.warn(`${ctx.ledger.size} completed step(s) left in place for inspection`)
      return { exitCode: 1, report }
    }

    let accepted = false
    try {
      accepted = await ctx.prompter.confirm("Attempt rollback of completed steps?", true)
    } catch (confirmError) {
      if (!(confirmError instanceof OperatorAbortError)) throw confirmError
    }
    if (!accepted) {
      return { exitCode: 1, report }
    }

    return { exitCode: 1, report, rollback: await rollback(ctx.ledger.list(), ctx) }
  }

  private async writeCredentialsSummary(): Promise<string> {
    const { ctx } = this
    const { account, benchDir, domain } = requireIdentity(ctx)
    const admin = await ctx.secrets.load(SECRET_PURPOSES.ADMIN)
    const dbRoot = await ctx.secrets.load(SECRET_PURPOSES.DB_ROOT)

    const entries: SummaryEntry[] = [
      { label: "Site URL", value: `http://${domain}` },
      { label: "Administrator username", value: DEFAULTS.ADMIN_USERNAME },
    ]
    if (admin) entries.push({ label: "Administrator password", value: admin.value })
    if (dbRoot) entries.push({ label: "MariaDB root password", value: dbRoot.value })
    entries.push({ label: "Service account", value: account }, { label: "Bench directory", value: benchDir })

    return ctx.secrets.writeSummary("ERPNext Installation Credentials", entries)
  }

  private logCompletion(summaryFile: string): void {
    const { ctx } = this
    const { account, domain } = requireIdentity(ctx)
    const seconds = Math.round((Date.now() - ctx.startedAt.getTime()) / 1000)

    ctx.logger.success(`=== Installation completed in ${seconds}s ===`)
    ctx.logger.info(`Site: http://${domain}`)
    ctx.logger.info(`Login as ${DEFAULTS.ADMIN_USERNAME}; the password is in ${summaryFile}`)

    for (const note of ctx.notes) {
      ctx.logger.warn(note.step ? `${note.step}: ${note.message}` : note.message)
    }

    ctx.logger.info("Next steps:")
    ctx.logger.info(`  Setup SSL: bench setup add-domain ${domain} --ssl-certificate`)
    ctx.logger.info(`  Start bench: su - ${account} -c 'cd frappe-bench && bench start'`)
    ctx.logger.info(`  Stop bench: su - ${account} -c 'cd frappe-bench && bench stop'`)
  }
}
