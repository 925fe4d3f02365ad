import { PATHS, getBenchDir } from "@erpstack/shared"
import { join } from "node:path"
import { readSiteRecord } from "./site-record.js"
import { UNDO_ACTIONS } from "./steps/index.js"
import type { LedgerEntry, RunContext, StepKind, UndoAction } from "./types.js"

export interface RollbackReport {
  /** Steps whose undo succeeded, in the order they were undone */
  undone: string[]
  failed: string[]
  /** Steps without an undo action */
  noUndo: string[]
}

/**
 * Undo completed steps in reverse order. A failing undo is logged and the
 * remaining ones still run.
 */
export async function rollback(
  ledger: readonly LedgerEntry[],
  ctx: RunContext,
  undoActions: Partial<Record<StepKind, UndoAction>> = UNDO_ACTIONS,
): Promise<RollbackReport> {
  const report: RollbackReport = { undone: [], failed: [], noUndo: [] }
  const logger = ctx.logger.child({ operation: "rollback" })

  logger.warn(`Rolling back ${ledger.length} completed step(s)`)

  for (const entry of [...ledger].reverse()) {
    const undo = undoActions[entry.kind]
    if (!undo) {
      logger.info(`No undo for ${entry.name}`)
      report.noUndo.push(entry.name)
      continue
    }

    try {
      logger.info(`Undoing ${entry.name}...`)
      await undo(ctx)
      report.undone.push(entry.name)
      logger.success(`Undid ${entry.name}`)
    } catch (err) {
      report.failed.push(entry.name)
      logger.error(`Undo of ${entry.name} failed`, err)
    }
  }

  if (report.failed.length > 0) {
    logger.warn(`Rollback completed with ${report.failed.length} error(s)`)
  } else {
    logger.success("Rollback completed")
  }
  return report
}

export interface UninstallReport {
  account: string
  confirmed: boolean
  /** Actions that failed; uninstall goes on past them */
  failed: string[]
}

/**
 * Remove an existing installation: services, bench, account, sudo rule and
 * every stored credential. Best-effort after a single confirmation.
 */
export async function uninstall(ctx: RunContext): Promise<UninstallReport> {
  const { host, logger, prompter, secrets } = ctx
  const site = await readSiteRecord(secrets.dir)
  const account = site?.account ?? ctx.config.defaultAccount
  const benchDir = site?.benchDir ?? getBenchDir(account)

  const confirmed = await prompter.confirm(
    `This will remove the ${account} account, ${benchDir} and all stored credentials. Continue?`,
    false,
  )
  if (!confirmed) {
    logger.info("Uninstall cancelled")
    return { account, confirmed, failed: [] }
  }

  const failed: string[] = []
  const attempt = async (label: string, action: () => Promise<void>): Promise<void> => {
    try {
      await action()
      logger.success(label)
    } catch (err) {
      failed.push(label)
      logger.warn(`${label} failed`, err)
    }
  }
  const command = (cmd: string, args: string[]) => async () => {
    const result = await host.exec(cmd, args)
    if (result.exitCode !== 0) {
      throw new Error(`${cmd} exited with ${result.exitCode}`)
    }
  }

  await attempt("Stopped supervisor programs", command("supervisorctl", ["stop", "all"]))
  await attempt("Stopped nginx", command("systemctl", ["stop", "nginx"]))
  await attempt(`Removed ${benchDir}`, () => host.removePath(benchDir))
  if (await host.userExists(account)) {
    await attempt(`Removed account ${account}`, command("userdel", ["-r", account]))
  }
  await attempt("Removed sudo rule", () => host.removePath(join(PATHS.SUDOERS_DIR, account)))
  await attempt("Removed stored credentials", () => secrets.purge())

  if (failed.length > 0) {
    logger.warn(`Uninstall finished with ${failed.length} error(s)`)
  } else {
    logger.success("Uninstall complete")
  }
  return { account, confirmed, failed }
}
