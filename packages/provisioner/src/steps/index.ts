import { StepRegistry } from "../registry.js"
import type { StepKind, UndoAction } from "../types.js"
import { addonsStep } from "./addons.js"
import { benchStep, undoBench } from "./bench.js"
import { databaseStep, undoDatabase } from "./database.js"
import { firewallStep, undoFirewall } from "./firewall.js"
import { productionStep, undoProduction } from "./production.js"
import { pythonCacheStep, undoPythonCache } from "./python-cache.js"
import { repositoriesStep, undoRepositories } from "./repositories.js"
import { runtimeStep } from "./runtime.js"
import { serviceAccountStep, undoServiceAccount } from "./service-account.js"
import { siteStep, undoSite } from "./site.js"
import { systemPackagesStep } from "./system-packages.js"
import { verifyStep } from "./verify.js"

/** Undo for each step kind. Every kind must be listed. */
export const UNDO_ACTIONS: Record<StepKind, UndoAction | undefined> = {
  repositories: undoRepositories,
  "system-packages": undefined,
  "service-account": undoServiceAccount,
  database: undoDatabase,
  runtime: undefined,
  "python-cache": undoPythonCache,
  bench: undoBench,
  site: undoSite,
  addons: undefined,
  production: undoProduction,
  firewall: undoFirewall,
  verify: undefined,
}

export const DEFAULT_STEPS = [
  repositoriesStep,
  systemPackagesStep,
  serviceAccountStep,
  databaseStep,
  runtimeStep,
  pythonCacheStep,
  benchStep,
  siteStep,
  addonsStep,
  productionStep,
  firewallStep,
  verifyStep,
]

export function createDefaultRegistry(): StepRegistry {
  const registry = new StepRegistry()
  for (const step of DEFAULT_STEPS) {
    registry.register(step)
  }
  return registry
}
