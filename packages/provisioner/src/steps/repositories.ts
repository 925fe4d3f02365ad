import { PATHS, TARGET_HOST } from "@erpstack/shared"
import type { Host } from "../host.js"
import type { StepDefinition, UndoAction } from "../types.js"
import { installPackages, run, tryRun } from "./common.js"

export type SourcesFormat = "deb822" | "legacy"

interface SourcesFile {
  path: string
  format: SourcesFormat
  content: string
}

const EXTRA_COMPONENTS = "contrib non-free non-free-firmware"

async function readSources(host: Host): Promise<SourcesFile | undefined> {
  const deb822 = await host.readFile(PATHS.APT_SOURCES_DEB822)
  if (deb822 !== undefined) {
    return { path: PATHS.APT_SOURCES_DEB822, format: "deb822", content: deb822 }
  }
  const legacy = await host.readFile(PATHS.APT_SOURCES_LEGACY)
  if (legacy !== undefined) {
    return { path: PATHS.APT_SOURCES_LEGACY, format: "legacy", content: legacy }
  }
  return undefined
}

/** Add the contrib and non-free components to every `main`-only entry */
export function enableComponents(content: string, format: SourcesFormat): string {
  if (format === "deb822") {
    return content.replace(/^Components: main[ \t]*$/gm, `Components: main ${EXTRA_COMPONENTS}`)
  }
  return content.replace(/^(deb(?:-src)?[ \t].*[ \t]main)[ \t]*$/gm, `$1 ${EXTRA_COMPONENTS}`)
}

export const repositoriesStep: StepDefinition = {
  name: "repositories",
  kind: "repositories",
  title: "Configure package repositories",
  criticality: "recoverable",

  // Component names below are Debian's; other releases keep their sources
  async enabled(ctx) {
    const release = await ctx.host.osRelease()
    return release.ID === TARGET_HOST.OS_ID && release.VERSION_ID === TARGET_HOST.OS_VERSION
  },

  async precheck(ctx) {
    const sources = await readSources(ctx.host)
    if (!sources || /\bcontrib\b/.test(sources.content)) {
      return "already-done"
    }
    return "not-done"
  },

  async apply(ctx) {
    await installPackages(ctx, ["ca-certificates", "debian-archive-keyring"])

    const sources = await readSources(ctx.host)
    if (sources) {
      await ctx.host.copyFile(sources.path, `${sources.path}.backup`)
      await ctx.host.writeFile(sources.path, enableComponents(sources.content, sources.format), 0o644)
      ctx.logger.success(`Added ${EXTRA_COMPONENTS} to ${sources.path}`)
    }

    const refreshed = await tryRun(
      ctx,
      "apt-get",
      ["update", "--allow-releaseinfo-change"],
      "Package list refresh with release info change failed, retrying",
    )
    if (!refreshed) {
      await run(ctx, "apt-get", ["update"])
    }
  },
}

export const undoRepositories: UndoAction = async ctx => {
  for (const path of [PATHS.APT_SOURCES_DEB822, PATHS.APT_SOURCES_LEGACY]) {
    const backup = `${path}.backup`
    if (await ctx.host.pathExists(backup)) {
      await ctx.host.copyFile(backup, path)
      ctx.logger.info(`Restored ${path}`)
    }
  }
}
