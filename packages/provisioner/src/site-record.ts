import { readFile, rm } from "node:fs/promises"
import { join } from "node:path"
import { PATHS } from "@erpstack/shared"
import { z } from "zod"
import { withRestrictedFile } from "./secrets.js"
import type { InstalledSite } from "./types.js"

const installedSiteSchema = z.object({
  domain: z.string().min(1),
  account: z.string().min(1),
  benchDir: z.string().startsWith("/"),
  installedAt: z.string(),
})

export function siteRecordPath(credentialsDir: string): string {
  return join(credentialsDir, PATHS.SITE_RECORD)
}

/** The installed site, or undefined when none was recorded (or the record is unreadable) */
export async function readSiteRecord(credentialsDir: string): Promise<InstalledSite | undefined> {
  let raw: string
  try {
    raw = await readFile(siteRecordPath(credentialsDir), "utf8")
  } catch {
    return undefined
  }
  try {
    const parsed = installedSiteSchema.safeParse(JSON.parse(raw))
    return parsed.success ? parsed.data : undefined
  } catch {
    return undefined
  }
}

export async function writeSiteRecord(credentialsDir: string, site: InstalledSite): Promise<void> {
  await withRestrictedFile(siteRecordPath(credentialsDir), async handle => {
    await handle.writeFile(`${JSON.stringify(site, null, 2)}\n`)
  })
}

export async function removeSiteRecord(credentialsDir: string): Promise<void> {
  await rm(siteRecordPath(credentialsDir), { force: true })
}
