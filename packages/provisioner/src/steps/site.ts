import { join } from "node:path"
import { requireIdentity } from "../context.js"
import { SECRET_PURPOSES } from "../secrets.js"
import { readSiteRecord, removeSiteRecord, writeSiteRecord } from "../site-record.js"
import type { StepDefinition, UndoAction } from "../types.js"
import { inBench, runAsAccount, shellQuote } from "./common.js"

export const siteStep: StepDefinition = {
  name: "site",
  kind: "site",
  title: "Create the ERPNext site",
  criticality: "fatal",

  async precheck(ctx) {
    const { benchDir, domain } = requireIdentity(ctx)
    const done =
      (await ctx.host.pathExists(join(benchDir, "sites", domain))) &&
      (await ctx.host.pathExists(join(benchDir, "apps", "erpnext"))) &&
      (await readSiteRecord(ctx.secrets.dir)) !== undefined
    return done ? "already-done" : "not-done"
  },

  async apply(ctx) {
    const identity = requireIdentity(ctx)
    const dbRoot = await ctx.secrets.require(SECRET_PURPOSES.DB_ROOT)
    const admin = await ctx.secrets.resolve({
      purpose: SECRET_PURPOSES.ADMIN,
      label: "administrator password",
      length: ctx.config.adminPasswordLength,
      override: ctx.env.ERPNEXT_ADMIN_PASSWORD,
    })

    await writeSiteRecord(ctx.secrets.dir, { ...identity, installedAt: new Date().toISOString() })

    // Root password on stdin; new-site takes the admin password only as an option
    await runAsAccount(
      ctx,
      [
        inBench(identity.benchDir),
        'if [ -d "sites/$SITE_DOMAIN" ]; then',
        '  echo "Site $SITE_DOMAIN already exists"',
        "else",
        '  bench new-site "$SITE_DOMAIN" --mariadb-root-password - --admin-password "$ADMIN_PASSWORD"',
        "fi",
      ].join("\n"),
      {
        env: { SITE_DOMAIN: identity.domain, ADMIN_PASSWORD: admin.value },
        input: `${dbRoot.value}\n`,
      },
    )

    await runAsAccount(
      ctx,
      [
        inBench(identity.benchDir),
        "if [ ! -d apps/erpnext ]; then",
        `  bench get-app erpnext --branch ${shellQuote(ctx.config.erpnextBranch)}`,
        "  (cd apps/erpnext && (yarn install --check-files || yarn install --network-timeout 100000))",
        "fi",
        'if ! bench --site "$SITE_DOMAIN" list-apps | grep -q "^erpnext"; then',
        '  bench --site "$SITE_DOMAIN" install-app erpnext',
        "fi",
        'bench use "$SITE_DOMAIN"',
      ].join("\n"),
      { env: { SITE_DOMAIN: identity.domain } },
    )
  },
}

export const undoSite: UndoAction = async ctx => {
  const { benchDir, domain } = requireIdentity(ctx)
  const dbRoot = await ctx.secrets.require(SECRET_PURPOSES.DB_ROOT)
  if (await ctx.host.pathExists(join(benchDir, "sites", domain))) {
    await runAsAccount(
      ctx,
      // Without --db-root-password bench asks for it, and reads the answer from stdin
      `${inBench(benchDir)}bench drop-site "$SITE_DOMAIN" --force --no-backup`,
      { env: { SITE_DOMAIN: domain }, input: `${dbRoot.value}\n` },
    )
  }
  await removeSiteRecord(ctx.secrets.dir)
}
