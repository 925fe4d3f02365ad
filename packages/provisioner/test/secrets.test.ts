import { chmodSync, existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import { REDACTED } from "@erpstack/logger"
import { afterEach, describe, expect, it } from "vitest"
import { SECRET_PURPOSES, withRestrictedFile } from "../src/secrets.js"
import { createTestContext, makeTempDir, removeTempDir } from "./helpers/context.js"
import { ScriptedPrompter } from "./helpers/prompter.js"

const modeOf = (path: string) => statSync(path).mode & 0o777

const DB_REQUEST = {
  purpose: SECRET_PURPOSES.DB_ROOT,
  label: "MariaDB root password",
  length: 24,
} as const

describe("SecretStore", () => {
  const dirs: string[] = []
  const track = (dir: string) => {
    dirs.push(dir)
    return dir
  }

  afterEach(() => {
    for (const dir of dirs.splice(0)) removeTempDir(dir)
  })

  it("generates values from the requested alphabet", () => {
    const { ctx, dir } = createTestContext()
    track(dir)

    expect(ctx.secrets.generate("a", 24).value).toMatch(/^[A-Za-z0-9]{24}$/)
    expect(ctx.secrets.generate("b", 16, "hex").value).toMatch(/^[0-9a-f]{16}$/)
  })

  it("persists a resolved secret owner-only inside an owner-only directory", async () => {
    const { ctx, dir, config } = createTestContext()
    track(dir)

    const secret = await ctx.secrets.resolve(DB_REQUEST)

    const file = join(config.credentialsDir, "database-root-password.json")
    expect(secret.method).toBe("generated")
    expect(secret.location).toBe(file)
    expect(modeOf(config.credentialsDir)).toBe(0o700)
    expect(modeOf(file)).toBe(0o600)
    expect(JSON.parse(readFileSync(file, "utf8"))).toMatchObject({
      purpose: "database-root-password",
      value: secret.value,
      method: "generated",
    })
  })

  it("returns the same value on every resolve within a run", async () => {
    const { ctx, dir } = createTestContext()
    track(dir)

    const first = await ctx.secrets.resolve(DB_REQUEST)
    const second = await ctx.secrets.resolve(DB_REQUEST)

    expect(second.value).toBe(first.value)
  })

  it("reuses the persisted value in a later run and warns", async () => {
    const dir = track(makeTempDir())
    const first = await createTestContext({ dir }).ctx.secrets.resolve(DB_REQUEST)

    const { ctx, memory, config } = createTestContext({ dir })
    const second = await ctx.secrets.resolve(DB_REQUEST)

    expect(second.value).toBe(first.value)
    expect(second.method).toBe("persisted")
    const warning = memory.entries.find(entry => entry.level === "warn")
    expect(warning?.message).toBe(
      `Reusing existing MariaDB root password from ${join(config.credentialsDir, "database-root-password.json")}`,
    )
  })

  it("takes the environment value in automated runs", async () => {
    const { ctx, dir } = createTestContext({ mode: "automated" })
    track(dir)

    const secret = await ctx.secrets.resolve({ ...DB_REQUEST, override: "test-secret-root" })

    expect(secret.value).toBe("test-secret-root")
    expect(secret.method).toBe("environment")
  })

  it("ignores the environment value outside automated runs", async () => {
    const { ctx, dir } = createTestContext({ mode: "quick" })
    track(dir)

    const secret = await ctx.secrets.resolve({ ...DB_REQUEST, override: "test-secret-root" })

    expect(secret.method).toBe("generated")
    expect(secret.value).not.toBe("test-secret-root")
  })

  it("asks the operator when random generation is declined", async () => {
    const prompter = new ScriptedPrompter([false, "test-secret-operator"])
    const { ctx, dir } = createTestContext({ mode: "interactive", prompter })
    track(dir)

    const secret = await ctx.secrets.resolve(DB_REQUEST)

    expect(prompter.asked).toEqual(["Generate random MariaDB root password?", "Enter MariaDB root password"])
    expect(secret.value).toBe("test-secret-operator")
    expect(secret.method).toBe("operator")
  })

  it("asks again when the operator's value is too short to mask", async () => {
    const prompter = new ScriptedPrompter([false, "abc", "test-secret-operator"])
    const { ctx, dir, memory } = createTestContext({ mode: "interactive", prompter })
    track(dir)

    const secret = await ctx.secrets.resolve(DB_REQUEST)

    expect(prompter.asked).toEqual([
      "Generate random MariaDB root password?",
      "Enter MariaDB root password",
      "Enter MariaDB root password",
    ])
    expect(secret.value).toBe("test-secret-operator")
    expect(memory.entries.map(entry => entry.message)).toContain("MariaDB root password: Must be at least 8 characters")
  })

  it("masks resolved values in later log lines", async () => {
    const { ctx, dir, memory } = createTestContext()
    track(dir)

    const secret = await ctx.secrets.resolve(DB_REQUEST)
    ctx.logger.info(`value=${secret.value}`)

    expect(memory.entries[memory.entries.length - 1]?.message).toBe(`value=${REDACTED}`)
  })

  it("treats a malformed credential file as absent", async () => {
    const { ctx, dir, config, memory } = createTestContext()
    track(dir)
    mkdirSync(config.credentialsDir, { recursive: true })
    const file = join(config.credentialsDir, "admin-password.json")
    writeFileSync(file, "{not json", { mode: 0o600 })

    expect(await ctx.secrets.load(SECRET_PURPOSES.ADMIN)).toBeUndefined()
    expect(memory.entries.some(entry => entry.level === "warn" && entry.message.startsWith("Ignoring unreadable"))).toBe(
      true,
    )
  })

  it("restricts a loaded file that was readable by others", async () => {
    const { ctx, dir, config } = createTestContext()
    track(dir)
    mkdirSync(config.credentialsDir, { recursive: true })
    const file = join(config.credentialsDir, "admin-password.json")
    const record = { purpose: "admin-password", value: "test-secret", method: "generated", createdAt: "2026-01-01" }
    writeFileSync(file, JSON.stringify(record))
    chmodSync(file, 0o644)

    const secret = await ctx.secrets.load(SECRET_PURPOSES.ADMIN)

    expect(secret?.value).toBe("test-secret")
    expect(modeOf(file)).toBe(0o600)
  })

  it("requires a secret an earlier step resolved", async () => {
    const { ctx, dir } = createTestContext()
    track(dir)

    await expect(ctx.secrets.require(SECRET_PURPOSES.ADMIN)).rejects.toThrow("No admin-password found")
    const resolved = await ctx.secrets.resolve({ purpose: SECRET_PURPOSES.ADMIN, label: "administrator password", length: 16 })
    expect((await ctx.secrets.require(SECRET_PURPOSES.ADMIN)).value).toBe(resolved.value)
  })

  it("writes an aligned owner-only summary", async () => {
    const { ctx, dir, config } = createTestContext()
    track(dir)

    const path = await ctx.secrets.writeSummary("Creds", [
      { label: "Site URL", value: "http://erp.local" },
      { label: "MariaDB root password", value: "test-secret" },
    ])

    expect(path).toBe(config.summaryFile)
    expect(readFileSync(path, "utf8")).toBe(
      "Creds\n=====\n\nSite URL:              http://erp.local\nMariaDB root password: test-secret\n",
    )
    expect(modeOf(path)).toBe(0o600)
  })

  it("purges credentials and the summary", async () => {
    const { ctx, dir, config } = createTestContext()
    track(dir)
    await ctx.secrets.resolve(DB_REQUEST)
    await ctx.secrets.writeSummary("Creds", [{ label: "a", value: "b" }])

    await ctx.secrets.purge()

    expect(existsSync(config.credentialsDir)).toBe(false)
    expect(existsSync(config.summaryFile)).toBe(false)
  })
})

describe("withRestrictedFile", () => {
  let dir: string | undefined

  afterEach(() => {
    if (dir) removeTempDir(dir)
  })

  it("leaves the file owner-only when the writer throws", async () => {
    dir = makeTempDir()
    const path = join(dir, "secret.json")
    writeFileSync(path, "old")
    chmodSync(path, 0o644)

    await expect(
      withRestrictedFile(path, async handle => {
        await handle.writeFile("partial")
        throw new Error("writer failed")
      }),
    ).rejects.toThrow("writer failed")

    expect(modeOf(path)).toBe(0o600)
  })

  it("writes through the handle", async () => {
    dir = makeTempDir()
    const path = join(dir, "secret.json")

    await withRestrictedFile(path, async handle => {
      await handle.writeFile("test-secret")
    })

    expect(readFileSync(path, "utf8")).toBe("test-secret")
    expect(modeOf(path)).toBe(0o600)
  })
})
