import { mkdtempSync, readFileSync, rmSync, statSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import {
  createMemorySink,
  createRedactor,
  createRunLogger,
  fileSink,
  formatLogLine,
  formatTimestamp,
  REDACTED,
} from "../src/index.js"

describe("formatTimestamp", () => {
  it("renders local wall-clock time with zero padding", () => {
    expect(formatTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe("2026-01-02 03:04:05")
  })
})

describe("formatLogLine", () => {
  it("tags success as INFO with a check mark", () => {
    const line = formatLogLine({ level: "success", message: "done", timestamp: new Date(2026, 9, 18, 14, 30, 0) })
    expect(line).toBe("[2026-10-18 14:30:00] [INFO] ✓ done")
  })

  it("tags warnings and errors", () => {
    const at = new Date(2026, 9, 18, 14, 30, 0)
    expect(formatLogLine({ level: "warn", message: "low ram", timestamp: at })).toBe(
      "[2026-10-18 14:30:00] [WARN] ⚠ low ram",
    )
    expect(formatLogLine({ level: "error", message: "boom", timestamp: at })).toBe(
      "[2026-10-18 14:30:00] [ERROR] ✗ boom",
    )
  })
})

describe("createRunLogger", () => {
  it("drops entries below the threshold", () => {
    const memory = createMemorySink()
    const logger = createRunLogger({ sinks: [memory.sink], level: "WARN" })

    logger.debug("d")
    logger.info("i")
    logger.success("s")
    logger.warn("w")
    logger.error("e")

    expect(memory.entries.map(e => e.level)).toEqual(["warn", "error"])
  })

  it("appends the error message", () => {
    const memory = createMemorySink()
    const logger = createRunLogger({ sinks: [memory.sink] })

    logger.error("Step database failed", new Error("exit 100"))

    expect(memory.entries[0]?.message).toBe("Step database failed: exit 100")
  })

  it("masks registered secrets in every line", () => {
    const memory = createMemorySink()
    const redactor = createRedactor()
    const logger = createRunLogger({ sinks: [memory.sink], redactor })

    redactor.add("test-secret-value")
    logger.info("password is test-secret-value")
    logger.error("failed", new Error("mysql -ptest-secret-value rejected"))

    expect(memory.entries[0]?.message).toBe(`password is ${REDACTED}`)
    expect(memory.entries[1]?.message).toBe(`failed: mysql -p${REDACTED} rejected`)
  })

  it("merges child context into entries", () => {
    const memory = createMemorySink()
    const logger = createRunLogger({ sinks: [memory.sink] }).child({ step: "database" })

    logger.info("starting", { operation: "install" })

    expect(memory.entries[0]?.context).toEqual({ step: "database", operation: "install" })
  })
})

describe("createRedactor", () => {
  it("ignores values too short to be secrets", () => {
    const redactor = createRedactor()
    redactor.add("a")
    expect(redactor.redact("a cat")).toBe("a cat")
  })
})

describe("fileSink", () => {
  let dir: string | undefined

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true })
  })

  it("appends timestamped lines to an owner-only file", () => {
    dir = mkdtempSync(join(tmpdir(), "erpstack-log-"))
    const path = join(dir, "nested", "install.log")
    const logger = createRunLogger({ sinks: [fileSink(path)] })

    logger.info("first")
    logger.warn("second")

    const lines = readFileSync(path, "utf8").trim().split("\n")
    expect(lines).toHaveLength(2)
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] \[INFO\] ℹ first$/)
    expect(lines[1]).toMatch(/\[WARN\] ⚠ second$/)
    expect(statSync(path).mode & 0o777).toBe(0o600)
  })
})
