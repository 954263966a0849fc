import assert from "node:assert/strict"
import test from "node:test"
import { ZodError } from "zod"
import { getConfig, getLogLevel } from "../../ai_base/config"

test("getConfig falls back to defaults on an empty environment", () => {
  const config = getConfig({})
  assert.deepEqual(config, {
    logLevel: "info",
    activityRetentionMs: 86_400_000,
    janitorIntervalMs: 60_000,
    highSeverityThreshold: 50,
  })
})

test("getConfig reads and coerces variables, treating blanks as unset", () => {
  const config = getConfig({
    LOG_LEVEL: "debug",
    ACTIVITY_RETENTION_MS: "5000",
    JANITOR_INTERVAL_MS: "  ",
    HIGH_SEVERITY_THRESHOLD: "75",
  })
  assert.equal(config.logLevel, "debug")
  assert.equal(config.activityRetentionMs, 5000)
  assert.equal(config.janitorIntervalMs, 60_000)
  assert.equal(config.highSeverityThreshold, 75)
})

test("getConfig rejects an unknown log level", () => {
  assert.throws(() => getConfig({ LOG_LEVEL: "verbose" }), ZodError)
})

test("getConfig rejects a janitor interval under one second", () => {
  assert.throws(() => getConfig({ JANITOR_INTERVAL_MS: "10" }), ZodError)
})

test("getLogLevel reads only LOG_LEVEL and falls back to info", () => {
  assert.equal(getLogLevel({ LOG_LEVEL: "warn", HIGH_SEVERITY_THRESHOLD: "-5" }), "warn")
  assert.equal(getLogLevel({ LOG_LEVEL: "verbose" }), "info")
  assert.equal(getLogLevel({ LOG_LEVEL: " " }), "info")
  assert.equal(getLogLevel({}), "info")
})
