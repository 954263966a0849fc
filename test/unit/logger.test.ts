import assert from "node:assert/strict"
import test from "node:test"
import { createLogger, type LogSink } from "../../ai_base/logger"

type Line = { method: "log" | "warn" | "error"; entry: Record<string, unknown> }

function recordingSink(): { sink: LogSink; lines: Line[] } {
  const lines: Line[] = []
  const sink: LogSink = {
    log: (entry: Record<string, unknown>) => lines.push({ method: "log", entry }),
    warn: (entry: Record<string, unknown>) => lines.push({ method: "warn", entry }),
    error: (entry: Record<string, unknown>) => lines.push({ method: "error", entry }),
  }
  return { sink, lines }
}

test("createLogger writes structured lines at or above its level", () => {
  const { sink, lines } = recordingSink()
  const logger = createLogger("PriceLedger", "info", sink)

  logger.debug("hidden")
  logger.info("Item removed", { itemId: "ITEM001" })

  assert.equal(lines.length, 1)
  const { method, entry } = lines[0]
  assert.equal(method, "log")
  assert.equal(entry.level, "info")
  assert.equal(entry.scope, "PriceLedger")
  assert.equal(entry.msg, "Item removed")
  assert.equal(entry.itemId, "ITEM001")
  assert.equal(typeof entry.timestamp, "string")
})

test("warn goes to sink.warn and error to sink.error", () => {
  const { sink, lines } = recordingSink()
  const logger = createLogger("CheatDetector", "warn", sink)

  logger.info("hidden")
  logger.warn("Suspicious activity detected")
  logger.error("Sweep failed", { error: "boom" })

  assert.deepEqual(lines.map(l => l.method), ["warn", "error"])
  assert.equal(lines[1].entry.error, "boom")
})

test("silent level drops every line", () => {
  const { sink, lines } = recordingSink()
  const logger = createLogger("ActivityJanitor", "silent", sink)

  logger.warn("nothing")
  logger.error("nothing")

  assert.equal(lines.length, 0)
})
