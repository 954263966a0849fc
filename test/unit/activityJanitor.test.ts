import assert from "node:assert/strict"
import test from "node:test"
import { ZodError } from "zod"
import { silentLogger } from "../../ai_base/logger"
import { ActivityJanitor } from "../../bg_tasks/jobs/activityJanitor"
import { PriceLedger } from "../../itemlab/ledger/PriceLedger"
import { CheatDetector } from "../../infra/watchman/CheatDetector"

const T0 = Date.UTC(2026, 0, 1)
const HOUR = 60 * 60 * 1000

class FailingDetector extends CheatDetector {
  clearOldActivities(): number {
    throw new Error("log unavailable")
  }
}

function setup() {
  const clock = { t: T0 }
  const now = () => clock.t
  const ledger = new PriceLedger({ now, logger: silentLogger })
  const detector = new CheatDetector(ledger, { now, logger: silentLogger })
  const diamonds = { id: "ITEM004", name: "Diamond", currentPrice: 5000, quantity: 999_999, owner: "SuspiciousPlayer" }
  ledger.upsertItem(diamonds)
  detector.analyzeItemUpdate(diamonds)
  return { clock, ledger, detector }
}

test("runOnce purges findings past the retention and reports the count", () => {
  const { clock, detector } = setup()
  const sweeps: number[] = []
  const janitor = new ActivityJanitor(detector, {
    retentionMs: HOUR,
    hooks: { onSweep: n => sweeps.push(n) },
    logger: silentLogger,
  })

  assert.equal(janitor.runOnce(), 0)
  clock.t += 2 * HOUR
  assert.equal(janitor.runOnce(), 1)
  assert.deepEqual(sweeps, [0, 1])
  assert.deepEqual(detector.getAllActivities(), [])
})

test("a failing sweep is handed to onError and returns 0", () => {
  const { ledger } = setup()
  const errors: string[] = []
  const janitor = new ActivityJanitor(new FailingDetector(ledger, { logger: silentLogger }), {
    retentionMs: HOUR,
    hooks: { onError: e => errors.push(e.message) },
    logger: silentLogger,
  })

  assert.equal(janitor.runOnce(), 0)
  assert.deepEqual(errors, ["log unavailable"])
})

test("start and stop toggle the timer", () => {
  const { detector } = setup()
  const janitor = new ActivityJanitor(detector, { retentionMs: HOUR, logger: silentLogger })

  janitor.start()
  janitor.start()
  assert.equal(janitor.running, true)
  janitor.stop()
  assert.equal(janitor.running, false)
  janitor.stop()
})

test("bad options are rejected", () => {
  const { detector } = setup()
  assert.throws(() => new ActivityJanitor(detector, { retentionMs: -1 }), ZodError)
  assert.throws(() => new ActivityJanitor(detector, { retentionMs: HOUR, intervalMs: 0 }), ZodError)
})
