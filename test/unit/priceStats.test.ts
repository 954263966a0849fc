import assert from "node:assert/strict"
import test from "node:test"
import { mean, populationStdDev, populationVariance, pricesEqual, relativeChange } from "../../bg_tasks/utils/priceStats"

test("mean of an empty series is 0", () => {
  assert.equal(mean([]), 0)
  assert.equal(mean([1, 2, 3]), 2)
})

test("population variance divides by n", () => {
  assert.equal(populationVariance([2, 4, 4, 4, 5, 5, 7, 9]), 4)
  assert.equal(populationStdDev([2, 4, 4, 4, 5, 5, 7, 9]), 2)
})

test("standard deviation of two prices 5 apart from the mean", () => {
  assert.equal(populationStdDev([10, 20]), 5)
})

test("decimal prices average without binary drift", () => {
  assert.equal(mean([0.1, 0.2, 0.3]), 0.2)
  assert.equal(populationStdDev([0.1, 0.3]), 0.1)
})

test("relative change of 0.70 to 1.05 is exactly one half", () => {
  assert.equal(relativeChange(0.7, 1.05).toString(), "0.5")
  assert.equal(relativeChange(50, 500).toNumber(), 9)
})

test("pricesEqual compares decimal values", () => {
  assert.equal(pricesEqual(0.7, 0.70), true)
  assert.equal(pricesEqual(1.05, 1.06), false)
})
