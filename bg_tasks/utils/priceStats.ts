import Decimal from "decimal.js"

/**
 * Price math on exact decimals.
 * A price `number` is read through its shortest decimal form, so 0.7 is exactly 0.7.
 */
export function toDecimal(value: Decimal.Value): Decimal {
  return new Decimal(value)
}

export function pricesEqual(a: number, b: number): boolean {
  return toDecimal(a).eq(b)
}

/** |current - previous| / previous; caller guards previous = 0 */
export function relativeChange(previous: number, current: number): Decimal {
  const prev = toDecimal(previous)
  return toDecimal(current).minus(prev).abs().div(prev)
}

function decimalMean(xs: Decimal[]): Decimal {
  if (xs.length === 0) return new Decimal(0)
  return Decimal.sum(...xs).div(xs.length)
}

export function mean(xs: number[]): number {
  return decimalMean(xs.map(toDecimal)).toNumber()
}

/** Population variance: squared deviations divided by n, not n - 1 */
function decimalVariance(xs: Decimal[]): Decimal {
  if (xs.length === 0) return new Decimal(0)
  const m = decimalMean(xs)
  return Decimal.sum(...xs.map(x => x.minus(m).pow(2))).div(xs.length)
}

export function populationVariance(xs: number[]): number {
  return decimalVariance(xs.map(toDecimal)).toNumber()
}

export function populationStdDev(xs: number[]): number {
  return decimalVariance(xs.map(toDecimal)).sqrt().toNumber()
}
