import type Decimal from "decimal.js"
import { relativeChange, toDecimal } from "../../bg_tasks/utils/priceStats"
import type { InventoryItem, InventoryItemInput, PriceObservation } from "../../itemlab/ledger/itemSchemas"
import type {
  PriceManipulationDraft,
  RapidTransactionsDraft,
  UnrealisticQuantityDraft,
} from "./activityTypes"

/** relative change above which a price move counts as manipulation (50%) */
export const EXTREME_PRICE_CHANGE_THRESHOLD = 0.5
/** more than this many updates inside the window is a burst */
export const RAPID_TRANSACTION_THRESHOLD = 10
export const RAPID_TRANSACTION_WINDOW_SECONDS = 60
export const HIGH_QUANTITY_THRESHOLD = 100_000

export function formatPrice(value: Decimal.Value): string {
  return `$${toDecimal(value).toFixed(2)}`
}

export function formatPercent(fraction: Decimal.Value): string {
  return `${toDecimal(fraction).times(100).toFixed(2)}%`
}

/**
 * Compare the item's price to the earlier of the two latest observations.
 * Needs at least two observations; a previous price of 0 is skipped.
 */
export function checkPriceManipulation(
  item: InventoryItemInput,
  history: PriceObservation[]
): PriceManipulationDraft | null {
  if (history.length < 2) return null

  const [previous] = history.slice(-2)
  const previousPrice = previous.price
  const currentPrice = item.currentPrice
  if (previousPrice === 0) return null

  const change = relativeChange(previousPrice, currentPrice)
  if (change.lte(EXTREME_PRICE_CHANGE_THRESHOLD)) return null

  return {
    type: "PriceManipulation",
    userId: item.owner,
    description:
      `Extreme price change detected: ${formatPrice(previousPrice)} → ${formatPrice(currentPrice)} ` +
      `(${formatPercent(change)})`,
    severityScore: change.times(100).toNumber(),
    metadata: {
      itemId: item.id,
      itemName: item.name,
      previousPrice,
      currentPrice,
      changeFraction: change.toNumber(),
    },
  }
}

/** Quantities past the threshold usually mean duplicated items */
export function checkUnrealisticQuantity(item: InventoryItemInput): UnrealisticQuantityDraft | null {
  if (item.quantity <= HIGH_QUANTITY_THRESHOLD) return null

  return {
    type: "UnrealisticQuantity",
    userId: item.owner,
    description: `Extremely high quantity detected: ${item.quantity} units of ${item.name}`,
    severityScore: Math.min(100, item.quantity / 1000),
    metadata: {
      itemId: item.id,
      itemName: item.name,
      quantity: item.quantity,
    },
  }
}

/** Count the user's items touched in the trailing window ending at `now` */
export function checkRapidTransactions(
  userId: string,
  recentItems: ReadonlyArray<Pick<InventoryItem, "owner" | "lastUpdated">>,
  now: number
): RapidTransactionsDraft | null {
  const cutoff = now - RAPID_TRANSACTION_WINDOW_SECONDS * 1000
  const count = recentItems.filter(i => i.owner === userId && i.lastUpdated >= cutoff).length
  if (count <= RAPID_TRANSACTION_THRESHOLD) return null

  return {
    type: "RapidTransactions",
    userId,
    description: `Unusual transaction rate: ${count} transactions in ${RAPID_TRANSACTION_WINDOW_SECONDS} seconds`,
    severityScore: count * 5,
    metadata: {
      transactionCount: count,
      timeWindowSeconds: RAPID_TRANSACTION_WINDOW_SECONDS,
    },
  }
}
