import { z } from "zod"

export const InventoryItemInputSchema = z.object({
  id: z.string().min(1, "item id required"),
  name: z.string(),
  currentPrice: z.number().finite().nonnegative(),
  quantity: z.number().int().nonnegative(),
  owner: z.string(),
  /** Unix ms; overwritten by the ledger on upsert */
  lastUpdated: z.number().finite().optional(),
})

export type InventoryItemInput = z.infer<typeof InventoryItemInputSchema>

export interface InventoryItem {
  id: string
  name: string
  currentPrice: number
  quantity: number
  owner: string
  lastUpdated: number // Unix ms
}

export interface PriceObservation {
  readonly itemId: string
  readonly price: number
  readonly timestamp: number // Unix ms
  /** user acting on the item when the price was seen */
  readonly source: string
}

/** Parse caller input into a detached copy (unknown keys are dropped) */
export function parseItemInput(item: InventoryItemInput): InventoryItemInput {
  return InventoryItemInputSchema.parse(item)
}

export function copyItem(item: InventoryItem): InventoryItem {
  return { ...item }
}

export function assertWindowMs(windowMs: number, name = "windowMs"): void {
  if (!Number.isFinite(windowMs) || windowMs < 0) {
    throw new RangeError(`${name} must be a finite number >= 0`)
  }
}
