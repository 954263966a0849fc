import { randomUUID } from "crypto"
import { z } from "zod"

export const ActivityTypeSchema = z.enum([
  "PriceManipulation",
  "UnrealisticQuantity",
  "RapidTransactions",
])
export type ActivityType = z.infer<typeof ActivityTypeSchema>

interface ActivityBase {
  readonly id: string
  readonly userId: string
  readonly description: string
  /** >= 0, no upper bound */
  readonly severityScore: number
  readonly detectedAt: number // Unix ms
}

export interface PriceManipulationMetadata {
  readonly itemId: string
  readonly itemName: string
  readonly previousPrice: number
  readonly currentPrice: number
  /** |current - previous| / previous */
  readonly changeFraction: number
}

export interface UnrealisticQuantityMetadata {
  readonly itemId: string
  readonly itemName: string
  readonly quantity: number
}

export interface RapidTransactionsMetadata {
  readonly transactionCount: number
  readonly timeWindowSeconds: number
}

export interface PriceManipulationActivity extends ActivityBase {
  readonly type: "PriceManipulation"
  readonly metadata: PriceManipulationMetadata
}

export interface UnrealisticQuantityActivity extends ActivityBase {
  readonly type: "UnrealisticQuantity"
  readonly metadata: UnrealisticQuantityMetadata
}

export interface RapidTransactionsActivity extends ActivityBase {
  readonly type: "RapidTransactions"
  readonly metadata: RapidTransactionsMetadata
}

export type SuspiciousActivity =
  | PriceManipulationActivity
  | UnrealisticQuantityActivity
  | RapidTransactionsActivity

export type PriceManipulationDraft = Omit<PriceManipulationActivity, "id" | "detectedAt">
export type UnrealisticQuantityDraft = Omit<UnrealisticQuantityActivity, "id" | "detectedAt">
export type RapidTransactionsDraft = Omit<RapidTransactionsActivity, "id" | "detectedAt">

/** What a rule produces before the detector stamps id and time on it */
export type ActivityDraft = PriceManipulationDraft | UnrealisticQuantityDraft | RapidTransactionsDraft

export function createActivity(draft: ActivityDraft, detectedAt: number): SuspiciousActivity {
  // drafts are built fresh by the rules, so their metadata can be frozen in place
  Object.freeze(draft.metadata)
  return Object.freeze({ ...draft, id: randomUUID(), detectedAt })
}
