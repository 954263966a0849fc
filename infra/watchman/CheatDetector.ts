import { EventEmitter } from "events"
import { createLogger, type Logger } from "../../ai_base/logger"
import { parseItemInput, assertWindowMs, type InventoryItem, type InventoryItemInput } from "../../itemlab/ledger/itemSchemas"
import type { PriceLedger } from "../../itemlab/ledger/PriceLedger"
import { createActivity, type ActivityDraft, type ActivityType, type SuspiciousActivity } from "./activityTypes"
import {
  RAPID_TRANSACTION_WINDOW_SECONDS,
  checkPriceManipulation,
  checkRapidTransactions,
  checkUnrealisticQuantity,
} from "./detectionRules"

export interface CheatDetectorOptions {
  /** Inject a clock for tests (default: Date.now) */
  now?: () => number
  logger?: Logger
}

/** Typed events */
type DetectorEvents = {
  activity: (activity: SuspiciousActivity) => void
  purged: (removed: number) => void
}

/**
 * Runs the cheat rules against ledger data and keeps a log of findings.
 * Reads from the ledger only; the activity log is the one thing it owns.
 *
 * Events:
 *  - "activity": SuspiciousActivity, once per logged finding
 *  - "purged": number of findings removed by clearOldActivities
 */
export class CheatDetector {
  private activities: SuspiciousActivity[] = []
  private readonly events = new EventEmitter()
  private readonly now: () => number
  private readonly logger: Logger

  constructor(
    private readonly ledger: PriceLedger,
    opts: CheatDetectorOptions = {}
  ) {
    this.now = opts.now ?? Date.now
    this.logger = opts.logger ?? createLogger("CheatDetector")
  }

  /** Typed 'on' */
  public on<E extends keyof DetectorEvents>(event: E, listener: DetectorEvents[E]): this {
    this.events.on(event, listener)
    return this
  }

  /** Typed 'once' */
  public once<E extends keyof DetectorEvents>(event: E, listener: DetectorEvents[E]): this {
    this.events.once(event, listener)
    return this
  }

  public off<E extends keyof DetectorEvents>(event: E, listener: DetectorEvents[E]): this {
    this.events.off(event, listener)
    return this
  }

  /**
   * Check one item update for price manipulation and unrealistic quantity.
   * Call after the item went through `ledger.upsertItem`.
   * @returns findings of this call (0, 1 or 2), all of them already logged
   */
  public analyzeItemUpdate(item: InventoryItemInput): SuspiciousActivity[] {
    const input = parseItemInput(item)
    const drafts: ActivityDraft[] = []

    const price = checkPriceManipulation(input, this.ledger.getPriceHistory(input.id))
    if (price) drafts.push(price)

    const quantity = checkUnrealisticQuantity(input)
    if (quantity) drafts.push(quantity)

    return this.record(drafts)
  }

  /**
   * Count `userId`'s items in `recentItems` updated in the last 60 seconds.
   * The caller decides which items to pass; see detectRapidTransactionsForUser
   * for the ledger-backed variant.
   */
  public detectRapidTransactions(
    userId: string,
    recentItems: ReadonlyArray<Pick<InventoryItem, "owner" | "lastUpdated">>
  ): SuspiciousActivity | null {
    const draft = checkRapidTransactions(userId, recentItems, this.now())
    if (!draft) return null
    const [activity] = this.record([draft])
    return activity
  }

  /** Same rule, fed with the user's recently updated items straight from the ledger */
  public detectRapidTransactionsForUser(userId: string): SuspiciousActivity | null {
    const recent = this.ledger.listRecentItemsByOwner(userId, RAPID_TRANSACTION_WINDOW_SECONDS * 1000)
    return this.detectRapidTransactions(userId, recent)
  }

  /** All findings, newest first */
  public getAllActivities(): SuspiciousActivity[] {
    return byNewest(this.activities.slice())
  }

  public getUserActivities(userId: string): SuspiciousActivity[] {
    return byNewest(this.activities.filter(a => a.userId === userId))
  }

  public getActivitiesByType(type: ActivityType): SuspiciousActivity[] {
    return byNewest(this.activities.filter(a => a.type === type))
  }

  /** Findings with severityScore >= threshold, most severe first */
  public getHighSeverityActivities(severityThreshold: number = 50): SuspiciousActivity[] {
    return this.activities
      .filter(a => a.severityScore >= severityThreshold)
      .sort((a, b) => b.severityScore - a.severityScore)
  }

  /**
   * Drop findings detected strictly before now - maxAgeMs.
   * @returns how many were removed
   */
  public clearOldActivities(maxAgeMs: number): number {
    assertWindowMs(maxAgeMs, "maxAgeMs")
    const cutoff = this.now() - maxAgeMs
    const before = this.activities.length
    this.activities = this.activities.filter(a => a.detectedAt >= cutoff)
    const removed = before - this.activities.length

    if (removed > 0) {
      this.logger.info("Old activities cleared", { removed, remaining: this.activities.length })
    }
    this.events.emit("purged", removed)
    return removed
  }

  // ---------- internals ----------

  private record(drafts: ActivityDraft[]): SuspiciousActivity[] {
    const detectedAt = this.now()
    const created = drafts.map(d => createActivity(d, detectedAt))
    this.activities.push(...created)
    for (const activity of created) {
      this.logger.warn("Suspicious activity detected", {
        activityId: activity.id,
        type: activity.type,
        userId: activity.userId,
        severityScore: activity.severityScore,
      })
      this.events.emit("activity", activity)
    }
    return created
  }
}

/** Stable descending sort by detectedAt */
function byNewest(list: SuspiciousActivity[]): SuspiciousActivity[] {
  return list.sort((a, b) => b.detectedAt - a.detectedAt)
}
