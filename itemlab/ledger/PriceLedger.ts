import { EventEmitter } from "events"
import { createLogger, type Logger } from "../../ai_base/logger"
import { mean, populationStdDev, pricesEqual } from "../../bg_tasks/utils/priceStats"
import {
  assertWindowMs,
  copyItem,
  parseItemInput,
  type InventoryItem,
  type InventoryItemInput,
  type PriceObservation,
} from "./itemSchemas"

export interface PriceLedgerOptions {
  /** Inject a clock for tests (default: Date.now) */
  now?: () => number
  logger?: Logger
}

/** Typed events */
type LedgerEvents = {
  priceObserved: (observation: PriceObservation) => void
  itemRemoved: (itemId: string) => void
}

/**
 * PriceLedger
 * - Current state per item id, stored and returned as copies
 * - Append-only price history, one observation on first sight and on every price change
 * - Windowed average / volatility over the history
 *
 * Every method is synchronous, so each call finishes before another one can touch the maps.
 */
export class PriceLedger {
  private items = new Map<string, InventoryItem>()
  private history: PriceObservation[] = [] // insertion order
  private readonly events = new EventEmitter()
  private readonly now: () => number
  private readonly logger: Logger

  constructor(opts: PriceLedgerOptions = {}) {
    this.now = opts.now ?? Date.now
    this.logger = opts.logger ?? createLogger("PriceLedger")
  }

  /** Typed 'on' */
  public on<E extends keyof LedgerEvents>(event: E, listener: LedgerEvents[E]): this {
    this.events.on(event, listener)
    return this
  }

  /** Typed 'once' */
  public once<E extends keyof LedgerEvents>(event: E, listener: LedgerEvents[E]): this {
    this.events.once(event, listener)
    return this
  }

  public off<E extends keyof LedgerEvents>(event: E, listener: LedgerEvents[E]): this {
    this.events.off(event, listener)
    return this
  }

  /** Number of items currently stored */
  get size(): number {
    return this.items.size
  }

  /**
   * Add or replace the record for `item.id`.
   * Records a price observation when the id is new or the price moved.
   * @throws ZodError on malformed input
   */
  public upsertItem(item: InventoryItemInput): void {
    const input = parseItemInput(item)
    const ts = this.now()
    const existing = this.items.get(input.id)

    if (!existing || !pricesEqual(existing.currentPrice, input.currentPrice)) {
      const observation: PriceObservation = Object.freeze({
        itemId: input.id,
        price: input.currentPrice,
        timestamp: ts,
        source: input.owner,
      })
      this.history.push(observation)
      this.logger.debug("Price observed", {
        itemId: input.id,
        previousPrice: existing?.currentPrice ?? null,
        price: input.currentPrice,
      })
      this.events.emit("priceObserved", observation)
    }

    this.items.set(input.id, {
      id: input.id,
      name: input.name,
      currentPrice: input.currentPrice,
      quantity: input.quantity,
      owner: input.owner,
      lastUpdated: ts,
    })
  }

  /** Copy of the stored record, or null when the id is unknown */
  public getItem(itemId: string): InventoryItem | null {
    const item = this.items.get(itemId)
    return item ? copyItem(item) : null
  }

  public listItems(): InventoryItem[] {
    return Array.from(this.items.values(), copyItem)
  }

  public listItemsByOwner(owner: string): InventoryItem[] {
    return this.listItems().filter(i => i.owner === owner)
  }

  /** Owner's items whose lastUpdated falls in [now - windowMs, now] */
  public listRecentItemsByOwner(owner: string, windowMs: number): InventoryItem[] {
    assertWindowMs(windowMs)
    const now = this.now()
    const cutoff = now - windowMs
    return this.listItemsByOwner(owner).filter(
      i => i.lastUpdated >= cutoff && i.lastUpdated <= now
    )
  }

  /** Observations for one item, ascending by timestamp */
  public getPriceHistory(itemId: string): PriceObservation[] {
    return sortByTs(this.history.filter(h => h.itemId === itemId))
  }

  public getAllPriceHistory(): PriceObservation[] {
    return sortByTs(this.history.slice())
  }

  /** Mean price over [now - windowMs, now]; 0 when nothing falls inside */
  public getAveragePrice(itemId: string, windowMs: number): number {
    return mean(this.pricesInWindow(itemId, windowMs))
  }

  /** Population standard deviation over [now - windowMs, now]; 0 below two samples */
  public getPriceVolatility(itemId: string, windowMs: number): number {
    const prices = this.pricesInWindow(itemId, windowMs)
    if (prices.length < 2) return 0
    return populationStdDev(prices)
  }

  /** Drop the current record; its price history stays */
  public removeItem(itemId: string): boolean {
    const removed = this.items.delete(itemId)
    if (removed) {
      this.logger.info("Item removed", { itemId })
      this.events.emit("itemRemoved", itemId)
    }
    return removed
  }

  // ---------- internals ----------

  private pricesInWindow(itemId: string, windowMs: number): number[] {
    assertWindowMs(windowMs)
    const now = this.now()
    const cutoff = now - windowMs
    return this.history
      .filter(h => h.itemId === itemId && h.timestamp >= cutoff && h.timestamp <= now)
      .map(h => h.price)
  }
}

/** Stable ascending sort, ties keep insertion order */
function sortByTs(list: PriceObservation[]): PriceObservation[] {
  return list.sort((a, b) => a.timestamp - b.timestamp)
}
