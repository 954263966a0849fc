import { z } from "zod"
import { createLogger, type Logger } from "../../ai_base/logger"
import type { CheatDetector } from "../../infra/watchman/CheatDetector"

interface ActivityJanitorHooks {
  onSweep?: (removed: number) => void
  onError?: (error: Error) => void
}

export interface ActivityJanitorOptions {
  /** Findings older than this are dropped on each sweep */
  retentionMs: number
  /** Sweep interval in ms (default: 60_000) */
  intervalMs?: number
  hooks?: ActivityJanitorHooks
  logger?: Logger
}

const janitorOptionsSchema = z.object({
  retentionMs: z.number().finite().nonnegative(),
  intervalMs: z.number().finite().positive().default(60_000),
})

/**
 * Periodically purges old findings from a CheatDetector.
 * The detector never evicts on its own, so long-running hosts run one of these.
 */
export class ActivityJanitor {
  private intervalId?: NodeJS.Timeout
  private readonly retentionMs: number
  private readonly intervalMs: number
  private readonly hooks: Required<ActivityJanitorHooks>
  private readonly logger: Logger

  constructor(
    private readonly detector: CheatDetector,
    opts: ActivityJanitorOptions
  ) {
    const { retentionMs, intervalMs } = janitorOptionsSchema.parse({
      retentionMs: opts.retentionMs,
      intervalMs: opts.intervalMs,
    })
    this.retentionMs = retentionMs
    this.intervalMs = intervalMs
    this.hooks = {
      onSweep: opts.hooks?.onSweep ?? (() => {}),
      onError: opts.hooks?.onError ?? (() => {}),
    }
    this.logger = opts.logger ?? createLogger("ActivityJanitor")
  }

  get running(): boolean {
    return this.intervalId !== undefined
  }

  /** Start sweeping on the interval; no-op when already running */
  start(): void {
    if (this.intervalId) return
    this.logger.info("Janitor started", { intervalMs: this.intervalMs, retentionMs: this.retentionMs })
    this.intervalId = setInterval(() => this.runOnce(), this.intervalMs)
  }

  stop(): void {
    if (!this.intervalId) return
    clearInterval(this.intervalId)
    this.intervalId = undefined
    this.logger.info("Janitor stopped")
  }

  /**
   * One sweep. Errors are logged and handed to onError instead of escaping the timer.
   * @returns removed count, or 0 when the sweep failed
   */
  runOnce(): number {
    try {
      const removed = this.detector.clearOldActivities(this.retentionMs)
      this.logger.debug("Sweep finished", { removed })
      this.hooks.onSweep(removed)
      return removed
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Error(String(err))
      this.logger.error("Sweep failed", { error: error.message })
      this.hooks.onError(error)
      return 0
    }
  }
}
