import { getConfig } from "../../ai_base/config"
import type { InventoryItem } from "../../itemlab/ledger/itemSchemas"
import type { PriceLedger } from "../../itemlab/ledger/PriceLedger"
import { ActivityTypeSchema, type ActivityType, type SuspiciousActivity } from "../../infra/watchman/activityTypes"
import type { CheatDetector } from "../../infra/watchman/CheatDetector"

export interface UserActivitySummary {
  userId: string
  count: number
  maxSeverity: number
}

export interface SecurityReport {
  generatedAt: number
  totalActivities: number
  highSeverityThreshold: number
  highSeverityCount: number
  byType: Record<ActivityType, number>
  /** worst offenders first */
  users: UserActivitySummary[]
  /** sorted by item name */
  inventory: InventoryItem[]
}

export interface SecurityReportOptions {
  /** default: HIGH_SEVERITY_THRESHOLD from config */
  highSeverityThreshold?: number
  now?: () => number
}

export class SecurityReporter {

  static build(
    ledger: PriceLedger,
    detector: CheatDetector,
    opts: SecurityReportOptions = {}
  ): SecurityReport {
    const threshold = opts.highSeverityThreshold ?? getConfig().highSeverityThreshold
    const activities = detector.getAllActivities()

    const byType: Record<ActivityType, number> = {
      PriceManipulation: 0,
      UnrealisticQuantity: 0,
      RapidTransactions: 0,
    }
    const users = new Map<string, UserActivitySummary>()
    for (const a of activities) {
      byType[a.type] += 1
      const u = users.get(a.userId) ?? { userId: a.userId, count: 0, maxSeverity: 0 }
      u.count += 1
      u.maxSeverity = Math.max(u.maxSeverity, a.severityScore)
      users.set(a.userId, u)
    }

    return {
      generatedAt: (opts.now ?? Date.now)(),
      totalActivities: activities.length,
      highSeverityThreshold: threshold,
      highSeverityCount: detector.getHighSeverityActivities(threshold).length,
      byType,
      users: Array.from(users.values()).sort(
        (a, b) => b.maxSeverity - a.maxSeverity || b.count - a.count || a.userId.localeCompare(b.userId)
      ),
      inventory: ledger.listItems().sort((a, b) => a.name.localeCompare(b.name)),
    }
  }

  static summarize(report: SecurityReport): string {
    const types = ActivityTypeSchema.options.map(t => `${t}: ${report.byType[t]}`).join(", ")
    return [
      `Activities: ${report.totalActivities}`,
      `High severity (>= ${report.highSeverityThreshold}): ${report.highSeverityCount}`,
      types,
      `Items: ${report.inventory.length}`,
    ].join(" | ")
  }

  /**
   * Create a simple table of the first `n` activities.
   */
  static table(activities: SuspiciousActivity[], n: number = 10): string {
    const header = `Detected\tType\tUser\tSeverity\tDescription`
    const rows = activities.slice(0, n).map(a => {
      const time = new Date(a.detectedAt).toISOString()
      return `${time}\t${a.type}\t${a.userId}\t${a.severityScore.toFixed(2)}\t${a.description}`
    })
    return [header, ...rows].join("\n")
  }
}
