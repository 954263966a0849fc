export { getConfig, getLogLevel, LogLevelSchema, type AppConfig, type LogLevel } from "./ai_base/config"
export { createLogger, silentLogger, type Logger, type LogMeta, type LogSink } from "./ai_base/logger"
export {
  InventoryItemInputSchema,
  type InventoryItem,
  type InventoryItemInput,
  type PriceObservation,
} from "./itemlab/ledger/itemSchemas"
export { PriceLedger, type PriceLedgerOptions } from "./itemlab/ledger/PriceLedger"
export {
  ActivityTypeSchema,
  type ActivityType,
  type SuspiciousActivity,
  type PriceManipulationActivity,
  type UnrealisticQuantityActivity,
  type RapidTransactionsActivity,
} from "./infra/watchman/activityTypes"
export {
  EXTREME_PRICE_CHANGE_THRESHOLD,
  HIGH_QUANTITY_THRESHOLD,
  RAPID_TRANSACTION_THRESHOLD,
  RAPID_TRANSACTION_WINDOW_SECONDS,
} from "./infra/watchman/detectionRules"
export { CheatDetector, type CheatDetectorOptions } from "./infra/watchman/CheatDetector"
export { ActivityJanitor, type ActivityJanitorOptions } from "./bg_tasks/jobs/activityJanitor"
export {
  SecurityReporter,
  type SecurityReport,
  type SecurityReportOptions,
  type UserActivitySummary,
} from "./mainkit/reports/SecurityReporter"
