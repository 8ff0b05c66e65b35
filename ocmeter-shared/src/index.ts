/**
 * Public API for ocmeter-shared.
 */

// Result & errors
export type { Result } from './result';
export { ok, err, unwrap } from './result';
export { OcmeterError, ConfigError, SessionNotFoundError, ExportError, errorMessage } from './errors';

// Logging
export type { Logger, LogContext, LoggerOptions } from './logger';
export { createLogger, createSilentLogger } from './logger';

// Paths
export { expandPath, getConfigDir, getDataHome, getDefaultMessagesDir, getDefaultStorageDir } from './paths';

// Record model
export type { TokenUsage, TimeData, InteractionRecord } from './types/usage';
export {
  EMPTY_TOKEN_USAGE,
  createTokenUsage,
  totalTokens,
  addTokenUsage,
  sumTokenUsage,
  durationMs,
} from './types/usage';

// Parsers
export { UNKNOWN_MODEL, normalizeModelName, extractModelName } from './parsers/modelName';
export type { RecordSource } from './parsers/interactionParser';
export { parseInteractionPayload, parseInteractionFile } from './parsers/interactionParser';

// Pricing
export type { ModelPricing, PricingTable } from './pricing/types';
export {
  DEFAULT_CONTEXT_WINDOW,
  resolvePricing,
  calculateCost,
  calculateRecordCost,
  sumDecimals,
  getContextWindow,
  getSessionQuota,
} from './pricing/pricingResolver';

// Sessions
export type { ModelBreakdownEntry } from './session/SessionData';
export { SessionData, MAX_SESSION_HOURS, MAX_TITLE_LENGTH } from './session/SessionData';
export {
  UNKNOWN_PROJECT,
  recordFileName,
  projectNameFromPath,
  recordProjectName,
  recordDurationMs,
} from './session/recordInfo';
export type { SessionStoreOptions, LoadOutcome, SessionFileStats } from './providers/sessionStore';
export { SessionStore, SESSION_DIR_PREFIX, findJsonFiles } from './providers/sessionStore';

// Aggregation
export type { DateRange, Timeframe, WeekStartDay } from './aggregation/dates';
export {
  WEEKDAY_NAMES,
  MONTH_NAMES,
  toDateKey,
  isDateKey,
  addDays,
  weekday,
  getCustomWeekRange,
  isoWeek,
  yearMonthOf,
  getMonthRange,
  getYearRange,
  parseMonthFilter,
  parseWeekStartDay,
  timeframeRange,
  formatWeekLabel,
  monthName,
} from './aggregation/dates';
export { DailyUsage, WeeklyUsage, MonthlyUsage } from './aggregation/periods';
export type {
  ModelUsageStats,
  ProjectUsageStats,
  BreakdownReport,
  ModelBreakdownReport,
  ProjectBreakdownReport,
  BreakdownOptions,
} from './aggregation/TimeframeAggregator';
export {
  outputRate,
  filterSessionsByDate,
  createDailyBreakdown,
  createWeeklyBreakdown,
  createMonthlyBreakdown,
  createModelBreakdown,
  createProjectBreakdown,
} from './aggregation/TimeframeAggregator';
export type {
  SessionsSummary,
  SessionStatistics,
  SessionHealth,
  DailyReportOptions,
  WeeklyReportOptions,
  MonthlyReportOptions,
  BreakdownReportOptions,
  SessionAnalyzerOptions,
} from './aggregation/SessionAnalyzer';
export { SessionAnalyzer } from './aggregation/SessionAnalyzer';

// Live tracking
export type {
  ActivityStatus,
  ContextUsage,
  LiveSnapshot,
  SessionStatus,
  SingleUpdate,
  MonitoringValidation,
  LiveTrackerOptions,
  RunOptions,
} from './live/LiveTracker';
export { LiveTracker, OUTPUT_RATE_WINDOW_MS, classifyActivity, mostRecentRecord } from './live/LiveTracker';

// Configuration
export type { AppConfig, TableStyle } from './config/schema';
export { buildConfigSchema, modelPricingSchema, pricingFileSchema } from './config/schema';
export type { LoadedConfig, AppContext, LoadConfigOptions, CreateContextOptions } from './config/loader';
export {
  CONFIG_FILE_NAME,
  LOCAL_CONFIG_FILE_NAME,
  BUNDLED_PRICING_FILE,
  configSearchPaths,
  loadAppConfig,
  resolvePricingPath,
  loadPricingTable,
  createAppContext,
  reloadAppContext,
} from './config/loader';

// Report rows & export
export type { CellValue, Row, ReportKind, TokenColumns } from './report/rows';
export {
  isoTimestamp,
  toSessionRows,
  toSessionSummaryRows,
  toDailyRows,
  toWeeklyRows,
  toMonthlyRows,
  toModelRows,
  toProjectRows,
} from './report/rows';
export type { ExportFormat, ExportOptions } from './report/exportWriter';
export { collectColumns, toCsv, toJson, defaultExportFileName, writeExport } from './report/exportWriter';
