/**
 * Shelter Records SDK
 *
 * Query matching, record storage, aggregation with demo-mode fallback,
 * an audit trail and access control for animal-shelter outcome records
 */

// Re-export types
export type {
  AnimalRecord,
  KnownField,
  RecordQuery,
  RecordPatch,
  Clause,
  FieldPredicate,
  StoreConnector,
  StoreHandle,
  AggregationKind,
  BreedPerformance,
  RescueType,
  RescueBreedBreakdown,
  RescueTypeSummary,
  RescueTypeAnalytics,
  MonthlyAdoptionTrend,
  DemographicSummary,
  OperationContext,
  UpdateOptions,
  DeleteOptions,
} from "./types.js";
export { KNOWN_FIELDS } from "./types.js";

// Re-export errors
export {
  ShelterStoreError,
  InvalidInputError,
  ComputationFailureError,
  AuditFailureError,
  DataFileError,
  errorCode,
  errorMessage,
} from "./errors.js";
export type { Result } from "./result.js";
export { ok, err, attempt } from "./result.js";

// Matcher
export {
  CompiledQuery,
  compileQuery,
  matches,
  filterRecords,
  coerceNumber,
  parseNumeric,
  toText,
} from "./query.js";
export { isMapping, assertMapping } from "./validation.js";

// Store and connectors
export type { StoreMode, RecordStoreOptions, OpenStoreOptions } from "./store.js";
export {
  RecordStore,
  openShelterStore,
  resolveHandle,
  connected,
  unavailable,
  SYSTEM_ACTOR,
} from "./store.js";
export { MemoryConnector } from "./connectors/memory.js";
export type { JsonFileConnectorOptions } from "./connectors/file.js";
export { JsonFileConnector, parseDataFile } from "./connectors/file.js";

// Aggregation
export type { RescueAnalyticsOptions, AnalyticsEngineOptions } from "./analytics.js";
export {
  AnalyticsEngine,
  computeBreedPerformance,
  computeRescueTypeAnalytics,
  computeMonthlyAdoptionTrends,
  computeDemographics,
  yearMonth,
  DEFAULT_TREND_MONTHS,
} from "./analytics.js";
export type { RescueProfile } from "./rescue.js";
export { RESCUE_PROFILES, RESCUE_TYPES, isRescueEligible } from "./rescue.js";

// Fallback
export type { FallbackDataset, FallbackProvider } from "./fallback.js";
export { DemoFallbackProvider, createFallbackProvider } from "./fallback.js";

// Audit
export type { AuditAction, AuditEntry, AuditSink } from "./audit.js";
export { MutationLog, MemoryAuditSink, JsonLinesAuditSink } from "./audit.js";

// Access control
export type {
  Role,
  UserAccount,
  Actor,
  Verification,
  CredentialVerifier,
  NewUser,
  AuthFailure,
  AuthFailureKind,
  IssuedToken,
  AccessControlOptions,
} from "./auth.js";
export {
  ROLES,
  isRole,
  hashPassword,
  verifyPassword,
  UserDirectory,
  AccessControl,
} from "./auth.js";

// Reports
export type {
  ReportRenderer,
  ExportStats,
  RescueCounts,
  RescueReport,
  RescueReportOptions,
} from "./report.js";
export {
  computeExportStats,
  countRescueEligible,
  buildRescueReport,
  SAMPLE_COLUMNS,
} from "./report.js";

// Formatting and I/O
export { stableStringify, recordColumns } from "./format.js";
export { atomicWrite, readTextFile, ensureDirectory } from "./io.js";

// Observability
export type { LogLevel, LogEntry, LogSink } from "./observability/logs.js";
export { logger } from "./observability/logs.js";
export type { AggregationMetrics, AggregationOutcome } from "./observability/metrics.js";
export { metrics } from "./observability/metrics.js";
