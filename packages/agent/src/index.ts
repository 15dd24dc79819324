export { PLAN_ERROR_KINDS, PlanError, isPlanError, isCapabilityFailure, asPlanError } from "./errors.js";
export type { PlanErrorKind, ErrorInfo } from "./errors.js";

export { Logger, InMemorySink, JsonLineSink, isLogLevel, silentLogger } from "./logger.js";
export type { LogLevel, LogContext, LogEvent, LoggerSink, LoggerOptions } from "./logger.js";

export {
  DEFAULT_ENGINE_SETTINGS,
  EngineSettingsFileSchema,
  SettingsError,
  mergeSettings,
  parseSettings,
  loadSettingsFile,
  settingsFromEnv,
} from "./settings.js";
export type { EngineSettings, EngineSettingsOverrides, BoundsMode, AngleMode, LockPolicy, ManufacturingLimits } from "./settings.js";

export { stableJsonStringify, sha256HexFromString } from "./hash.js";

export { sanitizePlan, fatalIssues, advisoryIssues } from "./sanitize.js";
export type { SanitizeIssue, SanitizeResult, IssueSeverity, IssueCode } from "./sanitize.js";

export { GraphError, resolvePlan, producedName, referencedNames } from "./resolve.js";
export type { GraphErrorCode, ExternalRefs, ResolveOptions, ResolveResult } from "./resolve.js";

export { createCapability } from "./capability.js";
export type {
  OperationRequest,
  OperationOutcome,
  OperationHandler,
  GeometryCapability,
  WorkspaceSession,
  SandboxSession,
  TransactionSession,
  DesignWorkspace,
} from "./capability.js";

export { DocumentLock } from "./lock.js";
export type { ReleaseLock } from "./lock.js";

export { ExecutionEngine } from "./execute.js";
export type {
  ExecutionMode,
  ExecutionResult,
  ExecutionReport,
  ExecutionEngineOptions,
  ExecuteOptions,
  ResultStatus,
  RunFailure,
  RunStatus,
  RollbackReport,
} from "./execute.js";

export {
  ACTION_LOG_FORMAT,
  ACTION_LOG_VERSION,
  LOG_FIELDS,
  LogEntrySchema,
  ActionLog,
  ActionLogError,
  computeChecksum,
  verifyEntry,
  summarizeEntries,
  entriesInRange,
  exportActionLog,
  exportArchive,
  parseLogEntry,
  importActionLog,
  replayPlan,
} from "./actionLog.js";
export type { LogEntry, LogField, LogExportFormat, LogTimeRange, ActionLogStore, ActionLogOptions, LogSummary, KindCounts, ReplayOptions } from "./actionLog.js";
export { MemoryActionLogStore, FileActionLogStore } from "./actionLogStore.js";

export { runPlan } from "./pipeline.js";
export type { PipelineContext, RunPlanOptions, PipelineOutcome } from "./pipeline.js";
