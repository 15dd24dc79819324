/**
 * Append-only audit trail of dispatched operations.
 *
 * Every entry carries a sha256 checksum over its other fields. Exports come
 * in three forms derived from the same entries: structured JSON (the only
 * form that can be imported again), flat CSV and plain text.
 */
import { strFromU8, strToU8, zipSync } from "fflate";
import { z } from "zod";
import {
  OPERATION_KINDS,
  ParamValueSchema,
  isDimensionedValue,
  type OperationKind,
  type OperationParams,
  type ParamValue,
  type Plan,
  type PlanOperation,
  type RawOperation,
  type RawPlan,
} from "@cadpilot/engine";
import { PLAN_ERROR_KINDS, type ErrorInfo } from "./errors.js";
import type { ExecutionMode, ExecutionReport, ExecutionResult } from "./execute.js";
import { sha256HexFromString, stableJsonStringify } from "./hash.js";
import { silentLogger, type Logger } from "./logger.js";

export const ACTION_LOG_FORMAT = "cadpilot.action-log";
export const ACTION_LOG_VERSION = 1;

/** Stable column order for every export form. */
export const LOG_FIELDS = [
  "seq",
  "timestamp",
  "runId",
  "planId",
  "mode",
  "opId",
  "opKind",
  "status",
  "entityId",
  "timelineId",
  "error",
  "targetRef",
  "dependencies",
  "params",
  "checksum",
] as const;

export type LogField = (typeof LOG_FIELDS)[number];

export interface LogEntry {
  seq: number;
  timestamp: string;
  runId: string;
  planId: string;
  mode: ExecutionMode;
  opId: string;
  opKind: OperationKind;
  status: "succeeded" | "failed";
  entityId: string | null;
  timelineId: string | null;
  error: ErrorInfo | null;
  targetRef: string | null;
  dependencies: string[];
  params: OperationParams;
  checksum: string;
}

export type LogExportFormat = "json" | "csv" | "text";

export class ActionLogError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "ActionLogError";
    this.code = code;
  }
}

export const LogEntrySchema = z
  .object({
    seq: z.number().int().positive(),
    timestamp: z.string().min(1),
    runId: z.string().min(1),
    planId: z.string().min(1),
    mode: z.enum(["sandbox", "apply"]),
    opId: z.string().min(1),
    opKind: z.enum(OPERATION_KINDS),
    status: z.enum(["succeeded", "failed"]),
    entityId: z.string().nullable(),
    timelineId: z.string().nullable(),
    error: z
      .object({
        kind: z.enum(PLAN_ERROR_KINDS),
        code: z.string(),
        message: z.string(),
      })
      .strict()
      .nullable(),
    targetRef: z.string().nullable(),
    dependencies: z.array(z.string()),
    params: z.record(ParamValueSchema),
    checksum: z.string().regex(/^[0-9a-f]{64}$/),
  })
  .strict();

const LogDocumentSchema = z.object({
  format: z.literal(ACTION_LOG_FORMAT),
  version: z.literal(ACTION_LOG_VERSION),
  fields: z.array(z.string()),
  entries: z.array(LogEntrySchema),
});

export function computeChecksum(entry: Omit<LogEntry, "checksum">): string {
  return sha256HexFromString(stableJsonStringify(entry, 0));
}

function withChecksum(entry: Omit<LogEntry, "checksum">): LogEntry {
  return { ...entry, checksum: computeChecksum(entry) };
}

export function verifyEntry(entry: LogEntry): boolean {
  const { checksum, ...rest } = entry;
  return computeChecksum(rest) === checksum;
}

export interface ActionLogStore {
  append(entry: LogEntry): Promise<void>;
  load(): Promise<LogEntry[]>;
}

export interface ActionLogOptions {
  store?: ActionLogStore;
  logger?: Logger;
}

export interface KindCounts {
  total: number;
  succeeded: number;
  failed: number;
}

export interface LogSummary {
  total: number;
  succeeded: number;
  failed: number;
  successRate: number;
  runs: number;
  byKind: Record<string, KindCounts>;
  byMode: Record<ExecutionMode, number>;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
}

/** Build the entry fields for one dispatched result. */
function entryFields(seq: number, plan: Plan, op: PlanOperation, result: ExecutionResult, runId: string, mode: ExecutionMode): Omit<LogEntry, "checksum"> {
  return {
    seq,
    timestamp: result.timestamp,
    runId,
    planId: plan.plan_id,
    mode,
    opId: op.op_id,
    opKind: op.op,
    status: result.status === "succeeded" ? "succeeded" : "failed",
    entityId: result.entityId ?? null,
    timelineId: result.timelineId ?? null,
    error: result.error ?? null,
    targetRef: op.target_ref ?? null,
    dependencies: [...(op.dependencies ?? [])],
    params: structuredClone(op.params),
  };
}

export class ActionLog {
  private readonly items: LogEntry[];
  private readonly store: ActionLogStore | null;
  private readonly logger: Logger;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: ActionLogOptions = {}, initial: readonly LogEntry[] = []) {
    this.items = [...initial];
    this.store = options.store ?? null;
    this.logger = (options.logger ?? silentLogger()).child("action-log");
  }

  /** Log backed by a store, seeded with what the store already holds. */
  static async open(store: ActionLogStore, logger?: Logger): Promise<ActionLog> {
    const existing = await store.load();
    return new ActionLog({ store, logger }, existing);
  }

  entries(): readonly LogEntry[] {
    return this.items;
  }

  get lastSeq(): number {
    return this.items[this.items.length - 1]?.seq ?? 0;
  }

  /**
   * Appends run one at a time. An entry is visible only after the store has
   * accepted it.
   */
  append(plan: Plan, op: PlanOperation, result: ExecutionResult, runId: string, mode: ExecutionMode): Promise<LogEntry> {
    const task = this.tail.then(async () => {
      const entry = withChecksum(entryFields(this.lastSeq + 1, plan, op, result, runId, mode));
      if (this.store) {
        await this.store.append(entry);
      }
      this.items.push(entry);
      this.logger.debug("entry recorded", { seq: entry.seq, runId, opId: entry.opId, status: entry.status });
      return entry;
    });
    this.tail = task.catch(() => undefined);
    return task;
  }

  /** Result callback for the engine; skipped results are not logged. */
  createRecorder(plan: Plan, runId: string, mode: ExecutionMode): (result: ExecutionResult) => Promise<void> {
    const byId = new Map(plan.operations.map((op) => [op.op_id, op]));
    return async (result) => {
      if (result.status === "skipped") return;
      const op = byId.get(result.opId);
      if (!op) {
        throw new ActionLogError("LOG_UNKNOWN_OPERATION", `Operation ${result.opId} is not part of plan ${plan.plan_id}.`);
      }
      await this.append(plan, op, result, runId, mode);
    };
  }

  /** Record a finished run after the fact. */
  async record(plan: Plan, orderedOps: readonly PlanOperation[], report: ExecutionReport): Promise<LogEntry[]> {
    const recorder = this.createRecorder({ ...plan, operations: [...orderedOps] }, report.runId, report.mode);
    const before = this.items.length;
    for (const result of report.results) {
      await recorder(result);
    }
    return this.items.slice(before);
  }

  runEntries(runId: string): LogEntry[] {
    return this.items.filter((entry) => entry.runId === runId);
  }

  summarize(): LogSummary {
    return summarizeEntries(this.items);
  }
}

export function summarizeEntries(entries: readonly LogEntry[]): LogSummary {
  const byKind: Record<string, KindCounts> = {};
  const byMode: Record<ExecutionMode, number> = { sandbox: 0, apply: 0 };
  const runs = new Set<string>();
  let succeeded = 0;
  for (const entry of entries) {
    runs.add(entry.runId);
    byMode[entry.mode] += 1;
    const counts = byKind[entry.opKind] ?? { total: 0, succeeded: 0, failed: 0 };
    counts.total += 1;
    if (entry.status === "succeeded") {
      counts.succeeded += 1;
      succeeded += 1;
    } else {
      counts.failed += 1;
    }
    byKind[entry.opKind] = counts;
  }
  const total = entries.length;
  return {
    total,
    succeeded,
    failed: total - succeeded,
    successRate: total === 0 ? 0 : Math.round((succeeded / total) * 10_000) / 10_000,
    runs: runs.size,
    byKind,
    byMode,
    firstTimestamp: entries[0]?.timestamp ?? null,
    lastTimestamp: entries[entries.length - 1]?.timestamp ?? null,
  };
}

// Export

export interface LogTimeRange {
  /** Inclusive ISO-8601 bounds; either may be left open. */
  from?: string;
  to?: string;
}

function rangeBound(name: "from" | "to", value: string | undefined): number | null {
  if (value === undefined) return null;
  const at = Date.parse(value);
  if (Number.isNaN(at)) {
    throw new ActionLogError("LOG_INVALID_RANGE", `Invalid ${name} timestamp "${value}".`);
  }
  return at;
}

/** Entries recorded inside the time range, in log order. */
export function entriesInRange(entries: readonly LogEntry[], range: LogTimeRange = {}): LogEntry[] {
  const from = rangeBound("from", range.from);
  const to = rangeBound("to", range.to);
  if (from !== null && to !== null && from > to) {
    throw new ActionLogError("LOG_INVALID_RANGE", `Range start ${range.from ?? ""} is after its end ${range.to ?? ""}.`);
  }
  return entries.filter((entry) => {
    const at = Date.parse(entry.timestamp);
    return (from === null || at >= from) && (to === null || at <= to);
  });
}

function renderJson(entries: readonly LogEntry[]): string {
  return `${stableJsonStringify({
    format: ACTION_LOG_FORMAT,
    version: ACTION_LOG_VERSION,
    fields: [...LOG_FIELDS],
    entries,
  })}\n`;
}

function csvCell(value: LogEntry[LogField]): string {
  if (value === null) return "";
  const text = typeof value === "object" ? stableJsonStringify(value, 0) : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function renderCsv(entries: readonly LogEntry[]): string {
  const lines = [LOG_FIELDS.join(",")];
  for (const entry of entries) {
    lines.push(LOG_FIELDS.map((field) => csvCell(entry[field])).join(","));
  }
  return `${lines.join("\r\n")}\r\n`;
}

function describeParam(value: ParamValue): string {
  if (isDimensionedValue(value)) return `${value.value}${value.unit}`;
  return typeof value === "string" ? value : stableJsonStringify(value, 0);
}

function renderText(entries: readonly LogEntry[]): string {
  const lines: string[] = [];
  for (const entry of entries) {
    const params = Object.keys(entry.params)
      .sort()
      .map((key) => {
        const value = entry.params[key];
        return value === undefined ? key : `${key}=${describeParam(value)}`;
      })
      .join(" ");
    const head = `#${entry.seq} ${entry.timestamp} [${entry.mode}] ${entry.planId}/${entry.opId} ${entry.opKind} ${entry.status.toUpperCase()}`;
    const parts = [head];
    if (entry.entityId) parts.push(`entity=${entry.entityId}`);
    if (entry.timelineId) parts.push(`timeline=${entry.timelineId}`);
    if (entry.targetRef) parts.push(`target=${entry.targetRef}`);
    lines.push(parts.join(" "));
    if (params) lines.push(`    params: ${params}`);
    if (entry.error) lines.push(`    error: ${entry.error.kind}/${entry.error.code}: ${entry.error.message}`);
    lines.push(`    run: ${entry.runId} checksum: ${entry.checksum.slice(0, 16)}`);
  }
  return lines.length === 0 ? "(empty action log)\n" : `${lines.join("\n")}\n`;
}

export function exportActionLog(entries: readonly LogEntry[], format: LogExportFormat): Uint8Array {
  switch (format) {
    case "json":
      return strToU8(renderJson(entries));
    case "csv":
      return strToU8(renderCsv(entries));
    case "text":
      return strToU8(renderText(entries));
  }
}

/** All three forms in one zip. Timestamps are fixed so equal logs give equal archives. */
export function exportArchive(entries: readonly LogEntry[]): Uint8Array {
  const mtime = new Date("2000-01-01T00:00:00Z");
  return zipSync(
    {
      "action-log.json": exportActionLog(entries, "json"),
      "action-log.csv": exportActionLog(entries, "csv"),
      "action-log.txt": exportActionLog(entries, "text"),
    },
    { level: 6, mtime },
  );
}

// Import

export function parseLogEntry(input: unknown): LogEntry {
  const parsed = LogEntrySchema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ActionLogError("LOG_INVALID_ENTRY", `Invalid log entry at ${first?.path.join(".") ?? "?"}: ${first?.message ?? "unknown"}`);
  }
  const entry: LogEntry = parsed.data;
  if (!verifyEntry(entry)) {
    throw new ActionLogError("LOG_CHECKSUM_MISMATCH", `Checksum mismatch for entry #${entry.seq} (${entry.opId}).`);
  }
  return entry;
}

export function importActionLog(bytes: Uint8Array): LogEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(strFromU8(bytes));
  } catch {
    throw new ActionLogError("LOG_INVALID_JSON", "Action log is not valid JSON.");
  }
  const document = LogDocumentSchema.safeParse(raw);
  if (!document.success) {
    const first = document.error.issues[0];
    throw new ActionLogError("LOG_INVALID_FORMAT", `Not a structured action log: ${first?.path.join(".") ?? ""} ${first?.message ?? ""}`.trim());
  }
  const entries: LogEntry[] = [];
  let previous = 0;
  for (const candidate of document.data.entries) {
    const entry = parseLogEntry(candidate);
    if (entry.seq <= previous) {
      throw new ActionLogError("LOG_SEQUENCE", `Entry #${entry.seq} is out of sequence.`);
    }
    previous = entry.seq;
    entries.push(entry);
  }
  return entries;
}

// Replay

export interface ReplayOptions {
  /** Defaults to the run of the most recent entry. */
  runId?: string;
  planId?: string;
}

function stripOriginal(params: OperationParams): OperationParams {
  const out: OperationParams = {};
  for (const [key, value] of Object.entries(params)) {
    out[key] = isDimensionedValue(value) ? { value: value.value, unit: value.unit } : structuredClone(value);
  }
  return out;
}

/**
 * Fresh plan mirroring the successful operations of one logged run. Entity
 * and timeline ids are not carried over; the plan goes through sanitize,
 * resolve and execute like any other.
 */
export function replayPlan(entries: readonly LogEntry[], options: ReplayOptions = {}): RawPlan {
  const runId = options.runId ?? entries[entries.length - 1]?.runId;
  if (runId === undefined) {
    throw new ActionLogError("LOG_NOTHING_TO_REPLAY", "The action log is empty.");
  }
  const run = entries.filter((entry) => entry.runId === runId).sort((a, b) => a.seq - b.seq);
  const first = run[0];
  if (!first) {
    throw new ActionLogError("LOG_UNKNOWN_RUN", `No entries for run ${runId}.`);
  }
  const succeeded = run.filter((entry) => entry.status === "succeeded");
  if (succeeded.length === 0) {
    throw new ActionLogError("LOG_NOTHING_TO_REPLAY", `Run ${runId} has no successful operations.`);
  }
  const included = new Set(succeeded.map((entry) => entry.opId));
  return {
    plan_id: options.planId ?? `replay_${sha256HexFromString(runId).slice(0, 12)}`,
    metadata: {
      units: "mm",
      replay_of: { plan_id: first.planId, run_id: runId },
    },
    operations: succeeded.map((entry) => {
      const op: RawOperation = {
        op_id: entry.opId,
        op: entry.opKind,
        params: stripOriginal(entry.params),
        dependencies: entry.dependencies.filter((id) => included.has(id)),
      };
      if (entry.targetRef !== null) op.target_ref = entry.targetRef;
      return op;
    }),
  };
}
