/**
 * Execution engine.
 *
 * Dispatches an ordered operation list to the geometry capability, one
 * operation at a time. Sandbox runs work on a disposable session; apply runs
 * hold the document lock and work inside one transaction that is committed
 * on success and rolled back on the first failure, timeout or cancellation.
 */
import { randomUUID } from "node:crypto";
import type { OperationKind, PlanOperation } from "@cadpilot/engine";
import type { DesignWorkspace, GeometryCapability, OperationOutcome, SandboxSession, TransactionSession } from "./capability.js";
import { PlanError, asPlanError, type ErrorInfo, type PlanErrorKind } from "./errors.js";
import { DocumentLock } from "./lock.js";
import { silentLogger, type Logger } from "./logger.js";
import { producedName, referencedNames, type ExternalRefs } from "./resolve.js";
import { DEFAULT_ENGINE_SETTINGS, type LockPolicy } from "./settings.js";

export type ExecutionMode = "sandbox" | "apply";

export type ResultStatus = "succeeded" | "failed" | "skipped";

export interface ExecutionResult {
  opId: string;
  kind: OperationKind;
  status: ResultStatus;
  entityId?: string;
  timelineId?: string;
  error?: ErrorInfo;
  timestamp: string;
  durationMs: number;
}

export interface RunFailure {
  opId: string | null;
  kind: PlanErrorKind;
  code: string;
  message: string;
}

export interface RollbackReport {
  strategy: "native" | "compensation";
  status: "completed" | "incomplete";
  compensated: number;
  failures: Array<{ opId: string | null; message: string }>;
}

export type RunStatus = "succeeded" | "failed" | "cancelled";

export interface ExecutionReport {
  runId: string;
  planId: string;
  mode: ExecutionMode;
  status: RunStatus;
  results: ExecutionResult[];
  failure: RunFailure | null;
  rollback: RollbackReport | null;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export interface ExecutionEngineOptions {
  /** 0 disables the timeout. */
  operationTimeoutMs?: number;
  /**
   * How long a timed-out or cancelled operation may keep running before the
   * run returns without it. The document lock stays held until it settles.
   */
  settleGraceMs?: number;
  lockPolicy?: LockPolicy;
  lock?: DocumentLock;
  logger?: Logger;
  now?: () => Date;
  createRunId?: () => string;
}

export interface ExecuteOptions<S extends SandboxSession = SandboxSession> {
  planId: string;
  runId?: string;
  externalRefs?: ExternalRefs;
  signal?: AbortSignal;
  /** Awaited after every result, before the next operation is dispatched. */
  onResult?: (result: ExecutionResult) => void | Promise<void>;
  /** Sandbox only: called with the session after the last dispatch and before disposal. */
  inspect?: (session: S) => void | Promise<void>;
}

type AppliedOutcome = Extract<OperationOutcome, { ok: true }>;

type Dispatched =
  | { ok: true; outcome: AppliedOutcome }
  | {
      ok: false;
      error: PlanError;
      /** The interrupted handler finished anyway, inside the grace period. */
      lateOutcome?: AppliedOutcome;
      /** The interrupted handler was still running when the grace period ran out. */
      inFlight?: Promise<AppliedOutcome | null>;
    };

interface InFlight {
  opId: string;
  outcome: Promise<AppliedOutcome | null>;
}

const DEFAULT_SETTLE_GRACE_MS = 5_000;

interface Compensation {
  opId: string;
  compensate?: () => void | Promise<void>;
}

interface LoopState {
  results: ExecutionResult[];
  compensations: Compensation[];
  failure: PlanError | null;
  /** Index of the first operation that produced no result. */
  stoppedAt: number;
  inFlight: InFlight | null;
}

function toRunFailure(error: PlanError): RunFailure {
  return { opId: error.opId, kind: error.kind, code: error.code, message: error.message };
}

function elapsed(start: number): number {
  return Math.round((performance.now() - start) * 1000) / 1000;
}

export class ExecutionEngine<S extends SandboxSession = SandboxSession> {
  private readonly workspace: DesignWorkspace<S>;
  private readonly timeoutMs: number;
  private readonly settleGraceMs: number;
  private readonly lockPolicy: LockPolicy;
  private readonly lock: DocumentLock;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly createRunId: () => string;

  constructor(workspace: DesignWorkspace<S>, options: ExecutionEngineOptions = {}) {
    this.workspace = workspace;
    this.timeoutMs = options.operationTimeoutMs ?? DEFAULT_ENGINE_SETTINGS.operationTimeoutMs;
    this.settleGraceMs = options.settleGraceMs ?? DEFAULT_SETTLE_GRACE_MS;
    this.lockPolicy = options.lockPolicy ?? DEFAULT_ENGINE_SETTINGS.lockPolicy;
    this.lock = options.lock ?? new DocumentLock();
    this.logger = (options.logger ?? silentLogger()).child("engine");
    this.now = options.now ?? (() => new Date());
    this.createRunId = options.createRunId ?? (() => `run_${randomUUID()}`);
  }

  private draining: Promise<void> = Promise.resolve();

  get documentLock(): DocumentLock {
    return this.lock;
  }

  /** Resolves once operations that outlived their run have settled and the lock is free again. */
  idle(): Promise<void> {
    return this.draining;
  }

  async execute(ops: readonly PlanOperation[], mode: ExecutionMode, options: ExecuteOptions<S>): Promise<ExecutionReport> {
    const runId = options.runId ?? this.createRunId();
    const startedAt = this.now().toISOString();
    const start = performance.now();
    this.logger.info("run started", { runId, planId: options.planId, mode, operations: ops.length });

    const { state, rollback } = mode === "sandbox" ? await this.runSandbox(ops, options) : await this.runApply(ops, runId, options);

    const failure = state.failure ? toRunFailure(state.failure) : null;
    const status: RunStatus = !failure ? "succeeded" : failure.kind === "CancelledError" ? "cancelled" : "failed";
    const report: ExecutionReport = {
      runId,
      planId: options.planId,
      mode,
      status,
      results: state.results,
      failure,
      rollback,
      startedAt,
      finishedAt: this.now().toISOString(),
      durationMs: elapsed(start),
    };
    this.logger.info("run finished", {
      runId,
      status,
      dispatched: state.results.filter((result) => result.status !== "skipped").length,
      failedOp: failure?.opId ?? null,
    });
    return report;
  }

  private async runSandbox(ops: readonly PlanOperation[], options: ExecuteOptions<S>): Promise<{ state: LoopState; rollback: null }> {
    const session = await this.workspace.openSandbox();
    try {
      const state = await this.dispatchAll(ops, session.capability, options);
      for (const op of ops.slice(state.stoppedAt)) {
        state.results.push({ opId: op.op_id, kind: op.op, status: "skipped", timestamp: this.now().toISOString(), durationMs: 0 });
      }
      if (options.inspect) {
        await options.inspect(session);
      }
      return { state, rollback: null };
    } finally {
      await session.dispose();
    }
  }

  private async runApply(
    ops: readonly PlanOperation[],
    runId: string,
    options: ExecuteOptions<S>,
  ): Promise<{ state: LoopState; rollback: RollbackReport | null }> {
    const release = await this.lock.acquire(this.lockPolicy);
    let straggler: Promise<void> | null = null;
    try {
      let transaction: TransactionSession;
      try {
        transaction = await this.workspace.beginTransaction();
      } catch (error) {
        const failure = asPlanError(error, { kind: "CapabilityError", code: "TRANSACTION_FAILED" });
        return { state: { results: [], compensations: [], failure, stoppedAt: 0, inFlight: null }, rollback: null };
      }

      const state = await this.dispatchAll(ops, transaction.capability, options);
      if (!state.failure) {
        try {
          await transaction.commit();
          return { state, rollback: null };
        } catch (error) {
          state.failure = asPlanError(error, { kind: "CapabilityError", code: "COMMIT_FAILED" });
        }
      }
      const rollback = await this.rollback(transaction, state.compensations, runId);
      if (state.inFlight) {
        straggler = this.undoWhenSettled(state.inFlight, runId);
      }
      return { state, rollback };
    } finally {
      if (straggler) {
        this.draining = straggler.finally(release);
      } else {
        release();
      }
    }
  }

  /** Undoes an operation that completed after its run had already rolled back. */
  private async undoWhenSettled(inFlight: InFlight, runId: string): Promise<void> {
    const outcome = await inFlight.outcome;
    if (!outcome) return;
    const context = { runId, opId: inFlight.opId, entityId: outcome.entityId };
    if (!outcome.compensate) {
      this.logger.error("late operation left in the document; no compensating action", undefined, context);
      return;
    }
    try {
      await outcome.compensate();
      this.logger.warn("undid late operation", context);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error("could not undo late operation", cause, context);
    }
  }

  private async dispatchAll(ops: readonly PlanOperation[], capability: GeometryCapability, options: ExecuteOptions<S>): Promise<LoopState> {
    const arena = new Map<string, string>(Object.entries(options.externalRefs ?? {}));
    const state: LoopState = { results: [], compensations: [], failure: null, stoppedAt: ops.length, inFlight: null };

    for (const [index, op] of ops.entries()) {
      if (options.signal?.aborted) {
        state.failure = new PlanError("CancelledError", "CANCELLED", `Run cancelled before ${op.op_id} was dispatched.`);
        state.stoppedAt = index;
        break;
      }
      const start = performance.now();
      const dispatched = await this.dispatch(op, capability, arena, options.signal);
      const result: ExecutionResult = {
        opId: op.op_id,
        kind: op.op,
        status: dispatched.ok ? "succeeded" : "failed",
        timestamp: this.now().toISOString(),
        durationMs: elapsed(start),
      };
      if (dispatched.ok) {
        const { entityId, timelineId, compensate } = dispatched.outcome;
        result.entityId = entityId;
        if (timelineId !== undefined) result.timelineId = timelineId;
        const name = producedName(op);
        if (name !== null) arena.set(name, entityId);
        state.compensations.push({ opId: op.op_id, compensate });
        this.logger.debug("operation succeeded", { opId: op.op_id, kind: op.op, entityId });
      } else {
        result.error = dispatched.error.toInfo();
        this.logger.warn("operation failed", { opId: op.op_id, kind: op.op, code: dispatched.error.code });
        if (dispatched.lateOutcome) {
          state.compensations.push({ opId: op.op_id, compensate: dispatched.lateOutcome.compensate });
        }
        if (dispatched.inFlight) {
          state.inFlight = { opId: op.op_id, outcome: dispatched.inFlight };
        }
      }
      state.results.push(result);

      if (options.onResult) {
        try {
          await options.onResult(result);
        } catch (error) {
          const handlerError = asPlanError(error, { kind: "CapabilityError", code: "RESULT_HANDLER_FAILED", opId: op.op_id });
          if (dispatched.ok) {
            state.failure = handlerError;
            state.stoppedAt = index + 1;
            break;
          }
          // The operation's own failure stays the run failure.
          this.logger.error("result callback failed", handlerError, { opId: op.op_id, code: handlerError.code });
        }
      }
      if (!dispatched.ok) {
        state.failure = dispatched.error;
        state.stoppedAt = index + 1;
        break;
      }
    }
    return state;
  }

  private async dispatch(
    op: PlanOperation,
    capability: GeometryCapability,
    arena: ReadonlyMap<string, string>,
    runSignal?: AbortSignal,
  ): Promise<Dispatched> {
    const references: Record<string, string> = {};
    for (const name of referencedNames(op)) {
      const entityId = arena.get(name);
      if (entityId === undefined) {
        return {
          ok: false,
          error: new PlanError("CapabilityError", "UNRESOLVED_REFERENCE", `${op.op_id}: "${name}" has no entity in the document`, op.op_id),
        };
      }
      references[name] = entityId;
    }
    const targetId = op.target_ref === undefined ? undefined : arena.get(op.target_ref);
    const target = op.target_ref !== undefined && targetId !== undefined ? { name: op.target_ref, entityId: targetId } : null;

    const controller = new AbortController();
    const handler = capability[op.op];
    const call: Promise<Dispatched> = Promise.resolve()
      .then(() => handler({ opId: op.op_id, kind: op.op, params: op.params, target, references, signal: controller.signal }))
      .then(
        (outcome): Dispatched =>
          outcome.ok
            ? { ok: true, outcome }
            : {
                ok: false,
                error: new PlanError("CapabilityError", outcome.error.kind, `${op.op_id} (${op.op}): ${outcome.error.message}`, op.op_id),
              },
        (error: unknown): Dispatched => ({
          ok: false,
          error: asPlanError(error, { kind: "CapabilityError", code: "HANDLER_FAILED", opId: op.op_id }),
        }),
      );

    const interruption = this.watchInterruption(op, runSignal);
    try {
      const first = await Promise.race([call.then((settled) => ({ settled })), interruption.promise]);
      if ("settled" in first) return first.settled;
      controller.abort();
      return await this.settleInterrupted(op, call, first.interrupted);
    } finally {
      interruption.cancel();
    }
  }

  /** Fires on the run's abort signal or the per-operation timeout, whichever comes first. */
  private watchInterruption(op: PlanOperation, runSignal?: AbortSignal): { promise: Promise<{ interrupted: PlanError }>; cancel: () => void } {
    const timeoutMs = this.timeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;
    const promise = new Promise<{ interrupted: PlanError }>((resolve) => {
      onAbort = () => {
        resolve({ interrupted: new PlanError("CancelledError", "CANCELLED", `Run cancelled while ${op.op_id} was running.`, op.op_id) });
      };
      runSignal?.addEventListener("abort", onAbort, { once: true });
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          resolve({
            interrupted: new PlanError("TimeoutError", "OPERATION_TIMEOUT", `${op.op_id} (${op.op}) did not finish within ${timeoutMs}ms`, op.op_id),
          });
        }, timeoutMs);
      }
    });
    return {
      promise,
      cancel: () => {
        clearTimeout(timer);
        if (onAbort) runSignal?.removeEventListener("abort", onAbort);
      },
    };
  }

  /**
   * Waits up to the grace period for an interrupted handler. A handler that
   * still succeeds has changed the document, so its undo joins the rollback.
   */
  private async settleInterrupted(op: PlanOperation, call: Promise<Dispatched>, error: PlanError): Promise<Dispatched> {
    const outcome = call.then((settled) => (settled.ok ? settled.outcome : null));
    let timer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<"grace">((resolve) => {
      timer = setTimeout(() => resolve("grace"), this.settleGraceMs);
    });
    try {
      const late = await Promise.race([outcome, grace]);
      if (late === "grace") {
        this.logger.warn("operation still running after interruption", { opId: op.op_id, graceMs: this.settleGraceMs });
        return { ok: false, error, inFlight: outcome };
      }
      if (late) {
        this.logger.warn("operation completed after interruption", { opId: op.op_id, entityId: late.entityId });
        return { ok: false, error, lateOutcome: late };
      }
      return { ok: false, error };
    } finally {
      clearTimeout(timer);
    }
  }

  private async rollback(transaction: TransactionSession, compensations: readonly Compensation[], runId: string): Promise<RollbackReport> {
    if (transaction.rollback) {
      try {
        await transaction.rollback();
        this.logger.info("rolled back", { runId, strategy: "native" });
        return { strategy: "native", status: "completed", compensated: 0, failures: [] };
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        this.logger.error("native rollback failed; running compensations", cause, { runId });
      }
    }

    const failures: RollbackReport["failures"] = [];
    let compensated = 0;
    for (const entry of [...compensations].reverse()) {
      if (!entry.compensate) {
        failures.push({ opId: entry.opId, message: "No compensating action was provided." });
        continue;
      }
      try {
        await entry.compensate();
        compensated += 1;
      } catch (error) {
        failures.push({ opId: entry.opId, message: error instanceof Error ? error.message : String(error) });
      }
    }

    const status = failures.length === 0 ? "completed" : "incomplete";
    if (status === "incomplete") {
      this.logger.error("rollback incomplete", undefined, { runId, failures });
    } else {
      this.logger.info("rolled back", { runId, strategy: "compensation", compensated });
    }
    return { strategy: "compensation", status, compensated, failures };
  }
}
