import { randomUUID } from "node:crypto";
import type { Plan } from "@cadpilot/engine";
import type { ActionLog, LogEntry } from "./actionLog.js";
import type { SandboxSession } from "./capability.js";
import { isPlanError, type ErrorInfo } from "./errors.js";
import type { ExecutionEngine, ExecutionMode, ExecutionReport } from "./execute.js";
import { silentLogger, type Logger } from "./logger.js";
import { resolvePlan, type ExternalRefs, type GraphErrorCode } from "./resolve.js";
import { advisoryIssues, sanitizePlan, type SanitizeIssue } from "./sanitize.js";
import { DEFAULT_ENGINE_SETTINGS, type EngineSettings } from "./settings.js";

export interface PipelineContext<S extends SandboxSession = SandboxSession> {
  engine: ExecutionEngine<S>;
  log?: ActionLog;
  settings?: EngineSettings;
  logger?: Logger;
}

export interface RunPlanOptions<S extends SandboxSession = SandboxSession> {
  mode: ExecutionMode;
  /** Accept advisory issues for an apply run. */
  confirm?: boolean;
  externalRefs?: ExternalRefs;
  signal?: AbortSignal;
  runId?: string;
  inspect?: (session: S) => void | Promise<void>;
}

export type PipelineOutcome =
  | { stage: "sanitize"; ok: false; issues: SanitizeIssue[] }
  | { stage: "input-required"; ok: false; plan: Plan; issues: SanitizeIssue[]; questions: string[] }
  | { stage: "confirm"; ok: false; plan: Plan; issues: SanitizeIssue[]; advisories: SanitizeIssue[] }
  | {
      stage: "resolve";
      ok: false;
      plan: Plan;
      issues: SanitizeIssue[];
      error: ErrorInfo & { code: GraphErrorCode; opId: string | null; members: readonly string[] };
    }
  | { stage: "busy"; ok: false; plan: Plan; issues: SanitizeIssue[]; error: ErrorInfo }
  | {
      stage: "execute";
      ok: boolean;
      plan: Plan;
      issues: SanitizeIssue[];
      order: string[];
      report: ExecutionReport;
      entries: LogEntry[];
    };

/**
 * sanitize, gate, resolve, execute, record. Nothing reaches the capability
 * unless every earlier stage passed.
 */
export async function runPlan<S extends SandboxSession>(
  input: unknown,
  context: PipelineContext<S>,
  options: RunPlanOptions<S>,
): Promise<PipelineOutcome> {
  const settings = context.settings ?? DEFAULT_ENGINE_SETTINGS;
  const logger = (context.logger ?? silentLogger()).child("pipeline");

  const sanitized = sanitizePlan(input, settings, logger);
  if (!sanitized.ok) {
    logger.info("plan rejected", { stage: "sanitize", issues: sanitized.issues.length });
    return { stage: "sanitize", ok: false, issues: sanitized.issues };
  }
  const { plan, issues } = sanitized;

  if (options.mode === "apply" && plan.metadata.requires_user_input === true) {
    return { stage: "input-required", ok: false, plan, issues, questions: plan.metadata.clarification_questions ?? [] };
  }

  const advisories = advisoryIssues(issues);
  if (options.mode === "apply" && advisories.length > 0 && settings.requireConfirmForAdvisories && options.confirm !== true) {
    return { stage: "confirm", ok: false, plan, issues, advisories };
  }

  const resolved = resolvePlan(plan, { externalRefs: options.externalRefs });
  if (!resolved.ok) {
    const { error } = resolved;
    logger.info("plan rejected", { stage: "resolve", code: error.graphCode, opId: error.opId });
    return {
      stage: "resolve",
      ok: false,
      plan,
      issues,
      error: { ...error.toInfo(), code: error.graphCode, opId: error.opId, members: error.members },
    };
  }

  const before = context.log?.entries().length ?? 0;
  const runId = options.runId ?? `run_${randomUUID()}`;
  let report: ExecutionReport;
  try {
    report = await context.engine.execute(resolved.order, options.mode, {
      planId: plan.plan_id,
      runId,
      externalRefs: options.externalRefs,
      signal: options.signal,
      onResult: context.log?.createRecorder(plan, runId, options.mode),
      inspect: options.inspect,
    });
  } catch (error) {
    if (isPlanError(error) && error.kind === "DocumentBusy") {
      return { stage: "busy", ok: false, plan, issues, error: error.toInfo() };
    }
    throw error;
  }

  return {
    stage: "execute",
    ok: report.status === "succeeded",
    plan,
    issues,
    order: resolved.order.map((op) => op.op_id),
    report,
    entries: context.log ? context.log.entries().slice(before).filter((entry) => entry.runId === runId) : [],
  };
}
