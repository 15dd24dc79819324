import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  entriesInRange,
  exportActionLog,
  exportArchive,
  importActionLog,
  replayPlan,
  resolvePlan,
  runPlan,
  sanitizePlan,
  summarizeEntries,
  type PipelineContext,
  type PipelineOutcome,
} from "@cadpilot/agent";
import {
  CANONICAL_UNITS,
  ENGINE_VERSION,
  PLAN_SCHEMA_VERSION,
  listOperationDefinitions,
  listUnits,
} from "@cadpilot/engine";
import type { ZodRawShape, ZodTypeAny, z } from "zod";
import type { CadContext } from "./context.js";
import { diffSnapshots } from "./runtime/diff.js";
import type { DocumentSandbox, DocumentSnapshot } from "./runtime/document.js";
import { RuntimeError, asRuntimeError } from "./runtime/errors.js";
import {
  CadCapabilitiesInputSchema,
  CadDocumentExportInputSchema,
  CadDocumentLoadInputSchema,
  CadDocumentSnapshotInputSchema,
  CadLogExportInputSchema,
  CadLogImportInputSchema,
  CadLogListInputSchema,
  CadLogReplayInputSchema,
  CadLogStatsInputSchema,
  CadPingInputSchema,
  CadPlanApplyInputSchema,
  CadPlanPreviewInputSchema,
  CadPlanResolveInputSchema,
  CadPlanSanitizeInputSchema,
  ToolDefinitions,
  type CadToolName,
} from "./schema.js";

export interface RegisterToolsOptions {
  version: string;
  commit?: string;
}

export type ToolResponse = {
  ok: boolean;
  [key: string]: unknown;
};

export type ToolHandler = (input: unknown) => Promise<ToolResponse>;

export type ToolHandlerMap = Record<CadToolName, ToolHandler>;

function toToolResult(payload: ToolResponse) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload) }],
    structuredContent: payload,
    isError: !payload.ok,
  };
}

function failure(code: string, message: string, extra: Record<string, unknown> = {}): ToolResponse {
  return { ok: false, ...extra, error: { code, message } };
}

function resolveError(error: unknown, fallbackCode: string, fallbackMessage: string): ToolResponse {
  const resolved = asRuntimeError(error, fallbackCode, fallbackMessage);
  return failure(resolved.code, resolved.message);
}

function parseInput<T extends ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new RuntimeError("CAD_ERR_INVALID_INPUT", parsed.error.issues.map((item) => item.message).join("; "));
  }
  return parsed.data;
}

/** Plans arrive as objects or as the raw JSON text a model wrote. */
function readPlanInput(plan: string | Record<string, unknown>): unknown {
  if (typeof plan !== "string") return plan;
  try {
    return JSON.parse(plan);
  } catch {
    throw new RuntimeError("CAD_ERR_INVALID_INPUT", "Plan is not valid JSON.");
  }
}

/** Flatten a pipeline outcome into the tool payload shape. */
export function outcomeResponse(outcome: PipelineOutcome): ToolResponse {
  switch (outcome.stage) {
    case "sanitize":
      return failure("CAD_ERR_PLAN_REJECTED", `Plan rejected with ${outcome.issues.length} issue(s).`, {
        stage: outcome.stage,
        issues: outcome.issues,
      });
    case "input-required":
      return failure("CAD_ERR_INPUT_REQUIRED", "The plan asks for user input before it can be applied.", {
        stage: outcome.stage,
        planId: outcome.plan.plan_id,
        questions: outcome.questions,
        issues: outcome.issues,
      });
    case "confirm":
      return failure("CAD_ERR_CONFIRM_REQUIRED", `${outcome.advisories.length} advisory issue(s) need confirm: true.`, {
        stage: outcome.stage,
        planId: outcome.plan.plan_id,
        advisories: outcome.advisories,
        issues: outcome.issues,
      });
    case "resolve":
      return failure(outcome.error.code, outcome.error.message, {
        stage: outcome.stage,
        planId: outcome.plan.plan_id,
        opId: outcome.error.opId,
        members: outcome.error.members,
        issues: outcome.issues,
      });
    case "busy":
      return failure(outcome.error.code, outcome.error.message, {
        stage: outcome.stage,
        planId: outcome.plan.plan_id,
      });
    case "execute": {
      const { report } = outcome;
      const body: ToolResponse = {
        ok: outcome.ok,
        stage: outcome.stage,
        planId: report.planId,
        runId: report.runId,
        mode: report.mode,
        status: report.status,
        order: outcome.order,
        results: report.results,
        rollback: report.rollback,
        issues: outcome.issues,
        logged: outcome.entries.length,
      };
      if (report.failure) {
        body.error = { code: report.failure.code, message: report.failure.message };
      }
      return body;
    }
  }
}

export function createToolHandlers(context: CadContext, options: RegisterToolsOptions): ToolHandlerMap {
  const pipeline: PipelineContext<DocumentSandbox> = {
    engine: context.engine,
    log: context.log,
    settings: context.settings,
    logger: context.logger,
  };

  const applyPlan = async (plan: unknown, selection: Record<string, string> | undefined, confirm: boolean) => {
    // Events left over from loads belong to no run.
    context.document.drainEvents();
    const outcome = await runPlan(plan, pipeline, { mode: "apply", confirm, externalRefs: selection });
    const response = outcomeResponse(outcome);
    if (outcome.stage !== "execute") return response;
    return {
      ...response,
      events: context.document.drainEvents(),
      documentId: context.document.snapshot().documentId,
    };
  };

  const handlers: ToolHandlerMap = {
    "cad.ping": async (input) => {
      try {
        const payload = parseInput(CadPingInputSchema, input);
        return {
          ok: true,
          version: options.version,
          commit: options.commit ?? null,
          schemaVersion: PLAN_SCHEMA_VERSION,
          nonce: payload.nonce ?? null,
        };
      } catch (error) {
        return resolveError(error, "CAD_ERR_PING", "Ping failed.");
      }
    },

    "cad.capabilities": async (input) => {
      try {
        parseInput(CadCapabilitiesInputSchema, input);
        return {
          ok: true,
          schemaVersion: PLAN_SCHEMA_VERSION,
          engineVersion: ENGINE_VERSION,
          tools: ToolDefinitions.map((tool) => ({
            name: tool.name,
            description: tool.description,
            output: tool.output,
          })),
          operations: listOperationDefinitions().map((definition) => ({
            kind: definition.kind,
            category: definition.category,
            description: definition.description,
            required: Object.keys(definition.required),
            optional: Object.keys(definition.optional),
            requiresTarget: definition.requiresTarget,
            destructive: definition.destructive ?? false,
            since: definition.since,
          })),
          units: {
            length: listUnits("length"),
            angle: listUnits("angle"),
            canonical: CANONICAL_UNITS,
          },
        };
      } catch (error) {
        return resolveError(error, "CAD_ERR_CAPABILITIES", "Failed to list capabilities.");
      }
    },

    "cad.document.snapshot": async (input) => {
      try {
        parseInput(CadDocumentSnapshotInputSchema, input);
        return { ok: true, ...context.document.snapshot() };
      } catch (error) {
        return resolveError(error, "CAD_ERR_SNAPSHOT", "Failed to read the document.");
      }
    },

    "cad.document.load": async (input) => {
      try {
        const payload = parseInput(CadDocumentLoadInputSchema, input);
        return { ok: true, ...context.document.loadDocumentJson(payload.json) };
      } catch (error) {
        return resolveError(error, "CAD_ERR_LOAD_DOCUMENT", "Failed to load document JSON.");
      }
    },

    "cad.document.export": async (input) => {
      try {
        parseInput(CadDocumentExportInputSchema, input);
        return { ok: true, json: context.document.exportDocumentJson() };
      } catch (error) {
        return resolveError(error, "CAD_ERR_EXPORT_DOCUMENT", "Failed to export the document.");
      }
    },

    "cad.plan.sanitize": async (input) => {
      try {
        const payload = parseInput(CadPlanSanitizeInputSchema, input);
        const result = sanitizePlan(readPlanInput(payload.plan), context.settings, context.logger);
        if (!result.ok) {
          return failure("CAD_ERR_PLAN_REJECTED", `Plan rejected with ${result.issues.length} issue(s).`, {
            issues: result.issues,
          });
        }
        return { ok: true, plan: result.plan, issues: result.issues };
      } catch (error) {
        return resolveError(error, "CAD_ERR_PLAN_SANITIZE", "Plan sanitize failed.");
      }
    },

    "cad.plan.resolve": async (input) => {
      try {
        const payload = parseInput(CadPlanResolveInputSchema, input);
        const sanitized = sanitizePlan(readPlanInput(payload.plan), context.settings, context.logger);
        if (!sanitized.ok) {
          return failure("CAD_ERR_PLAN_REJECTED", `Plan rejected with ${sanitized.issues.length} issue(s).`, {
            issues: sanitized.issues,
          });
        }
        const resolved = resolvePlan(sanitized.plan, { externalRefs: payload.selection });
        if (!resolved.ok) {
          return failure(resolved.error.code, resolved.error.message, {
            opId: resolved.error.opId,
            members: resolved.error.members,
            issues: sanitized.issues,
          });
        }
        return {
          ok: true,
          order: resolved.order.map((op) => op.op_id),
          producers: resolved.producers,
          issues: sanitized.issues,
        };
      } catch (error) {
        return resolveError(error, "CAD_ERR_PLAN_RESOLVE", "Plan resolve failed.");
      }
    },

    "cad.plan.preview": async (input) => {
      try {
        const payload = parseInput(CadPlanPreviewInputSchema, input);
        const before = context.document.snapshot();
        const captured: { after: DocumentSnapshot | null } = { after: null };
        const outcome = await runPlan(readPlanInput(payload.plan), pipeline, {
          mode: "sandbox",
          externalRefs: payload.selection,
          inspect: (session) => {
            captured.after = session.snapshot();
          },
        });
        const response = outcomeResponse(outcome);
        if (captured.after === null) return response;
        return { ...response, diff: diffSnapshots(before, captured.after) };
      } catch (error) {
        return resolveError(error, "CAD_ERR_PLAN_PREVIEW", "Plan preview failed.");
      }
    },

    "cad.plan.apply": async (input) => {
      try {
        const payload = parseInput(CadPlanApplyInputSchema, input);
        return await applyPlan(readPlanInput(payload.plan), payload.selection, payload.confirm);
      } catch (error) {
        return resolveError(error, "CAD_ERR_PLAN_APPLY", "Plan apply failed.");
      }
    },

    "cad.log.list": async (input) => {
      try {
        const payload = parseInput(CadLogListInputSchema, input);
        const all = payload.runId ? context.log.runEntries(payload.runId) : [...context.log.entries()];
        const entries = payload.limit === undefined ? all : all.slice(-payload.limit);
        return { ok: true, total: all.length, entries };
      } catch (error) {
        return resolveError(error, "CAD_ERR_LOG_LIST", "Failed to list the action log.");
      }
    },

    "cad.log.stats": async (input) => {
      try {
        parseInput(CadLogStatsInputSchema, input);
        return { ok: true, ...context.log.summarize() };
      } catch (error) {
        return resolveError(error, "CAD_ERR_LOG_STATS", "Failed to summarize the action log.");
      }
    },

    "cad.log.export": async (input) => {
      try {
        const payload = parseInput(CadLogExportInputSchema, input);
        const entries = entriesInRange(context.log.entries(), { from: payload.from, to: payload.to });
        const bytes = payload.format === "zip" ? exportArchive(entries) : exportActionLog(entries, payload.format);
        const summary = { ok: true, format: payload.format, entries: entries.length, bytes: bytes.byteLength };
        if (payload.outPath) {
          const path = resolve(payload.outPath);
          await mkdir(dirname(path), { recursive: true });
          await writeFile(path, bytes);
          return { ...summary, path };
        }
        if (payload.format === "zip") {
          return { ...summary, base64: Buffer.from(bytes).toString("base64") };
        }
        return { ...summary, content: new TextDecoder().decode(bytes) };
      } catch (error) {
        return resolveError(error, "CAD_ERR_LOG_EXPORT", "Action log export failed.");
      }
    },

    "cad.log.import": async (input) => {
      try {
        const payload = parseInput(CadLogImportInputSchema, input);
        const entries = importActionLog(new TextEncoder().encode(payload.json));
        return { ok: true, count: entries.length, summary: summarizeEntries(entries) };
      } catch (error) {
        return resolveError(error, "CAD_ERR_LOG_IMPORT", "Action log import failed.");
      }
    },

    "cad.log.replay": async (input) => {
      try {
        const payload = parseInput(CadLogReplayInputSchema, input);
        const plan = replayPlan(context.log.entries(), { runId: payload.runId, planId: payload.planId });
        if (!payload.apply) {
          return { ok: true, plan, applied: false };
        }
        return { ...(await applyPlan(plan, payload.selection, payload.confirm)), plan, applied: true };
      } catch (error) {
        return resolveError(error, "CAD_ERR_LOG_REPLAY", "Replay failed.");
      }
    },
  };

  return handlers;
}

export function registerCadTools(server: McpServer, context: CadContext, options: RegisterToolsOptions) {
  const handlers = createToolHandlers(context, options);

  for (const definition of ToolDefinitions) {
    const handler = handlers[definition.name];
    const shape: ZodRawShape = definition.input.shape;
    server.tool(definition.name, definition.description, shape, async (input) => toToolResult(await handler(input)));
  }
}
