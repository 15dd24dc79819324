import { z } from "zod";

/** A plan as a JSON object, or as the JSON text a model produced. */
export const PlanInputSchema = z.union([z.string().min(1), z.record(z.unknown())]);

/** Entity names the caller has selected in the document, mapped to their ids. */
export const SelectionSchema = z.record(z.string().min(1));

export const CadPingInputSchema = z.object({
  nonce: z.string().optional(),
});

export const CadCapabilitiesInputSchema = z.object({});
export const CadDocumentSnapshotInputSchema = z.object({});
export const CadDocumentExportInputSchema = z.object({});

export const CadDocumentLoadInputSchema = z.object({
  json: z.string().min(1),
});

export const CadPlanSanitizeInputSchema = z.object({
  plan: PlanInputSchema,
});

export const CadPlanResolveInputSchema = z.object({
  plan: PlanInputSchema,
  selection: SelectionSchema.optional(),
});

export const CadPlanPreviewInputSchema = z.object({
  plan: PlanInputSchema,
  selection: SelectionSchema.optional(),
});

export const CadPlanApplyInputSchema = z.object({
  plan: PlanInputSchema,
  selection: SelectionSchema.optional(),
  confirm: z.boolean().default(false),
});

export const CadLogListInputSchema = z.object({
  runId: z.string().min(1).optional(),
  limit: z.number().int().positive().max(1000).optional(),
});

export const CadLogStatsInputSchema = z.object({});

export const CadLogExportInputSchema = z.object({
  format: z.enum(["json", "csv", "text", "zip"]),
  outPath: z.string().min(1).optional(),
  /** Inclusive ISO-8601 bounds on entry timestamps. */
  from: z.string().min(1).optional(),
  to: z.string().min(1).optional(),
});

export const CadLogImportInputSchema = z.object({
  json: z.string().min(1),
});

export const CadLogReplayInputSchema = z.object({
  runId: z.string().min(1).optional(),
  planId: z.string().min(1).optional(),
  selection: SelectionSchema.optional(),
  apply: z.boolean().default(false),
  confirm: z.boolean().default(false),
});

export const ToolDefinitions = [
  {
    name: "cad.ping",
    description: "Liveness probe.",
    input: CadPingInputSchema,
    output: "{ ok: true, version, schemaVersion, nonce? }",
  },
  {
    name: "cad.capabilities",
    description: "List tools, operation kinds and units.",
    input: CadCapabilitiesInputSchema,
    output: "{ tools: [...], schemaVersion, operations: [...], units }",
  },
  {
    name: "cad.document.snapshot",
    description: "Read the live design document.",
    input: CadDocumentSnapshotInputSchema,
    output: "{ documentId, revision, entityCount, solidCount, entities }",
  },
  {
    name: "cad.document.load",
    description: "Replace the live document with saved document JSON.",
    input: CadDocumentLoadInputSchema,
    output: "{ documentId, entityCount }",
  },
  {
    name: "cad.document.export",
    description: "Export the live document as stable JSON.",
    input: CadDocumentExportInputSchema,
    output: "{ json }",
  },
  {
    name: "cad.plan.sanitize",
    description: "Validate a plan and convert every value to millimetres and radians.",
    input: CadPlanSanitizeInputSchema,
    output: "{ ok, plan, issues }",
  },
  {
    name: "cad.plan.resolve",
    description: "Sanitize a plan and compute its execution order.",
    input: CadPlanResolveInputSchema,
    output: "{ ok, order, producers, issues }",
  },
  {
    name: "cad.plan.preview",
    description: "Run a plan in a sandbox copy of the document and report the diff.",
    input: CadPlanPreviewInputSchema,
    output: "{ ok, runId, status, results, diff, issues }",
  },
  {
    name: "cad.plan.apply",
    description: "Apply a plan to the live document in one transaction, with confirm gate.",
    input: CadPlanApplyInputSchema,
    output: "{ ok, runId, status, results, rollback?, events, documentId }",
  },
  {
    name: "cad.log.list",
    description: "List action log entries, newest last.",
    input: CadLogListInputSchema,
    output: "{ ok, entries }",
  },
  {
    name: "cad.log.stats",
    description: "Summarize the action log.",
    input: CadLogStatsInputSchema,
    output: "{ ok, total, succeeded, failed, successRate, runs, byKind, byMode }",
  },
  {
    name: "cad.log.export",
    description: "Export the action log as JSON, CSV, text or a zip of all three, optionally limited to a time range.",
    input: CadLogExportInputSchema,
    output: "{ ok, format, entries, bytes, content? | base64? | path? }",
  },
  {
    name: "cad.log.import",
    description: "Verify a structured action log export and summarize it.",
    input: CadLogImportInputSchema,
    output: "{ ok, count, summary }",
  },
  {
    name: "cad.log.replay",
    description: "Rebuild a plan from a logged run, optionally applying it.",
    input: CadLogReplayInputSchema,
    output: "{ ok, plan, applied? }",
  },
] as const;

export type CadToolName = (typeof ToolDefinitions)[number]["name"];
