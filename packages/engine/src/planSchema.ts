/**
 * Structural validation of a candidate plan.
 *
 * Only the envelope is checked here: identifiers, metadata types and the
 * shape of every operation record. Vocabulary, parameters and units are the
 * sanitizer's job.
 */
import { z } from "zod";
import type { ParamValue, RawPlan } from "./plan.js";

export const PLAN_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;
export const OPERATION_ID_PATTERN = /^[A-Za-z0-9_.-]{1,64}$/;

export const ParamValueSchema: z.ZodType<ParamValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(ParamValueSchema), z.record(ParamValueSchema)]),
);

export const PlanMetadataSchema = z.object({
  natural_language_prompt: z.string().optional(),
  confidence_score: z.number().finite().optional(),
  units: z.string().min(1).optional(),
  clarification_questions: z.array(z.string()).optional(),
  requires_user_input: z.boolean().optional(),
  estimated_duration_seconds: z.number().finite().nonnegative().optional(),
  created_at: z.string().optional(),
  replay_of: z
    .object({
      plan_id: z.string().min(1),
      run_id: z.string().min(1),
    })
    .optional(),
});

export const PlanOperationSchema = z.object({
  op_id: z.string().regex(OPERATION_ID_PATTERN, "op_id must match [A-Za-z0-9_.-]{1,64}"),
  op: z.string().min(1),
  params: z.record(ParamValueSchema).default({}),
  target_ref: z.string().min(1).optional(),
  dependencies: z.array(z.string().min(1)).optional(),
});

export const PlanSchema = z.object({
  plan_id: z.string().regex(PLAN_ID_PATTERN, "plan_id must match [A-Za-z0-9_-]{1,128}"),
  metadata: PlanMetadataSchema,
  operations: z.array(PlanOperationSchema),
});

export interface PlanStructureIssue {
  path: string;
  opId: string | null;
  message: string;
}

export type PlanStructureResult =
  | { valid: true; plan: RawPlan }
  | { valid: false; issues: PlanStructureIssue[] };

function formatPath(path: readonly (string | number)[]): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out.length === 0 ? segment : `.${segment}`;
    }
  }
  return out.length === 0 ? "plan" : out;
}

function rawOperationId(input: unknown, index: number): string | null {
  if (typeof input !== "object" || input === null || !("operations" in input)) return null;
  const operations = input.operations;
  if (!Array.isArray(operations)) return null;
  const operation: unknown = operations[index];
  if (typeof operation === "object" && operation !== null && "op_id" in operation && typeof operation.op_id === "string") {
    return operation.op_id;
  }
  return null;
}

export function validatePlanStructure(input: unknown): PlanStructureResult {
  const parsed = PlanSchema.safeParse(input);
  if (parsed.success) {
    const plan: RawPlan = parsed.data;
    return { valid: true, plan };
  }
  const issues = parsed.error.issues.map((issue) => {
    const [head, index] = issue.path;
    const opId = head === "operations" && typeof index === "number" ? rawOperationId(input, index) : null;
    const path = formatPath(issue.path);
    return {
      path,
      opId,
      message: `${path}: ${issue.message}`,
    };
  });
  return { valid: false, issues };
}

export function isStructurallyValidPlan(input: unknown): boolean {
  return validatePlanStructure(input).valid;
}
