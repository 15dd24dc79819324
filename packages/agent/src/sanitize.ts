/**
 * Plan sanitizer.
 *
 * Takes an untrusted candidate plan and returns either a cleaned plan, with
 * every length in millimetres and every angle in radians, or the list of
 * issues that rejected it. The input is never mutated and the result depends
 * only on the input and the settings.
 */
import {
  CANONICAL_UNITS,
  getOperationDefinition,
  isLengthUnit,
  isOperationKind,
  parseUnit,
  roundCanonical,
  toCanonical,
  validatePlanStructure,
  type AdvisoryCheck,
  type DimensionedValue,
  type LengthUnit,
  type LowerBound,
  type OperationDefinition,
  type OperationParams,
  type ParamSpec,
  type ParamValue,
  type Plan,
  type PlanMetadata,
  type PlanOperation,
  type Point3,
  type Quantity,
  type RawOperation,
} from "@cadpilot/engine";
import type { PlanErrorKind } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { DEFAULT_ENGINE_SETTINGS, type EngineSettings } from "./settings.js";

export type IssueSeverity = "fatal" | "advisory";

export type IssueCode =
  | "InvalidPlan"
  | "EmptyPlan"
  | "TooManyOperations"
  | "DuplicateOperationId"
  | "UnknownOperation"
  | "MissingParameter"
  | "InvalidParameter"
  | "MissingTarget"
  | "UnknownParameter"
  | "InvalidUnit"
  | "OutOfBounds"
  | "AngleWrapped"
  | "ConfidenceClamped"
  | "PromptTruncated"
  | "DurationExceeded"
  | "ManufacturingLimit"
  | "DestructiveOperation";

export interface SanitizeIssue {
  kind: Extract<PlanErrorKind, "SchemaError" | "UnitError" | "BoundsError">;
  code: IssueCode;
  severity: IssueSeverity;
  opId: string | null;
  path: string;
  message: string;
}

export type SanitizeResult =
  | { ok: true; plan: Plan; issues: SanitizeIssue[] }
  | { ok: false; plan: null; issues: SanitizeIssue[] };

const FULL_TURN = roundCanonical(2 * Math.PI);

interface OperationContext {
  opId: string;
  path: string;
  declaredUnit: LengthUnit;
  settings: EngineSettings;
  issues: SanitizeIssue[];
}

function boundsSeverity(settings: EngineSettings): IssueSeverity {
  return settings.bounds.mode === "reject" ? "fatal" : "advisory";
}

function canClamp(settings: EngineSettings): boolean {
  return settings.bounds.mode === "advisory" && settings.bounds.clamp;
}

function report(ctx: OperationContext, issue: Omit<SanitizeIssue, "opId">): void {
  ctx.issues.push({ ...issue, opId: ctx.opId });
}

function invalid(ctx: OperationContext, path: string, message: string): null {
  report(ctx, { kind: "SchemaError", code: "InvalidParameter", severity: "fatal", path, message });
  return null;
}

function readDimension(raw: unknown, defaultUnit: string): { value: number; unitText: string } | null {
  if (typeof raw === "number") return { value: raw, unitText: defaultUnit };
  if (typeof raw !== "object" || raw === null || Array.isArray(raw) || !("value" in raw)) return null;
  if (typeof raw.value !== "number") return null;
  if (!("unit" in raw) || raw.unit === undefined) return { value: raw.value, unitText: defaultUnit };
  return typeof raw.unit === "string" ? { value: raw.value, unitText: raw.unit } : null;
}

function failsLowerBound(value: number, rule: LowerBound): boolean {
  if (rule === "positive") return value <= 0;
  if (rule === "nonNegative") return value < 0;
  return false;
}

function checkAdvisory(ctx: OperationContext, path: string, check: AdvisoryCheck, value: number): void {
  const limits = ctx.settings.manufacturing;
  let message: string | null = null;
  switch (check) {
    case "minToolDiameter":
      if (value < limits.minToolDiameter) message = `diameter ${value}mm is below the minimum tool diameter ${limits.minToolDiameter}mm`;
      break;
    case "maxCutDepth":
      if (value > limits.maxCutDepth) message = `depth ${value}mm exceeds the maximum cut depth ${limits.maxCutDepth}mm`;
      break;
    case "minWallThickness":
      if (value < limits.minWallThickness) message = `wall thickness ${value}mm is below the minimum ${limits.minWallThickness}mm`;
      break;
    case "maxFilletRadius":
      if (value > limits.maxFilletRadius) message = `fillet radius ${value}mm exceeds ${limits.maxFilletRadius}mm`;
      break;
    case "maxPatternCount":
      if (value > limits.maxPatternCount) message = `pattern count ${value} exceeds ${limits.maxPatternCount}`;
      break;
  }
  if (message) {
    report(ctx, { kind: "BoundsError", code: "ManufacturingLimit", severity: "advisory", path, message: `${path}: ${message}` });
  }
}

function sanitizeDimension(ctx: OperationContext, path: string, raw: unknown, quantity: Quantity, rule: LowerBound): DimensionedValue | null {
  const defaultUnit = quantity === "length" ? ctx.declaredUnit : "deg";
  const dimension = readDimension(raw, defaultUnit);
  if (!dimension) {
    return invalid(ctx, path, `${path} must be a number or a { value, unit } pair`);
  }
  const converted = toCanonical(dimension.value, dimension.unitText, quantity);
  if (!converted.ok) {
    if (converted.reason === "not-finite") {
      return invalid(ctx, path, `${path} must be a finite number`);
    }
    const detail = converted.reason === "wrong-quantity" ? `is not a ${quantity} unit` : "is not a recognised unit";
    report(ctx, { kind: "UnitError", code: "InvalidUnit", severity: "fatal", path, message: `${path}: "${dimension.unitText}" ${detail}` });
    return null;
  }
  const originalUnit = parseUnit(dimension.unitText) ?? CANONICAL_UNITS[quantity];
  let value = converted.value;

  if (quantity === "angle" && ctx.settings.angleMode === "wrap" && (value < 0 || value > FULL_TURN)) {
    const wrapped = roundCanonical(((value % FULL_TURN) + FULL_TURN) % FULL_TURN);
    report(ctx, {
      kind: "BoundsError",
      code: "AngleWrapped",
      severity: "advisory",
      path,
      message: `${path}: angle ${dimension.value}${originalUnit} normalised to ${wrapped}rad`,
    });
    value = wrapped;
  }

  const upper = quantity === "length" ? ctx.settings.maxFeatureSize : FULL_TURN;
  const lower = quantity === "length" ? -ctx.settings.maxFeatureSize : 0;
  const belowRule = failsLowerBound(value, rule);
  const outsideRange = value > upper || value < lower;
  if (belowRule || outsideRange) {
    const severity = boundsSeverity(ctx.settings);
    const range = quantity === "length" ? `at most ${ctx.settings.maxFeatureSize}mm` : "within [0, 360] degrees";
    const requirement = belowRule && rule === "positive" ? "must be greater than zero" : belowRule ? "must not be negative" : `must be ${range}`;
    report(ctx, {
      kind: "BoundsError",
      code: "OutOfBounds",
      severity,
      path,
      message: `${path}: ${dimension.value}${originalUnit} ${requirement}`,
    });
    if (severity === "fatal") return null;
    if (canClamp(ctx.settings)) {
      const floor = rule === "nonNegative" ? Math.max(lower, 0) : lower;
      value = roundCanonical(Math.min(upper, Math.max(floor, value)));
    }
  }

  return {
    value,
    unit: converted.unit,
    original_value: dimension.value,
    original_unit: originalUnit,
  };
}

function sanitizePoint(ctx: OperationContext, path: string, raw: unknown): Point3 | null {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw) || !("x" in raw) || !("y" in raw)) {
    return invalid(ctx, path, `${path} must be a point { x, y, z }`);
  }
  const z = "z" in raw ? raw.z : 0;
  if (typeof raw.x !== "number" || typeof raw.y !== "number" || typeof z !== "number") {
    return invalid(ctx, path, `${path} coordinates must be numbers`);
  }
  const coords: number[] = [];
  for (const coord of [raw.x, raw.y, z]) {
    const converted = toCanonical(coord, ctx.declaredUnit, "length");
    if (!converted.ok) return invalid(ctx, path, `${path} coordinates must be finite`);
    coords.push(converted.value);
  }
  const [x = 0, y = 0, zc = 0] = coords;
  return { x, y, z: zc };
}

function sanitizeStringList(ctx: OperationContext, path: string, raw: unknown, minItems: number): string[] | null {
  if (!Array.isArray(raw) || raw.length < minItems) {
    return invalid(ctx, path, `${path} must be a list of at least ${minItems} names`);
  }
  const out: string[] = [];
  for (const item of raw) {
    if (typeof item !== "string" || item.length === 0) return invalid(ctx, path, `${path} must contain non-empty strings`);
    out.push(item);
  }
  return out;
}

function sanitizeParam(ctx: OperationContext, name: string, spec: ParamSpec, raw: ParamValue): ParamValue | null {
  const path = `${ctx.path}.params.${name}`;
  switch (spec.type) {
    case "length":
    case "angle": {
      const dimension = sanitizeDimension(ctx, path, raw, spec.type, spec.min);
      if (dimension && spec.type === "length" && spec.advisory) {
        checkAdvisory(ctx, path, spec.advisory, dimension.value);
      }
      return dimension;
    }
    case "count": {
      const minimum = spec.minimum ?? 1;
      if (typeof raw !== "number" || !Number.isInteger(raw) || raw < minimum) {
        return invalid(ctx, path, `${path} must be an integer of at least ${minimum}`);
      }
      if (spec.advisory) checkAdvisory(ctx, path, spec.advisory, raw);
      return raw;
    }
    case "number":
      return typeof raw === "number" && Number.isFinite(raw) ? raw : invalid(ctx, path, `${path} must be a finite number`);
    case "string":
    case "ref":
      return typeof raw === "string" && raw.trim().length > 0 ? raw : invalid(ctx, path, `${path} must be a non-empty string`);
    case "boolean":
      return typeof raw === "boolean" ? raw : invalid(ctx, path, `${path} must be true or false`);
    case "enum":
      return typeof raw === "string" && spec.values.includes(raw)
        ? raw
        : invalid(ctx, path, `${path} must be one of ${spec.values.join(", ")}`);
    case "point":
      return sanitizePoint(ctx, path, raw);
    case "points": {
      if (!Array.isArray(raw) || raw.length < spec.minItems) {
        return invalid(ctx, path, `${path} must be a list of at least ${spec.minItems} points`);
      }
      const points: Point3[] = [];
      for (const [index, item] of raw.entries()) {
        const point = sanitizePoint(ctx, `${path}[${index}]`, item);
        if (!point) return null;
        points.push(point);
      }
      return points;
    }
    case "strings":
      return sanitizeStringList(ctx, path, raw, 0);
    case "refs":
      return sanitizeStringList(ctx, path, raw, spec.minItems);
  }
}

function hasValue(op: RawOperation, name: string): boolean {
  if (name === "target_ref") return op.target_ref !== undefined;
  return op.params[name] !== undefined && op.params[name] !== null;
}

function sanitizeOperation(op: RawOperation, definition: OperationDefinition, ctx: OperationContext): PlanOperation | null {
  const before = ctx.issues.length;
  const params: OperationParams = {};

  for (const [name, spec] of Object.entries(definition.required)) {
    const raw = op.params[name];
    if (raw === undefined || raw === null) {
      report(ctx, {
        kind: "SchemaError",
        code: "MissingParameter",
        severity: "fatal",
        path: `${ctx.path}.params.${name}`,
        message: `${op.op} requires parameter "${name}"`,
      });
      continue;
    }
    const value = sanitizeParam(ctx, name, spec, raw);
    if (value !== null) params[name] = value;
  }

  for (const [name, raw] of Object.entries(op.params)) {
    if (Object.hasOwn(definition.required, name)) continue;
    const spec = Object.hasOwn(definition.optional, name) ? definition.optional[name] : undefined;
    if (!spec) {
      report(ctx, {
        kind: "SchemaError",
        code: "UnknownParameter",
        severity: "advisory",
        path: `${ctx.path}.params.${name}`,
        message: `${op.op} does not take parameter "${name}"; it was dropped`,
      });
      continue;
    }
    if (raw === null) continue;
    const value = sanitizeParam(ctx, name, spec, raw);
    if (value !== null) params[name] = value;
  }

  for (const group of definition.requiredOneOf ?? []) {
    if (!group.some((name) => hasValue(op, name))) {
      report(ctx, {
        kind: "SchemaError",
        code: "MissingParameter",
        severity: "fatal",
        path: `${ctx.path}.params`,
        message: `${op.op} requires one of ${group.join(", ")}`,
      });
    }
  }

  if (definition.requiresTarget && op.target_ref === undefined) {
    report(ctx, {
      kind: "SchemaError",
      code: "MissingTarget",
      severity: "fatal",
      path: `${ctx.path}.target_ref`,
      message: `${op.op} requires a target_ref`,
    });
  }

  if (definition.destructive) {
    report(ctx, {
      kind: "BoundsError",
      code: "DestructiveOperation",
      severity: "advisory",
      path: ctx.path,
      message: `${op.op} removes material from existing bodies`,
    });
  }

  const fatal = ctx.issues.slice(before).some((issue) => issue.severity === "fatal");
  if (fatal) return null;

  const out: PlanOperation = {
    op_id: op.op_id,
    op: definition.kind,
    params,
    dependencies: [...(op.dependencies ?? [])],
  };
  if (op.target_ref !== undefined) out.target_ref = op.target_ref;
  return out;
}

function sanitizeMetadata(metadata: PlanMetadata, settings: EngineSettings, issues: SanitizeIssue[]): { metadata: PlanMetadata; declaredUnit: LengthUnit } {
  const out: PlanMetadata = { ...metadata };
  if (metadata.clarification_questions) out.clarification_questions = [...metadata.clarification_questions];
  if (metadata.replay_of) out.replay_of = { ...metadata.replay_of };
  let declaredUnit: LengthUnit = CANONICAL_UNITS.length;

  if (metadata.units !== undefined) {
    const unit = parseUnit(metadata.units);
    if (!unit || !isLengthUnit(unit)) {
      issues.push({
        kind: "UnitError",
        code: "InvalidUnit",
        severity: "fatal",
        opId: null,
        path: "metadata.units",
        message: `metadata.units: "${metadata.units}" is not a recognised length unit`,
      });
    } else {
      declaredUnit = unit;
      out.units = unit;
    }
  }

  const confidence = metadata.confidence_score;
  if (confidence !== undefined && (confidence < 0 || confidence > 1)) {
    out.confidence_score = Math.min(1, Math.max(0, confidence));
    issues.push({
      kind: "BoundsError",
      code: "ConfidenceClamped",
      severity: "advisory",
      opId: null,
      path: "metadata.confidence_score",
      message: `metadata.confidence_score ${confidence} clamped to ${out.confidence_score}`,
    });
  }

  const prompt = metadata.natural_language_prompt;
  if (prompt !== undefined && prompt.length > settings.maxPromptLength) {
    out.natural_language_prompt = prompt.slice(0, settings.maxPromptLength);
    issues.push({
      kind: "BoundsError",
      code: "PromptTruncated",
      severity: "advisory",
      opId: null,
      path: "metadata.natural_language_prompt",
      message: `Prompt truncated to ${settings.maxPromptLength} characters`,
    });
  }

  const duration = metadata.estimated_duration_seconds;
  if (duration !== undefined && duration > settings.maxExecutionSeconds) {
    issues.push({
      kind: "BoundsError",
      code: "DurationExceeded",
      severity: "advisory",
      opId: null,
      path: "metadata.estimated_duration_seconds",
      message: `Estimated execution time ${duration}s exceeds maximum ${settings.maxExecutionSeconds}s`,
    });
  }

  return { metadata: out, declaredUnit };
}

export function sanitizePlan(input: unknown, settings: EngineSettings = DEFAULT_ENGINE_SETTINGS, logger: Logger = silentLogger()): SanitizeResult {
  const structure = validatePlanStructure(input);
  if (!structure.valid) {
    const issues: SanitizeIssue[] = structure.issues.map((issue) => ({
      kind: "SchemaError",
      code: "InvalidPlan",
      severity: "fatal",
      opId: issue.opId,
      path: issue.path,
      message: issue.message,
    }));
    logger.debug("plan rejected by structure check", { issues: issues.length });
    return { ok: false, plan: null, issues };
  }

  const raw = structure.plan;
  const issues: SanitizeIssue[] = [];

  if (raw.operations.length === 0) {
    issues.push({ kind: "SchemaError", code: "EmptyPlan", severity: "fatal", opId: null, path: "operations", message: "Plan contains no operations" });
  }
  if (raw.operations.length > settings.maxOperationsPerPlan) {
    issues.push({
      kind: "SchemaError",
      code: "TooManyOperations",
      severity: "fatal",
      opId: null,
      path: "operations",
      message: `Plan has ${raw.operations.length} operations; the maximum is ${settings.maxOperationsPerPlan}`,
    });
  }

  const { metadata, declaredUnit } = sanitizeMetadata(raw.metadata, settings, issues);

  const seen = new Set<string>();
  const operations: PlanOperation[] = [];
  for (const [index, op] of raw.operations.entries()) {
    const ctx: OperationContext = { opId: op.op_id, path: `operations[${index}]`, declaredUnit, settings, issues };
    if (seen.has(op.op_id)) {
      report(ctx, {
        kind: "SchemaError",
        code: "DuplicateOperationId",
        severity: "fatal",
        path: `${ctx.path}.op_id`,
        message: `Operation id "${op.op_id}" is used more than once`,
      });
      continue;
    }
    seen.add(op.op_id);
    if (!isOperationKind(op.op)) {
      report(ctx, {
        kind: "SchemaError",
        code: "UnknownOperation",
        severity: "fatal",
        path: `${ctx.path}.op`,
        message: `Unknown operation type "${op.op}"`,
      });
      continue;
    }
    const sanitized = sanitizeOperation(op, getOperationDefinition(op.op), ctx);
    if (sanitized) operations.push(sanitized);
  }

  const finalIssues = settings.strict
    ? issues.map((issue) => (issue.severity === "advisory" ? { ...issue, severity: "fatal" as const } : issue))
    : issues;
  const fatal = finalIssues.filter((issue) => issue.severity === "fatal").length;

  logger.debug("plan sanitized", { planId: raw.plan_id, fatal, advisory: finalIssues.length - fatal });

  if (fatal > 0) {
    return { ok: false, plan: null, issues: finalIssues };
  }
  return {
    ok: true,
    plan: { plan_id: raw.plan_id, metadata, operations },
    issues: finalIssues,
  };
}

export function fatalIssues(issues: readonly SanitizeIssue[]): SanitizeIssue[] {
  return issues.filter((issue) => issue.severity === "fatal");
}

export function advisoryIssues(issues: readonly SanitizeIssue[]): SanitizeIssue[] {
  return issues.filter((issue) => issue.severity === "advisory");
}
