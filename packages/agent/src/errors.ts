export const PLAN_ERROR_KINDS = [
  "SchemaError",
  "UnitError",
  "BoundsError",
  "GraphError",
  "CapabilityError",
  "TimeoutError",
  "CancelledError",
  "DocumentBusy",
] as const;

export type PlanErrorKind = (typeof PLAN_ERROR_KINDS)[number];

export interface ErrorInfo {
  kind: PlanErrorKind;
  code: string;
  message: string;
}

export class PlanError extends Error {
  readonly kind: PlanErrorKind;
  readonly code: string;
  readonly opId: string | null;

  constructor(kind: PlanErrorKind, code: string, message: string, opId: string | null = null) {
    super(message);
    this.name = "PlanError";
    this.kind = kind;
    this.code = code;
    this.opId = opId;
  }

  toInfo(): ErrorInfo {
    return { kind: this.kind, code: this.code, message: this.message };
  }
}

export function isPlanError(error: unknown): error is PlanError {
  return error instanceof PlanError;
}

/** Timeouts are capability failures with their own kind. */
export function isCapabilityFailure(kind: PlanErrorKind): boolean {
  return kind === "CapabilityError" || kind === "TimeoutError";
}

export function asPlanError(
  error: unknown,
  fallback: { kind: PlanErrorKind; code: string; opId?: string | null },
): PlanError {
  if (isPlanError(error)) {
    return error;
  }
  const opId = fallback.opId ?? null;
  if (error instanceof Error) {
    return new PlanError(fallback.kind, fallback.code, error.message, opId);
  }
  return new PlanError(fallback.kind, fallback.code, typeof error === "string" ? error : "Unknown error.", opId);
}
