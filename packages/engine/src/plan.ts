import type { OperationKind } from "./operations.js";

export interface Point3 {
  x: number;
  y: number;
  z: number;
}

export interface DimensionedValue {
  value: number;
  unit: string;
  original_value?: number;
  original_unit?: string;
}

export type ParamValue =
  | string
  | number
  | boolean
  | null
  | DimensionedValue
  | Point3
  | ParamValue[]
  | { [key: string]: ParamValue };

export type OperationParams = Record<string, ParamValue>;

export interface PlanMetadata {
  natural_language_prompt?: string;
  confidence_score?: number;
  units?: string;
  clarification_questions?: string[];
  requires_user_input?: boolean;
  estimated_duration_seconds?: number;
  created_at?: string;
  replay_of?: {
    plan_id: string;
    run_id: string;
  };
}

/** Operation as received from a plan source; `op` is not yet checked against the vocabulary. */
export interface RawOperation {
  op_id: string;
  op: string;
  params: OperationParams;
  target_ref?: string;
  dependencies?: string[];
}

export interface RawPlan {
  plan_id: string;
  metadata: PlanMetadata;
  operations: RawOperation[];
}

export interface PlanOperation extends RawOperation {
  op: OperationKind;
}

export interface Plan extends RawPlan {
  operations: PlanOperation[];
}

export function isDimensionedValue(value: unknown): value is DimensionedValue {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return "value" in value && "unit" in value && typeof value.value === "number" && typeof value.unit === "string";
}
