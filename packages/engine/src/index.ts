export const ENGINE_VERSION = "0.1.0";

export {
  UNITS,
  CANONICAL_UNITS,
  parseUnit,
  quantityOf,
  isLengthUnit,
  roundCanonical,
  toCanonical,
  fromCanonical,
  listUnits,
} from "./units.js";
export type { Quantity, LengthUnit, AngleUnit, Unit, UnitConversion } from "./units.js";

// Plan schema
export {
  PLAN_SCHEMA_VERSION,
  OPERATION_KINDS,
  OPERATION_CATALOG,
  isOperationKind,
  getOperationDefinition,
  paramSpecFor,
  referenceParams,
  listOperationDefinitions,
} from "./operations.js";
export type {
  OperationKind,
  OperationCategory,
  OperationDefinition,
  LowerBound,
  AdvisoryCheck,
  ParamSpec,
  ParamType,
} from "./operations.js";
export { isDimensionedValue } from "./plan.js";
export type {
  Point3,
  DimensionedValue,
  ParamValue,
  OperationParams,
  PlanMetadata,
  RawOperation,
  RawPlan,
  PlanOperation,
  Plan,
} from "./plan.js";
export {
  PLAN_ID_PATTERN,
  OPERATION_ID_PATTERN,
  ParamValueSchema,
  PlanMetadataSchema,
  PlanOperationSchema,
  PlanSchema,
  validatePlanStructure,
  isStructurallyValidPlan,
} from "./planSchema.js";
export type { PlanStructureIssue, PlanStructureResult } from "./planSchema.js";
