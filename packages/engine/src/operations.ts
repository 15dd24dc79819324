/**
 * Operation vocabulary of the plan schema.
 *
 * The catalog is a versioned contract: kinds are only ever added, and a
 * kind's required parameters never change within a schema major.
 */
export const PLAN_SCHEMA_VERSION = "1.2.0";

export const OPERATION_KINDS = [
  "create_sketch",
  "draw_line",
  "draw_circle",
  "draw_rectangle",
  "draw_polygon",
  "draw_arc",
  "draw_spline",
  "extrude",
  "cut",
  "revolve",
  "sweep",
  "loft",
  "fillet",
  "chamfer",
  "shell",
  "mirror",
  "pattern_linear",
  "pattern_circular",
  "pattern_rectangular",
  "pattern_path",
  "create_plane",
  "create_axis",
  "create_point",
  "set_dimension",
  "add_constraint",
  "rename_feature",
  "create_component",
  "create_joint",
  "create_hole",
  "thread_hole",
  "countersink_hole",
  "counterbore_hole",
] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

export type OperationCategory = "sketch" | "sketch-entity" | "feature" | "pattern" | "construction" | "edit" | "assembly" | "hole";

/** Lower bound a dimension must satisfy before any configured maximum applies. */
export type LowerBound = "positive" | "nonNegative" | "any";

/** Manufacturing checks that never reject a plan on their own. */
export type AdvisoryCheck = "minToolDiameter" | "maxCutDepth" | "minWallThickness" | "maxFilletRadius" | "maxPatternCount";

export type ParamSpec =
  | { type: "length"; min: LowerBound; advisory?: AdvisoryCheck }
  | { type: "angle"; min: LowerBound }
  | { type: "count"; advisory?: AdvisoryCheck; minimum?: number }
  | { type: "number" }
  | { type: "string" }
  | { type: "strings" }
  | { type: "boolean" }
  | { type: "enum"; values: readonly string[] }
  | { type: "point" }
  | { type: "points"; minItems: number }
  | { type: "ref" }
  | { type: "refs"; minItems: number };

export type ParamType = ParamSpec["type"];

export interface OperationDefinition {
  kind: OperationKind;
  category: OperationCategory;
  description: string;
  required: Readonly<Record<string, ParamSpec>>;
  optional: Readonly<Record<string, ParamSpec>>;
  /** At least one parameter of each group must be present. */
  requiredOneOf?: readonly (readonly string[])[];
  /** The operation acts on an existing entity named by target_ref. */
  requiresTarget: boolean;
  /** Parameter whose string value names the entity the operation produces. */
  producesNameFrom?: string;
  destructive?: boolean;
  since: string;
}

const LENGTH_POSITIVE: ParamSpec = { type: "length", min: "positive" };
const LENGTH_ANY: ParamSpec = { type: "length", min: "any" };
const ANGLE_POSITIVE: ParamSpec = { type: "angle", min: "positive" };
const ANGLE_NON_NEGATIVE: ParamSpec = { type: "angle", min: "nonNegative" };
const NAME: ParamSpec = { type: "string" };
const POINT: ParamSpec = { type: "point" };
const REF: ParamSpec = { type: "ref" };
const EXTENT_DIRECTION: ParamSpec = { type: "enum", values: ["positive", "negative", "symmetric"] };
const BODY_OPERATION: ParamSpec = { type: "enum", values: ["new_body", "join", "cut", "intersect"] };
const AXIS_DIRECTION: ParamSpec = { type: "enum", values: ["x", "y", "z"] };
const HOLE_DIAMETER: ParamSpec = { type: "length", min: "positive", advisory: "minToolDiameter" };
const HOLE_DEPTH: ParamSpec = { type: "length", min: "positive", advisory: "maxCutDepth" };
const PATTERN_COUNT: ParamSpec = { type: "count", advisory: "maxPatternCount" };

function define(definition: Omit<OperationDefinition, "optional" | "requiresTarget" | "since"> & Partial<Pick<OperationDefinition, "optional" | "requiresTarget" | "since">>): OperationDefinition {
  return {
    optional: {},
    requiresTarget: false,
    since: "1.0.0",
    ...definition,
  };
}

export const OPERATION_CATALOG: Readonly<Record<OperationKind, OperationDefinition>> = {
  create_sketch: define({
    kind: "create_sketch",
    category: "sketch",
    description: "Create a sketch on a base plane or a named construction plane.",
    required: { plane: { type: "string" } },
    optional: { name: NAME, offset: LENGTH_ANY },
    producesNameFrom: "name",
  }),
  draw_line: define({
    kind: "draw_line",
    category: "sketch-entity",
    description: "Draw a line segment in the target sketch.",
    required: { start_point: POINT, end_point: POINT },
    optional: { name: NAME, construction: { type: "boolean" } },
    requiresTarget: true,
    producesNameFrom: "name",
  }),
  draw_circle: define({
    kind: "draw_circle",
    category: "sketch-entity",
    description: "Draw a circle by centre and diameter or radius.",
    required: { center_point: POINT },
    optional: { diameter: HOLE_DIAMETER, radius: LENGTH_POSITIVE, name: NAME },
    requiredOneOf: [["diameter", "radius"]],
    requiresTarget: true,
    producesNameFrom: "name",
  }),
  draw_rectangle: define({
    kind: "draw_rectangle",
    category: "sketch-entity",
    description: "Draw a centred rectangle.",
    required: { center_point: POINT, width: LENGTH_POSITIVE, height: LENGTH_POSITIVE },
    optional: { name: NAME },
    requiresTarget: true,
    producesNameFrom: "name",
  }),
  draw_polygon: define({
    kind: "draw_polygon",
    category: "sketch-entity",
    description: "Draw a regular polygon inscribed in a circle.",
    required: { center_point: POINT, radius: LENGTH_POSITIVE, sides: { type: "count", minimum: 3 } },
    optional: { rotation: ANGLE_NON_NEGATIVE, name: NAME },
    requiresTarget: true,
    producesNameFrom: "name",
  }),
  draw_arc: define({
    kind: "draw_arc",
    category: "sketch-entity",
    description: "Draw an arc from a centre, radius, start angle and sweep.",
    required: { center_point: POINT, radius: LENGTH_POSITIVE, sweep_angle: ANGLE_POSITIVE },
    optional: { start_angle: ANGLE_NON_NEGATIVE, name: NAME },
    requiresTarget: true,
    producesNameFrom: "name",
  }),
  draw_spline: define({
    kind: "draw_spline",
    category: "sketch-entity",
    description: "Draw a fitted spline through points.",
    required: { points: { type: "points", minItems: 2 } },
    optional: { closed: { type: "boolean" }, name: NAME },
    requiresTarget: true,
    producesNameFrom: "name",
  }),
  extrude: define({
    kind: "extrude",
    category: "feature",
    description: "Extrude a sketch profile by a distance.",
    required: { distance: { type: "length", min: "positive", advisory: "maxCutDepth" } },
    optional: { profile: REF, direction: EXTENT_DIRECTION, operation: BODY_OPERATION, name: NAME },
    requiredOneOf: [["profile", "target_ref"]],
    producesNameFrom: "name",
  }),
  cut: define({
    kind: "cut",
    category: "feature",
    description: "Cut a sketch profile into existing bodies.",
    required: { distance: { type: "length", min: "positive", advisory: "maxCutDepth" } },
    optional: { profile: REF, direction: EXTENT_DIRECTION, through_all: { type: "boolean" }, name: NAME },
    requiredOneOf: [["profile", "target_ref"]],
    producesNameFrom: "name",
    destructive: true,
  }),
  revolve: define({
    kind: "revolve",
    category: "feature",
    description: "Revolve a sketch profile around an axis.",
    required: { angle: ANGLE_POSITIVE },
    optional: { profile: REF, axis: { type: "string" }, operation: BODY_OPERATION, name: NAME },
    requiredOneOf: [["profile", "target_ref"]],
    producesNameFrom: "name",
  }),
  sweep: define({
    kind: "sweep",
    category: "feature",
    description: "Sweep a profile along a path.",
    required: { profile: REF, path: REF },
    optional: { operation: BODY_OPERATION, name: NAME },
    producesNameFrom: "name",
  }),
  loft: define({
    kind: "loft",
    category: "feature",
    description: "Loft between two or more profiles.",
    required: { profiles: { type: "refs", minItems: 2 } },
    optional: { operation: BODY_OPERATION, name: NAME },
    producesNameFrom: "name",
  }),
  fillet: define({
    kind: "fillet",
    category: "feature",
    description: "Round edges of the target body.",
    required: { radius: { type: "length", min: "positive", advisory: "maxFilletRadius" } },
    optional: { edges: { type: "strings" }, name: NAME },
    requiresTarget: true,
    producesNameFrom: "name",
  }),
  chamfer: define({
    kind: "chamfer",
    category: "feature",
    description: "Bevel edges of the target body.",
    required: { distance: LENGTH_POSITIVE },
    optional: { edges: { type: "strings" }, name: NAME },
    requiresTarget: true,
    producesNameFrom: "name",
  }),
  shell: define({
    kind: "shell",
    category: "feature",
    description: "Hollow the target body leaving walls of a thickness.",
    required: { thickness: { type: "length", min: "positive", advisory: "minWallThickness" } },
    optional: { faces: { type: "strings" }, name: NAME },
    requiresTarget: true,
    producesNameFrom: "name",
    destructive: true,
  }),
  mirror: define({
    kind: "mirror",
    category: "feature",
    description: "Mirror features across a plane.",
    required: { plane: { type: "string" } },
    optional: { features: { type: "refs", minItems: 1 }, name: NAME },
    requiredOneOf: [["features", "target_ref"]],
    producesNameFrom: "name",
  }),
  pattern_linear: define({
    kind: "pattern_linear",
    category: "pattern",
    description: "Repeat the target feature along a direction.",
    required: { count: PATTERN_COUNT, spacing: LENGTH_POSITIVE },
    optional: { direction: AXIS_DIRECTION, name: NAME },
    requiresTarget: true,
    producesNameFrom: "name",
  }),
  pattern_circular: define({
    kind: "pattern_circular",
    category: "pattern",
    description: "Repeat the target feature around an axis.",
    required: { count: PATTERN_COUNT },
    optional: { total_angle: ANGLE_POSITIVE, axis: { type: "string" }, name: NAME },
    requiresTarget: true,
    producesNameFrom: "name",
  }),
  pattern_rectangular: define({
    kind: "pattern_rectangular",
    category: "pattern",
    description: "Repeat the target feature on a two-direction grid.",
    required: {
      count_1: PATTERN_COUNT,
      count_2: PATTERN_COUNT,
      distance_1: LENGTH_POSITIVE,
      distance_2: LENGTH_POSITIVE,
    },
    optional: { name: NAME },
    requiresTarget: true,
    producesNameFrom: "name",
    since: "1.1.0",
  }),
  pattern_path: define({
    kind: "pattern_path",
    category: "pattern",
    description: "Repeat the target feature along a path.",
    required: { count: PATTERN_COUNT, path: REF },
    optional: { spacing: LENGTH_POSITIVE, name: NAME },
    requiresTarget: true,
    producesNameFrom: "name",
    since: "1.1.0",
  }),
  create_plane: define({
    kind: "create_plane",
    category: "construction",
    description: "Create a construction plane offset or angled from a reference.",
    required: { reference: { type: "string" } },
    optional: { offset: LENGTH_ANY, angle: ANGLE_NON_NEGATIVE, name: NAME },
    producesNameFrom: "name",
  }),
  create_axis: define({
    kind: "create_axis",
    category: "construction",
    description: "Create a construction axis through a reference.",
    required: { reference: { type: "string" } },
    optional: { name: NAME },
    producesNameFrom: "name",
  }),
  create_point: define({
    kind: "create_point",
    category: "construction",
    description: "Create a construction point.",
    required: { position: POINT },
    optional: { name: NAME },
    producesNameFrom: "name",
  }),
  set_dimension: define({
    kind: "set_dimension",
    category: "edit",
    description: "Drive a named sketch dimension to a new value.",
    required: { dimension: { type: "string" }, value: LENGTH_POSITIVE },
    requiresTarget: true,
  }),
  add_constraint: define({
    kind: "add_constraint",
    category: "edit",
    description: "Add a geometric constraint between sketch entities.",
    required: {
      constraint: {
        type: "enum",
        values: ["horizontal", "vertical", "coincident", "parallel", "perpendicular", "tangent", "equal", "concentric", "fixed"],
      },
      entities: { type: "strings" },
    },
    requiresTarget: true,
  }),
  rename_feature: define({
    kind: "rename_feature",
    category: "edit",
    description: "Give the target entity a new name.",
    required: { new_name: NAME },
    requiresTarget: true,
    producesNameFrom: "new_name",
  }),
  create_component: define({
    kind: "create_component",
    category: "assembly",
    description: "Create an empty component.",
    required: { name: NAME },
    producesNameFrom: "name",
  }),
  create_joint: define({
    kind: "create_joint",
    category: "assembly",
    description: "Join two components.",
    required: { component_1: REF, component_2: REF },
    optional: {
      joint_type: { type: "enum", values: ["rigid", "revolute", "slider", "cylindrical", "pin_slot", "planar", "ball"] },
      name: NAME,
    },
    producesNameFrom: "name",
  }),
  create_hole: define({
    kind: "create_hole",
    category: "hole",
    description: "Drill a simple hole into the target face.",
    required: { diameter: HOLE_DIAMETER, depth: HOLE_DEPTH },
    optional: { position: POINT, name: NAME },
    requiresTarget: true,
    producesNameFrom: "name",
    destructive: true,
  }),
  thread_hole: define({
    kind: "thread_hole",
    category: "hole",
    description: "Drill a tapped hole.",
    required: { diameter: HOLE_DIAMETER, depth: HOLE_DEPTH, pitch: LENGTH_POSITIVE },
    optional: { position: POINT, name: NAME },
    requiresTarget: true,
    producesNameFrom: "name",
    destructive: true,
    since: "1.2.0",
  }),
  countersink_hole: define({
    kind: "countersink_hole",
    category: "hole",
    description: "Drill a countersunk hole.",
    required: {
      diameter: HOLE_DIAMETER,
      depth: HOLE_DEPTH,
      countersink_diameter: LENGTH_POSITIVE,
      countersink_angle: ANGLE_POSITIVE,
    },
    optional: { position: POINT, name: NAME },
    requiresTarget: true,
    producesNameFrom: "name",
    destructive: true,
    since: "1.2.0",
  }),
  counterbore_hole: define({
    kind: "counterbore_hole",
    category: "hole",
    description: "Drill a counterbored hole.",
    required: {
      diameter: HOLE_DIAMETER,
      depth: HOLE_DEPTH,
      counterbore_diameter: LENGTH_POSITIVE,
      counterbore_depth: LENGTH_POSITIVE,
    },
    optional: { position: POINT, name: NAME },
    requiresTarget: true,
    producesNameFrom: "name",
    destructive: true,
    since: "1.2.0",
  }),
};

const KIND_SET: ReadonlySet<string> = new Set(OPERATION_KINDS);

export function isOperationKind(value: string): value is OperationKind {
  return KIND_SET.has(value);
}

export function getOperationDefinition(kind: OperationKind): OperationDefinition {
  return OPERATION_CATALOG[kind];
}

export function paramSpecFor(kind: OperationKind, param: string): ParamSpec | null {
  const definition = OPERATION_CATALOG[kind];
  if (Object.hasOwn(definition.required, param)) return definition.required[param] ?? null;
  if (Object.hasOwn(definition.optional, param)) return definition.optional[param] ?? null;
  return null;
}

/** Names of the parameters whose values refer to other entities by name. */
export function referenceParams(kind: OperationKind): string[] {
  const definition = OPERATION_CATALOG[kind];
  return Object.entries({ ...definition.required, ...definition.optional })
    .filter(([, spec]) => spec.type === "ref" || spec.type === "refs")
    .map(([name]) => name)
    .sort((a, b) => a.localeCompare(b));
}

export function listOperationDefinitions(): OperationDefinition[] {
  return OPERATION_KINDS.map((kind) => OPERATION_CATALOG[kind]);
}
