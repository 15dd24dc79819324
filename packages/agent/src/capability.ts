import type { OperationKind, OperationParams } from "@cadpilot/engine";

export interface OperationRequest {
  opId: string;
  kind: OperationKind;
  /** Canonical units: millimetres and radians. */
  params: OperationParams;
  target: { name: string; entityId: string } | null;
  /** Entity ids for the target and every reference parameter, keyed by name. */
  references: Readonly<Record<string, string>>;
  signal: AbortSignal;
}

export type OperationOutcome =
  | {
      ok: true;
      entityId: string;
      timelineId?: string;
      /** Undo for this operation when the transaction has no native rollback. */
      compensate?: () => void | Promise<void>;
    }
  | {
      ok: false;
      error: { kind: string; message: string };
    };

export type OperationHandler = (request: OperationRequest) => OperationOutcome | Promise<OperationOutcome>;

/** One handler per operation kind; adding a kind means adding a handler here. */
export type GeometryCapability = { readonly [K in OperationKind]: OperationHandler };

export interface WorkspaceSession {
  readonly capability: GeometryCapability;
}

export interface SandboxSession extends WorkspaceSession {
  dispose(): void | Promise<void>;
}

export interface TransactionSession extends WorkspaceSession {
  commit(): void | Promise<void>;
  rollback?(): void | Promise<void>;
}

export interface DesignWorkspace<S extends SandboxSession = SandboxSession> {
  openSandbox(): S | Promise<S>;
  beginTransaction(): TransactionSession | Promise<TransactionSession>;
}

/** Builds the full kind-to-handler mapping from a per-kind lookup. */
export function createCapability(handlerFor: (kind: OperationKind) => OperationHandler): GeometryCapability {
  return {
    create_sketch: handlerFor("create_sketch"),
    draw_line: handlerFor("draw_line"),
    draw_circle: handlerFor("draw_circle"),
    draw_rectangle: handlerFor("draw_rectangle"),
    draw_polygon: handlerFor("draw_polygon"),
    draw_arc: handlerFor("draw_arc"),
    draw_spline: handlerFor("draw_spline"),
    extrude: handlerFor("extrude"),
    cut: handlerFor("cut"),
    revolve: handlerFor("revolve"),
    sweep: handlerFor("sweep"),
    loft: handlerFor("loft"),
    fillet: handlerFor("fillet"),
    chamfer: handlerFor("chamfer"),
    shell: handlerFor("shell"),
    mirror: handlerFor("mirror"),
    pattern_linear: handlerFor("pattern_linear"),
    pattern_circular: handlerFor("pattern_circular"),
    pattern_rectangular: handlerFor("pattern_rectangular"),
    pattern_path: handlerFor("pattern_path"),
    create_plane: handlerFor("create_plane"),
    create_axis: handlerFor("create_axis"),
    create_point: handlerFor("create_point"),
    set_dimension: handlerFor("set_dimension"),
    add_constraint: handlerFor("add_constraint"),
    rename_feature: handlerFor("rename_feature"),
    create_component: handlerFor("create_component"),
    create_joint: handlerFor("create_joint"),
    create_hole: handlerFor("create_hole"),
    thread_hole: handlerFor("thread_hole"),
    countersink_hole: handlerFor("countersink_hole"),
    counterbore_hole: handlerFor("counterbore_hole"),
  };
}
