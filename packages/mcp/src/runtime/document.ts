import {
  OPERATION_KINDS,
  ParamValueSchema,
  getOperationDefinition,
  type OperationCategory,
  type OperationKind,
  type OperationParams,
} from "@cadpilot/engine";
import {
  createCapability,
  sha256HexFromString,
  stableJsonStringify,
  type DesignWorkspace,
  type GeometryCapability,
  type OperationOutcome,
  type OperationRequest,
  type SandboxSession,
  type TransactionSession,
} from "@cadpilot/agent";
import { z } from "zod";
import { createRuntimeEventLog, type RuntimeEvent } from "./events.js";
import { RuntimeError } from "./errors.js";

export const DOCUMENT_FORMAT = "cadpilot.document";
export const DOCUMENT_VERSION = 1;

const DEFAULT_MAX_IMPORT_JSON_BYTES = 5 * 1024 * 1024;

export interface DocumentEntity {
  id: string;
  kind: OperationKind;
  name: string | null;
  parentId: string | null;
  timelineId: string;
  solid: boolean;
  /** Closed profiles drawn on a sketch; always 0 for other entities. */
  closedProfiles: number;
  params: OperationParams;
}

interface DocumentState {
  counter: number;
  entities: DocumentEntity[];
}

export interface DocumentSnapshotEntity {
  id: string;
  kind: OperationKind;
  category: OperationCategory;
  name: string | null;
  parentId: string | null;
  timelineId: string;
  solid: boolean;
  closedProfiles: number;
}

export interface DocumentSnapshot {
  documentId: string;
  revision: number;
  entityCount: number;
  solidCount: number;
  entities: DocumentSnapshotEntity[];
}

export interface DocumentSandbox extends SandboxSession {
  readonly disposed: boolean;
  snapshot(): DocumentSnapshot;
}

/** How an apply run is undone: restore the pre-run state, or let the engine run each operation's undo. */
export type RollbackStrategy = "restorePoint" | "compensate";

export interface DesignDocumentOptions {
  rollback?: RollbackStrategy;
  maxJsonBytes?: number;
}

export interface LoadDocumentResult {
  documentId: string;
  entityCount: number;
}

export interface DesignDocumentRuntime extends DesignWorkspace<DocumentSandbox> {
  snapshot(): DocumentSnapshot;
  loadDocumentJson(json: string): LoadDocumentResult;
  exportDocumentJson(): string;
  /** Events since the last call, oldest first. */
  drainEvents(): RuntimeEvent[];
}

const DocumentEntitySchema = z
  .object({
    id: z.string().min(1),
    kind: z.enum(OPERATION_KINDS),
    name: z.string().nullable(),
    parentId: z.string().nullable(),
    timelineId: z.string().min(1),
    solid: z.boolean(),
    closedProfiles: z.number().int().nonnegative(),
    params: z.record(ParamValueSchema),
  })
  .strict();

const DocumentDataSchema = z
  .object({
    format: z.literal(DOCUMENT_FORMAT),
    version: z.literal(DOCUMENT_VERSION),
    counter: z.number().int().nonnegative(),
    entities: z.array(DocumentEntitySchema),
  })
  .strict();

const ID_PREFIX: Record<OperationCategory, string> = {
  sketch: "sketch",
  "sketch-entity": "curve",
  feature: "feature",
  pattern: "feature",
  hole: "feature",
  construction: "construction",
  edit: "edit",
  assembly: "component",
};

const PROFILE_CONSUMERS = new Set<OperationKind>(["extrude", "cut", "revolve", "sweep", "loft"]);

const SOLID_TARGETS = new Set<OperationKind>([
  "fillet",
  "chamfer",
  "shell",
  "pattern_linear",
  "pattern_circular",
  "pattern_rectangular",
  "pattern_path",
  "create_hole",
  "thread_hole",
  "countersink_hole",
  "counterbore_hole",
]);

function fail(kind: string, message: string): OperationOutcome {
  return { ok: false, error: { kind, message } };
}

function closesProfile(kind: OperationKind, params: OperationParams): boolean {
  if (kind === "draw_rectangle" || kind === "draw_circle" || kind === "draw_polygon") return true;
  return kind === "draw_spline" && params.closed === true;
}

function idPrefix(kind: OperationKind): string {
  return kind === "create_joint" ? "joint" : ID_PREFIX[getOperationDefinition(kind).category];
}

function findEntity(state: DocumentState, id: string): DocumentEntity | undefined {
  return state.entities.find((entity) => entity.id === id);
}

/** Entities named by a reference parameter, in parameter order. */
function referencedEntities(state: DocumentState, request: OperationRequest, param: string): Array<{ name: string; entity: DocumentEntity }> {
  const value = request.params[param];
  const names = typeof value === "string" ? [value] : Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
  const out: Array<{ name: string; entity: DocumentEntity }> = [];
  for (const name of names) {
    const id = request.references[name];
    const entity = id === undefined ? undefined : findEntity(state, id);
    if (entity) out.push({ name, entity });
  }
  return out;
}

function profileSources(state: DocumentState, request: OperationRequest, target: DocumentEntity | null): Array<{ name: string; entity: DocumentEntity }> {
  if (request.kind === "loft") return referencedEntities(state, request, "profiles");
  const profiles = referencedEntities(state, request, "profile");
  if (profiles.length > 0) return profiles;
  return target && request.target ? [{ name: request.target.name, entity: target }] : [];
}

/** Geometry checks the reference kernel enforces; null when the operation may proceed. */
function checkPreconditions(state: DocumentState, request: OperationRequest, target: DocumentEntity | null): OperationOutcome | null {
  const { kind } = request;
  const definition = getOperationDefinition(kind);
  const targetName = request.target?.name ?? "target";
  if (definition.requiresTarget && !target) {
    return fail("MissingTarget", `${kind} needs a target entity`);
  }

  if (definition.category === "sketch-entity" && target?.kind !== "create_sketch") {
    return fail("NotASketch", `${targetName} is not a sketch`);
  }

  if (PROFILE_CONSUMERS.has(kind)) {
    const sources = profileSources(state, request, target);
    if (sources.length === 0) return fail("NoProfile", `${kind} has no profile to work from`);
    for (const { name, entity } of sources) {
      if (entity.kind !== "create_sketch") return fail("NotASketch", `${name} is not a sketch`);
      if (entity.closedProfiles === 0) return fail("NoClosedProfile", `sketch ${name} has no closed profile`);
    }
  }

  if (kind === "cut" && !state.entities.some((entity) => entity.solid)) {
    return fail("NoBody", "there is no body to cut");
  }

  if (SOLID_TARGETS.has(kind) && !target?.solid) {
    return fail("NotASolid", `${targetName} is not a solid body`);
  }

  if (kind === "mirror") {
    const features = referencedEntities(state, request, "features");
    const sources = features.length > 0 ? features : target && request.target ? [{ name: request.target.name, entity: target }] : [];
    const open = sources.find((source) => !source.entity.solid);
    if (open) return fail("NotASolid", `${open.name} is not a solid body`);
  }

  if (kind === "create_joint") {
    for (const param of ["component_1", "component_2"]) {
      for (const { name, entity } of referencedEntities(state, request, param)) {
        if (entity.kind !== "create_component") return fail("NotAComponent", `${name} is not a component`);
      }
    }
  }
  return null;
}

type Emit = (type: RuntimeEvent["type"], payload: Record<string, unknown>) => void;

function applyOperation(getState: () => DocumentState, request: OperationRequest, emit: Emit): OperationOutcome {
  if (request.signal.aborted) {
    return fail("Aborted", `${request.opId} was aborted before it started`);
  }
  const state = getState();
  for (const [name, id] of Object.entries(request.references)) {
    if (!findEntity(state, id)) return fail("UnknownEntity", `${name} (${id}) is not in the document`);
  }
  const target = request.target ? (findEntity(state, request.target.entityId) ?? null) : null;
  const rejected = checkPreconditions(state, request, target);
  if (rejected) return rejected;

  if (request.kind === "rename_feature" && target) {
    const newName = request.params.new_name;
    if (typeof newName !== "string") return fail("InvalidParameter", "new_name must be a string");
    const previous = target.name;
    target.name = newName;
    emit("entity.renamed", { id: target.id, from: previous, to: newName });
    return {
      ok: true,
      entityId: target.id,
      compensate: () => {
        const renamed = findEntity(getState(), target.id);
        if (renamed) renamed.name = previous;
        emit("entity.renamed", { id: target.id, from: newName, to: previous });
      },
    };
  }

  const definition = getOperationDefinition(request.kind);
  const nameParam = definition.producesNameFrom;
  const name = nameParam === undefined ? undefined : request.params[nameParam];
  state.counter += 1;
  const entity: DocumentEntity = {
    id: `${idPrefix(request.kind)}_${state.counter}`,
    kind: request.kind,
    name: typeof name === "string" ? name : null,
    parentId: target?.id ?? profileSources(state, request, target)[0]?.entity.id ?? null,
    timelineId: `tl_${state.counter}`,
    solid: definition.category === "feature" || definition.category === "pattern" || definition.category === "hole",
    closedProfiles: 0,
    params: structuredClone(request.params),
  };
  state.entities.push(entity);
  const closedOn = closesProfile(request.kind, request.params) && target ? target.id : null;
  if (closedOn !== null && target) target.closedProfiles += 1;
  emit("entity.created", { id: entity.id, kind: entity.kind, name: entity.name });

  return {
    ok: true,
    entityId: entity.id,
    timelineId: entity.timelineId,
    compensate: () => {
      const live = getState();
      live.entities = live.entities.filter((candidate) => candidate.id !== entity.id);
      if (closedOn !== null) {
        const sketch = findEntity(live, closedOn);
        if (sketch) sketch.closedProfiles = Math.max(0, sketch.closedProfiles - 1);
      }
      emit("entity.removed", { id: entity.id });
    },
  };
}

function capabilityFor(getState: () => DocumentState, emit: Emit, isOpen: () => boolean): GeometryCapability {
  return createCapability(() => (request) => {
    if (!isOpen()) {
      return fail("SessionClosed", `${request.opId} arrived after the session closed`);
    }
    return applyOperation(getState, request, emit);
  });
}

function createEmptyState(): DocumentState {
  return { counter: 0, entities: [] };
}

function serializeState(state: DocumentState): string {
  return stableJsonStringify({
    format: DOCUMENT_FORMAT,
    version: DOCUMENT_VERSION,
    counter: state.counter,
    entities: state.entities,
  });
}

function snapshotOf(state: DocumentState, revision: number): DocumentSnapshot {
  return {
    documentId: `doc_${sha256HexFromString(serializeState(state)).slice(0, 12)}`,
    revision,
    entityCount: state.entities.length,
    solidCount: state.entities.filter((entity) => entity.solid).length,
    entities: state.entities.map((entity) => ({
      id: entity.id,
      kind: entity.kind,
      category: getOperationDefinition(entity.kind).category,
      name: entity.name,
      parentId: entity.parentId,
      timelineId: entity.timelineId,
      solid: entity.solid,
      closedProfiles: entity.closedProfiles,
    })),
  };
}

function parseDocument(json: string, maxJsonBytes: number): DocumentState {
  const bytes = Buffer.byteLength(json, "utf8");
  if (bytes > maxJsonBytes) {
    throw new RuntimeError("CAD_ERR_DOCUMENT_TOO_LARGE", `Document JSON is ${bytes} bytes; the limit is ${maxJsonBytes}.`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new RuntimeError("CAD_ERR_INVALID_DOCUMENT", "Document is not valid JSON.");
  }
  const parsed = DocumentDataSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new RuntimeError("CAD_ERR_INVALID_DOCUMENT", `Invalid document at ${first?.path.join(".") ?? "?"}: ${first?.message ?? "unknown"}`);
  }
  const seen = new Set<string>();
  for (const entity of parsed.data.entities) {
    if (seen.has(entity.id)) {
      throw new RuntimeError("CAD_ERR_INVALID_DOCUMENT", `Duplicate entity id "${entity.id}".`);
    }
    seen.add(entity.id);
  }
  return { counter: parsed.data.counter, entities: parsed.data.entities };
}

/**
 * In-memory design document behind the geometry capability. Sandboxes work
 * on a private copy; transactions work on the live state.
 */
export function createDesignDocument(options: DesignDocumentOptions = {}): DesignDocumentRuntime {
  const strategy = options.rollback ?? "restorePoint";
  const maxJsonBytes = options.maxJsonBytes ?? DEFAULT_MAX_IMPORT_JSON_BYTES;
  const eventLog = createRuntimeEventLog();
  let current = createEmptyState();
  let revision = 0;
  let pending: RuntimeEvent[] = [];

  const record: Emit = (type, payload) => {
    pending.push(eventLog.next(type, payload));
  };

  return {
    openSandbox() {
      const sandboxState = structuredClone(current);
      const baseRevision = revision;
      let disposed = false;
      return {
        capability: capabilityFor(() => sandboxState, () => undefined, () => !disposed),
        get disposed() {
          return disposed;
        },
        snapshot: () => snapshotOf(sandboxState, baseRevision),
        dispose: () => {
          disposed = true;
        },
      };
    },

    beginTransaction() {
      const restorePoint = structuredClone(current);
      let open = true;
      const session: TransactionSession = {
        capability: capabilityFor(() => current, record, () => open),
        commit: () => {
          open = false;
          revision += 1;
          record("document.committed", { revision });
        },
      };
      if (strategy === "restorePoint") {
        session.rollback = () => {
          open = false;
          current = structuredClone(restorePoint);
          revision += 1;
          record("document.rolledBack", { revision });
        };
      }
      return session;
    },

    snapshot() {
      return snapshotOf(current, revision);
    },

    loadDocumentJson(json: string) {
      const state = parseDocument(json, maxJsonBytes);
      current = state;
      revision += 1;
      const snapshot = snapshotOf(current, revision);
      record("document.loaded", { documentId: snapshot.documentId, entityCount: snapshot.entityCount });
      return { documentId: snapshot.documentId, entityCount: snapshot.entityCount };
    },

    exportDocumentJson() {
      return serializeState(current);
    },

    drainEvents() {
      const events = pending;
      pending = [];
      return events;
    },
  };
}
