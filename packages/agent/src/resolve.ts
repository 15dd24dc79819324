import { getOperationDefinition, referenceParams, type Plan, type PlanOperation } from "@cadpilot/engine";
import { PlanError } from "./errors.js";

export type GraphErrorCode = "CycleDetected" | "DanglingReference" | "DuplicateName";

export class GraphError extends PlanError {
  readonly graphCode: GraphErrorCode;
  /** Operation ids on the cycle, in dependency order, for CycleDetected. */
  readonly members: readonly string[];

  constructor(code: GraphErrorCode, message: string, opId: string | null, members: readonly string[] = []) {
    super("GraphError", code, message, opId);
    this.name = "GraphError";
    this.graphCode = code;
    this.members = members;
  }
}

export type ExternalRefs = Readonly<Record<string, string>>;

export interface ResolveOptions {
  /** Names supplied by the caller's selection context; only the keys matter here. */
  externalRefs?: ExternalRefs;
}

export type ResolveResult =
  | { ok: true; order: PlanOperation[]; producers: Readonly<Record<string, string>> }
  | { ok: false; error: GraphError };

/** Name an operation introduces into the arena, if any. */
export function producedName(op: PlanOperation): string | null {
  const param = getOperationDefinition(op.op).producesNameFrom;
  if (!param) return null;
  const value = op.params[param];
  return typeof value === "string" ? value : null;
}

/** Every entity name the operation reads: its target plus reference parameters. */
export function referencedNames(op: PlanOperation): string[] {
  const names: string[] = [];
  if (op.target_ref !== undefined) names.push(op.target_ref);
  for (const param of referenceParams(op.op)) {
    const value = op.params[param];
    if (typeof value === "string") {
      names.push(value);
    } else if (Array.isArray(value)) {
      for (const item of value) {
        if (typeof item === "string") names.push(item);
      }
    }
  }
  return names;
}

function findCycle(remaining: ReadonlySet<number>, predecessors: ReadonlyArray<ReadonlySet<number>>): number[] {
  const [start] = [...remaining].sort((a, b) => a - b);
  if (start === undefined) return [];
  // Every remaining node has a remaining predecessor, so walking backwards must revisit one.
  const path: number[] = [];
  const position = new Map<number, number>();
  let current = start;
  while (!position.has(current)) {
    position.set(current, path.length);
    path.push(current);
    const next = [...(predecessors[current] ?? [])].filter((node) => remaining.has(node)).sort((a, b) => a - b)[0];
    if (next === undefined) break;
    current = next;
  }
  const cycle = path.slice(position.get(current) ?? 0).reverse();
  // Start the report at the member that comes first in the plan.
  const first = cycle.indexOf(Math.min(...cycle));
  return [...cycle.slice(first), ...cycle.slice(0, first)];
}

export function resolvePlan(plan: Plan, options: ResolveOptions = {}): ResolveResult {
  const ops = plan.operations;
  const external = options.externalRefs ?? {};
  const indexById = new Map<string, number>();
  ops.forEach((op, index) => indexById.set(op.op_id, index));

  const producers = new Map<string, number>();
  for (const [index, op] of ops.entries()) {
    const name = producedName(op);
    if (name === null) continue;
    const existing = producers.get(name);
    if (existing !== undefined) {
      const first = ops[existing]?.op_id ?? "?";
      return {
        ok: false,
        error: new GraphError("DuplicateName", `Name "${name}" is produced by both ${first} and ${op.op_id}`, op.op_id),
      };
    }
    producers.set(name, index);
  }

  // Edges go into the graph even when they point forward, so a cycle is
  // reported as one before any reference problem.
  const predecessors = ops.map(() => new Set<number>());
  let dangling: GraphError | null = null;
  for (const [index, op] of ops.entries()) {
    for (const dependency of op.dependencies ?? []) {
      const from = indexById.get(dependency);
      if (from === undefined) {
        dangling ??= new GraphError("DanglingReference", `${op.op_id} depends on unknown operation "${dependency}"`, op.op_id);
        continue;
      }
      if (from === index) {
        return {
          ok: false,
          error: new GraphError("CycleDetected", `Dependency cycle: ${op.op_id} -> ${op.op_id}`, op.op_id, [op.op_id]),
        };
      }
      if (from > index) {
        dangling ??= new GraphError("DanglingReference", `${op.op_id} depends on ${dependency}, which comes later in the plan`, op.op_id);
      }
      predecessors[index]?.add(from);
    }
    for (const name of referencedNames(op)) {
      const from = producers.get(name);
      if (from === index) continue;
      if (from !== undefined && from < index) {
        predecessors[index]?.add(from);
        continue;
      }
      // A selection supplies the name until a later operation takes it over.
      if (Object.hasOwn(external, name)) continue;
      if (from !== undefined) {
        const producer = ops[from]?.op_id ?? "?";
        dangling ??= new GraphError(
          "DanglingReference",
          `${op.op_id} references "${name}", which ${producer} only produces later in the plan`,
          op.op_id,
        );
        predecessors[index]?.add(from);
        continue;
      }
      dangling ??= new GraphError(
        "DanglingReference",
        `${op.op_id} references "${name}", which no operation produces and no selection provides`,
        op.op_id,
      );
    }
  }

  const indegree = predecessors.map((set) => set.size);
  const successors = ops.map((): number[] => []);
  predecessors.forEach((set, index) => {
    for (const from of set) successors[from]?.push(index);
  });

  const order: PlanOperation[] = [];
  const remaining = new Set(ops.map((_, index) => index));
  while (remaining.size > 0) {
    let next: number | undefined;
    for (const index of remaining) {
      if (indegree[index] === 0 && (next === undefined || index < next)) next = index;
    }
    if (next === undefined) break;
    remaining.delete(next);
    const op = ops[next];
    if (op) order.push(op);
    for (const to of successors[next] ?? []) {
      indegree[to] = (indegree[to] ?? 0) - 1;
    }
  }

  if (remaining.size > 0) {
    const members = findCycle(remaining, predecessors).map((index) => ops[index]?.op_id ?? "?");
    const loop = [...members, members[0] ?? "?"].join(" -> ");
    return {
      ok: false,
      error: new GraphError("CycleDetected", `Dependency cycle: ${loop}`, members[0] ?? null, members),
    };
  }

  if (dangling) return { ok: false, error: dangling };

  const producerIds: Record<string, string> = {};
  for (const [name, index] of producers) {
    const op = ops[index];
    if (op) producerIds[name] = op.op_id;
  }
  return { ok: true, order, producers: producerIds };
}
