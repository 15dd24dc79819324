import { describe, expect, it } from "vitest";
import type { PlanOperation } from "@cadpilot/engine";
import { FakeWorkspace, basePlan } from "./__tests__/fakeWorkspace.js";
import { isPlanError } from "./errors.js";
import { ExecutionEngine, type ExecutionResult } from "./execute.js";
import { InMemorySink, Logger } from "./logger.js";
import { resolvePlan } from "./resolve.js";
import { sanitizePlan } from "./sanitize.js";

function orderedOps(input: unknown = basePlan(), externalRefs: Record<string, string> = {}): PlanOperation[] {
  const sanitized = sanitizePlan(input);
  if (!sanitized.ok) throw new Error("fixture plan must sanitize");
  const resolved = resolvePlan(sanitized.plan, { externalRefs });
  if (!resolved.ok) throw new Error("fixture plan must resolve");
  return resolved.order;
}

function sketchPlan(name: string): unknown {
  return { plan_id: `p_${name}`, metadata: {}, operations: [{ op_id: "op1", op: "create_sketch", params: { plane: "XY", name } }] };
}

describe("ExecutionEngine apply mode", () => {
  it("applies the plate plan in order and commits", async () => {
    const workspace = new FakeWorkspace();
    const engine = new ExecutionEngine(workspace);
    const report = await engine.execute(orderedOps(), "apply", { planId: "plate_001" });

    expect(report.status).toBe("succeeded");
    expect(report.rollback).toBeNull();
    expect(report.failure).toBeNull();
    expect(report.results.map((result) => [result.opId, result.status, result.entityId, result.timelineId])).toEqual([
      ["op1", "succeeded", "create_sketch_1", "tl_1"],
      ["op2", "succeeded", "draw_rectangle_2", "tl_2"],
      ["op3", "succeeded", "extrude_3", "tl_3"],
    ]);
    expect(workspace.document.entities.map((entity) => entity.id)).toEqual(["create_sketch_1", "draw_rectangle_2", "extrude_3"]);
    expect(workspace.requests[1]?.target).toEqual({ name: "s1", entityId: "create_sketch_1" });
    expect(workspace.requests[2]?.references).toEqual({ s1: "create_sketch_1" });
  });

  it("halts at the failing operation and compensates what was applied", async () => {
    const workspace = new FakeWorkspace().on("op2", { type: "fail", kind: "SketchLocked", message: "sketch is locked" });
    const engine = new ExecutionEngine(workspace);
    const report = await engine.execute(orderedOps(), "apply", { planId: "plate_001" });

    expect(report.status).toBe("failed");
    expect(report.results.map((result) => [result.opId, result.status])).toEqual([
      ["op1", "succeeded"],
      ["op2", "failed"],
    ]);
    expect(report.results[1]?.error).toEqual({
      kind: "CapabilityError",
      code: "SketchLocked",
      message: "op2 (draw_rectangle): sketch is locked",
    });
    expect(report.failure).toEqual({
      opId: "op2",
      kind: "CapabilityError",
      code: "SketchLocked",
      message: "op2 (draw_rectangle): sketch is locked",
    });
    expect(workspace.calls).toEqual(["op1", "op2"]);
    expect(report.rollback).toEqual({ strategy: "compensation", status: "completed", compensated: 1, failures: [] });
    expect(workspace.document.entities).toEqual([]);
  });

  it("prefers a native rollback and restores the prior content", async () => {
    const workspace = new FakeWorkspace({ nativeRollback: true }).on("op3", { type: "throw", message: "kernel crashed" });
    workspace.document = { entities: [{ id: "create_component_9", kind: "create_component" }], counter: 9 };
    const before = structuredClone(workspace.document);
    const engine = new ExecutionEngine(workspace);
    const report = await engine.execute(orderedOps(), "apply", { planId: "plate_001" });

    expect(report.failure).toEqual({ opId: "op3", kind: "CapabilityError", code: "HANDLER_FAILED", message: "kernel crashed" });
    expect(report.rollback?.strategy).toBe("native");
    expect(report.rollback?.status).toBe("completed");
    expect(workspace.document).toEqual(before);
  });

  it("keeps compensating after a compensation fails and reports it incomplete", async () => {
    const sink = new InMemorySink();
    const workspace = new FakeWorkspace()
      .on("op1", { type: "compensationFails" })
      .on("op3", { type: "fail", kind: "NoProfile", message: "no closed profile" });
    const engine = new ExecutionEngine(workspace, { logger: new Logger("test", { sinks: [sink] }) });
    const report = await engine.execute(orderedOps(), "apply", { planId: "plate_001" });

    expect(report.rollback).toEqual({
      strategy: "compensation",
      status: "incomplete",
      compensated: 1,
      failures: [{ opId: "op1", message: "cannot undo create_sketch_1" }],
    });
    expect(workspace.document.entities.map((entity) => entity.id)).toEqual(["create_sketch_1"]);
    expect(sink.read().some((event) => event.level === "error" && event.message === "rollback incomplete")).toBe(true);
  });

  it("reports an operation without an undo as an incomplete rollback", async () => {
    const workspace = new FakeWorkspace()
      .on("op1", { type: "noCompensation" })
      .on("op2", { type: "fail", kind: "Rejected", message: "no" });
    const report = await new ExecutionEngine(workspace).execute(orderedOps(), "apply", { planId: "plate_001" });
    expect(report.rollback?.status).toBe("incomplete");
    expect(report.rollback?.failures).toEqual([{ opId: "op1", message: "No compensating action was provided." }]);
  });

  it("rolls back when the commit fails", async () => {
    const workspace = new FakeWorkspace({ commitFails: true });
    const report = await new ExecutionEngine(workspace).execute(orderedOps(), "apply", { planId: "plate_001" });

    expect(report.status).toBe("failed");
    expect(report.failure).toEqual({ opId: null, kind: "CapabilityError", code: "COMMIT_FAILED", message: "commit rejected" });
    expect(report.results).toHaveLength(3);
    expect(report.rollback).toEqual({ strategy: "compensation", status: "completed", compensated: 3, failures: [] });
    expect(workspace.document.entities).toEqual([]);
  });

  it("treats an operation timeout as a failure", async () => {
    const workspace = new FakeWorkspace().on("op2", { type: "hang" });
    const engine = new ExecutionEngine(workspace, { operationTimeoutMs: 20 });
    const report = await engine.execute(orderedOps(), "apply", { planId: "plate_001" });

    expect(report.status).toBe("failed");
    expect(report.failure?.kind).toBe("TimeoutError");
    expect(report.failure?.code).toBe("OPERATION_TIMEOUT");
    expect(report.results[1]?.error?.message).toBe("op2 (draw_rectangle) did not finish within 20ms");
    expect(workspace.requests[1]?.signal.aborted).toBe(true);
    expect(workspace.document.entities).toEqual([]);
  });

  it("waits for an operation that ignores its timeout and undoes its late change", async () => {
    const workspace = new FakeWorkspace().on("op2", { type: "late", delayMs: 40 });
    const engine = new ExecutionEngine(workspace, { operationTimeoutMs: 10 });
    const report = await engine.execute(orderedOps(), "apply", { planId: "plate_001" });

    expect(report.failure?.code).toBe("OPERATION_TIMEOUT");
    expect(report.results.map((result) => [result.opId, result.status])).toEqual([
      ["op1", "succeeded"],
      ["op2", "failed"],
    ]);
    expect(report.rollback).toEqual({ strategy: "compensation", status: "completed", compensated: 2, failures: [] });
    expect(workspace.document.entities).toEqual([]);
    expect(engine.documentLock.locked).toBe(false);
  });

  it("keeps the document locked until an operation outliving the grace period settles", async () => {
    const sink = new InMemorySink();
    const workspace = new FakeWorkspace().on("op2", { type: "late", delayMs: 60 });
    const engine = new ExecutionEngine(workspace, {
      operationTimeoutMs: 10,
      settleGraceMs: 10,
      logger: new Logger("test", { sinks: [sink] }),
    });
    const report = await engine.execute(orderedOps(), "apply", { planId: "plate_001" });

    expect(report.failure?.kind).toBe("TimeoutError");
    expect(report.rollback).toEqual({ strategy: "compensation", status: "completed", compensated: 1, failures: [] });
    expect(engine.documentLock.locked).toBe(true);

    await engine.idle();
    expect(workspace.document.entities).toEqual([]);
    expect(engine.documentLock.locked).toBe(false);
    expect(sink.read().filter((event) => event.level === "warn").map((event) => event.message)).toEqual([
      "operation still running after interruption",
      "operation failed",
      "undid late operation",
    ]);
  });

  it("rolls back when cancelled between operations", async () => {
    const workspace = new FakeWorkspace();
    const controller = new AbortController();
    const report = await new ExecutionEngine(workspace).execute(orderedOps(), "apply", {
      planId: "plate_001",
      signal: controller.signal,
      onResult: (result) => {
        if (result.opId === "op1") controller.abort();
      },
    });

    expect(report.status).toBe("cancelled");
    expect(report.results.map((result) => result.opId)).toEqual(["op1"]);
    expect(report.failure).toEqual({
      opId: null,
      kind: "CancelledError",
      code: "CANCELLED",
      message: "Run cancelled before op2 was dispatched.",
    });
    expect(workspace.calls).toEqual(["op1"]);
    expect(workspace.document.entities).toEqual([]);
  });

  it("rolls back when cancelled while an operation runs", async () => {
    const workspace = new FakeWorkspace().on("op2", { type: "hang" });
    const controller = new AbortController();
    const report = await new ExecutionEngine(workspace, { operationTimeoutMs: 0 }).execute(orderedOps(), "apply", {
      planId: "plate_001",
      signal: controller.signal,
      onResult: (result) => {
        if (result.opId === "op1") setTimeout(() => controller.abort(), 5);
      },
    });

    expect(report.status).toBe("cancelled");
    expect(report.results.map((result) => [result.opId, result.status])).toEqual([
      ["op1", "succeeded"],
      ["op2", "failed"],
    ]);
    expect(report.results[1]?.error?.kind).toBe("CancelledError");
    expect(workspace.document.entities).toEqual([]);
  });

  it("awaits the result callback before dispatching the next operation", async () => {
    const seen: string[] = [];
    const workspace = new FakeWorkspace();
    await new ExecutionEngine(workspace).execute(orderedOps(), "apply", {
      planId: "plate_001",
      onResult: async (result: ExecutionResult) => {
        await new Promise((resolve) => setTimeout(resolve, 1));
        seen.push(`${result.opId}:${workspace.calls.length}`);
      },
    });
    expect(seen).toEqual(["op1:1", "op2:2", "op3:3"]);
  });

  it("halts and rolls back when the result callback throws", async () => {
    const workspace = new FakeWorkspace();
    const report = await new ExecutionEngine(workspace).execute(orderedOps(), "apply", {
      planId: "plate_001",
      onResult: (result) => {
        if (result.opId === "op2") throw new Error("disk full");
      },
    });
    expect(report.failure).toEqual({ opId: "op2", kind: "CapabilityError", code: "RESULT_HANDLER_FAILED", message: "disk full" });
    expect(workspace.calls).toEqual(["op1", "op2"]);
    expect(report.rollback?.compensated).toBe(2);
    expect(workspace.document.entities).toEqual([]);
  });

  it("keeps the operation's own failure when the result callback also throws", async () => {
    const sink = new InMemorySink();
    const workspace = new FakeWorkspace().on("op2", { type: "fail", kind: "SketchLocked", message: "sketch is locked" });
    const engine = new ExecutionEngine(workspace, { logger: new Logger("test", { sinks: [sink] }) });
    const report = await engine.execute(orderedOps(), "apply", {
      planId: "plate_001",
      onResult: (result) => {
        if (result.status === "failed") throw new Error("disk full");
      },
    });

    expect(report.failure).toEqual({
      opId: "op2",
      kind: "CapabilityError",
      code: "SketchLocked",
      message: "op2 (draw_rectangle): sketch is locked",
    });
    expect(report.rollback?.compensated).toBe(1);
    const logged = sink.read().find((event) => event.message === "result callback failed");
    expect(logged?.error?.message).toBe("disk full");
  });

  it("fails an operation whose reference has no entity", async () => {
    const ops = orderedOps({ plan_id: "p", metadata: {}, operations: [{ op_id: "f", op: "fillet", params: { radius: 2 }, target_ref: "body_main" }] }, { body_main: "body_7" });
    const workspace = new FakeWorkspace();
    const report = await new ExecutionEngine(workspace).execute(ops, "apply", { planId: "p" });
    expect(report.failure?.code).toBe("UNRESOLVED_REFERENCE");
    expect(workspace.calls).toEqual([]);

    const seeded = await new ExecutionEngine(workspace).execute(ops, "apply", { planId: "p", externalRefs: { body_main: "body_7" } });
    expect(seeded.status).toBe("succeeded");
    expect(workspace.requests[0]?.target).toEqual({ name: "body_main", entityId: "body_7" });
  });
});

describe("ExecutionEngine document lock", () => {
  it("rejects a second apply run under the reject policy", async () => {
    const workspace = new FakeWorkspace().on("op1", { type: "hang" });
    const engine = new ExecutionEngine(workspace, { lockPolicy: "reject", operationTimeoutMs: 0 });
    const controller = new AbortController();
    const first = engine.execute(orderedOps(sketchPlan("s1")), "apply", { planId: "p_s1", signal: controller.signal });

    const error = await engine.execute(orderedOps(sketchPlan("s2")), "apply", { planId: "p_s2" }).then(
      () => null,
      (reason: unknown) => reason,
    );
    expect(isPlanError(error) && error.kind).toBe("DocumentBusy");

    controller.abort();
    const report = await first;
    expect(report.status).toBe("cancelled");
    expect(engine.documentLock.locked).toBe(false);
  });

  it("serialises apply runs under the queue policy", async () => {
    const workspace = new FakeWorkspace();
    const engine = new ExecutionEngine(workspace);
    const [a, b] = await Promise.all([
      engine.execute(orderedOps(sketchPlan("s1")), "apply", { planId: "p_s1" }),
      engine.execute(orderedOps(sketchPlan("s2")), "apply", { planId: "p_s2" }),
    ]);
    expect(a.results[0]?.entityId).toBe("create_sketch_1");
    expect(b.results[0]?.entityId).toBe("create_sketch_2");
    expect(engine.documentLock.locked).toBe(false);
  });
});

describe("ExecutionEngine sandbox mode", () => {
  it("never touches the live document", async () => {
    const workspace = new FakeWorkspace();
    const engine = new ExecutionEngine(workspace);
    const report = await engine.execute(orderedOps(), "sandbox", { planId: "plate_001" });

    expect(report.status).toBe("succeeded");
    expect(report.results.every((result) => result.status === "succeeded")).toBe(true);
    expect(workspace.document.entities).toEqual([]);
    expect(workspace.sandboxes[0]?.disposed).toBe(true);
  });

  it("skips the remaining operations after a failure and lets callers inspect the sandbox", async () => {
    const workspace = new FakeWorkspace().on("op2", { type: "fail", kind: "SketchLocked", message: "locked" });
    const seen: string[][] = [];
    const report = await new ExecutionEngine(workspace).execute(orderedOps(), "sandbox", {
      planId: "plate_001",
      inspect: (session) => {
        seen.push(session.document.entities.map((entity) => entity.id));
      },
    });

    expect(report.status).toBe("failed");
    expect(report.rollback).toBeNull();
    expect(report.results.map((result) => [result.opId, result.status])).toEqual([
      ["op1", "succeeded"],
      ["op2", "failed"],
      ["op3", "skipped"],
    ]);
    expect(seen).toEqual([["create_sketch_1"]]);
    expect(workspace.calls).toEqual(["op1", "op2"]);
    expect(workspace.document.entities).toEqual([]);
  });

  it("runs sandboxes concurrently without sharing state", async () => {
    const workspace = new FakeWorkspace();
    const engine = new ExecutionEngine(workspace);
    const [a, b] = await Promise.all([
      engine.execute(orderedOps(), "sandbox", { planId: "plate_001" }),
      engine.execute(orderedOps(), "sandbox", { planId: "plate_001" }),
    ]);
    expect(a.results.map((result) => result.entityId)).toEqual(b.results.map((result) => result.entityId));
    expect(a.runId).not.toBe(b.runId);
    expect(workspace.document.entities).toEqual([]);
  });
});
