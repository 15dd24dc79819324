import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { strFromU8, unzipSync } from "fflate";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { LOG_FIELDS, sha256HexFromString } from "@cadpilot/agent";
import { describe, expect, it } from "vitest";
import { createCadContext } from "../context.js";
import { ToolDefinitions } from "../schema.js";
import { createToolHandlers, registerCadTools } from "../tools.js";
import { holePlan, openProfilePlan, platePlan } from "./fixtures.js";

async function setup() {
  const context = await createCadContext();
  const handlers = createToolHandlers(context, { version: "0.1.0", commit: "abc1234" });
  return { context, handlers };
}

describe("mcp contract tools", () => {
  it("ping echoes the nonce and rejects bad input", async () => {
    const { handlers } = await setup();

    expect(await handlers["cad.ping"]({ nonce: "n1" })).toEqual({
      ok: true,
      version: "0.1.0",
      commit: "abc1234",
      schemaVersion: "1.2.0",
      nonce: "n1",
    });
    expect(await handlers["cad.ping"]({ nonce: 5 })).toEqual({
      ok: false,
      error: { code: "CAD_ERR_INVALID_INPUT", message: "Expected string, received number" },
    });
  });

  it("describes every operation kind and unit", async () => {
    const { handlers } = await setup();
    const capabilities = await handlers["cad.capabilities"]({});

    expect(capabilities.ok).toBe(true);
    const operations = capabilities.operations;
    if (!Array.isArray(operations)) throw new Error("operations missing");
    expect(operations).toHaveLength(32);
    expect(operations.find((item) => item.kind === "extrude")).toEqual({
      kind: "extrude",
      category: "feature",
      description: "Extrude a sketch profile by a distance.",
      required: ["distance"],
      optional: ["profile", "direction", "operation", "name"],
      requiresTarget: false,
      destructive: false,
      since: "1.0.0",
    });
    expect(capabilities.units).toMatchObject({ canonical: { length: "mm", angle: "rad" } });
    expect(capabilities.tools).toHaveLength(ToolDefinitions.length);
  });

  it("sanitizes plan text into millimetres", async () => {
    const { handlers } = await setup();
    const plan = JSON.stringify({
      plan_id: "inch_plate",
      metadata: { units: "in" },
      operations: [
        { op_id: "op1", op: "create_sketch", params: { plane: "XY", name: "s1" } },
        { op_id: "op2", op: "extrude", params: { profile: "s1", distance: 1 } },
      ],
    });

    const result = await handlers["cad.plan.sanitize"]({ plan });
    expect(result.ok).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.plan).toMatchObject({
      operations: [{ op_id: "op1" }, { op_id: "op2", params: { distance: { value: 25.4, unit: "mm", original_value: 1, original_unit: "in" } } }],
    });

    const broken = await handlers["cad.plan.sanitize"]({ plan: "{" });
    expect(broken).toEqual({ ok: false, error: { code: "CAD_ERR_INVALID_INPUT", message: "Plan is not valid JSON." } });
  });

  it("rejects a negative distance before anything runs", async () => {
    const { context, handlers } = await setup();
    const result = await handlers["cad.plan.apply"]({ plan: platePlan({ distance: { value: -5, unit: "mm" } }) });

    expect(result.ok).toBe(false);
    expect(result.error).toEqual({ code: "CAD_ERR_PLAN_REJECTED", message: "Plan rejected with 1 issue(s)." });
    expect(result.issues).toMatchObject([{ kind: "BoundsError", opId: "op3" }]);
    expect(context.log.entries()).toEqual([]);
    expect(context.document.snapshot().entityCount).toBe(0);
  });

  it("resolves the order and reports cycles", async () => {
    const { handlers } = await setup();

    expect(await handlers["cad.plan.resolve"]({ plan: platePlan() })).toEqual({
      ok: true,
      order: ["op1", "op2", "op3"],
      producers: { s1: "op1" },
      issues: [],
    });
    expect(await handlers["cad.plan.resolve"]({ plan: platePlan({ op3Dependencies: ["op3"] }) })).toEqual({
      ok: false,
      opId: "op3",
      members: ["op3"],
      issues: [],
      error: { code: "CycleDetected", message: "Dependency cycle: op3 -> op3" },
    });
  });

  it("previews in a sandbox and reports the diff", async () => {
    const { context, handlers } = await setup();
    const preview = await handlers["cad.plan.preview"]({ plan: platePlan() });

    expect(preview).toMatchObject({ ok: true, stage: "execute", mode: "sandbox", status: "succeeded", logged: 3 });
    expect(preview.diff).toMatchObject({ summary: { added: 3, removed: 0, changed: 0, solidsBefore: 0, solidsAfter: 1 } });
    expect(context.document.snapshot().entityCount).toBe(0);
    expect(context.log.entries().map((entry) => entry.mode)).toEqual(["sandbox", "sandbox", "sandbox"]);
  });

  it("applies with events and holds destructive plans for confirmation", async () => {
    const { context, handlers } = await setup();
    const plate = await handlers["cad.plan.apply"]({ plan: platePlan() });

    expect(plate.ok).toBe(true);
    expect(plate.documentId).toBe(context.document.snapshot().documentId);
    if (!Array.isArray(plate.events)) throw new Error("events missing");
    expect(plate.events.map((event) => event.type)).toEqual(["entity.created", "entity.created", "entity.created", "document.committed"]);

    const held = await handlers["cad.plan.apply"]({ plan: holePlan(), selection: { plate: "feature_3" } });
    expect(held.ok).toBe(false);
    expect(held.error).toEqual({ code: "CAD_ERR_CONFIRM_REQUIRED", message: "1 advisory issue(s) need confirm: true." });
    expect(held.advisories).toMatchObject([{ code: "DestructiveOperation", opId: "h1" }]);
    expect(context.document.snapshot().entityCount).toBe(3);

    const drilled = await handlers["cad.plan.apply"]({ plan: holePlan(), selection: { plate: "feature_3" }, confirm: true });
    expect(drilled).toMatchObject({ ok: true, status: "succeeded" });
    expect(context.document.snapshot().entityCount).toBe(4);
  });

  it("reports a failed apply with its rollback", async () => {
    const { context, handlers } = await setup();
    const result = await handlers["cad.plan.apply"]({ plan: openProfilePlan() });

    expect(result).toMatchObject({
      ok: false,
      status: "failed",
      logged: 3,
      rollback: { strategy: "native", status: "completed" },
      error: { code: "NoClosedProfile", message: "op3 (extrude): sketch s1 has no closed profile" },
    });
    expect(context.document.snapshot().entityCount).toBe(0);
    expect(context.log.entries().map((entry) => [entry.opId, entry.status])).toEqual([
      ["op1", "succeeded"],
      ["op2", "succeeded"],
      ["op3", "failed"],
    ]);
  });

  it("asks for user input when the plan says so", async () => {
    const { handlers } = await setup();
    const plan = {
      ...platePlan(),
      metadata: { units: "mm", requires_user_input: true, clarification_questions: ["Which face should the plate sit on?"] },
    };
    const result = await handlers["cad.plan.apply"]({ plan });

    expect(result).toMatchObject({
      ok: false,
      stage: "input-required",
      questions: ["Which face should the plate sit on?"],
      error: { code: "CAD_ERR_INPUT_REQUIRED" },
    });
  });

  it("lists, summarizes, exports and imports the action log", async () => {
    const { handlers } = await setup();
    await handlers["cad.plan.apply"]({ plan: platePlan() });

    const listed = await handlers["cad.log.list"]({ limit: 2 });
    expect(listed.total).toBe(3);
    if (!Array.isArray(listed.entries)) throw new Error("entries missing");
    expect(listed.entries.map((entry) => entry.opId)).toEqual(["op2", "op3"]);

    expect(await handlers["cad.log.stats"]({})).toMatchObject({ ok: true, total: 3, succeeded: 3, failed: 0, successRate: 1, runs: 1 });

    const csv = await handlers["cad.log.export"]({ format: "csv" });
    if (typeof csv.content !== "string") throw new Error("csv content missing");
    expect(csv.content.split("\r\n")[0]).toBe(LOG_FIELDS.join(","));

    const none = await handlers["cad.log.export"]({ format: "text", from: "2999-01-01T00:00:00Z" });
    expect(none).toMatchObject({ ok: true, entries: 0, content: "(empty action log)\n" });
    const bounded = await handlers["cad.log.export"]({ format: "json", from: "2000-01-01T00:00:00Z", to: "2999-01-01T00:00:00Z" });
    expect(bounded).toMatchObject({ ok: true, entries: 3 });
    expect(await handlers["cad.log.export"]({ format: "csv", to: "soon" })).toEqual({
      ok: false,
      error: { code: "LOG_INVALID_RANGE", message: 'Invalid to timestamp "soon".' },
    });

    const zip = await handlers["cad.log.export"]({ format: "zip" });
    if (typeof zip.base64 !== "string") throw new Error("zip payload missing");
    expect(Object.keys(unzipSync(new Uint8Array(Buffer.from(zip.base64, "base64")))).sort()).toEqual([
      "action-log.csv",
      "action-log.json",
      "action-log.txt",
    ]);

    const json = await handlers["cad.log.export"]({ format: "json" });
    if (typeof json.content !== "string") throw new Error("json content missing");
    const imported = await handlers["cad.log.import"]({ json: json.content });
    expect(imported).toMatchObject({ ok: true, count: 3, summary: { total: 3, succeeded: 3 } });

    expect(await handlers["cad.log.import"]({ json: "nope" })).toEqual({
      ok: false,
      error: { code: "LOG_INVALID_JSON", message: "Action log is not valid JSON." },
    });
  });

  it("writes an export to disk when given a path", async () => {
    const dir = await mkdtemp(join(tmpdir(), "cadpilot-export-"));
    try {
      const { handlers } = await setup();
      await handlers["cad.plan.apply"]({ plan: platePlan() });
      const outPath = join(dir, "nested", "log.zip");

      const result = await handlers["cad.log.export"]({ format: "zip", outPath });
      expect(result).toMatchObject({ ok: true, format: "zip", path: outPath });
      const files = unzipSync(new Uint8Array(await readFile(outPath)));
      const archived = files["action-log.json"];
      if (!archived) throw new Error("json member missing");
      expect(JSON.parse(strFromU8(archived))).toMatchObject({ format: "cadpilot.action-log" });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("replays the last run as a fresh plan and can apply it", async () => {
    const { context, handlers } = await setup();
    const first = await handlers["cad.plan.apply"]({ plan: platePlan() });
    if (typeof first.runId !== "string") throw new Error("runId missing");

    const preview = await handlers["cad.log.replay"]({});
    expect(preview).toMatchObject({
      ok: true,
      applied: false,
      plan: {
        plan_id: `replay_${sha256HexFromString(first.runId).slice(0, 12)}`,
        metadata: { replay_of: { plan_id: "plate_001", run_id: first.runId } },
      },
    });

    const applied = await handlers["cad.log.replay"]({ apply: true });
    expect(applied).toMatchObject({ ok: true, applied: true, status: "succeeded" });
    expect(context.document.snapshot().entities.map((entity) => entity.id)).toEqual([
      "sketch_1",
      "curve_2",
      "feature_3",
      "sketch_4",
      "curve_5",
      "feature_6",
    ]);

    expect(await handlers["cad.log.replay"]({ runId: "run_missing" })).toEqual({
      ok: false,
      error: { code: "LOG_UNKNOWN_RUN", message: "No entries for run run_missing." },
    });
  });

  it("moves a document between sessions as JSON", async () => {
    const source = await setup();
    await source.handlers["cad.plan.apply"]({ plan: platePlan() });
    const exported = await source.handlers["cad.document.export"]({});
    if (typeof exported.json !== "string") throw new Error("document json missing");

    const target = await setup();
    const loaded = await target.handlers["cad.document.load"]({ json: exported.json });
    expect(loaded).toEqual({ ok: true, documentId: source.context.document.snapshot().documentId, entityCount: 3 });
    expect(await target.handlers["cad.document.snapshot"]({})).toMatchObject({ ok: true, entityCount: 3, solidCount: 1 });

    expect(await target.handlers["cad.document.load"]({ json: "[]" })).toMatchObject({
      ok: false,
      error: { code: "CAD_ERR_INVALID_DOCUMENT" },
    });
  });

  it("serves every tool over an in-process MCP connection", async () => {
    const context = await createCadContext();
    const server = new McpServer({ name: "cadpilot-mcp", version: "0.1.0" });
    registerCadTools(server, context, { version: "0.1.0" });
    const client = new Client({ name: "contract-test", version: "0.1.0" });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);

    try {
      const listed = await client.listTools();
      expect(listed.tools.map((tool) => tool.name).sort()).toEqual(ToolDefinitions.map((tool) => tool.name).sort());

      const ping = await client.callTool({ name: "cad.ping", arguments: { nonce: "n2" } });
      expect(ping.isError).toBe(false);
      expect(ping.structuredContent).toMatchObject({ ok: true, nonce: "n2", commit: null });

      const apply = await client.callTool({ name: "cad.plan.apply", arguments: { plan: JSON.stringify(openProfilePlan()) } });
      expect(apply.isError).toBe(true);
      expect(apply.structuredContent).toMatchObject({ ok: false, error: { code: "NoClosedProfile" } });
    } finally {
      await client.close();
      await server.close();
    }
  });
});
