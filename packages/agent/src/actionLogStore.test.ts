import { appendFile, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { basePlan } from "./__tests__/fakeWorkspace.js";
import { ActionLog, ActionLogError, type LogEntry } from "./actionLog.js";
import { FileActionLogStore } from "./actionLogStore.js";
import { InMemorySink, Logger } from "./logger.js";
import { sanitizePlan } from "./sanitize.js";

async function sampleEntries(): Promise<LogEntry[]> {
  const sanitized = sanitizePlan(basePlan());
  if (!sanitized.ok) throw new Error("fixture plan must sanitize");
  const plan = sanitized.plan;
  const log = new ActionLog();
  for (const [index, op] of plan.operations.entries()) {
    await log.append(
      plan,
      op,
      { opId: op.op_id, kind: op.op, status: "succeeded", entityId: `e${index + 1}`, timestamp: "2026-01-01T00:00:00.000Z", durationMs: 0 },
      "run_a",
      "apply",
    );
  }
  return [...log.entries()];
}

describe("FileActionLogStore", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cadpilot-log-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads nothing when the file does not exist yet", async () => {
    const store = new FileActionLogStore(join(dir, "missing.jsonl"));
    await expect(store.load()).resolves.toEqual([]);
  });

  it("writes one line per entry and reads them back", async () => {
    const path = join(dir, "nested", "actions.jsonl");
    const store = new FileActionLogStore(path);
    const entries = await sampleEntries();
    for (const entry of entries) await store.append(entry);

    const text = await readFile(path, "utf8");
    expect(text.split("\n")).toHaveLength(4);
    await expect(store.load()).resolves.toEqual(entries);
  });

  it("continues numbering from the stored entries", async () => {
    const path = join(dir, "actions.jsonl");
    const store = new FileActionLogStore(path);
    for (const entry of await sampleEntries()) await store.append(entry);
    const log = await ActionLog.open(store);
    expect(log.lastSeq).toBe(3);
  });

  it("drops a torn final line with a warning", async () => {
    const path = join(dir, "actions.jsonl");
    const sink = new InMemorySink();
    const store = new FileActionLogStore(path, new Logger("test", { sinks: [sink] }));
    const entries = await sampleEntries();
    for (const entry of entries.slice(0, 2)) await store.append(entry);
    await appendFile(path, '{"seq":3,"timest', "utf8");

    await expect(store.load()).resolves.toEqual(entries.slice(0, 2));
    expect(sink.read().map((event) => [event.level, event.namespace, event.message])).toEqual([
      ["warn", "test.log-store", "dropped torn final line"],
    ]);
  });

  it("refuses a damaged line in the middle of the file", async () => {
    const path = join(dir, "actions.jsonl");
    const [first] = await sampleEntries();
    await writeFile(path, `not json\n${JSON.stringify(first)}\n`, "utf8");
    const error = await new FileActionLogStore(path).load().then(
      () => null,
      (reason: unknown) => reason,
    );
    expect(error).toBeInstanceOf(ActionLogError);
    expect(error instanceof ActionLogError && error.code).toBe("LOG_CORRUPT");
  });
});
