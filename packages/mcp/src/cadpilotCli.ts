#!/usr/bin/env node
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import {
  DEFAULT_ENGINE_SETTINGS,
  FileActionLogStore,
  JsonLineSink,
  Logger,
  loadSettingsFile,
  settingsFromEnv,
  stableJsonStringify,
  type ActionLogStore,
} from "@cadpilot/agent";
import { createCadContext } from "./context.js";
import { MCP_SERVER_VERSION } from "./index.js";
import { createToolHandlers, type ToolHandlerMap, type ToolResponse } from "./tools.js";

interface CliIo {
  writeStdout: (line: string) => void;
  writeStderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
}

const defaultIo: CliIo = {
  writeStdout: (line) => process.stdout.write(`${line}\n`),
  writeStderr: (line) => process.stderr.write(`${line}\n`),
  env: process.env,
};

/** Codes that mean "ask the user", not "something broke". */
const NEEDS_USER_CODES = new Set(["CAD_ERR_CONFIRM_REQUIRED", "CAD_ERR_INPUT_REQUIRED"]);

function renderHelpText(): string {
  return [
    "cadpilot",
    "",
    "Usage:",
    "  cadpilot run --plan plan.json [--apply --confirm] [--select name=id] [--log log.jsonl]",
    "  cadpilot export --log log.jsonl --format json|csv|text|zip --out ./action-log.csv [--from <time> --to <time>]",
    "  cadpilot replay --log log.jsonl [--run <runId>] --out ./replay.json",
    "",
    "Command: run",
    "  --plan <path>            Plan JSON file",
    "  --apply                  Apply to the document (default: sandbox preview)",
    "  --confirm                Accept advisory issues",
    "  --select <name=id>       Map a plan name to an existing entity id (repeatable)",
    "  --log <path>             Action log file (default: in memory)",
    "  --document <path>        Document JSON to start from",
    "  --save-document <path>   Write the document after an apply run",
    "  --settings <path>        Engine settings JSON file",
    "",
    "Command: export",
    "  --log <path>             Action log file",
    "  --format <format>        json, csv, text or zip",
    "  --out <path>             Output file",
    "  --from <time>            Only entries at or after this ISO-8601 time",
    "  --to <time>              Only entries at or before this ISO-8601 time",
    "",
    "Command: replay",
    "  --log <path>             Action log file",
    "  --run <runId>            Run to replay (default: the most recent)",
    "  --out <path>             Output plan file",
    "",
    "  -h, --help               Show help",
  ].join("\n");
}

interface RunArgs {
  command: "run";
  planPath: string;
  apply: boolean;
  confirm: boolean;
  selection: Record<string, string>;
  logPath?: string;
  documentPath?: string;
  saveDocumentPath?: string;
  settingsPath?: string;
}

interface ExportArgs {
  command: "export";
  logPath: string;
  format: "json" | "csv" | "text" | "zip";
  outPath: string;
  from?: string;
  to?: string;
}

interface ReplayArgs {
  command: "replay";
  logPath: string;
  runId?: string;
  outPath: string;
}

type CliArgs = RunArgs | ExportArgs | ReplayArgs;

const EXPORT_FORMATS: ReadonlyArray<ExportArgs["format"]> = ["json", "csv", "text", "zip"];

function isExportFormat(value: string): value is ExportArgs["format"] {
  return EXPORT_FORMATS.some((format) => format === value);
}

function parseSelection(value: string, selection: Record<string, string>): void {
  const separator = value.indexOf("=");
  if (separator <= 0 || separator === value.length - 1) {
    throw new Error(`Invalid --select value "${value}". Expected name=id`);
  }
  selection[value.slice(0, separator)] = value.slice(separator + 1);
}

function parseArgs(command: string, argv: string[]): CliArgs {
  const values = new Map<string, string>();
  const selection: Record<string, string> = {};
  let apply = false;
  let confirm = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--apply") {
      apply = true;
      continue;
    }
    if (arg === "--confirm") {
      confirm = true;
      continue;
    }
    if (
      arg === "--plan" ||
      arg === "--select" ||
      arg === "--log" ||
      arg === "--document" ||
      arg === "--save-document" ||
      arg === "--settings" ||
      arg === "--format" ||
      arg === "--out" ||
      arg === "--run" ||
      arg === "--from" ||
      arg === "--to"
    ) {
      const value = argv[i + 1];
      if (!value) throw new Error(`${arg} requires a value.`);
      if (arg === "--select") {
        parseSelection(value, selection);
      } else {
        values.set(arg, value);
      }
      i += 1;
      continue;
    }
    throw new Error(`Unknown flag "${arg}".`);
  }

  const path = (flag: string) => {
    const value = values.get(flag);
    return value === undefined ? undefined : resolve(value);
  };
  const requiredPath = (flag: string) => {
    const value = path(flag);
    if (!value) throw new Error(`${flag} is required.`);
    return value;
  };

  if (command === "run") {
    return {
      command: "run",
      planPath: requiredPath("--plan"),
      apply,
      confirm,
      selection,
      logPath: path("--log"),
      documentPath: path("--document"),
      saveDocumentPath: path("--save-document"),
      settingsPath: path("--settings"),
    };
  }
  if (command === "export") {
    const format = values.get("--format");
    if (!format || !isExportFormat(format)) {
      throw new Error(`--format must be one of ${EXPORT_FORMATS.join(", ")}.`);
    }
    return {
      command: "export",
      logPath: requiredPath("--log"),
      format,
      outPath: requiredPath("--out"),
      from: values.get("--from"),
      to: values.get("--to"),
    };
  }
  return { command: "replay", logPath: requiredPath("--log"), runId: values.get("--run"), outPath: requiredPath("--out") };
}

async function createHandlers(io: CliIo, logPath: string | undefined, settingsPath?: string): Promise<ToolHandlerMap> {
  const logger = new Logger("cadpilot", { level: "warn", sinks: [new JsonLineSink((line) => io.writeStderr(line.trimEnd()))] });
  const fileSettings = settingsPath ? await loadSettingsFile(settingsPath) : DEFAULT_ENGINE_SETTINGS;
  const settings = settingsFromEnv(io.env, fileSettings);
  const store: ActionLogStore | undefined = logPath ? new FileActionLogStore(logPath, logger) : undefined;
  const context = await createCadContext({ settings, logger, store });
  return createToolHandlers(context, {
    version: MCP_SERVER_VERSION,
    commit: io.env.GITHUB_SHA?.slice(0, 7),
  });
}

function exitCodeFor(response: ToolResponse): number {
  if (response.ok) return 0;
  const { error } = response;
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string" && NEEDS_USER_CODES.has(error.code)) {
    return 2;
  }
  return 1;
}

function reportFailure(io: CliIo, response: ToolResponse): void {
  const { error } = response;
  if (typeof error === "object" && error !== null && "code" in error && "message" in error) {
    io.writeStderr(`${String(error.code)}: ${String(error.message)}`);
  }
}

async function runCommand(args: RunArgs, io: CliIo): Promise<ToolResponse> {
  const handlers = await createHandlers(io, args.logPath, args.settingsPath);
  if (args.documentPath) {
    const loaded = await handlers["cad.document.load"]({ json: await readFile(args.documentPath, "utf8") });
    if (!loaded.ok) return loaded;
  }
  const plan = await readFile(args.planPath, "utf8");
  const selection = Object.keys(args.selection).length > 0 ? args.selection : undefined;
  const response = args.apply
    ? await handlers["cad.plan.apply"]({ plan, selection, confirm: args.confirm })
    : await handlers["cad.plan.preview"]({ plan, selection });

  if (args.apply && response.ok && args.saveDocumentPath) {
    const exported = await handlers["cad.document.export"]({});
    if (typeof exported.json === "string") {
      await mkdir(dirname(args.saveDocumentPath), { recursive: true });
      await writeFile(args.saveDocumentPath, exported.json, "utf8");
      return { ...response, documentPath: args.saveDocumentPath };
    }
  }
  return response;
}

async function replayCommand(args: ReplayArgs, io: CliIo): Promise<ToolResponse> {
  const handlers = await createHandlers(io, args.logPath);
  const response = await handlers["cad.log.replay"]({ runId: args.runId });
  if (!response.ok) return response;
  await mkdir(dirname(args.outPath), { recursive: true });
  await writeFile(args.outPath, `${stableJsonStringify(response.plan)}\n`, "utf8");
  return { ok: true, path: args.outPath, plan: response.plan };
}

export async function runCadpilotCli(argv: string[], io: CliIo = defaultIo): Promise<number> {
  if (argv.length === 0 || argv.includes("--help") || argv.includes("-h")) {
    io.writeStdout(renderHelpText());
    return 0;
  }

  const command = argv[0];
  if (command !== "run" && command !== "export" && command !== "replay") {
    io.writeStderr(`Unknown command "${command}".`);
    io.writeStdout(renderHelpText());
    return 1;
  }

  let parsed: CliArgs;
  try {
    parsed = parseArgs(command, argv.slice(1));
  } catch (error) {
    io.writeStderr(error instanceof Error ? error.message : String(error));
    io.writeStdout(renderHelpText());
    return 1;
  }

  let response: ToolResponse;
  try {
    if (parsed.command === "run") {
      response = await runCommand(parsed, io);
    } else if (parsed.command === "export") {
      const handlers = await createHandlers(io, parsed.logPath);
      response = await handlers["cad.log.export"]({ format: parsed.format, outPath: parsed.outPath, from: parsed.from, to: parsed.to });
    } else {
      response = await replayCommand(parsed, io);
    }
  } catch (error) {
    io.writeStderr(`cadpilot failed: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  io.writeStdout(stableJsonStringify(response));
  if (!response.ok) {
    reportFailure(io, response);
  }
  return exitCodeFor(response);
}

async function main() {
  const exitCode = await runCadpilotCli(process.argv.slice(2), defaultIo);
  process.exitCode = exitCode;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
