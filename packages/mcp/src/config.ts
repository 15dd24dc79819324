import { resolve } from "node:path";
import { isLogLevel, type LogLevel } from "@cadpilot/agent";

export interface CadMcpConfig {
  transport: "stdio";
  settingsPath: string | null;
  /** null keeps the action log in memory for the session. */
  logFile: string | null;
  documentPath: string | null;
  logLevel: LogLevel;
}

export interface ParsedCliConfig {
  config: CadMcpConfig;
  error?: string;
}

export const DEFAULT_MCP_CONFIG: CadMcpConfig = {
  transport: "stdio",
  settingsPath: null,
  logFile: resolve(process.cwd(), ".cadpilot/action-log.jsonl"),
  documentPath: null,
  logLevel: "info",
};

export function parseCliConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedCliConfig {
  const config: CadMcpConfig = {
    ...DEFAULT_MCP_CONFIG,
  };

  if (env.CADPILOT_SETTINGS) config.settingsPath = resolve(env.CADPILOT_SETTINGS);
  if (env.CADPILOT_DOCUMENT) config.documentPath = resolve(env.CADPILOT_DOCUMENT);
  if (env.CADPILOT_LOG_FILE !== undefined) {
    config.logFile = env.CADPILOT_LOG_FILE === "" || env.CADPILOT_LOG_FILE === "memory" ? null : resolve(env.CADPILOT_LOG_FILE);
  }
  if (env.CADPILOT_LOG_LEVEL) {
    if (!isLogLevel(env.CADPILOT_LOG_LEVEL)) {
      return {
        config,
        error: `Invalid CADPILOT_LOG_LEVEL value "${env.CADPILOT_LOG_LEVEL}".`,
      };
    }
    config.logLevel = env.CADPILOT_LOG_LEVEL;
  }

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--") {
      continue;
    }
    if (arg === "--stdio") {
      config.transport = "stdio";
      continue;
    }
    if (arg === "--settings" || arg === "--log-file" || arg === "--document" || arg === "--log-level") {
      const value = argv[index + 1];
      if (!value) {
        return {
          config,
          error: `${arg} requires a value.`,
        };
      }
      index += 1;
      if (arg === "--settings") {
        config.settingsPath = resolve(value);
      } else if (arg === "--document") {
        config.documentPath = resolve(value);
      } else if (arg === "--log-file") {
        config.logFile = value === "memory" ? null : resolve(value);
      } else if (isLogLevel(value)) {
        config.logLevel = value;
      } else {
        return {
          config,
          error: `Invalid --log-level value "${value}".`,
        };
      }
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      return {
        config,
        error: "help",
      };
    }
    return {
      config,
      error: `Unknown flag "${arg}".`,
    };
  }

  return { config };
}

export function renderHelpText() {
  return [
    "cadpilot-mcp",
    "",
    "Usage:",
    "  cadpilot-mcp --stdio",
    "  cadpilot-mcp --settings engine.json --log-file .cadpilot/action-log.jsonl",
    "",
    "Flags:",
    "  --stdio               Run MCP over stdio (default).",
    "  --settings <path>     Engine settings JSON file.",
    "  --log-file <path>     Action log file (default: .cadpilot/action-log.jsonl; \"memory\" keeps it in memory).",
    "  --document <path>     Document JSON to load at startup.",
    "  --log-level <level>   debug, info, warn or error (default: info).",
    "  -h, --help            Show help.",
  ].join("\n");
}
