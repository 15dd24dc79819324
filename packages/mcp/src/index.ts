import { readFile } from "node:fs/promises";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  DEFAULT_ENGINE_SETTINGS,
  FileActionLogStore,
  JsonLineSink,
  Logger,
  loadSettingsFile,
  settingsFromEnv,
} from "@cadpilot/agent";
import { createCadContext, type CadContext } from "./context.js";
import { createDesignDocument } from "./runtime/document.js";
import { registerCadTools } from "./tools.js";
import type { CadMcpConfig } from "./config.js";

export const MCP_SERVER_NAME = "cadpilot-mcp";
export const MCP_SERVER_VERSION = "0.1.0";

export interface CadMcpServerContext {
  server: McpServer;
  context: CadContext;
}

export interface CreateServerOptions {
  env?: NodeJS.ProcessEnv;
  /** Defaults to JSON lines on stderr. */
  logger?: Logger;
}

/** Settings file first, then CADPILOT_* variables on top. */
export async function loadCadContext(config: CadMcpConfig, options: CreateServerOptions = {}): Promise<CadContext> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? new Logger("cadpilot", { level: config.logLevel, sinks: [new JsonLineSink()] });
  const fileSettings = config.settingsPath ? await loadSettingsFile(config.settingsPath) : DEFAULT_ENGINE_SETTINGS;
  const settings = settingsFromEnv(env, fileSettings);
  const document = createDesignDocument();
  if (config.documentPath) {
    document.loadDocumentJson(await readFile(config.documentPath, "utf8"));
    document.drainEvents();
  }
  const store = config.logFile ? new FileActionLogStore(config.logFile, logger) : undefined;
  return createCadContext({ settings, logger, store, document });
}

export async function createCadMcpServer(config: CadMcpConfig, options: CreateServerOptions = {}): Promise<CadMcpServerContext> {
  const server = new McpServer({
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
  });
  const context = await loadCadContext(config, options);
  registerCadTools(server, context, {
    version: MCP_SERVER_VERSION,
    commit: (options.env ?? process.env).GITHUB_SHA?.slice(0, 7),
  });
  context.logger.info("server ready", { logFile: config.logFile, settings: config.settingsPath });
  return {
    server,
    context,
  };
}

export async function startCadMcpServer(config: CadMcpConfig): Promise<void> {
  const { server } = await createCadMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

export { createCadContext } from "./context.js";
export type { CadContext, CadContextOptions } from "./context.js";
export { createToolHandlers, outcomeResponse, registerCadTools } from "./tools.js";
export type { ToolHandler, ToolHandlerMap, ToolResponse, RegisterToolsOptions } from "./tools.js";
export { createDesignDocument, DOCUMENT_FORMAT, DOCUMENT_VERSION } from "./runtime/document.js";
export type { DesignDocumentRuntime, DocumentSandbox, DocumentSnapshot, RollbackStrategy } from "./runtime/document.js";
export { diffSnapshots } from "./runtime/diff.js";
export type { DocumentDiff, EntityChange } from "./runtime/diff.js";
export { RuntimeError, isRuntimeError, asRuntimeError } from "./runtime/errors.js";
export { ToolDefinitions } from "./schema.js";
export type { CadToolName } from "./schema.js";
