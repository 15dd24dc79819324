import {
  ActionLog,
  DEFAULT_ENGINE_SETTINGS,
  ExecutionEngine,
  silentLogger,
  type ActionLogStore,
  type EngineSettings,
  type Logger,
} from "@cadpilot/agent";
import { createDesignDocument, type DesignDocumentRuntime, type DocumentSandbox } from "./runtime/document.js";

/** Everything a tool call or CLI command works against. */
export interface CadContext {
  document: DesignDocumentRuntime;
  engine: ExecutionEngine<DocumentSandbox>;
  log: ActionLog;
  settings: EngineSettings;
  logger: Logger;
}

export interface CadContextOptions {
  settings?: EngineSettings;
  logger?: Logger;
  /** Without a store the log lives in memory for the session. */
  store?: ActionLogStore;
  document?: DesignDocumentRuntime;
}

export async function createCadContext(options: CadContextOptions = {}): Promise<CadContext> {
  const settings = options.settings ?? DEFAULT_ENGINE_SETTINGS;
  const logger = options.logger ?? silentLogger();
  const document = options.document ?? createDesignDocument();
  const log = options.store ? await ActionLog.open(options.store, logger) : new ActionLog({ logger });
  const engine = new ExecutionEngine(document, {
    operationTimeoutMs: settings.operationTimeoutMs,
    lockPolicy: settings.lockPolicy,
    logger,
  });
  return { document, engine, log, settings, logger };
}
