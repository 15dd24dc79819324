import { ActionLogError, SettingsError, isPlanError } from "@cadpilot/agent";

export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "RuntimeError";
    this.code = code;
  }
}

export function isRuntimeError(error: unknown): error is RuntimeError {
  return error instanceof RuntimeError;
}

/** Keeps the code of any error that carries one; everything else gets the fallback code. */
export function asRuntimeError(error: unknown, fallbackCode: string, fallbackMessage: string): RuntimeError {
  if (isRuntimeError(error)) {
    return error;
  }
  if (isPlanError(error) || error instanceof ActionLogError) {
    return new RuntimeError(error.code, error.message);
  }
  if (error instanceof SettingsError) {
    return new RuntimeError("CAD_ERR_SETTINGS", error.message);
  }
  if (error instanceof Error) {
    return new RuntimeError(fallbackCode, error.message);
  }
  return new RuntimeError(fallbackCode, fallbackMessage);
}
