import { readFile } from "node:fs/promises";
import { z } from "zod";

export type BoundsMode = "reject" | "advisory";
export type AngleMode = "strict" | "wrap";
export type LockPolicy = "queue" | "reject";

export interface ManufacturingLimits {
  minToolDiameter: number;
  maxCutDepth: number;
  minWallThickness: number;
  maxFilletRadius: number;
  maxPatternCount: number;
}

export interface EngineSettings {
  maxOperationsPerPlan: number;
  /** Largest length accepted, in millimetres. */
  maxFeatureSize: number;
  angleMode: AngleMode;
  bounds: {
    mode: BoundsMode;
    clamp: boolean;
  };
  /** Promote every advisory issue to fatal. */
  strict: boolean;
  maxPromptLength: number;
  maxExecutionSeconds: number;
  manufacturing: ManufacturingLimits;
  /** 0 disables the per-operation timeout. */
  operationTimeoutMs: number;
  lockPolicy: LockPolicy;
  requireConfirmForAdvisories: boolean;
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  maxOperationsPerPlan: 50,
  maxFeatureSize: 1000,
  angleMode: "strict",
  bounds: {
    mode: "reject",
    clamp: false,
  },
  strict: false,
  maxPromptLength: 2000,
  maxExecutionSeconds: 300,
  manufacturing: {
    minToolDiameter: 0.5,
    maxCutDepth: 100,
    minWallThickness: 0.8,
    maxFilletRadius: 50,
    maxPatternCount: 100,
  },
  operationTimeoutMs: 30_000,
  lockPolicy: "queue",
  requireConfirmForAdvisories: true,
};

const positive = z.number().finite().positive();

export const EngineSettingsFileSchema = z
  .object({
    maxOperationsPerPlan: z.number().int().positive(),
    maxFeatureSize: positive,
    angleMode: z.enum(["strict", "wrap"]),
    bounds: z
      .object({
        mode: z.enum(["reject", "advisory"]),
        clamp: z.boolean(),
      })
      .partial()
      .strict(),
    strict: z.boolean(),
    maxPromptLength: z.number().int().positive(),
    maxExecutionSeconds: positive,
    manufacturing: z
      .object({
        minToolDiameter: positive,
        maxCutDepth: positive,
        minWallThickness: positive,
        maxFilletRadius: positive,
        maxPatternCount: z.number().int().positive(),
      })
      .partial()
      .strict(),
    operationTimeoutMs: z.number().int().nonnegative(),
    lockPolicy: z.enum(["queue", "reject"]),
    requireConfirmForAdvisories: z.boolean(),
  })
  .partial()
  .strict();

export type EngineSettingsOverrides = z.infer<typeof EngineSettingsFileSchema>;

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}

export function mergeSettings(base: EngineSettings, overrides: EngineSettingsOverrides): EngineSettings {
  return {
    ...base,
    ...overrides,
    bounds: { ...base.bounds, ...overrides.bounds },
    manufacturing: { ...base.manufacturing, ...overrides.manufacturing },
  };
}

export function parseSettings(input: unknown, base: EngineSettings = DEFAULT_ENGINE_SETTINGS): EngineSettings {
  const parsed = EngineSettingsFileSchema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? `${first.path.join(".")}: ` : "";
    throw new SettingsError(`Invalid settings: ${where}${first?.message ?? "unknown issue"}`);
  }
  return mergeSettings(base, parsed.data);
}

export async function loadSettingsFile(path: string, base: EngineSettings = DEFAULT_ENGINE_SETTINGS): Promise<EngineSettings> {
  const text = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new SettingsError(`Settings file ${path} is not valid JSON: ${detail}`);
  }
  return parseSettings(raw, base);
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value === "") return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new SettingsError(`${name} must be a number, got "${value}".`);
  }
  return parsed;
}

function readFlag(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = env[name];
  if (value === undefined || value === "") return undefined;
  return value === "1" || value.toLowerCase() === "true";
}

/** CADPILOT_* variables win over the settings file. */
export function settingsFromEnv(env: NodeJS.ProcessEnv, base: EngineSettings = DEFAULT_ENGINE_SETTINGS): EngineSettings {
  const overrides: Record<string, unknown> = {};
  const bounds: Record<string, unknown> = {};

  const maxOperations = readNumber(env, "CADPILOT_MAX_OPERATIONS");
  if (maxOperations !== undefined) overrides.maxOperationsPerPlan = maxOperations;
  const maxFeatureSize = readNumber(env, "CADPILOT_MAX_FEATURE_SIZE");
  if (maxFeatureSize !== undefined) overrides.maxFeatureSize = maxFeatureSize;
  const timeout = readNumber(env, "CADPILOT_OPERATION_TIMEOUT_MS");
  if (timeout !== undefined) overrides.operationTimeoutMs = timeout;
  const promptLength = readNumber(env, "CADPILOT_MAX_PROMPT_LENGTH");
  if (promptLength !== undefined) overrides.maxPromptLength = promptLength;
  const strict = readFlag(env, "CADPILOT_STRICT");
  if (strict !== undefined) overrides.strict = strict;
  if (env.CADPILOT_ANGLE_MODE) overrides.angleMode = env.CADPILOT_ANGLE_MODE;
  if (env.CADPILOT_LOCK_POLICY) overrides.lockPolicy = env.CADPILOT_LOCK_POLICY;
  if (env.CADPILOT_BOUNDS_MODE) bounds.mode = env.CADPILOT_BOUNDS_MODE;
  const clamp = readFlag(env, "CADPILOT_BOUNDS_CLAMP");
  if (clamp !== undefined) bounds.clamp = clamp;
  if (Object.keys(bounds).length > 0) overrides.bounds = bounds;

  return parseSettings(overrides, base);
}
