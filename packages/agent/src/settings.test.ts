import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_SETTINGS, SettingsError, loadSettingsFile, mergeSettings, parseSettings, settingsFromEnv } from "./settings.js";

describe("settings", () => {
  it("merges nested groups without losing defaults", () => {
    const merged = mergeSettings(DEFAULT_ENGINE_SETTINGS, { bounds: { mode: "advisory" }, manufacturing: { maxCutDepth: 40 } });
    expect(merged.bounds).toEqual({ mode: "advisory", clamp: false });
    expect(merged.manufacturing).toEqual({ ...DEFAULT_ENGINE_SETTINGS.manufacturing, maxCutDepth: 40 });
    expect(DEFAULT_ENGINE_SETTINGS.bounds.mode).toBe("reject");
  });

  it("rejects unknown keys and invalid values", () => {
    expect(() => parseSettings({ maxOperations: 5 })).toThrow(SettingsError);
    expect(() => parseSettings({ maxOperations: 5 })).toThrow("Invalid settings: Unrecognized key(s) in object: 'maxOperations'");
    expect(() => parseSettings({ operationTimeoutMs: -1 })).toThrow(/^Invalid settings: operationTimeoutMs: /);
  });

  it("reads CADPILOT variables", () => {
    const settings = settingsFromEnv({
      CADPILOT_MAX_OPERATIONS: "10",
      CADPILOT_STRICT: "true",
      CADPILOT_BOUNDS_CLAMP: "1",
      CADPILOT_LOCK_POLICY: "reject",
      CADPILOT_ANGLE_MODE: "wrap",
    });
    expect(settings.maxOperationsPerPlan).toBe(10);
    expect(settings.strict).toBe(true);
    expect(settings.bounds).toEqual({ mode: "reject", clamp: true });
    expect(settings.lockPolicy).toBe("reject");
    expect(settings.angleMode).toBe("wrap");
    expect(settingsFromEnv({})).toEqual(DEFAULT_ENGINE_SETTINGS);
  });

  it("rejects malformed variables", () => {
    expect(() => settingsFromEnv({ CADPILOT_MAX_OPERATIONS: "ten" })).toThrow('CADPILOT_MAX_OPERATIONS must be a number, got "ten".');
    expect(() => settingsFromEnv({ CADPILOT_ANGLE_MODE: "spin" })).toThrow(SettingsError);
  });

  it("loads a settings file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "cadpilot-settings-"));
    try {
      const good = join(dir, "settings.json");
      await writeFile(good, JSON.stringify({ maxFeatureSize: 250, requireConfirmForAdvisories: false }), "utf8");
      const settings = await loadSettingsFile(good);
      expect(settings.maxFeatureSize).toBe(250);
      expect(settings.requireConfirmForAdvisories).toBe(false);

      const bad = join(dir, "broken.json");
      await writeFile(bad, "{", "utf8");
      await expect(loadSettingsFile(bad)).rejects.toThrow(`Settings file ${bad} is not valid JSON:`);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
