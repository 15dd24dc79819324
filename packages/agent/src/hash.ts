import { createHash } from "node:crypto";

function toStableJsonValue(input: unknown): unknown {
  if (input === null || typeof input !== "object") return input;
  if (Array.isArray(input)) {
    return input.map((item) => toStableJsonValue(item));
  }
  const entries = Object.entries(input).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const out: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    out[key] = toStableJsonValue(value);
  }
  return out;
}

export function stableJsonStringify(input: unknown, indent = 2): string {
  return JSON.stringify(toStableJsonValue(input), null, indent);
}

export function sha256HexFromString(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}
