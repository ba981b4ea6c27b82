import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { SweepConfigSchema, type SweepConfig } from "./schema";

export const DEFAULT_CONFIG_PATH = "config/default.yaml";

function deepFreeze<T>(obj: T): T {
  Object.freeze(obj);
  if (obj !== null && typeof obj === "object") {
    const values: unknown[] = Object.values(obj);
    for (const val of values) {
      if (val !== null && typeof val === "object" && !Object.isFrozen(val)) {
        deepFreeze(val);
      }
    }
  }
  return obj;
}

const cached = new Map<string, SweepConfig>();

const HERE = path.dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = path.resolve(HERE, "..", "..", "..", "..");

// No fallback to the default file: a missing explicit path is an error.
function resolveConfigPath(preferred: string): string {
  const candidates = [
    preferred,
    path.resolve(process.cwd(), preferred),
    path.join(REPO_ROOT, preferred),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return path.resolve(candidate);
    }
  }

  throw new Error(
    `Unable to locate configuration file. Tried: ${candidates.join(", ")}`
  );
}

/** Parse + validate a YAML document. Throws a ZodError on schema violations. */
export function parseConfig(raw: string): SweepConfig {
  return SweepConfigSchema.parse(YAML.parse(raw));
}

export function loadConfig(configPath = DEFAULT_CONFIG_PATH): SweepConfig {
  const resolved = resolveConfigPath(configPath);
  const hit = cached.get(resolved);
  if (hit) return hit;

  const cfg = deepFreeze(parseConfig(fs.readFileSync(resolved, "utf-8")));
  cached.set(resolved, cfg);
  return cfg;
}

export function resetConfigCache(): void {
  cached.clear();
}
