import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import YAML from "yaml";
import { z } from "zod";
import { ConfigurationError } from "@tubecompare/tube-core";
import { AppConfigSchema, type AppConfig } from "./schema";

function deepFreeze<T extends object>(obj: T): T {
  Object.freeze(obj);
  for (const val of Object.values(obj)) {
    if (val && typeof val === "object" && !Object.isFrozen(val)) {
      deepFreeze(val);
    }
  }
  return obj;
}

let cached: { path: string; config: AppConfig } | null = null;

const HERE = path.dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = path.resolve(HERE, "..", "..", "..", "..");
const DEFAULT_CONFIG = "config/default.yaml";

function resolveConfigPath(preferred: string): string | null {
  const candidates = [
    path.resolve(process.cwd(), preferred),
    path.join(REPO_ROOT, preferred),
  ];
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? null;
}

export function parseConfig(raw: unknown, source: string): AppConfig {
  try {
    return deepFreeze(AppConfigSchema.parse(raw ?? {}));
  } catch (err) {
    if (err instanceof z.ZodError) {
      const issues = err.issues.map((issue) => `  ${issue.path.join(".")}: ${issue.message}`);
      throw new ConfigurationError(`Invalid configuration in ${source}:\n${issues.join("\n")}`);
    }
    throw err;
  }
}

/**
 * Loads, validates and freezes the YAML configuration. An explicit path must
 * exist; without one the default file is used when present, otherwise the
 * schema defaults.
 */
export function loadConfig(configPath?: string): AppConfig {
  const resolved = resolveConfigPath(configPath ?? DEFAULT_CONFIG);
  if (resolved === null) {
    if (configPath) {
      throw new ConfigurationError(`Unable to locate configuration file: ${configPath}`);
    }
    return parseConfig({}, "defaults");
  }
  if (cached && cached.path === resolved) return cached.config;

  const raw = fs.readFileSync(resolved, "utf-8");
  const config = parseConfig(YAML.parse(raw), resolved);
  cached = { path: resolved, config };
  return config;
}

export function resetConfigCache() {
  cached = null;
}
