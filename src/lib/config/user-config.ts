import * as fs from "node:fs";
import * as path from "node:path";
import { CONFIG, PATHS } from "../../config";

export type OutputFormat = "text" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json"];

export interface UserConfig {
  /** Capacity used by `replay` and `bench` when no --capacity is given */
  defaultCapacity?: number;
  output?: OutputFormat;
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === "text" || value === "json";
}

export function isValidCapacity(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1;
}

/**
 * Keep only the fields that have the right shape; anything else in the file
 * is ignored rather than trusted.
 */
function sanitize(raw: unknown): UserConfig {
  if (typeof raw !== "object" || raw === null) return {};
  const config: UserConfig = {};
  if ("defaultCapacity" in raw && isValidCapacity(raw.defaultCapacity)) {
    config.defaultCapacity = raw.defaultCapacity;
  }
  if ("output" in raw && isOutputFormat(raw.output)) {
    config.output = raw.output;
  }
  return config;
}

function ensureConfigDir(): void {
  const dir = path.dirname(PATHS.userConfig);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Load user configuration from ~/.lrustore/config.json
 */
export function loadUserConfig(): UserConfig {
  if (!fs.existsSync(PATHS.userConfig)) return {};
  try {
    const content = fs.readFileSync(PATHS.userConfig, "utf-8");
    return sanitize(JSON.parse(content));
  } catch {
    return {};
  }
}

export function saveUserConfig(config: UserConfig): void {
  ensureConfigDir();
  const content = JSON.stringify(sanitize(config), null, 2);
  fs.writeFileSync(PATHS.userConfig, content, "utf-8");
}

/**
 * Merge `updates` into the stored configuration. A key present with an
 * `undefined` value clears that setting.
 */
export function updateUserConfig(updates: Partial<UserConfig>): UserConfig {
  const current = loadUserConfig();
  const updated: UserConfig = {
    defaultCapacity:
      "defaultCapacity" in updates
        ? updates.defaultCapacity
        : current.defaultCapacity,
    output: "output" in updates ? updates.output : current.output,
  };
  saveUserConfig(updated);
  return sanitize(updated);
}

export function resetUserConfig(): void {
  if (fs.existsSync(PATHS.userConfig)) {
    fs.rmSync(PATHS.userConfig);
  }
}

/**
 * Capacity to use when the caller gives none: user config first, then the
 * LRUSTORE_DEFAULT_CAPACITY environment variable, then the built-in default.
 */
export function resolveDefaultCapacity(config = loadUserConfig()): number {
  return config.defaultCapacity ?? CONFIG.DEFAULT_CAPACITY;
}

export function resolveOutputFormat(config = loadUserConfig()): OutputFormat {
  return config.output ?? "text";
}

export function getConfigFilePath(): string {
  return PATHS.userConfig;
}
