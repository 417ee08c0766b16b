// config.ts: Runtime configuration for the utterd server
// Config file: $UTTERD_CONFIG, default /tmp/utterd-config.json
// Keys and defaults define the contract; callers should use isValidConfigKey() before setConfigValue().

import { readFile, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { z } from "zod";
import { getSocketPath } from "./client.js";
import { logger } from "./logger.js";

export function getConfigPath(): string {
  return process.env.UTTERD_CONFIG ?? "/tmp/utterd-config.json";
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const configSchema = z.object({
  "socket-path": z.string().min(1),
  // octal file mode for the socket; "" leaves the process umask in charge
  "socket-mode": z.string().regex(/^(0?[0-7]{3})?$/, "must be an octal mode such as 600"),
  "max-frame-length": z.number().int().min(1).max(1_048_576),
  "max-in-flight": z.number().int().min(1).max(10_000),
  "saturation-policy": z.enum(["wait", "drop"]),
  // comma-separated plugin names
  "plugins": z.string(),
  "log-level": z.enum(LOG_LEVELS),
});

export type RuntimeConfig = z.infer<typeof configSchema>;
export type ConfigKey = keyof RuntimeConfig;
export type ConfigValue = RuntimeConfig[ConfigKey];

function defaults(): RuntimeConfig {
  return {
    "socket-path": getSocketPath(),
    "socket-mode": "600",
    "max-frame-length": 16384,
    "max-in-flight": 32,
    "saturation-policy": "wait",
    "plugins": "basic,dictation,speech",
    "log-level": "info",
  };
}

const VALID_KEYS = new Set<string>(Object.keys(configSchema.shape));

export function isValidConfigKey(key: string): key is ConfigKey {
  return VALID_KEYS.has(key);
}

export function getDefaults(): RuntimeConfig {
  return defaults();
}

/** Keys with invalid values fall back to their defaults; the rest of the file is kept. */
export async function readConfig(): Promise<RuntimeConfig> {
  const path = getConfigPath();
  const base = defaults();
  if (!existsSync(path)) return base;

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    logger.warn({ err, path }, "Unreadable config file, using defaults");
    return base;
  }

  const parsed = configSchema.partial().safeParse(raw);
  if (parsed.success) return { ...base, ...parsed.data };

  const invalid = new Set(parsed.error.issues.map((issue) => String(issue.path[0])));
  logger.warn({ path, keys: [...invalid], issues: parsed.error.issues }, "Invalid config values, using defaults for them");
  const kept = configSchema.partial().safeParse(
    typeof raw === "object" && raw !== null
      ? Object.fromEntries(Object.entries(raw).filter(([key]) => !invalid.has(key)))
      : {},
  );
  return kept.success ? { ...base, ...kept.data } : base;
}

export async function writeRuntimeConfig(config: RuntimeConfig): Promise<void> {
  await writeFile(getConfigPath(), JSON.stringify(config, null, 2), "utf-8");
}

export async function getConfigValue(key: ConfigKey): Promise<ConfigValue> {
  const config = await readConfig();
  return config[key];
}

export async function setConfigValue(key: ConfigKey, rawValue: string): Promise<void> {
  const config = await readConfig();
  const next = configSchema.safeParse({ ...config, [key]: coerceValue(key, rawValue) });
  if (!next.success) {
    const issue = next.error.issues[0];
    throw new Error(`Invalid value for "${key}": ${issue ? issue.message : "rejected"} (got "${rawValue}")`);
  }
  await writeRuntimeConfig(next.data);
}

export async function resetConfig(): Promise<void> {
  await writeRuntimeConfig(defaults());
}

/** "600" / "0600" → 0o600; "" → undefined (no chmod). */
export function parseSocketMode(mode: string): number | undefined {
  if (mode === "") return undefined;
  if (!/^0?[0-7]{3}$/.test(mode)) throw new Error(`Invalid socket mode "${mode}"`);
  return parseInt(mode, 8);
}

/** Comma-separated plugin list → names, blanks dropped. */
export function parsePluginList(value: string): string[] {
  return value.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
}

function coerceValue(key: ConfigKey, raw: string): ConfigValue {
  const defaultVal = defaults()[key];
  if (typeof defaultVal === "number") {
    const n = Number(raw);
    if (raw.trim() === "" || Number.isNaN(n)) throw new Error(`Value for "${key}" must be a number, got "${raw}"`);
    return n;
  }
  return raw;
}
