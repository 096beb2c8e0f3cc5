import fs from "node:fs";
import path from "node:path";
import { BacktideError } from "../errors.js";
import { getDataPath, expandHome } from "../utils/helpers.js";
import { CONFIG_VERSION, configVersion, migrateConfig, type MigrationResult } from "./migrate.js";
import { ConfigStore, type ConfigValue } from "./store.js";

export function getDefaultConfigPath(): string {
  return path.join(getDataPath(), "config.json");
}

export function getConfigPath(): string {
  const override = process.env.BACKTIDE_CONFIG;
  if (override && override.trim()) return path.resolve(expandHome(override.trim()));
  return getDefaultConfigPath();
}

export function getDataDir(): string {
  return getDataPath();
}

export interface LoadedConfig {
  store: ConfigStore;
  path: string;
  migration: MigrationResult | null;
  /** The file exists but could not be parsed; `store` holds defaults. */
  fallback: boolean;
}

export interface LoadOptions {
  onWarning?: (message: string) => void;
  onMigrate?: (description: string) => void;
}

function toValues(parsed: unknown): Record<string, ConfigValue> {
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) throw new Error("config root must be an object");
  const out: Record<string, ConfigValue> = {};
  for (const [k, v] of Object.entries(parsed)) {
    if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") out[k] = v;
  }
  return out;
}

/**
 * Reads the config, upgrading and saving it first when it was written by an
 * older release. A version below the supported floor throws ConfigVersionError.
 */
export function loadConfig(configPath?: string, opts: LoadOptions = {}): LoadedConfig {
  const p = configPath ?? getConfigPath();
  const warn = opts.onWarning ?? ((message: string) => console.warn(message));
  if (!fs.existsSync(p)) return { store: new ConfigStore({ "config.version": CONFIG_VERSION }), path: p, migration: null, fallback: false };

  let store: ConfigStore;
  try {
    store = new ConfigStore(toValues(JSON.parse(fs.readFileSync(p, "utf8"))));
  } catch (err) {
    warn(`Warning: Failed to load config from ${p}: ${String(err)}`);
    return { store: new ConfigStore({ "config.version": CONFIG_VERSION }), path: p, migration: null, fallback: true };
  }

  const found = configVersion(store);
  if (found >= CONFIG_VERSION) return { store, path: p, migration: null, fallback: false };

  const migration = migrateConfig(store, found, (step) => opts.onMigrate?.(`Update to config version ${step.version}: ${step.description}`));
  saveConfig(store, p);
  return { store, path: p, migration, fallback: false };
}

/** Writes a loaded config back, unless it only holds defaults standing in for an unreadable file. */
export function saveLoadedConfig(loaded: LoadedConfig): void {
  if (loaded.fallback && fs.existsSync(loaded.path)) {
    throw new BacktideError(`Refusing to overwrite ${loaded.path}: it could not be parsed. Fix or remove it first.`, "ERR_CONFIG_UNREADABLE");
  }
  saveConfig(loaded.store, loaded.path);
}

export function saveConfig(store: ConfigStore, configPath?: string): void {
  const p = configPath ?? getConfigPath();
  // configs from newer releases keep their version
  if (!store.has("config.version") || configVersion(store) < CONFIG_VERSION) store.setIntValue("config.version", CONFIG_VERSION);
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, JSON.stringify(store, null, 2), "utf8");
}
