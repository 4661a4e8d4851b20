/**
 * Configuration System
 *
 * Configuration is loaded lazily, on first read, from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: SEQPARSE_*
 * 3. Config files: package.json#seqparse, .seqparserc, seqparse.config.js, etc.
 *    Only files `cosmiconfigSync` can load are searched, so no `.mjs`.
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@seqparse/core";
 *
 * config.get("trace.enabled")             // → true | false
 * config.traceSettings()                  // → { enabled, labels }
 *
 * config.set({ trace: { enabled: true, labels: ["item"] } });
 * ```
 */

import { cosmiconfigSync, type CosmiconfigResult } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Trace logging options.
 */
export interface TraceConfig {
  /** Log every labelled parser invocation */
  enabled?: boolean;
  /** Only trace these labels (array, or a comma-separated list). Empty traces all. */
  labels?: string[] | string;
}

/**
 * Full seqparse configuration schema.
 */
export interface SeqparseConfig {
  /** Trace logging */
  trace?: TraceConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

/** Normalized view of {@link TraceConfig}. */
export interface TraceSettings {
  readonly enabled: boolean;
  readonly labels: readonly string[];
}

/** Raised when a config file exists but cannot be loaded. */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "SEQPARSE_";

/**
 * Load configuration from environment variables.
 * Variables prefixed with SEQPARSE_ are parsed into the config object.
 *
 * Examples:
 *   SEQPARSE_TRACE_ENABLED=true       → { trace: { enabled: true } }
 *   SEQPARSE_TRACE_LABELS=label,item  → { trace: { labels: "label,item" } }
 */
function loadConfigFromEnv(): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // SEQPARSE_TRACE_ENABLED → trace.enabled
    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "seqparse";

const SEARCH_PLACES = [
  "package.json",
  `.${MODULE_NAME}rc`,
  `.${MODULE_NAME}rc.json`,
  `.${MODULE_NAME}rc.yaml`,
  `.${MODULE_NAME}rc.yml`,
  `${MODULE_NAME}.config.js`,
  `${MODULE_NAME}.config.cjs`,
];

function loadConfigFromFiles(): ConfigRecord {
  let result: CosmiconfigResult;
  try {
    result = cosmiconfigSync(MODULE_NAME, { searchPlaces: SEARCH_PLACES }).search(searchFrom);
  } catch (error) {
    throw new ConfigError(`Failed to load ${MODULE_NAME} configuration`, { cause: error });
  }

  if (!result || result.isEmpty) {
    return {};
  }
  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new ConfigError(`${result.filepath}: configuration must be an object`);
  }
  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: SeqparseConfig = {
    trace: {
      enabled: false,
      labels: [],
    },
  };

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<SeqparseConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration so the next read loads it again.
 * `directory` changes where config files are searched for (default: cwd).
 */
function reset(directory?: string): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  searchFrom = directory;
}

function traceSettings(): TraceSettings {
  const enabled = get("trace.enabled") === true;
  const raw = get("trace.labels");

  let labels: string[] = [];
  if (typeof raw === "string") {
    labels = raw
      .split(",")
      .map((label) => label.trim())
      .filter((label) => label.length > 0);
  } else if (Array.isArray(raw)) {
    labels = raw.filter((label): label is string => typeof label === "string");
  }

  return { enabled, labels };
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  traceSettings,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: SeqparseConfig): SeqparseConfig {
  return cfg;
}
