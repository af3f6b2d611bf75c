/**
 * Configuration for @parsnip/parser
 *
 * Parsing never reads configuration from disk or the environment. Until
 * `loadConfig()` is called the defaults apply, adjusted only by `config.set()`.
 * `loadConfig()` merges, in priority order:
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: PARSNIP_*
 * 3. Config files: .parsniprc, parsnip.config.js, package.json#parsnip, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config, loadConfig } from "@parsnip/parser";
 *
 * loadConfig();
 * config.get("trace");               // → false
 * config.set({ trace: true });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export interface ParsnipConfig {
  /** Emit trace lines for parses and reference resolution */
  readonly trace: boolean;
}

/** Where a configuration value came from. */
export type ConfigOrigin = "file" | "env" | "set";

/** A configuration value that could not be accepted. */
export class ConfigError extends Error {
  readonly key: string;
  readonly origin: ConfigOrigin;

  constructor(key: string, origin: ConfigOrigin, message: string, options?: { cause?: unknown }) {
    super(`Invalid parsnip configuration (${origin}) for "${key}": ${message}`, options);
    this.name = "ConfigError";
    this.key = key;
    this.origin = origin;
  }
}

type PartialConfig = { -readonly [K in keyof ParsnipConfig]?: ParsnipConfig[K] };

// ============================================================================
// Global State
// ============================================================================

const DEFAULTS: ParsnipConfig = Object.freeze({
  trace: false,
});

const MODULE_NAME = "parsnip";

const ENV_KEYS: Readonly<Record<string, keyof ParsnipConfig>> = {
  PARSNIP_TRACE: "trace",
};

let configStore: ParsnipConfig = DEFAULTS;
let overrides: PartialConfig = {};
let configFilePath: string | undefined;

// ============================================================================
// Validation
// ============================================================================

function validate(values: object, origin: ConfigOrigin): PartialConfig {
  const result: PartialConfig = {};
  const entries: Array<[string, unknown]> = Object.entries(values);

  for (const [key, value] of entries) {
    if (value === undefined) continue;
    switch (key) {
      case "trace":
        if (typeof value !== "boolean") {
          throw new ConfigError(key, origin, `expected a boolean, got ${JSON.stringify(value)}`);
        }
        result.trace = value;
        break;
      default:
        throw new ConfigError(key, origin, "unknown configuration key");
    }
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Examples:
 *   PARSNIP_TRACE=1               → { trace: true }
 *   PARSNIP_TRACE=false           → { trace: false }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): PartialConfig {
  const raw: Record<string, unknown> = {};

  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value === undefined) continue;

    if (value === "1" || value === "true") {
      raw[key] = true;
    } else if (value === "0" || value === "false" || value === "") {
      raw[key] = false;
    } else {
      raw[key] = value;
    }
  }

  return validate(raw, "env");
}

// ============================================================================
// Config File Loading
// ============================================================================

function loadConfigFromFiles(searchFrom: string | undefined): PartialConfig {
  // Synchronous search only: cosmiconfigSync has no loader for .mjs files.
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search(searchFrom);
  } catch (error) {
    throw new ConfigError("*", "file", "config file could not be loaded", { cause: error });
  }
  if (result === null || result.isEmpty) return {};

  configFilePath = result.filepath;
  const loaded: unknown = result.config;
  if (typeof loaded !== "object" || loaded === null || Array.isArray(loaded)) {
    throw new ConfigError("*", "file", `${result.filepath} must contain an object`);
  }
  return validate(loaded, "file");
}

// ============================================================================
// Public API
// ============================================================================

function get<K extends keyof ParsnipConfig>(key: K): ParsnipConfig[K] {
  return configStore[key];
}

/**
 * Set configuration values programmatically. They stay in effect until
 * `reset()`, including across later `loadConfig()` calls.
 */
function set(values: Partial<ParsnipConfig>): void {
  overrides = { ...overrides, ...validate(values, "set") };
  configStore = Object.freeze({ ...configStore, ...overrides });
}

function getAll(): Readonly<ParsnipConfig> {
  return configStore;
}

/**
 * Get the path of the config file found by the last `loadConfig()` (if any).
 */
function getConfigFilePath(): string | undefined {
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = DEFAULTS;
  overrides = {};
  configFilePath = undefined;
}

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Load configuration from a config file and the environment. The file is
 * searched for in `searchFrom`, or the working directory. Throws
 * `ConfigError` for an unreadable file or an invalid value, leaving the
 * current configuration in place.
 */
export function loadConfig(options: { searchFrom?: string } = {}): Readonly<ParsnipConfig> {
  const previousPath = configFilePath;
  configFilePath = undefined;
  try {
    const fileConfig = loadConfigFromFiles(options.searchFrom);
    const envConfig = loadConfigFromEnv(process.env);
    // Merge: defaults < fileConfig < envConfig < overrides
    configStore = Object.freeze({ ...DEFAULTS, ...fileConfig, ...envConfig, ...overrides });
  } catch (error) {
    configFilePath = previousPath;
    throw error;
  }
  return configStore;
}
