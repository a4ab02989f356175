/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: SIMPLECAS_* (highest priority, for CI overrides)
 * 2. Config files: .simplecasrc, simplecas.config.js, package.json#simplecas
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@simplecas/core";
 *
 * config.get("debug");                              // → boolean
 * config.set({ symbolic: { singleLetterVariables: true } });
 * config.has("symbolic.singleLetterVariables");     // → true
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the expression model.
 */
export interface SymbolicConfig {
  /** Restrict variable names to a single ASCII letter */
  singleLetterVariables: boolean;
}

/**
 * Full simplecas configuration schema.
 */
export interface SimplecasConfig {
  /** Enable debug logging */
  debug: boolean;
  /** Expression model options */
  symbolic: SymbolicConfig;
}

/**
 * Partial configuration accepted by `config.set()`.
 */
export interface SimplecasConfigInput {
  debug?: boolean;
  symbolic?: Partial<SymbolicConfig>;
}

type RawConfig = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

const MODULE_NAME = "simplecas";

const DEFAULTS: SimplecasConfig = {
  debug: false,
  symbolic: {
    singleLetterVariables: false,
  },
};

let configStore: SimplecasConfig = DEFAULTS;
let configLoaded = false;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with SIMPLECAS_ are parsed into the config object.
 *
 * Examples:
 *   SIMPLECAS_DEBUG=1                                → { debug: true }
 *   SIMPLECAS_SYMBOLIC_SINGLELETTERVARIABLES=true    → { symbolic: { singleLetterVariables: true } }
 */
function loadConfigFromEnv(): RawConfig {
  const envConfig: RawConfig = {};
  const PREFIX = "SIMPLECAS_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // SIMPLECAS_SYMBOLIC_SINGLELETTERVARIABLES -> symbolic.singlelettervariables
    const configPath = key.slice(PREFIX.length).toLowerCase().replace(/_+/g, ".");

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

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: RawConfig, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
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
 * Look up a key ignoring case, since environment variable names lose it.
 */
function pick(obj: RawConfig, key: string): unknown {
  if (key in obj) return obj[key];
  const lower = key.toLowerCase();
  for (const [candidate, value] of Object.entries(obj)) {
    if (candidate.toLowerCase() === lower) return value;
  }
  return undefined;
}

function toBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

/**
 * Overlay a raw (untyped) config layer onto a typed one.
 * Unknown keys and values of the wrong type are ignored.
 */
function overlay(base: SimplecasConfig, layer: unknown): SimplecasConfig {
  if (!isRecord(layer)) return base;
  const symbolic = pick(layer, "symbolic");
  return {
    debug: toBoolean(pick(layer, "debug"), base.debug),
    symbolic: {
      singleLetterVariables: isRecord(symbolic)
        ? toBoolean(pick(symbolic, "singleLetterVariables"), base.symbolic.singleLetterVariables)
        : base.symbolic.singleLetterVariables,
    },
  };
}

// ============================================================================
// Config File Loading
// ============================================================================

/**
 * Load configuration from the first config file found in `dir`.
 */
function loadConfigFromFiles(dir: string): unknown {
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
  const result = explorer.search(dir);
  if (result && !result.isEmpty) {
    configFilePath = result.filepath;
    return result.config;
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles(searchFrom ?? process.cwd());
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = overlay(overlay(DEFAULTS, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a top-level configuration section.
 */
function get<K extends keyof SimplecasConfig>(key: K): SimplecasConfig[K] {
  initializeConfig();
  return configStore[key];
}

/**
 * Set configuration values programmatically.
 * Environment variables are not re-applied on top of these.
 */
function set(values: SimplecasConfigInput): void {
  initializeConfig();
  configStore = {
    debug: values.debug ?? configStore.debug,
    symbolic: { ...configStore.symbolic, ...values.symbolic },
  };
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  initializeConfig();
  return !!getNestedValue(configStore, path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<SimplecasConfig> {
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
 * Reload configuration, searching for config files in `dir`.
 */
function loadFrom(dir: string): void {
  reset();
  searchFrom = dir;
  initializeConfig();
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = DEFAULTS;
  configLoaded = false;
  configFilePath = undefined;
  searchFrom = undefined;
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
  loadFrom,
  reset,
} as const;
