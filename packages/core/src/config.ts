/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for fieldmap.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: FIELDMAP_* (highest priority, for CI overrides)
 * 2. Config files: fieldmap.config.js, .fieldmaprc, package.json#fieldmap, etc.
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@fieldmap/core";
 *
 * config.settings().codec.noneHandling   // → "encode" | "ignore"
 * config.get("paths.optionalValueSuffix") // → unknown
 *
 * config.set({ codec: { noneHandling: "ignore" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/** How `undefined` optional fields are written by `encode`. */
export type NoneHandling = "encode" | "ignore";

/** How enum values are written by `encode`. */
export type EnumEncoding = "name" | "ordinal";

/**
 * Path options.
 */
export interface PathsConfig {
  /**
   * Emit `<field>.value` for optional scalar fields in `extractPaths`.
   * Legacy convention, on by default.
   */
  optionalValueSuffix?: boolean;
}

/**
 * Codec options.
 */
export interface CodecConfig {
  noneHandling?: NoneHandling;
  enumEncoding?: EnumEncoding;
}

/**
 * Full fieldmap configuration schema.
 */
export interface FieldmapConfig {
  /** Enable debug logging */
  debug?: boolean;
  paths?: PathsConfig;
  codec?: CodecConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

/**
 * Configuration with every known option resolved to a valid value.
 */
export interface FieldmapSettings {
  readonly debug: boolean;
  readonly paths: { readonly optionalValueSuffix: boolean };
  readonly codec: { readonly noneHandling: NoneHandling; readonly enumEncoding: EnumEncoding };
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

const DEFAULTS: FieldmapSettings = {
  debug: false,
  paths: { optionalValueSuffix: true },
  codec: { noneHandling: "encode", enumEncoding: "name" },
};

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "FIELDMAP_";

/**
 * Load configuration from environment variables.
 * Double underscore separates nesting levels; a single underscore inside a
 * level is folded into camelCase.
 *
 * Examples:
 *   FIELDMAP_DEBUG=1                         → { debug: true }
 *   FIELDMAP_CODEC__NONE_HANDLING=ignore     → { codec: { noneHandling: "ignore" } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .split("__")
      .map(toCamelCase)
      .join(".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

function toCamelCase(segment: string): string {
  return segment
    .toLowerCase()
    .replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
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
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
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

const MODULE_NAME = "fieldmap";

/**
 * Load configuration from the first config file cosmiconfig finds.
 * A broken config file is reported and otherwise ignored.
 */
function loadConfigFromFiles(): Record<string, unknown> {
  try {
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
    const result = explorer.search();
    const loaded: unknown = result?.config;
    if (result && !result.isEmpty && isPlainObject(loaded)) {
      configFilePath = result.filepath;
      return loaded;
    }
  } catch (e) {
    console.warn(`[fieldmap:config] Ignoring unreadable config file: ${String(e)}`);
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

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv(process.env);

  // Merge: defaults < fileConfig < envConfig
  const defaults: Record<string, unknown> = {
    debug: DEFAULTS.debug,
    paths: { ...DEFAULTS.paths },
    codec: { ...DEFAULTS.codec },
  };
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
function set(values: FieldmapConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

function pickBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function pickOneOf<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

/**
 * The known options, narrowed. Values of the wrong type fall back to defaults.
 */
function settings(): FieldmapSettings {
  return {
    debug: pickBoolean(get("debug"), DEFAULTS.debug),
    paths: {
      optionalValueSuffix: pickBoolean(
        get("paths.optionalValueSuffix"),
        DEFAULTS.paths.optionalValueSuffix
      ),
    },
    codec: {
      noneHandling: pickOneOf(
        get("codec.noneHandling"),
        ["encode", "ignore"] as const,
        DEFAULTS.codec.noneHandling
      ),
      enumEncoding: pickOneOf(
        get("codec.enumEncoding"),
        ["name", "ordinal"] as const,
        DEFAULTS.codec.enumEncoding
      ),
    },
  };
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
  getConfigFilePath,
  reset,
  settings,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: FieldmapConfig): FieldmapConfig {
  return cfg;
}
