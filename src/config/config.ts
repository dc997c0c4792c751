/**
 * cronstamp: Configuration Management
 *
 * Handles loading, validation, and path resolution for all configuration.
 *
 * @module config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { type Config, ConfigSchema, type Result, ok, err } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_BASE_DIR = path.join(os.homedir(), '.cronstamp');

export const DEFAULT_CONFIG: Config = {
  paths: {
    base_dir: DEFAULT_BASE_DIR,
    cache_dir: 'cache',
    config_file: 'config.json',
  },
  schedule: {
    lookback_days: 8,
    weekday_start: 'monday',
    lock: false,
    lock_timeout_ms: 5000,
  },
  logging: {
    level: 'info',
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function expandPath(inputPath: string): string {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === '~') {
    return os.homedir();
  }
  return inputPath;
}

export function getBaseDir(config?: Config): string {
  return expandPath(config?.paths.base_dir ?? DEFAULT_CONFIG.paths.base_dir);
}

/** Relative entries resolve under the base directory; absolute ones stand alone. */
export function getPath(entry: string, config?: Config): string {
  const expanded = expandPath(entry);
  return path.isAbsolute(expanded) ? expanded : path.join(getBaseDir(config), expanded);
}

export function getCacheDir(config?: Config): string {
  return getPath(config?.paths.cache_dir ?? DEFAULT_CONFIG.paths.cache_dir, config);
}

export function getConfigPath(config?: Config): string {
  return getPath(config?.paths.config_file ?? DEFAULT_CONFIG.paths.config_file, config);
}

// ═══════════════════════════════════════════════════════════════════════════
// DIRECTORY MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════

export function ensureDirectories(config?: Config): Result<void, Error> {
  try {
    for (const dir of [getBaseDir(config), getCacheDir(config)]) {
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
      }
    }
    return ok(undefined);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Load configuration from file and merge it over the defaults.
 * A missing file yields the defaults.
 */
export function loadConfig(customPath?: string): Result<Config, Error> {
  try {
    const expandedPath = expandPath(customPath ?? getConfigPath());

    let userConfig: unknown = {};
    if (fs.existsSync(expandedPath)) {
      userConfig = JSON.parse(fs.readFileSync(expandedPath, 'utf-8'));
    }
    if (!isPlainObject(userConfig)) {
      return err(new Error(`Invalid configuration: ${expandedPath} must contain a JSON object`));
    }

    const merged = deepMerge(DEFAULT_CONFIG, userConfig);
    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      return err(new Error(`Invalid configuration: ${result.error.message}`));
    }

    return ok(result.data);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

export function saveConfig(config: Config, customPath?: string): Result<void, Error> {
  try {
    const expandedPath = expandPath(customPath ?? getConfigPath(config));
    const dir = path.dirname(expandedPath);

    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    fs.writeFileSync(expandedPath, JSON.stringify(config, null, 2), {
      mode: 0o600,
      encoding: 'utf-8',
    });

    return ok(undefined);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

export function ensureConfig(customPath?: string): Result<Config, Error> {
  const configPath = expandPath(customPath ?? getConfigPath());
  if (!fs.existsSync(configPath)) {
    const saveResult = saveConfig(DEFAULT_CONFIG, configPath);
    if (!saveResult.success) {
      return err(saveResult.error);
    }
  }

  const loaded = loadConfig(configPath);
  if (!loaded.success) {
    return loaded;
  }

  const dirResult = ensureDirectories(loaded.data);
  if (!dirResult.success) {
    return err(dirResult.error);
  }

  return loaded;
}

// ═══════════════════════════════════════════════════════════════════════════
// SINGLETON PATTERN
// ═══════════════════════════════════════════════════════════════════════════

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig === null) {
    const result = loadConfig();
    cachedConfig = result.success ? result.data : DEFAULT_CONFIG;
  }
  return cachedConfig;
}

export function setConfig(config: Config): void {
  cachedConfig = config;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}

export function reloadConfig(customPath?: string): Result<Config, Error> {
  clearConfigCache();
  const result = loadConfig(customPath);
  if (result.success) {
    cachedConfig = result.data;
  }
  return result;
}
