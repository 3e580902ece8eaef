import { join } from 'path';
import { DEFAULT_EXCLUDE_PATTERNS, FILE_PATTERNS, INSTALLER_DEFAULTS, SERIAL_DEFAULTS, TIMEOUTS } from '../constants/index.js';
import { PipBridgeConfig, PipBridgeDirectories, SerialConfig } from '../types/index.js';
import { ConfigError, describeError } from '../utils/errors.js';
import { exists, readJsoncFile } from '../utils/fs.js';
import { isPlainObject } from '../utils/guards.js';
import { logger } from '../utils/logger.js';
import { getPipBridgeDirectories } from './directory.js';

/**
 * Configuration management for pipbridge
 * Reads config.jsonc (JSON with comments) or config.json from the config directory
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];

export type ResolvedConfig = PipBridgeConfig & {
  installerSpec: string;
  wheelSpec: string;
  upstreamTimeoutMs: number;
  excludePatterns: string[];
  serial: Required<SerialConfig>;
};

export const DEFAULT_CONFIG: ResolvedConfig = {
  installerSpec: INSTALLER_DEFAULTS.PIP_SPEC,
  wheelSpec: INSTALLER_DEFAULTS.WHEEL_SPEC,
  upstreamTimeoutMs: TIMEOUTS.UPSTREAM_MS,
  excludePatterns: [...DEFAULT_EXCLUDE_PATTERNS],
  serial: {
    baudRate: SERIAL_DEFAULTS.BAUD_RATE,
    timeoutMs: TIMEOUTS.SERIAL_MS
  }
};

function expectString(value: unknown, key: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`Config key '${key}' must be a string`);
  }
  return value;
}

function expectBoolean(value: unknown, key: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`Config key '${key}' must be true or false`);
  }
  return value;
}

function expectPositiveNumber(value: unknown, key: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`Config key '${key}' must be a positive number`);
  }
  return value;
}

function expectStringArray(value: unknown, key: string): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new ConfigError(`Config key '${key}' must be a list of strings`);
  }
  return value;
}

function expectStringRecord(value: unknown, key: string): Record<string, string> | undefined {
  if (value === undefined) return undefined;
  if (!isPlainObject(value)) {
    throw new ConfigError(`Config key '${key}' must be an object`);
  }
  const result: Record<string, string> = {};
  for (const [name, item] of Object.entries(value)) {
    const text = expectString(item, `${key}.${name}`);
    if (text !== undefined) result[name] = text;
  }
  return result;
}

function expectListRecord(value: unknown, key: string): Record<string, string[]> | undefined {
  if (value === undefined) return undefined;
  if (!isPlainObject(value)) {
    throw new ConfigError(`Config key '${key}' must be an object`);
  }
  const result: Record<string, string[]> = {};
  for (const [name, item] of Object.entries(value)) {
    const list = expectStringArray(item, `${key}.${name}`);
    if (list !== undefined) result[name] = list;
  }
  return result;
}

/**
 * Validate raw config file contents. Unknown keys are ignored with a warning.
 */
export function parseConfig(value: unknown): PipBridgeConfig {
  if (!isPlainObject(value)) {
    throw new ConfigError('Configuration must be a JSON object');
  }

  const known = new Set([
    'python', 'installerSpec', 'wheelSpec', 'indexUrl', 'extraIndexUrls', 'noMpOrg', 'upstreamTimeoutMs',
    'dummyPackages', 'excludedIndexes', 'excludePatterns', 'compilers', 'serial'
  ]);
  for (const key of Object.keys(value)) {
    if (!known.has(key)) {
      logger.warn(`Ignoring unknown config key '${key}'`);
    }
  }

  let serial: SerialConfig | undefined;
  if (value.serial !== undefined) {
    if (!isPlainObject(value.serial)) {
      throw new ConfigError(`Config key 'serial' must be an object`);
    }
    serial = {
      baudRate: expectPositiveNumber(value.serial.baudRate, 'serial.baudRate'),
      timeoutMs: expectPositiveNumber(value.serial.timeoutMs, 'serial.timeoutMs')
    };
  }

  return {
    python: expectString(value.python, 'python'),
    installerSpec: expectString(value.installerSpec, 'installerSpec'),
    wheelSpec: expectString(value.wheelSpec, 'wheelSpec'),
    indexUrl: expectString(value.indexUrl, 'indexUrl'),
    extraIndexUrls: expectStringArray(value.extraIndexUrls, 'extraIndexUrls'),
    noMpOrg: expectBoolean(value.noMpOrg, 'noMpOrg'),
    upstreamTimeoutMs: expectPositiveNumber(value.upstreamTimeoutMs, 'upstreamTimeoutMs'),
    dummyPackages: expectStringArray(value.dummyPackages, 'dummyPackages'),
    excludedIndexes: expectListRecord(value.excludedIndexes, 'excludedIndexes'),
    excludePatterns: expectStringArray(value.excludePatterns, 'excludePatterns'),
    compilers: expectStringRecord(value.compilers, 'compilers'),
    serial
  };
}

/**
 * File values over defaults; `serial` is merged key by key.
 */
export function mergeConfig(fileConfig: PipBridgeConfig): ResolvedConfig {
  return {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    installerSpec: fileConfig.installerSpec ?? DEFAULT_CONFIG.installerSpec,
    wheelSpec: fileConfig.wheelSpec ?? DEFAULT_CONFIG.wheelSpec,
    upstreamTimeoutMs: fileConfig.upstreamTimeoutMs ?? DEFAULT_CONFIG.upstreamTimeoutMs,
    excludePatterns: fileConfig.excludePatterns ?? DEFAULT_CONFIG.excludePatterns,
    serial: {
      baudRate: fileConfig.serial?.baudRate ?? DEFAULT_CONFIG.serial.baudRate,
      timeoutMs: fileConfig.serial?.timeoutMs ?? DEFAULT_CONFIG.serial.timeoutMs
    }
  };
}

class ConfigManager {
  private config: ResolvedConfig | null = null;
  private configPath: string | null = null;

  constructor(private readonly directories: PipBridgeDirectories = getPipBridgeDirectories()) {}

  /**
   * Find the existing config file (supports both .jsonc and .json)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.directories.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration from file; a missing file means defaults
   */
  async load(): Promise<ResolvedConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = mergeConfig({});
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsoncFile(configPath);
    } catch (error) {
      throw new ConfigError(`Failed to load configuration: ${describeError(error)}`, { configPath });
    }
    this.configPath = configPath;
    this.config = mergeConfig(parseConfig(raw));
    return this.config;
  }

  async get<K extends keyof ResolvedConfig>(key: K): Promise<ResolvedConfig[K]> {
    const config = await this.load();
    return config[key];
  }

  /**
   * Path of the config file in use, or where one would be read from
   */
  async getConfigFilePath(): Promise<string> {
    await this.load();
    return this.configPath ?? join(this.directories.config, FILE_PATTERNS.CONFIG_JSONC);
  }

  getDirectories(): PipBridgeDirectories {
    return this.directories;
  }
}

// Create and export a singleton instance
export const configManager = new ConfigManager();

// Export the class for testing purposes
export { ConfigManager };
