/**
 * Config Loader - Configuration loading and merging
 *
 * Loads configuration from .casetime/config.json and merges with defaults.
 * Supports environment variable overrides and handles a missing config file.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { z } from 'zod';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CasetimeConfig, Overrides, PartialCasetimeConfig } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Directory name for casetime configuration */
const CONFIG_DIR = '.casetime';

/** Config file name */
const CONFIG_FILE = 'config.json';

/** Environment variable prefix for config overrides */
const ENV_PREFIX = 'CASETIME_';

const ENV_VARS = {
  DB_PATH: `${ENV_PREFIX}DB_PATH`,
  INFERENCE_CONFIDENCE: `${ENV_PREFIX}INFERENCE_CONFIDENCE`,
  GAP_THRESHOLD_SECONDS: `${ENV_PREFIX}GAP_THRESHOLD_SECONDS`,
  BATCH_SIZE: `${ENV_PREFIX}BATCH_SIZE`,
  LOG_LEVEL: `${ENV_PREFIX}LOG_LEVEL`,
} as const;

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const configFileSchema = z
  .object({
    storage: z
      .object({
        dbPath: z.string().min(1),
        walMode: z.boolean(),
      })
      .partial()
      .strict(),
    inference: z
      .object({
        confidence: z.number().min(0).max(1),
      })
      .partial()
      .strict(),
    segmentation: z
      .object({
        gapThresholdSeconds: z.number().positive(),
        batchSize: z.number().int().positive(),
      })
      .partial()
      .strict(),
    logging: z
      .object({
        level: logLevelSchema,
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(message: string, filePath: string, errorCause?: Error | undefined) {
    super(message);
    this.name = 'ConfigLoadError';
    this.filePath = filePath;
    this.errorCause = errorCause;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function parseEnvNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const num = parseFloat(value);
  return isNaN(num) ? undefined : num;
}

function parseEnvInteger(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

function mergeSection<T extends object>(base: T, override: Overrides<T> | undefined): T {
  const result = { ...base };
  if (!override) return result;

  for (const key of Object.keys(base) as Array<keyof T>) {
    const value = override[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Merge a partial configuration over a complete one, section by section
 */
export function mergeConfig(base: CasetimeConfig, override: PartialCasetimeConfig): CasetimeConfig {
  return {
    storage: mergeSection(base.storage, override.storage),
    inference: mergeSection(base.inference, override.inference),
    segmentation: mergeSection(base.segmentation, override.segmentation),
    logging: mergeSection(base.logging, override.logging),
  };
}

// ============================================================================
// Config Loader Class
// ============================================================================

export interface ConfigLoaderOptions {
  /** Root directory to search for .casetime/config.json */
  rootDir?: string | undefined;
  /** Whether to apply environment variable overrides */
  applyEnvOverrides?: boolean | undefined;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv | undefined;
}

export interface ConfigLoadResult {
  config: CasetimeConfig;
  configPath?: string | undefined;
  configFileFound: boolean;
  envOverridesApplied: boolean;
}

/**
 * ConfigLoader - Loads casetime configuration
 */
export class ConfigLoader {
  private readonly applyEnvOverrides: boolean;
  private readonly env: NodeJS.ProcessEnv;
  private readonly configPath: string;
  private cachedConfig: CasetimeConfig | null = null;

  constructor(options: ConfigLoaderOptions = {}) {
    const rootDir = options.rootDir ?? process.cwd();
    this.applyEnvOverrides = options.applyEnvOverrides ?? true;
    this.env = options.env ?? process.env;
    this.configPath = path.join(rootDir, CONFIG_DIR, CONFIG_FILE);
  }

  /**
   * Load configuration from file, merge with defaults, and apply env overrides
   */
  async load(): Promise<ConfigLoadResult> {
    let config = mergeConfig(DEFAULT_CONFIG, {});
    let configFileFound = false;
    let envOverridesApplied = false;

    if (await fileExists(this.configPath)) {
      config = mergeConfig(config, await this.loadFromFile(this.configPath));
      configFileFound = true;
    }

    if (this.applyEnvOverrides) {
      const envConfig = this.getEnvOverrides();
      if (Object.keys(envConfig).length > 0) {
        config = mergeConfig(config, envConfig);
        envOverridesApplied = true;
      }
    }

    this.cachedConfig = config;

    return {
      config,
      configPath: configFileFound ? this.configPath : undefined,
      configFileFound,
      envOverridesApplied,
    };
  }

  /**
   * Get the cached configuration, loading if necessary
   */
  async getConfig(): Promise<CasetimeConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }
    const result = await this.load();
    return result.config;
  }

  private async loadFromFile(filePath: string): Promise<PartialCasetimeConfig> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ConfigLoadError(
        `Failed to read config file: ${filePath}`,
        filePath,
        error instanceof Error ? error : undefined,
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ConfigLoadError(
        `Invalid JSON in config file: ${filePath}`,
        filePath,
        error instanceof Error ? error : undefined,
      );
    }

    const parsed = configFileSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
      throw new ConfigLoadError(`Invalid config file ${filePath} (${where})`, filePath);
    }
    return parsed.data;
  }

  private getEnvOverrides(): PartialCasetimeConfig {
    const overrides: PartialCasetimeConfig = {};

    const dbPath = this.env[ENV_VARS.DB_PATH];
    if (dbPath) {
      overrides.storage = { dbPath };
    }

    const confidence = parseEnvNumber(this.env[ENV_VARS.INFERENCE_CONFIDENCE]);
    if (confidence !== undefined && confidence >= 0 && confidence <= 1) {
      overrides.inference = { confidence };
    }

    const gap = parseEnvNumber(this.env[ENV_VARS.GAP_THRESHOLD_SECONDS]);
    const batchSize = parseEnvInteger(this.env[ENV_VARS.BATCH_SIZE]);
    if ((gap !== undefined && gap > 0) || (batchSize !== undefined && batchSize > 0)) {
      overrides.segmentation = {
        gapThresholdSeconds: gap !== undefined && gap > 0 ? gap : undefined,
        batchSize: batchSize !== undefined && batchSize > 0 ? batchSize : undefined,
      };
    }

    const level = logLevelSchema.safeParse(this.env[ENV_VARS.LOG_LEVEL]);
    if (level.success) {
      overrides.logging = { level: level.data };
    }

    return overrides;
  }
}
