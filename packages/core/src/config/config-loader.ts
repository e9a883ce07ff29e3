/**
 * Config Loader - Configuration loading and merging
 *
 * Loads configuration from .lexiscan/config.json, merges it over the
 * defaults and applies LEXISCAN_* environment overrides. A missing file is
 * not an error; a malformed one is.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { ConfigError, errorMessage } from '../errors/index.js';

import { validateConfig } from './config-validator.js';
import { BUNDLED_PATTERNS_DIR } from './defaults.js';

import type { LexiscanConfig } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Directory name for lexiscan state and configuration */
export const LEXISCAN_DIR = '.lexiscan';

const CONFIG_FILE = 'config.json';

const ENV_PREFIX = 'LEXISCAN_';

const ENV_VARS = {
  PATTERNS_DIR: `${ENV_PREFIX}PATTERNS_DIR`,
  DB_PATH: `${ENV_PREFIX}DB_PATH`,
  CONCURRENCY: `${ENV_PREFIX}CONCURRENCY`,
  FETCH_TIMEOUT_MS: `${ENV_PREFIX}FETCH_TIMEOUT_MS`,
  MAX_RETRIES: `${ENV_PREFIX}MAX_RETRIES`,
} as const;

type RawConfig = Record<string, unknown>;

// ============================================================================
// Helper Functions
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source values overriding target values
 */
function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) {continue;}
    const current = result[key];
    result[key] = isPlainObject(value) && isPlainObject(current) ? deepMerge(current, value) : value;
  }
  return result;
}

/**
 * Parse an integer env value; anything else is reported rather than ignored
 */
function parseEnvInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {return undefined;}
  const num = Number(value);
  if (!Number.isInteger(num)) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`, {
      source: name,
      issues: [{ path: name, message: 'expected an integer' }],
    });
  }
  return num;
}

// ============================================================================
// Config Loader
// ============================================================================

export interface ConfigLoaderOptions {
  /** Directory containing .lexiscan/ (default: cwd) */
  rootDir?: string | undefined;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv | undefined;
  applyEnvOverrides?: boolean | undefined;
}

export interface ConfigLoadResult {
  config: LexiscanConfig;
  /** Path to the config file, when one was found */
  configPath?: string | undefined;
  configFileFound: boolean;
  envOverridesApplied: boolean;
}

export class ConfigLoader {
  private readonly rootDir: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly applyEnvOverrides: boolean;
  private readonly configPath: string;

  constructor(options: ConfigLoaderOptions = {}) {
    this.rootDir = path.resolve(options.rootDir ?? process.cwd());
    this.env = options.env ?? process.env;
    this.applyEnvOverrides = options.applyEnvOverrides ?? true;
    this.configPath = path.join(this.rootDir, LEXISCAN_DIR, CONFIG_FILE);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  async load(): Promise<ConfigLoadResult> {
    let raw: RawConfig = {};
    let configFileFound = false;
    let envOverridesApplied = false;

    const fileConfig = await this.loadFromFile();
    if (fileConfig) {
      raw = deepMerge(raw, fileConfig);
      configFileFound = true;
    }

    if (this.applyEnvOverrides) {
      const envConfig = this.getEnvOverrides();
      if (Object.keys(envConfig).length > 0) {
        raw = deepMerge(raw, envConfig);
        envOverridesApplied = true;
      }
    }

    const parsed = validateConfig(raw, configFileFound ? this.configPath : 'environment');
    const config: LexiscanConfig = {
      ...parsed,
      patternsDir: parsed.patternsDir ? this.resolvePath(parsed.patternsDir) : BUNDLED_PATTERNS_DIR,
      dbPath: parsed.dbPath === ':memory:' ? parsed.dbPath : this.resolvePath(parsed.dbPath),
    };

    return {
      config,
      configPath: configFileFound ? this.configPath : undefined,
      configFileFound,
      envOverridesApplied,
    };
  }

  /**
   * Relative paths in the config are relative to the root directory
   */
  private resolvePath(value: string): string {
    return path.resolve(this.rootDir, value);
  }

  private async loadFromFile(): Promise<RawConfig | null> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {return null;}
      throw new ConfigError(`Failed to read configuration file: ${errorMessage(error)}`, {
        source: this.configPath,
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Failed to parse configuration file: ${errorMessage(error)}`, {
        source: this.configPath,
        cause: error,
      });
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigError('Configuration must be a JSON object', { source: this.configPath });
    }
    return parsed;
  }

  private getEnvOverrides(): RawConfig {
    const overrides: RawConfig = {};
    const scan: RawConfig = {};

    const patternsDir = this.env[ENV_VARS.PATTERNS_DIR];
    if (patternsDir) {overrides['patternsDir'] = patternsDir;}

    const dbPath = this.env[ENV_VARS.DB_PATH];
    if (dbPath) {overrides['dbPath'] = dbPath;}

    const concurrency = parseEnvInteger(ENV_VARS.CONCURRENCY, this.env[ENV_VARS.CONCURRENCY]);
    if (concurrency !== undefined) {scan['concurrency'] = concurrency;}

    const timeout = parseEnvInteger(ENV_VARS.FETCH_TIMEOUT_MS, this.env[ENV_VARS.FETCH_TIMEOUT_MS]);
    if (timeout !== undefined) {scan['fetchTimeoutMs'] = timeout;}

    const retries = parseEnvInteger(ENV_VARS.MAX_RETRIES, this.env[ENV_VARS.MAX_RETRIES]);
    if (retries !== undefined) {scan['maxRetries'] = retries;}

    if (Object.keys(scan).length > 0) {overrides['scan'] = scan;}
    return overrides;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================================
// Convenience Functions
// ============================================================================

export async function loadConfig(rootDir?: string): Promise<LexiscanConfig> {
  const result = await new ConfigLoader({ rootDir }).load();
  return result.config;
}
