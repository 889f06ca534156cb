/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml } from 'yaml';
import { config as loadDotEnvFile } from 'dotenv';
import path from 'node:path';
import { ConfigSchema, ServerSettingsSchema, type Config, type ServerSettings } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_FILE_NAMES, CONFIG_MODULE_NAME, ENV_VARS } from './defaults.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';

/**
 * Raised when the merged configuration does not validate
 */
export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when the analysis-server endpoint or credential is missing
 */
export class MissingServerSettingsError extends Error {
  constructor(readonly missing: string[]) {
    super(`Missing ${missing.join(' or ')} in environment or .env file`);
    this.name = 'MissingServerSettingsError';
  }
}

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig(CONFIG_MODULE_NAME, {
  searchPlaces: CONFIG_FILE_NAMES,
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load project configuration file, if any
 *
 * @param cwd - Directory to search from
 * @returns Parsed file contents and the file path
 */
async function loadProjectConfig(
  cwd?: string
): Promise<{ config: Record<string, unknown>; filepath: string | null }> {
  const result = await explorer.search(cwd);
  if (!result || result.isEmpty) {
    return { config: {}, filepath: result?.filepath ?? null };
  }
  const raw: unknown = result.config;
  if (!isRecord(raw)) {
    throw new ConfigError(`Configuration file ${result.filepath} must contain a mapping`);
  }
  return { config: raw, filepath: result.filepath };
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  const workers = env[ENV_VARS.WORKERS];
  if (workers) {
    // Non-numeric text is kept as is and rejected by validateConfig
    const parsed = Number(workers);
    config.workers = isNaN(parsed) ? workers : parsed;
  }

  const workspace = env[ENV_VARS.WORKSPACE];
  if (workspace) {
    config.workspace_dir = workspace;
  }

  if (env[ENV_VARS.LOG_LEVEL] === 'debug') {
    config.output = { verbose: true };
  }

  return config;
}

/**
 * Deep merge configuration objects. Arrays and scalars from source replace
 * the target's value.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Validate a merged configuration object
 *
 * @throws ConfigError listing every failing path
 */
export function validateConfig(raw: Record<string, unknown>, origin = 'configuration'): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid ${origin}`, issues);
  }
  return result.data;
}

/**
 * Cached config path from last load
 */
let cachedConfigPath: string | null = null;

/**
 * Get the path to the currently loaded config file (or null if using defaults)
 */
export function getConfigPath(): string | null {
  return cachedConfigPath;
}

/**
 * Load and merge configuration from all sources
 * Priority: env vars > project config > defaults
 */
export async function loadConfig(cwd?: string, env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const project = await loadProjectConfig(cwd);
  cachedConfigPath = project.filepath;

  let merged = deepMerge({ ...DEFAULT_CONFIG }, project.config);
  merged = deepMerge(merged, loadEnvConfig(env));

  return validateConfig(merged, project.filepath ?? 'configuration');
}

/**
 * Load a .env file from the given directory into process.env.
 * Variables already set in the environment win.
 */
export function loadDotEnv(cwd: string = process.cwd()): void {
  loadDotEnvFile({ path: path.join(cwd, '.env') });
}

/**
 * Read the analysis-server endpoint and credential
 *
 * @throws MissingServerSettingsError when either value is absent
 */
export function loadServerSettings(env: NodeJS.ProcessEnv = process.env): ServerSettings {
  const host = env[ENV_VARS.SONAR_HOST]?.trim();
  const token = env[ENV_VARS.SONAR_TOKEN]?.trim();

  const missing: string[] = [];
  if (!host) missing.push(ENV_VARS.SONAR_HOST);
  if (!token) missing.push(ENV_VARS.SONAR_TOKEN);
  if (missing.length > 0) {
    throw new MissingServerSettingsError(missing);
  }

  const result = ServerSettingsSchema.safeParse({ host: host?.replace(/\/+$/, ''), token });
  if (!result.success) {
    throw new ConfigError(`Invalid ${ENV_VARS.SONAR_HOST}`, [result.error.issues[0]?.message ?? 'invalid value']);
  }
  return result.data;
}
