/**
 * Default configuration values
 */

import type { Config } from './schema.js';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  workers: 4,
  workspace_dir: 'repos',
  repo_list: 'repos.txt',
  default_branch: 'main',
  local_prefix: 'local',
  scanner: {
    binary: 'sonar-scanner',
    token_property: 'sonar.token',
    command_timeout_ms: 30 * 60 * 1000,
  },
  http: {
    retries: 3,
    retry_delay_ms: 500,
    timeout_ms: 30_000,
  },
  output: {
    verbose: false,
  },
  overrides: {},
};

/**
 * Module name used for config file discovery
 */
export const CONFIG_MODULE_NAME = 'scanfleet';

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'scanfleet.config.yaml',
  'scanfleet.config.yml',
  '.scanfleetrc.yaml',
  '.scanfleetrc.yml',
  '.scanfleetrc',
];

/**
 * Environment variable names
 */
export const ENV_VARS = {
  SONAR_HOST: 'SONAR_HOST',
  SONAR_TOKEN: 'SONAR_TOKEN',
  WORKERS: 'SCANFLEET_WORKERS',
  WORKSPACE: 'SCANFLEET_WORKSPACE',
  LOG_LEVEL: 'SCANFLEET_LOG_LEVEL',
} as const;
