/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';

/**
 * Per-repository override: optional scan subdirectory plus commands run
 * there before classification
 */
export const ExtraCommandOverrideSchema = z.object({
  workdir: z.string().min(1).optional(),
  commands: z.array(z.string().min(1)).default([]),
});

/**
 * Scanner invocation settings
 */
export const ScannerSettingsSchema = z.object({
  binary: z.string().min(1).default('sonar-scanner'),
  // Servers before 10.0 only accept sonar.login
  token_property: z.enum(['sonar.token', 'sonar.login']).default('sonar.token'),
  command_timeout_ms: z.number().int().positive().default(30 * 60 * 1000),
});

/**
 * Analysis-server HTTP client settings
 */
export const HttpSettingsSchema = z.object({
  retries: z.number().int().min(0).max(10).default(3),
  retry_delay_ms: z.number().int().min(0).default(500),
  timeout_ms: z.number().int().positive().default(30_000),
});

/**
 * Output settings schema
 */
export const OutputSettingsSchema = z.object({
  verbose: z.boolean().default(false),
  log_file: z.string().min(1).optional(),
});

/** Size of the worker pool */
export const WorkerCountSchema = z.number().int().min(1).max(64);

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  workers: WorkerCountSchema.default(4),
  workspace_dir: z.string().min(1).default('repos'),
  repo_list: z.string().min(1).default('repos.txt'),
  default_branch: z.string().min(1).default('main'),
  local_prefix: z.string().min(1).default('local'),
  scanner: ScannerSettingsSchema.default({
    binary: 'sonar-scanner',
    token_property: 'sonar.token',
    command_timeout_ms: 30 * 60 * 1000,
  }),
  http: HttpSettingsSchema.default({
    retries: 3,
    retry_delay_ms: 500,
    timeout_ms: 30_000,
  }),
  output: OutputSettingsSchema.default({
    verbose: false,
  }),
  overrides: z.record(z.string(), ExtraCommandOverrideSchema).default({}),
});

/**
 * Analysis-server endpoint and credential, taken from the environment
 */
export const ServerSettingsSchema = z.object({
  host: z.string().url(),
  token: z.string().min(1),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type ExtraCommandOverride = z.infer<typeof ExtraCommandOverrideSchema>;
export type ScannerSettings = z.infer<typeof ScannerSettingsSchema>;
export type HttpSettings = z.infer<typeof HttpSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type ServerSettings = z.infer<typeof ServerSettingsSchema>;
