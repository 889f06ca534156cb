/**
 * Tests for configuration management
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { ConfigSchema } from '../../src/config/schema.js';
import {
  ConfigError,
  MissingServerSettingsError,
  deepMerge,
  getConfigPath,
  loadConfig,
  loadEnvConfig,
  loadServerSettings,
  validateConfig,
} from '../../src/config/index.js';
import { makeTempDir, removeDir, writeTree } from '../helpers/fixtures.js';

describe('DEFAULT_CONFIG', () => {
  it('should pass schema validation', () => {
    const result = ConfigSchema.safeParse(DEFAULT_CONFIG);
    expect(result.success).toBe(true);
  });

  it('should have the documented defaults', () => {
    expect(DEFAULT_CONFIG.workers).toBe(4);
    expect(DEFAULT_CONFIG.default_branch).toBe('main');
    expect(DEFAULT_CONFIG.scanner.token_property).toBe('sonar.token');
    expect(DEFAULT_CONFIG.http.retries).toBe(3);
    expect(DEFAULT_CONFIG.overrides).toEqual({});
  });
});

describe('ConfigSchema', () => {
  it('should fill defaults for an empty object', () => {
    const parsed = ConfigSchema.parse({});
    expect(parsed.workspace_dir).toBe('repos');
    expect(parsed.scanner.binary).toBe('sonar-scanner');
    expect(parsed.output.verbose).toBe(false);
  });

  it('should default override commands to an empty list', () => {
    const parsed = ConfigSchema.parse({ overrides: { widgets: { workdir: 'services/api' } } });
    expect(parsed.overrides['widgets']).toEqual({ workdir: 'services/api', commands: [] });
  });

  it('should reject an unknown token property', () => {
    expect(ConfigSchema.safeParse({ scanner: { token_property: 'sonar.password' } }).success).toBe(false);
  });
});

describe('deepMerge', () => {
  it('should merge nested objects', () => {
    expect(deepMerge({ a: 1, nested: { x: 1, y: 2 } }, { nested: { y: 3 } })).toEqual({
      a: 1,
      nested: { x: 1, y: 3 },
    });
  });

  it('should replace arrays', () => {
    expect(deepMerge({ list: [1, 2] }, { list: [3] })).toEqual({ list: [3] });
  });

  it('should not overwrite with undefined', () => {
    expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
  });
});

describe('validateConfig', () => {
  it('should list every failing path', () => {
    expect(() => validateConfig({ workers: 0, default_branch: '' }, 'test.yaml')).toThrow(ConfigError);
    try {
      validateConfig({ workers: 0 }, 'test.yaml');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError && error.issues[0]?.startsWith('workers:')).toBe(true);
      expect(error instanceof Error && error.message.startsWith('Invalid test.yaml: workers:')).toBe(true);
    }
  });
});

describe('loadEnvConfig', () => {
  it('should read worker count, workspace and verbosity', () => {
    expect(
      loadEnvConfig({ SCANFLEET_WORKERS: '8', SCANFLEET_WORKSPACE: '/data/repos', SCANFLEET_LOG_LEVEL: 'debug' })
    ).toEqual({ workers: 8, workspace_dir: '/data/repos', output: { verbose: true } });
  });

  it('should pass an unusable worker count on for validation', () => {
    expect(loadEnvConfig({ SCANFLEET_WORKERS: 'many' })).toEqual({ workers: 'many' });
    expect(loadEnvConfig({ SCANFLEET_WORKERS: '0' })).toEqual({ workers: 0 });
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('config');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should use defaults without a config file', async () => {
    const config = await loadConfig(dir, {});
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(getConfigPath()).toBeNull();
  });

  it('should merge the project file and let the environment win', async () => {
    writeTree(dir, {
      'scanfleet.config.yaml': [
        'workers: 2',
        'default_branch: develop',
        'scanner:',
        '  token_property: sonar.login',
        'overrides:',
        '  widgets:',
        '    workdir: services/api',
        '    commands:',
        '      - make generate',
        '',
      ].join('\n'),
    });

    const config = await loadConfig(dir, { SCANFLEET_WORKERS: '6' });

    expect(config.workers).toBe(6);
    expect(config.default_branch).toBe('develop');
    expect(config.scanner).toEqual({
      binary: 'sonar-scanner',
      token_property: 'sonar.login',
      command_timeout_ms: 30 * 60 * 1000,
    });
    expect(config.overrides['widgets']).toEqual({ workdir: 'services/api', commands: ['make generate'] });
    expect(getConfigPath()?.endsWith('scanfleet.config.yaml')).toBe(true);
  });

  it('should reject an invalid worker count from the environment', async () => {
    await expect(loadConfig(dir, { SCANFLEET_WORKERS: 'many' })).rejects.toBeInstanceOf(ConfigError);
    await expect(loadConfig(dir, { SCANFLEET_WORKERS: '0' })).rejects.toThrow('Invalid configuration: workers:');
    await expect(loadConfig(dir, { SCANFLEET_WORKERS: '65' })).rejects.toBeInstanceOf(ConfigError);
  });

  it('should reject an invalid file', async () => {
    writeTree(dir, { '.scanfleetrc.yml': 'workers: lots\n' });
    await expect(loadConfig(dir, {})).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('loadServerSettings', () => {
  it('should read host and token and drop a trailing slash', () => {
    expect(loadServerSettings({ SONAR_HOST: 'http://sonar.test/', SONAR_TOKEN: 'test-secret' })).toEqual({
      host: 'http://sonar.test',
      token: 'test-secret',
    });
  });

  it('should name every missing variable', () => {
    expect(() => loadServerSettings({})).toThrow(
      new MissingServerSettingsError(['SONAR_HOST', 'SONAR_TOKEN']).message
    );
    expect(() => loadServerSettings({ SONAR_HOST: 'http://sonar.test' })).toThrow(
      'Missing SONAR_TOKEN in environment or .env file'
    );
  });

  it('should reject a host that is not a URL', () => {
    expect(() => loadServerSettings({ SONAR_HOST: 'sonar', SONAR_TOKEN: 'test-secret' })).toThrow(ConfigError);
  });
});
