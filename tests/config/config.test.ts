/**
 * Tests for configuration management
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { ConfigSchema } from '../../src/config/schema.js';
import {
  applyOverrides,
  deepMerge,
  loadConfig,
  loadEnvConfig,
  validateConfig,
} from '../../src/config/index.js';
import { ConfigError } from '../../src/types/errors.js';

describe('DEFAULT_CONFIG', () => {
  it('should have valid scan defaults', () => {
    expect(DEFAULT_CONFIG.scan.concurrency).toBe(8);
    expect(DEFAULT_CONFIG.scan.timeout_seconds).toBe(30);
  });

  it('should route through the local Tor proxy by default', () => {
    expect(DEFAULT_CONFIG.proxy).toEqual({ enabled: true, url: 'socks5h://127.0.0.1:9050' });
  });

  it('should pass schema validation', () => {
    const result = ConfigSchema.safeParse(DEFAULT_CONFIG);
    expect(result.success).toBe(true);
  });

  it('should equal the schema defaults', () => {
    expect(ConfigSchema.parse({})).toEqual(DEFAULT_CONFIG);
  });
});

describe('ConfigSchema', () => {
  it('should accept partial config', () => {
    const result = ConfigSchema.safeParse({ scan: { concurrency: 16 } });
    expect(result.success).toBe(true);
  });

  it('should reject a concurrency of zero', () => {
    const result = ConfigSchema.safeParse({ scan: { concurrency: 0 } });
    expect(result.success).toBe(false);
  });

  it('should reject a non-SOCKS proxy URL', () => {
    const result = ConfigSchema.safeParse({ proxy: { url: 'http://127.0.0.1:8080' } });
    expect(result.success).toBe(false);
  });

  it('should reject an unknown output format', () => {
    const result = ConfigSchema.safeParse({ output: { format: 'csv' } });
    expect(result.success).toBe(false);
  });
});

describe('deepMerge', () => {
  it('should deep merge nested objects', () => {
    const result = deepMerge({ level1: { a: 1, b: 2 } }, { level1: { b: 3, c: 4 } });
    expect(result).toEqual({ level1: { a: 1, b: 3, c: 4 } });
  });

  it('should not modify original objects', () => {
    const target = { a: 1 };
    const source = { b: 2 };

    deepMerge(target, source);

    expect(target).toEqual({ a: 1 });
    expect(source).toEqual({ b: 2 });
  });

  it('should handle arrays by replacement', () => {
    const result = deepMerge({ arr: [1, 2, 3] }, { arr: [4, 5] });
    expect(result.arr).toEqual([4, 5]);
  });

  it('should skip undefined values in source', () => {
    const result = deepMerge({ a: 1, b: 2 }, { a: undefined, c: 3 });
    expect(result).toEqual({ a: 1, b: 2, c: 3 });
  });
});

describe('loadEnvConfig', () => {
  it('should read every supported variable', () => {
    expect(
      loadEnvConfig({
        SDSTATUS_DIRECTORY_URL: 'https://directory.test/api/',
        SDSTATUS_PROXY_URL: 'socks5h://10.0.0.1:9150',
        SDSTATUS_CONCURRENCY: '4',
        SDSTATUS_TIMEOUT: '90',
        SDSTATUS_LOG_LEVEL: 'debug',
      })
    ).toEqual({
      directory: { url: 'https://directory.test/api/' },
      proxy: { enabled: true, url: 'socks5h://10.0.0.1:9150' },
      scan: { concurrency: 4, timeout_seconds: 90 },
      output: { verbose: true },
    });
  });

  it('should disable the proxy for "none"', () => {
    expect(loadEnvConfig({ SDSTATUS_PROXY_URL: 'none' })).toEqual({ proxy: { enabled: false } });
  });

  it('should ignore non-integer numbers', () => {
    expect(loadEnvConfig({ SDSTATUS_CONCURRENCY: 'eight' })).toEqual({});
  });
});

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sdstatus-config-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should return defaults when nothing is configured', async () => {
    const config = await loadConfig({ cwd: tmpDir, env: {}, homeDir: tmpDir });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('should layer global file, project file and environment', async () => {
    const home = path.join(tmpDir, 'home');
    const project = path.join(tmpDir, 'project');
    await fs.mkdir(path.join(home, '.sdstatus'), { recursive: true });
    await fs.mkdir(project, { recursive: true });
    await fs.writeFile(
      path.join(home, '.sdstatus', 'config.yaml'),
      'scan:\n  concurrency: 2\n  timeout_seconds: 45\noutput:\n  format: pp\n'
    );
    await fs.writeFile(path.join(project, 'sdstatus.config.yaml'), 'scan:\n  concurrency: 12\n');

    const config = await loadConfig({ cwd: project, env: { SDSTATUS_TIMEOUT: '10' }, homeDir: home });

    expect(config.scan).toEqual({ concurrency: 12, timeout_seconds: 10 });
    expect(config.output.format).toBe('pp');
    expect(config.directory.url).toBe(DEFAULT_CONFIG.directory.url);
  });

  it('should raise ConfigError for invalid values', async () => {
    await fs.writeFile(path.join(tmpDir, 'sdstatus.config.yaml'), 'scan:\n  concurrency: 500\n');

    await expect(loadConfig({ cwd: tmpDir, env: {}, homeDir: tmpDir })).rejects.toBeInstanceOf(ConfigError);
  });

  it('should raise ConfigError for a global file that is not valid YAML', async () => {
    const home = path.join(tmpDir, 'home');
    const globalFile = path.join(home, '.sdstatus', 'config.yaml');
    await fs.mkdir(path.dirname(globalFile), { recursive: true });
    await fs.writeFile(globalFile, 'scan:\n  concurrency: [1, 2\n');

    const error = await loadConfig({ cwd: tmpDir, env: {}, homeDir: home }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      code: 'ConfigInvalid',
      message: expect.stringContaining(`Invalid global configuration ${globalFile}:`),
    });
  });
});

describe('applyOverrides', () => {
  it('should apply command-line flags', () => {
    const config = applyOverrides(DEFAULT_CONFIG, {
      concurrency: 3,
      timeoutSeconds: 5,
      proxyUrl: 'socks5://127.0.0.1:1080',
      format: 'pp',
      verbose: true,
    });

    expect(config.scan).toEqual({ concurrency: 3, timeout_seconds: 5 });
    expect(config.proxy).toEqual({ enabled: true, url: 'socks5://127.0.0.1:1080' });
    expect(config.output).toEqual({ format: 'pp', verbose: true });
  });

  it('should turn the proxy off with proxy: false', () => {
    expect(applyOverrides(DEFAULT_CONFIG, { proxy: false }).proxy.enabled).toBe(false);
  });

  it('should leave unset flags alone', () => {
    expect(applyOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
  });

  it('should raise ConfigError for values out of range', () => {
    expect(() => applyOverrides(DEFAULT_CONFIG, { concurrency: 100 })).toThrow(ConfigError);
  });
});

describe('validateConfig', () => {
  it('should name the invalid setting', () => {
    expect(() => validateConfig({ scan: { timeout_seconds: 0 } })).toThrow(
      'Invalid configuration: scan.timeout_seconds: Number must be greater than or equal to 1'
    );
  });
});
