/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml } from 'yaml';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { ConfigSchema, type Config, type OutputFormat } from './schema.js';
import { DEFAULT_CONFIG, GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME, ENV_VARS } from './defaults.js';
import { ConfigError, errorMessage } from '../types/errors.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';

type ConfigLayer = Record<string, unknown>;

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('sdstatus', {
  searchPlaces: [
    'sdstatus.config.yaml',
    'sdstatus.config.yml',
    '.sdstatusrc.yaml',
    '.sdstatusrc.yml',
    '.sdstatusrc',
    '.sdstatus/config.yaml',
    '.sdstatus/config.yml',
  ],
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

function isPlainObject(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load global configuration from ~/.sdstatus/config.yaml
 */
async function loadGlobalConfig(homeDir: string): Promise<ConfigLayer> {
  const globalConfigPath = path.join(homeDir, GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await fs.readFile(globalConfigPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Cannot read ${globalConfigPath}: ${errorMessage(error)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Invalid global configuration ${globalConfigPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return isPlainObject(parsed) ? parsed : {};
}

/**
 * Load project-specific configuration
 */
async function loadProjectConfig(cwd?: string): Promise<ConfigLayer> {
  try {
    const result = await explorer.search(cwd);
    if (result && !result.isEmpty && isPlainObject(result.config)) {
      return result.config;
    }
    return {};
  } catch (error) {
    throw new ConfigError(`Invalid project configuration: ${errorMessage(error)}`, { cause: error });
  }
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const config: ConfigLayer = {};

  const directoryUrl = env[ENV_VARS.DIRECTORY_URL];
  if (directoryUrl) {
    config.directory = { url: directoryUrl };
  }

  // "none" routes requests directly, without a proxy
  const proxyUrl = env[ENV_VARS.PROXY_URL];
  if (proxyUrl === 'none') {
    config.proxy = { enabled: false };
  } else if (proxyUrl) {
    config.proxy = { enabled: true, url: proxyUrl };
  }

  const scan: ConfigLayer = {};
  const concurrency = parseInteger(env[ENV_VARS.CONCURRENCY]);
  if (concurrency !== undefined) {
    scan.concurrency = concurrency;
  }
  const timeout = parseInteger(env[ENV_VARS.TIMEOUT]);
  if (timeout !== undefined) {
    scan.timeout_seconds = timeout;
  }
  if (Object.keys(scan).length > 0) {
    config.scan = scan;
  }

  if (env[ENV_VARS.LOG_LEVEL] === 'debug') {
    config.output = { verbose: true };
  }

  return config;
}

/**
 * Deep merge configuration objects
 */
export function deepMerge<T extends ConfigLayer>(target: T, source: ConfigLayer): T {
  const result: ConfigLayer = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result as T;
}

/**
 * Validate a merged configuration
 *
 * @throws ConfigError listing every invalid setting
 */
export function validateConfig(candidate: unknown): Config {
  const result = ConfigSchema.safeParse(candidate);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
  return result.data;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

/**
 * Load and merge configuration from all sources
 * Priority: env vars > project config > global config > defaults
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const globalConfig = await loadGlobalConfig(options.homeDir ?? homedir());
  const projectConfig = await loadProjectConfig(options.cwd);
  const envConfig = loadEnvConfig(options.env);

  let merged: ConfigLayer = deepMerge({ ...DEFAULT_CONFIG }, globalConfig);
  merged = deepMerge(merged, projectConfig);
  merged = deepMerge(merged, envConfig);

  return validateConfig(merged);
}

/**
 * Settings given as command-line flags
 */
export interface ConfigOverrides {
  directoryUrl?: string;
  concurrency?: number;
  timeoutSeconds?: number;
  proxyUrl?: string;
  proxy?: boolean;
  format?: OutputFormat;
  verbose?: boolean;
}

/**
 * Apply command-line flags on top of a loaded configuration
 */
export function applyOverrides(config: Config, overrides: ConfigOverrides): Config {
  const layer: ConfigLayer = {
    directory: { url: overrides.directoryUrl },
    scan: { concurrency: overrides.concurrency, timeout_seconds: overrides.timeoutSeconds },
    proxy: {
      url: overrides.proxyUrl,
      enabled: overrides.proxy === false ? false : overrides.proxyUrl ? true : undefined,
    },
    output: { format: overrides.format, verbose: overrides.verbose || undefined },
  };

  return validateConfig(deepMerge({ ...config }, layer));
}
