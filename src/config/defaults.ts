/**
 * Default configuration values
 */

import type { Config } from './schema.js';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  directory: {
    url: 'https://securedrop.org/api/v1/directory/',
  },
  scan: {
    concurrency: 8,
    timeout_seconds: 30,
  },
  proxy: {
    enabled: true,
    // Tor's local SOCKS port; socks5h resolves .onion names on the proxy side
    url: 'socks5h://127.0.0.1:9050',
  },
  output: {
    format: 'json',
    verbose: false,
  },
};

/**
 * Global config directory path
 */
export const GLOBAL_CONFIG_DIR = '.sdstatus';

/**
 * Config file name in .sdstatus directory
 */
export const CONFIG_FILE_NAME = 'config.yaml';

/**
 * Environment variable names
 */
export const ENV_VARS = {
  DIRECTORY_URL: 'SDSTATUS_DIRECTORY_URL',
  PROXY_URL: 'SDSTATUS_PROXY_URL',
  CONCURRENCY: 'SDSTATUS_CONCURRENCY',
  TIMEOUT: 'SDSTATUS_TIMEOUT',
  LOG_LEVEL: 'SDSTATUS_LOG_LEVEL',
} as const;
