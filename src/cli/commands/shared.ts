/**
 * Options and helpers shared by the scan and l10n commands
 */

import { Command, InvalidArgumentError } from 'commander';
import { applyOverrides, loadConfig, type Config, type ConfigOverrides } from '../../config/index.js';
import { SdStatusError } from '../../types/errors.js';
import { printError, setVerbose, stopSpinner } from '../output.js';

/**
 * Network flags common to every command that reaches the network
 */
export interface NetworkOptions {
  directoryUrl?: string;
  concurrency?: number;
  timeout?: number;
  proxy?: string | boolean;
}

/**
 * Parse a positive integer flag value
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Add the network flags to a command
 */
export function addNetworkOptions(command: Command): Command {
  return command
    .option('--directory-url <url>', 'Directory API to read sites from')
    .option('-c, --concurrency <n>', 'Maximum sites scanned at the same time', parsePositiveInt)
    .option('-t, --timeout <seconds>', 'Maximum time to wait for a response from a site', parsePositiveInt)
    .option('--proxy <url>', 'SOCKS proxy to route requests through')
    .option('--no-proxy', 'Connect directly instead of through the SOCKS proxy');
}

/**
 * Map network flags onto config overrides
 */
export function networkOverrides(options: NetworkOptions): ConfigOverrides {
  return {
    directoryUrl: options.directoryUrl,
    concurrency: options.concurrency,
    timeoutSeconds: options.timeout,
    proxyUrl: typeof options.proxy === 'string' ? options.proxy : undefined,
    proxy: options.proxy === false ? false : undefined,
  };
}

/**
 * Load configuration and apply the command's flags
 */
export async function resolveConfig(command: Command, overrides: ConfigOverrides): Promise<Config> {
  const globals = command.optsWithGlobals<{ verbose?: boolean }>();
  const config = applyOverrides(await loadConfig(), {
    ...overrides,
    verbose: globals.verbose ?? overrides.verbose,
  });
  setVerbose(config.output.verbose);
  return config;
}

/**
 * Report a fatal command error and exit
 */
export function exitWithError(error: unknown): never {
  stopSpinner();
  if (error instanceof SdStatusError) {
    printError(`${error.message} [${error.code}]`);
  } else {
    printError(error instanceof Error ? error.message : 'Unknown error');
  }
  process.exit(1);
}
