/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { createScanCommand, createL10nCommand } from './commands/index.js';
import { printError } from './output.js';

// Re-export
export * from './output.js';
export * from './commands/index.js';

/**
 * Package version - read from package.json
 */
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../../package.json');
export const VERSION: string = packageJson.version;

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('sdstatus')
    .description('Reports metadata about SecureDrop sites')
    .version(VERSION)
    .option('-v, --verbose', 'Enable verbose output')
    .option('--no-color', 'Disable colored output');

  program.addCommand(createScanCommand());
  program.addCommand(createL10nCommand());

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}
