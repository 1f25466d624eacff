/**
 * Scan command
 * Retrieves metadata from SecureDrop sites
 */

import { Command, Option } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { collectDescriptors, createTransport, executeScan } from '../../workflow/scan-workflow.js';
import { saveScanResult, serializeScanResult } from '../../state/persistence.js';
import { summarizeScan } from '../../scan/aggregator.js';
import type { OutputFormat } from '../../config/index.js';
import { formatScanTable, isVerbose, printScanSummary, printSuccess } from '../output.js';
import {
  addNetworkOptions,
  exitWithError,
  networkOverrides,
  resolveConfig,
  type NetworkOptions,
} from './shared.js';

interface ScanCommandOptions extends NetworkOptions {
  directory?: boolean;
  inputFile?: string;
  outputFile?: string;
  format?: OutputFormat;
}

/**
 * Create the scan command
 */
export function createScanCommand(): Command {
  const scan = new Command('scan')
    .description('Retrieve metadata from SecureDrop sites')
    .argument('[addresses...]', 'Onion addresses to scan')
    .option('-d, --directory', 'Read sites to scan from the SecureDrop directory')
    .option('-i, --input-file <file>', 'Read sites to scan from a CSV (onion_address,title header), YAML or JSON list')
    .option('-o, --output-file <file>', 'Write output to the named file instead of the terminal')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(['json', 'pp']));

  addNetworkOptions(scan).action(
    async (addresses: string[], options: ScanCommandOptions, command: Command) => {
      try {
        const config = await resolveConfig(command, {
          ...networkOverrides(options),
          format: options.format,
        });
        const transport = createTransport(config);

        const descriptors = await collectDescriptors(
          { addresses, inputFile: options.inputFile, directory: options.directory ?? false },
          config,
          transport
        );
        const result = await executeScan(descriptors, config, transport);
        const format = config.output.format;

        if (format === 'pp' || isVerbose()) {
          printScanSummary(summarizeScan(result));
        }

        if (options.outputFile) {
          const outputPath = path.resolve(options.outputFile);
          if (format === 'json') {
            await saveScanResult(outputPath, result);
          } else {
            await fs.writeFile(outputPath, formatScanTable(result), 'utf-8');
          }
          printSuccess(`Wrote ${result.length} results to ${outputPath}`);
          return;
        }

        process.stdout.write(format === 'json' ? serializeScanResult(result) : formatScanTable(result));
      } catch (error) {
        exitWithError(error);
      }
    }
  );

  return scan;
}
