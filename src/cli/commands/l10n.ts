/**
 * L10n command
 * Reports which SecureDrop sites support each language
 */

import { Command } from 'commander';
import path from 'node:path';
import { collectDescriptors, createTransport, executeScan } from '../../workflow/scan-workflow.js';
import { loadScanResult } from '../../state/persistence.js';
import { buildL10nReport, l10nReportToJson, renderL10nReport } from '../../scan/aggregator.js';
import type { ScanResult } from '../../types/scan.js';
import { printInfo } from '../output.js';
import {
  addNetworkOptions,
  exitWithError,
  networkOverrides,
  resolveConfig,
  type NetworkOptions,
} from './shared.js';

interface L10nCommandOptions extends NetworkOptions {
  input?: string;
  json?: boolean;
}

/**
 * Create the l10n command
 */
export function createL10nCommand(): Command {
  const l10n = new Command('l10n')
    .description('Report localization coverage from scanned metadata')
    .option('-i, --input <file>', 'JSON output of a previous "scan"; scans the directory when omitted')
    .option('--json', 'Output as JSON');

  addNetworkOptions(l10n).action(async (options: L10nCommandOptions, command: Command) => {
    try {
      const config = await resolveConfig(command, networkOverrides(options));

      let result: ScanResult;
      if (options.input) {
        const inputPath = path.resolve(options.input);
        printInfo(`Reading scan results from ${inputPath}`);
        result = await loadScanResult(inputPath);
      } else {
        const transport = createTransport(config);
        const descriptors = await collectDescriptors({ addresses: [], directory: true }, config, transport);
        result = await executeScan(descriptors, config, transport);
      }

      const report = buildL10nReport(result);
      process.stdout.write(
        options.json ? `${JSON.stringify(l10nReportToJson(report), null, 2)}\n` : renderL10nReport(report)
      );
    } catch (error) {
      exitWithError(error);
    }
  });

  return l10n;
}
