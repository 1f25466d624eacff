/**
 * Scan workflow
 * Wires configuration, descriptor sources, the orchestrator and CLI progress together
 */

import type { Config } from '../config/index.js';
import { HttpTransport, type Transport } from '../scan/transport.js';
import { fetchDirectory } from '../scan/directory.js';
import { descriptorsFromAddresses, readDescriptorFile } from '../scan/sources.js';
import { ScanOrchestrator, type ScanProgressEvent } from '../scan/orchestrator.js';
import type { EndpointDescriptor, ScanResult } from '../types/scan.js';
import {
  isVerbose,
  printDebug,
  printInfo,
  printWarning,
  startSpinner,
  updateSpinner,
  succeedSpinner,
  failSpinner,
} from '../cli/output.js';

/**
 * Where the sites to scan come from
 */
export interface ScanSources {
  addresses: string[];
  inputFile?: string;
  directory: boolean;
}

/**
 * Create the HTTP transport described by the configuration
 */
export function createTransport(config: Config): Transport {
  return new HttpTransport({
    timeoutMs: config.scan.timeout_seconds * 1000,
    proxyUrl: config.proxy.enabled ? config.proxy.url : null,
  });
}

/**
 * Gather descriptors from every requested source
 *
 * Order: command-line addresses, input file, directory. The directory is
 * used when no other source is given.
 */
export async function collectDescriptors(
  sources: ScanSources,
  config: Config,
  transport: Transport
): Promise<EndpointDescriptor[]> {
  const descriptors: EndpointDescriptor[] = [];

  if (sources.addresses.length > 0) {
    for (const address of sources.addresses) {
      printDebug(`Will scan ${address}`);
    }
    descriptors.push(...descriptorsFromAddresses(sources.addresses));
  }

  if (sources.inputFile) {
    printInfo(`Reading sites to scan from ${sources.inputFile}`);
    descriptors.push(...(await readDescriptorFile(sources.inputFile)));
  }

  const useDirectory = sources.directory || (sources.addresses.length === 0 && !sources.inputFile);
  if (useDirectory) {
    startSpinner(`Reading sites to scan from ${config.directory.url}`);
    try {
      const listing = await fetchDirectory(transport, config.directory.url);
      succeedSpinner(`Directory lists ${listing.length} sites`);
      descriptors.push(...listing);
    } catch (error) {
      failSpinner('Could not read the directory');
      throw error;
    }
  }

  return descriptors;
}

function reportProgress(event: ScanProgressEvent): void {
  if (event.type === 'probe-start') {
    printDebug(`Checking ${event.descriptor.title}`);
    return;
  }

  const { outcome } = event;
  // Failures always show in the pp table; the log line is verbose only
  if (outcome.type === 'failure' && isVerbose()) {
    printWarning(`Error retrieving ${outcome.descriptor.title}: ${outcome.error.message}`);
  } else if (outcome.type === 'success') {
    printDebug(`Finished checking ${outcome.descriptor.title}`);
  }
  updateSpinner(`Scanned ${event.completed}/${event.total} sites`);
}

/**
 * Probe every descriptor under the configured concurrency
 */
export async function executeScan(
  descriptors: readonly EndpointDescriptor[],
  config: Config,
  transport: Transport
): Promise<ScanResult> {
  const orchestrator = new ScanOrchestrator({
    transport,
    concurrency: config.scan.concurrency,
    onProgress: reportProgress,
  });

  startSpinner(`Scanning ${descriptors.length} sites (${orchestrator.concurrency} at a time)`);
  try {
    const result = await orchestrator.run(descriptors);
    const available = result.filter((outcome) => outcome.type === 'success').length;
    succeedSpinner(`Scanned ${result.length} sites, ${available} available`);
    return result;
  } catch (error) {
    failSpinner('Scan failed');
    throw error;
  }
}
