/**
 * Scan persistence module
 * Saves scan results as JSON and loads them back for later reports
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import {
  PersistedScanSchema,
  metadataFromDocument,
  metadataToDocument,
  type EndpointDescriptor,
  type PersistedOutcome,
  type ProbeOutcome,
  type ScanResult,
} from '../types/scan.js';
import { ScanFileError, errorMessage } from '../types/errors.js';

/**
 * Convert one outcome to its persisted record
 *
 * @param outcome - Probe outcome
 * @returns Record with null metadata for failures
 */
export function toPersistedOutcome(outcome: ProbeOutcome): PersistedOutcome {
  const { descriptor } = outcome;
  return {
    title: descriptor.title,
    onion_address: descriptor.onionAddress,
    ...(descriptor.landingPageUrl ? { landing_page_url: descriptor.landingPageUrl } : {}),
    ...(descriptor.onionName ? { onion_name: descriptor.onionName } : {}),
    ...(descriptor.slug ? { slug: descriptor.slug } : {}),
    url: outcome.metadataUrl,
    available: outcome.type === 'success',
    error: outcome.type === 'failure' ? { ...outcome.error } : null,
    metadata: outcome.type === 'success' ? metadataToDocument(outcome.metadata) : null,
  };
}

function fromPersistedOutcome(record: PersistedOutcome, position: number): ProbeOutcome {
  const descriptor: EndpointDescriptor = {
    title: record.title,
    onionAddress: record.onion_address,
    ...(record.landing_page_url ? { landingPageUrl: record.landing_page_url } : {}),
    ...(record.onion_name ? { onionName: record.onion_name } : {}),
    ...(record.slug ? { slug: record.slug } : {}),
  };

  if (record.available) {
    if (!record.metadata) {
      throw new Error(`entry ${position} (${record.title}) is available but has no metadata`);
    }
    return {
      type: 'success',
      descriptor,
      metadataUrl: record.url,
      metadata: metadataFromDocument(record.metadata),
    };
  }

  if (!record.error) {
    throw new Error(`entry ${position} (${record.title}) is unavailable but has no error`);
  }
  return { type: 'failure', descriptor, metadataUrl: record.url, error: record.error };
}

/**
 * Serialize a scan result to the persisted JSON text
 */
export function serializeScanResult(result: ScanResult): string {
  return `${JSON.stringify(result.map(toPersistedOutcome), null, 2)}\n`;
}

/**
 * Parse persisted JSON text back into a scan result
 *
 * @throws Error when the text is not a valid scan file
 */
export function parseScanResult(content: string): ScanResult {
  const data: unknown = JSON.parse(content);
  const parsed = PersistedScanSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '));
  }
  return parsed.data.map(fromPersistedOutcome);
}

/**
 * Save a scan result using atomic write
 * Uses temp file + rename pattern to prevent a partial file
 *
 * @param filePath - Destination file
 * @param result - Scan result to save
 */
export async function saveScanResult(filePath: string, result: ScanResult): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.tmp.${Date.now()}`;
  try {
    await fs.writeFile(tempPath, serializeScanResult(result), 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Load a previously saved scan result
 *
 * @throws ScanFileError when the file cannot be read or is not a scan file
 */
export async function loadScanResult(filePath: string): Promise<ScanResult> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ScanFileError(filePath, `cannot read file (${errorMessage(error)})`, { cause: error });
  }

  try {
    return parseScanResult(content);
  } catch (error) {
    throw new ScanFileError(filePath, `not a valid scan file (${errorMessage(error)})`, { cause: error });
  }
}
