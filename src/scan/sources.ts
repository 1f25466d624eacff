/**
 * Descriptor sources
 * Sites to scan given on the command line or listed in an input file
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parse as parseCsv } from 'csv-parse/sync';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { EndpointDescriptor } from '../types/scan.js';
import { DescriptorFileError, errorMessage } from '../types/errors.js';

const InputSiteSchema = z.object({
  onion_address: z.string().min(1),
  title: z.string().optional(),
  landing_page_url: z.string().optional(),
});

type InputSite = z.infer<typeof InputSiteSchema>;

const InputFileSchema = z.array(z.union([z.string().min(1), InputSiteSchema]));

const CsvFileSchema = z.array(InputSiteSchema);

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

function descriptorFromSite(site: InputSite): EndpointDescriptor {
  return {
    title: site.title || site.onion_address,
    onionAddress: site.onion_address,
    ...(site.landing_page_url ? { landingPageUrl: site.landing_page_url } : {}),
  };
}

/**
 * Descriptors for addresses given as arguments, titled by their address
 */
export function descriptorsFromAddresses(addresses: readonly string[]): EndpointDescriptor[] {
  return addresses.map((address) => ({ title: address, onionAddress: address }));
}

/**
 * Parse a YAML or JSON site list
 *
 * Each item is either an address or an object with onion_address and an
 * optional title and landing_page_url.
 */
export function parseDescriptorList(content: string): EndpointDescriptor[] {
  const parsed = InputFileSchema.safeParse(parseYaml(content) ?? []);
  if (!parsed.success) {
    throw new Error(describeIssues(parsed.error));
  }

  return parsed.data.map((entry) =>
    typeof entry === 'string' ? { title: entry, onionAddress: entry } : descriptorFromSite(entry)
  );
}

/**
 * Parse a CSV site list with a header row naming its columns
 *
 * onion_address is required; title and landing_page_url are read when
 * present and other columns are ignored.
 */
export function parseDescriptorCsv(content: string): EndpointDescriptor[] {
  const rows: unknown = parseCsv(content, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    trim: true,
  });

  const parsed = CsvFileSchema.safeParse(rows);
  if (!parsed.success) {
    throw new Error(describeIssues(parsed.error));
  }
  return parsed.data.map(descriptorFromSite);
}

/**
 * Read descriptors from an input file
 *
 * @throws DescriptorFileError when the file is missing or malformed
 */
export async function readDescriptorFile(filePath: string): Promise<EndpointDescriptor[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new DescriptorFileError(filePath, `cannot read file (${errorMessage(error)})`, { cause: error });
  }

  try {
    return path.extname(filePath).toLowerCase() === '.csv'
      ? parseDescriptorCsv(content)
      : parseDescriptorList(content);
  } catch (error) {
    throw new DescriptorFileError(filePath, `invalid site list (${errorMessage(error)})`, { cause: error });
  }
}
