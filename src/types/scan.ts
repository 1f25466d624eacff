/**
 * Scan type definitions.
 *
 * Zod schemas for the two documents fetched over the network (the
 * directory listing and each site's metadata), the persisted scan file,
 * and the in-memory records the scanner passes around.
 */
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Directory listing
// ---------------------------------------------------------------------------

export const DirectoryEntrySchema = z.object({
  title: z.string(),
  onion_address: z.string().min(1),
  landing_page_url: z.string().optional(),
  onion_name: z.string().nullable().optional(),
  slug: z.string().optional(),
});
export type DirectoryEntry = z.infer<typeof DirectoryEntrySchema>;

export const DirectoryListingSchema = z.array(DirectoryEntrySchema);

/**
 * A site to probe. Created once by a descriptor source and never mutated.
 */
export interface EndpointDescriptor {
  readonly title: string;
  readonly onionAddress: string;
  readonly landingPageUrl?: string;
  readonly onionName?: string;
  readonly slug?: string;
}

export function descriptorFromEntry(entry: DirectoryEntry): EndpointDescriptor {
  return {
    title: entry.title,
    onionAddress: entry.onion_address,
    ...(entry.landing_page_url ? { landingPageUrl: entry.landing_page_url } : {}),
    ...(entry.onion_name ? { onionName: entry.onion_name } : {}),
    ...(entry.slug ? { slug: entry.slug } : {}),
  };
}

// ---------------------------------------------------------------------------
// Site metadata
// ---------------------------------------------------------------------------

export const MetadataDocumentSchema = z.object({
  sd_version: z.string(),
  server_os: z.string(),
  gpg_fpr: z.string(),
  v2_source_url: z.string().nullable().optional(),
  v3_source_url: z.string(),
  supported_languages: z.array(z.string()),
});
export type MetadataDocument = z.infer<typeof MetadataDocumentSchema>;

export interface MetadataRecord {
  readonly version: string;
  readonly serverOs: string;
  readonly fingerprint: string;
  readonly v2SourceUrl?: string;
  readonly v3SourceUrl: string;
  readonly supportedLanguages: readonly string[];
}

export function metadataFromDocument(doc: MetadataDocument): MetadataRecord {
  return {
    version: doc.sd_version,
    serverOs: doc.server_os,
    fingerprint: doc.gpg_fpr,
    ...(doc.v2_source_url ? { v2SourceUrl: doc.v2_source_url } : {}),
    v3SourceUrl: doc.v3_source_url,
    supportedLanguages: [...doc.supported_languages],
  };
}

export function metadataToDocument(record: MetadataRecord): MetadataDocument {
  return {
    sd_version: record.version,
    server_os: record.serverOs,
    gpg_fpr: record.fingerprint,
    ...(record.v2SourceUrl ? { v2_source_url: record.v2SourceUrl } : {}),
    v3_source_url: record.v3SourceUrl,
    supported_languages: [...record.supportedLanguages],
  };
}

// ---------------------------------------------------------------------------
// Probe outcomes
// ---------------------------------------------------------------------------

export const ProbeErrorKindSchema = z.enum(['Unreachable', 'Timeout', 'Malformed', 'HttpError']);
export type ProbeErrorKind = z.infer<typeof ProbeErrorKindSchema>;

export const ProbeErrorSchema = z.object({
  kind: ProbeErrorKindSchema,
  message: z.string(),
  status: z.number().int().optional(),
});
export type ProbeError = z.infer<typeof ProbeErrorSchema>;

export interface ProbeSuccess {
  readonly type: 'success';
  readonly descriptor: EndpointDescriptor;
  readonly metadataUrl: string;
  readonly metadata: MetadataRecord;
}

export interface ProbeFailure {
  readonly type: 'failure';
  readonly descriptor: EndpointDescriptor;
  readonly metadataUrl: string;
  readonly error: ProbeError;
}

export type ProbeOutcome = ProbeSuccess | ProbeFailure;

/**
 * One outcome per scanned descriptor, in the order the descriptors were given.
 */
export type ScanResult = readonly ProbeOutcome[];

// ---------------------------------------------------------------------------
// Persisted scan file
// ---------------------------------------------------------------------------

export const PersistedOutcomeSchema = z.object({
  title: z.string(),
  onion_address: z.string(),
  landing_page_url: z.string().optional(),
  onion_name: z.string().optional(),
  slug: z.string().optional(),
  url: z.string(),
  available: z.boolean(),
  error: ProbeErrorSchema.nullable(),
  metadata: MetadataDocumentSchema.nullable(),
});
export type PersistedOutcome = z.infer<typeof PersistedOutcomeSchema>;

export const PersistedScanSchema = z.array(PersistedOutcomeSchema);

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

export interface LocaleCoverage {
  readonly locale: string;
  readonly sites: readonly string[];
}

/**
 * Sites advertising each locale. Locales and sites are sorted.
 */
export type L10nReport = readonly LocaleCoverage[];

export interface ScanSummary {
  total: number;
  available: number;
  failed: number;
  failuresByKind: Record<ProbeErrorKind, number>;
  versions: Record<string, number>;
  serverOs: Record<string, number>;
}
