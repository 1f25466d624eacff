/**
 * Endpoint prober
 * Fetches one site's /metadata document and turns the result into an outcome
 */

import {
  MetadataDocumentSchema,
  metadataFromDocument,
  type EndpointDescriptor,
  type MetadataRecord,
  type ProbeError,
  type ProbeOutcome,
} from '../types/scan.js';
import { TransportError, errorMessage } from '../types/errors.js';
import type { Transport, TransportResponse } from './transport.js';

/**
 * Build the metadata URL for an onion address
 *
 * Bare addresses get an http:// scheme; trailing slashes are dropped.
 */
export function metadataUrlFor(onionAddress: string): string {
  const trimmed = onionAddress.trim().replace(/\/+$/, '');
  const base = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  return `${base}/metadata`;
}

/**
 * Decode a metadata response body
 */
function decodeMetadata(
  body: string
): { ok: true; value: MetadataRecord } | { ok: false; error: ProbeError } {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    return { ok: false, error: { kind: 'Malformed', message: `Invalid JSON: ${errorMessage(error)}` } };
  }

  const parsed = MetadataDocumentSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return {
      ok: false,
      error: { kind: 'Malformed', message: `Unexpected metadata schema: ${where}${issue?.message ?? 'invalid'}` },
    };
  }

  return { ok: true, value: metadataFromDocument(parsed.data) };
}

/**
 * Probe a single site
 *
 * Issues exactly one request and never rejects: every problem is returned
 * as a failure outcome.
 */
export async function probeEndpoint(
  descriptor: EndpointDescriptor,
  transport: Transport
): Promise<ProbeOutcome> {
  const metadataUrl = metadataUrlFor(descriptor.onionAddress);
  const fail = (error: ProbeError): ProbeOutcome => ({ type: 'failure', descriptor, metadataUrl, error });

  let response: TransportResponse;
  try {
    response = await transport.get(metadataUrl);
  } catch (error) {
    if (error instanceof TransportError) {
      return fail({ kind: error.kind, message: error.message });
    }
    return fail({ kind: 'Unreachable', message: errorMessage(error) });
  }

  if (response.status < 200 || response.status > 299) {
    return fail({ kind: 'HttpError', message: `HTTP status ${response.status}`, status: response.status });
  }

  const decoded = decodeMetadata(response.body);
  if (!decoded.ok) {
    return fail(decoded.error);
  }

  return { type: 'success', descriptor, metadataUrl, metadata: decoded.value };
}
