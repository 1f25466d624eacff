/**
 * Directory fetcher
 * Reads the list of SecureDrop sites from the directory API
 */

import { ZodError } from 'zod';
import { DirectoryListingSchema, descriptorFromEntry, type EndpointDescriptor } from '../types/scan.js';
import { DirectoryError, TransportError, errorMessage } from '../types/errors.js';
import type { Transport, TransportResponse } from './transport.js';

/**
 * Fetch the directory and return its entries in listing order
 *
 * @throws DirectoryError DirectoryUnavailable when no 2xx response arrives,
 *   DirectoryMalformed when the body is not a valid listing
 */
export async function fetchDirectory(
  transport: Transport,
  directoryUrl: string
): Promise<EndpointDescriptor[]> {
  let response: TransportResponse;
  try {
    response = await transport.get(directoryUrl);
  } catch (error) {
    const reason = error instanceof TransportError ? `${error.kind}: ${error.message}` : errorMessage(error);
    throw new DirectoryError('DirectoryUnavailable', `Could not reach directory ${directoryUrl} (${reason})`, {
      cause: error,
    });
  }

  if (response.status < 200 || response.status > 299) {
    throw new DirectoryError(
      'DirectoryUnavailable',
      `Directory ${directoryUrl} returned HTTP status ${response.status}`
    );
  }

  try {
    const listing = DirectoryListingSchema.parse(JSON.parse(response.body));
    return listing.map(descriptorFromEntry);
  } catch (error) {
    const detail =
      error instanceof ZodError
        ? error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
        : errorMessage(error);
    throw new DirectoryError('DirectoryMalformed', `Directory ${directoryUrl} returned an invalid listing: ${detail}`, {
      cause: error,
    });
  }
}
