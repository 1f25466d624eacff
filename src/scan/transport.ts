/**
 * HTTP transport
 * Performs GET requests, optionally routed through a SOCKS proxy (Tor)
 */

import axios, { AxiosError, type AxiosInstance } from 'axios';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { TransportError, errorMessage } from '../types/errors.js';

/**
 * Response of a completed request, whatever its status
 */
export interface TransportResponse {
  status: number;
  body: string;
}

/**
 * A GET against a URL that resolves with the response or rejects with a
 * TransportError when no response arrived
 */
export interface Transport {
  get(url: string): Promise<TransportResponse>;
}

export interface HttpTransportOptions {
  /** Per-request timeout, covering connect and body */
  timeoutMs: number;
  /** SOCKS proxy URL such as socks5h://127.0.0.1:9050, or null to connect directly */
  proxyUrl: string | null;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']);

/**
 * Map an error thrown by axios to a TransportError
 */
export function toTransportError(error: unknown, url: string): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  if (axios.isCancel(error) || (error instanceof AxiosError && error.code && TIMEOUT_CODES.has(error.code))) {
    return new TransportError('Timeout', `Request to ${url} timed out`, { cause: error });
  }

  return new TransportError('Unreachable', `Request to ${url} failed: ${errorMessage(error)}`, {
    cause: error,
  });
}

/**
 * Transport backed by a shared axios instance
 */
export class HttpTransport implements Transport {
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(options: HttpTransportOptions) {
    const agent = options.proxyUrl ? new SocksProxyAgent(options.proxyUrl) : undefined;

    this.timeoutMs = options.timeoutMs;
    this.client = axios.create({
      httpAgent: agent,
      httpsAgent: agent,
      proxy: false,
      timeout: options.timeoutMs,
      // Status handling and decoding belong to the callers
      validateStatus: () => true,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      headers: {
        accept: 'application/json',
      },
    });
  }

  async get(url: string): Promise<TransportResponse> {
    try {
      const response = await this.client.get<unknown>(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return {
        status: response.status,
        body: typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? ''),
      };
    } catch (error) {
      throw toTransportError(error, url);
    }
  }
}
