/**
 * Transport tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createServer, type Server } from 'node:http';
import { AxiosError, CanceledError } from 'axios';
import { HttpTransport, toTransportError } from '../../src/scan/transport.js';
import { probeEndpoint } from '../../src/scan/prober.js';
import { TransportError } from '../../src/types/errors.js';
import { descriptor, metadataDocument } from '../helpers/fake-transport.js';

const METADATA_URL = 'http://alpha.onion/metadata';

describe('toTransportError', () => {
  it('should classify an axios timeout as Timeout', () => {
    const error = toTransportError(new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'), METADATA_URL);

    expect(error).toBeInstanceOf(TransportError);
    expect(error.kind).toBe('Timeout');
    expect(error.message).toBe(`Request to ${METADATA_URL} timed out`);
  });

  it('should classify an aborted request as Timeout', () => {
    expect(toTransportError(new CanceledError(), METADATA_URL).kind).toBe('Timeout');
  });

  it('should classify connection failures as Unreachable', () => {
    const error = toTransportError(new AxiosError('connect ECONNREFUSED 127.0.0.1:9050', 'ECONNREFUSED'), METADATA_URL);

    expect(error.kind).toBe('Unreachable');
    expect(error.message).toBe(`Request to ${METADATA_URL} failed: connect ECONNREFUSED 127.0.0.1:9050`);
  });

  it('should classify unknown values as Unreachable', () => {
    expect(toTransportError('boom', METADATA_URL).kind).toBe('Unreachable');
  });

  it('should return a TransportError unchanged', () => {
    const original = new TransportError('Timeout', 'already classified');
    expect(toTransportError(original, METADATA_URL)).toBe(original);
  });
});

async function listen(server: Server): Promise<string> {
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return `http://127.0.0.1:${address.port}`;
}

async function close(server: Server): Promise<void> {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
}

describe('HttpTransport', () => {
  const metadataBody = JSON.stringify(metadataDocument());
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = createServer((req, res) => {
      if (req.url === '/metadata') {
        res.writeHead(200, { 'content-type': 'application/json' });
        res.end(metadataBody);
        return;
      }
      if (req.url === '/hang/metadata') {
        // Never answers
        return;
      }
      res.writeHead(404, { 'content-type': 'text/plain' });
      res.end('not found');
    });
    baseUrl = await listen(server);
  });

  afterAll(async () => {
    await close(server);
  });

  it('should construct with a SOCKS proxy', () => {
    expect(new HttpTransport({ timeoutMs: 1000, proxyUrl: 'socks5h://127.0.0.1:9050' })).toBeInstanceOf(HttpTransport);
  });

  it('should return a JSON body as text', async () => {
    const transport = new HttpTransport({ timeoutMs: 2000, proxyUrl: null });

    const response = await transport.get(`${baseUrl}/metadata`);

    expect(response).toEqual({ status: 200, body: metadataBody });
  });

  it('should pass a 404 through as a response', async () => {
    const transport = new HttpTransport({ timeoutMs: 2000, proxyUrl: null });

    const response = await transport.get(`${baseUrl}/missing`);

    expect(response).toEqual({ status: 404, body: 'not found' });
  });

  it('should let the prober turn responses into outcomes', async () => {
    const transport = new HttpTransport({ timeoutMs: 2000, proxyUrl: null });

    const up = await probeEndpoint(descriptor('Local', baseUrl), transport);
    const down = await probeEndpoint(descriptor('Missing', `${baseUrl}/missing`), transport);

    expect(up.type).toBe('success');
    expect(down).toMatchObject({
      type: 'failure',
      error: { kind: 'HttpError', message: 'HTTP status 404', status: 404 },
    });
  });

  it('should reject with Timeout when the server never answers', async () => {
    const transport = new HttpTransport({ timeoutMs: 200, proxyUrl: null });
    const url = `${baseUrl}/hang/metadata`;
    const started = Date.now();

    await expect(transport.get(url)).rejects.toMatchObject({
      kind: 'Timeout',
      message: `Request to ${url} timed out`,
    });
    expect(Date.now() - started).toBeLessThan(2000);
  });

  it('should reject with Unreachable when the connection is refused', async () => {
    const closed = createServer();
    const closedUrl = `${await listen(closed)}/metadata`;
    await close(closed);
    const transport = new HttpTransport({ timeoutMs: 2000, proxyUrl: null });

    const error = await transport.get(closedUrl).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ kind: 'Unreachable' });
  });
});
