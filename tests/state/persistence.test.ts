/**
 * Scan persistence tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import {
  loadScanResult,
  parseScanResult,
  saveScanResult,
  serializeScanResult,
  toPersistedOutcome,
} from '../../src/state/persistence.js';
import { buildL10nReport } from '../../src/scan/aggregator.js';
import { ScanFileError } from '../../src/types/errors.js';
import { metadataFromDocument, type ScanResult } from '../../src/types/scan.js';
import { metadataDocument } from '../helpers/fake-transport.js';

const SCAN: ScanResult = [
  {
    type: 'success',
    descriptor: {
      title: 'Alpha',
      onionAddress: 'alpha.onion',
      landingPageUrl: 'https://alpha.test/securedrop',
    },
    metadataUrl: 'http://alpha.onion/metadata',
    metadata: metadataFromDocument(metadataDocument({ supported_languages: ['en', 'fr'] })),
  },
  {
    type: 'failure',
    descriptor: { title: 'Gamma', onionAddress: 'gamma.onion' },
    metadataUrl: 'http://gamma.onion/metadata',
    error: { kind: 'HttpError', message: 'HTTP status 503', status: 503 },
  },
  {
    type: 'success',
    descriptor: { title: 'Beta', onionAddress: 'beta.onion' },
    metadataUrl: 'http://beta.onion/metadata',
    metadata: metadataFromDocument(metadataDocument({ supported_languages: ['en'] })),
  },
];

describe('toPersistedOutcome', () => {
  it('should write failures with null metadata', () => {
    expect(toPersistedOutcome(SCAN[1])).toEqual({
      title: 'Gamma',
      onion_address: 'gamma.onion',
      url: 'http://gamma.onion/metadata',
      available: false,
      error: { kind: 'HttpError', message: 'HTTP status 503', status: 503 },
      metadata: null,
    });
  });

  it('should write successes with the metadata document', () => {
    expect(toPersistedOutcome(SCAN[0])).toEqual({
      title: 'Alpha',
      onion_address: 'alpha.onion',
      landing_page_url: 'https://alpha.test/securedrop',
      url: 'http://alpha.onion/metadata',
      available: true,
      error: null,
      metadata: metadataDocument({ supported_languages: ['en', 'fr'] }),
    });
  });
});

describe('parseScanResult', () => {
  it('should restore the in-memory result', () => {
    expect(parseScanResult(serializeScanResult(SCAN))).toEqual(SCAN);
  });

  it('should reject an available entry without metadata', () => {
    const content = JSON.stringify([
      { title: 'Alpha', onion_address: 'alpha.onion', url: 'u', available: true, error: null, metadata: null },
    ]);
    expect(() => parseScanResult(content)).toThrow('entry 0 (Alpha) is available but has no metadata');
  });

  it('should reject documents that are not scan files', () => {
    expect(() => parseScanResult('{"title": "Alpha"}')).toThrow();
  });
});

describe('saveScanResult / loadScanResult', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sdstatus-persistence-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should produce the same report after a save and reload', async () => {
    const filePath = path.join(tmpDir, 'nested', 'scan.json');

    await saveScanResult(filePath, SCAN);
    const reloaded = await loadScanResult(filePath);

    expect(reloaded).toHaveLength(3);
    expect(buildL10nReport(reloaded)).toEqual(buildL10nReport(SCAN));
    expect(await fs.readdir(path.dirname(filePath))).toEqual(['scan.json']);
  });

  it('should write a JSON array', async () => {
    const filePath = path.join(tmpDir, 'scan.json');
    await saveScanResult(filePath, SCAN);

    const data: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    expect(Array.isArray(data)).toBe(true);
  });

  it('should raise ScanFileError for a missing file', async () => {
    await expect(loadScanResult(path.join(tmpDir, 'missing.json'))).rejects.toBeInstanceOf(ScanFileError);
  });

  it('should raise ScanFileError for invalid JSON', async () => {
    const filePath = path.join(tmpDir, 'scan.json');
    await fs.writeFile(filePath, '{ not json');

    await expect(loadScanResult(filePath)).rejects.toMatchObject({ code: 'ScanFileInvalid' });
  });
});
