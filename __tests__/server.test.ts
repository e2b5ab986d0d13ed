/**
 * HTTP API 테스트
 * 실제 포트(0번)로 띄우고 fetch 로 호출한다. 원문 수집과 시트 기록은 가짜로 대체.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import type { Server } from 'http';
import type { LimitRecord, RawTable } from '../lib/types.js';
import { loadConfig } from '../src/config.js';
import { FetchSourceError } from '../src/fetch-source.js';
import type { IngestDeps } from '../src/ingest.js';
import { createApp } from '../src/server.js';
import type { AppendResult } from '../src/sheets-client.js';

const TABLE: RawTable = {
  rows: [['安息香酸', '1.0ｇ']],
  sourceUrl: 'https://example.test/notice.pdf',
  page: 1,
  order: 0,
};

const extract = vi.fn(async (_url: string, _pages: string): Promise<RawTable[]> => [TABLE]);
const appendRecords = vi.fn(
  async (records: readonly LimitRecord[]): Promise<AppendResult> => ({
    appended: records.length,
    range: "'更新情報一覧'!A3:O3",
  })
);

const deps: IngestDeps = {
  sources: { pdf: { extract }, html: { extract } },
  sink: { appendRecords },
};

describe('HTTP API', () => {
  let server: Server;
  let baseUrl = '';

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    server = createApp(loadConfig({}), deps).listen(0);
    await new Promise<void>(resolve => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    vi.restoreAllMocks();
  });

  beforeEach(() => {
    extract.mockClear();
    appendRecords.mockClear();
  });

  it('should answer the health check without caching', async () => {
    const res = await fetch(`${baseUrl}/api/health`);

    expect(res.status).toBe(200);
    expect(res.headers.get('cache-control')).toBe('no-store, no-cache, must-revalidate, proxy-revalidate');
    expect(await res.json()).toEqual({ ok: true });
  });

  it('should preview records without appending', async () => {
    const res = await fetch(`${baseUrl}/api/records?source=html&url=${encodeURIComponent('https://example.test/notice')}`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ ok: true, count: 1, tableCount: 1, warnings: [] });
    expect(body.records[0].substanceName).toBe('安息香酸');
    expect(extract).toHaveBeenCalledWith('https://example.test/notice', 'all');
    expect(appendRecords).not.toHaveBeenCalled();
  });

  it('should reject an invalid url', async () => {
    const res = await fetch(`${baseUrl}/api/records?url=not-a-url`);

    expect(res.status).toBe(400);
    expect(extract).not.toHaveBeenCalled();
  });

  it('should reject an invalid page selector before extracting', async () => {
    const res = await fetch(`${baseUrl}/api/records?pages=abc`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: 'invalid page selector "abc"' });
    expect(extract).not.toHaveBeenCalled();
  });

  it('should map page selector errors raised during extraction to 400', async () => {
    extract.mockRejectedValueOnce(new RangeError('Invalid page range "5-2": start is after end'));

    const res = await fetch(`${baseUrl}/api/ingest`, { method: 'POST' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: 'Invalid page range "5-2": start is after end' });
  });

  it('should ingest and append', async () => {
    const res = await fetch(`${baseUrl}/api/ingest`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ pages: '1-2' }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      ok: true,
      count: 1,
      appended: 1,
      range: "'更新情報一覧'!A3:O3",
      warnings: [],
    });
    expect(appendRecords).toHaveBeenCalledTimes(1);
  });

  it('should map pipeline errors to 422', async () => {
    extract.mockResolvedValueOnce([]);

    const res = await fetch(`${baseUrl}/api/ingest`, { method: 'POST' });

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      ok: false,
      code: 'EXTRACTION_EMPTY',
      error: 'No tables were extracted from the source document',
      warnings: [],
    });
  });

  it('should map fetch errors to 502', async () => {
    extract.mockRejectedValueOnce(
      new FetchSourceError('HTTP_ERROR_503', 'HTTP 503 Service Unavailable', 'https://example.test/notice.pdf', 503)
    );

    const res = await fetch(`${baseUrl}/api/records`);

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      ok: false,
      code: 'HTTP_ERROR_503',
      error: 'HTTP 503 Service Unavailable',
      url: 'https://example.test/notice.pdf',
    });
  });
});
