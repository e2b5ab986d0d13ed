import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { PipelineError } from '../lib/pipeline-error.js';
import type { LimitRecord, RawTable } from '../lib/types.js';
import { DEFAULT_PDF_URL, loadConfig } from '../src/config.js';
import { runIngest, type IngestDeps } from '../src/ingest.js';
import type { AppendResult } from '../src/sheets-client.js';

function fakeDeps(tables: RawTable[]) {
  const pdfExtract = vi.fn(async (url: string, _pages: string) => tables.map(t => ({ ...t, sourceUrl: url })));
  const htmlExtract = vi.fn(async (url: string, _pages: string) => tables.map(t => ({ ...t, sourceUrl: url })));
  const appendRecords = vi.fn(
    async (records: readonly LimitRecord[]): Promise<AppendResult> => ({
      appended: records.length,
      range: `'更新情報一覧'!A1:O${records.length}`,
    })
  );

  const deps: IngestDeps = {
    sources: { pdf: { extract: pdfExtract }, html: { extract: htmlExtract } },
    sink: { appendRecords },
  };
  return { deps, pdfExtract, htmlExtract, appendRecords };
}

const TABLE: RawTable = {
  rows: [
    ['成分名', '100ｇ中の最大配合量'],
    ['安息香酸 ソルビン酸', '1.0ｇ 0.5ｇ'],
  ],
  sourceUrl: '',
  page: 2,
  order: 0,
};

describe('runIngest', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should extract the default PDF and append the records', async () => {
    const { deps, pdfExtract, appendRecords } = fakeDeps([TABLE]);

    const result = await runIngest(loadConfig({}), deps);

    expect(pdfExtract).toHaveBeenCalledWith(DEFAULT_PDF_URL, 'all');
    expect(appendRecords).toHaveBeenCalledTimes(1);
    expect(result.records.map(r => [r.substanceName, r.amount1, r.sourceUrl])).toEqual([
      ['安息香酸', '1.0', DEFAULT_PDF_URL],
      ['ソルビン酸', '0.5', DEFAULT_PDF_URL],
    ]);
    expect(result).toMatchObject({ sourceKind: 'pdf', tableCount: 1, appended: 2, range: "'更新情報一覧'!A1:O2" });
    expect(result.jsonPath).toBeUndefined();
  });

  it('should use the requested source, url and pages', async () => {
    const { deps, pdfExtract, htmlExtract } = fakeDeps([TABLE]);

    const result = await runIngest(loadConfig({}), deps, {
      sourceKind: 'html',
      url: 'https://example.test/notice',
      pages: '2-3',
    });

    expect(pdfExtract).not.toHaveBeenCalled();
    expect(htmlExtract).toHaveBeenCalledWith('https://example.test/notice', '2-3');
    expect(result.url).toBe('https://example.test/notice');
  });

  it('should not touch the sink on a dry run', async () => {
    const { deps, appendRecords } = fakeDeps([TABLE]);

    const result = await runIngest(loadConfig({}), deps, { dryRun: true });

    expect(appendRecords).not.toHaveBeenCalled();
    expect(result.appended).toBe(0);
    expect(result.records).toHaveLength(2);
  });

  it('should save the records as JSON when asked', async () => {
    const dir = await fs.mkdtemp(join(tmpdir(), 'limits-ingest-'));
    try {
      const { deps } = fakeDeps([TABLE]);
      const config = loadConfig({ JSON_DIR: dir, JSON_ALL_FILENAME: 'out.json' });

      const result = await runIngest(config, deps, { dryRun: true, saveJson: true });

      expect(result.jsonPath).toBe(join(dir, 'out.json'));
      const saved: unknown = JSON.parse(await fs.readFile(join(dir, 'out.json'), 'utf-8'));
      expect(saved).toEqual(result.records);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('should print pipeline warnings', async () => {
    const { deps } = fakeDeps([{ ...TABLE, rows: [...TABLE.rows, ['A', '1g 2g']] }]);

    const result = await runIngest(loadConfig({}), deps, { dryRun: true });

    expect(result.warnings).toEqual([
      '[MALFORMED_ROW] page 2 table #0 row 1: only condition "A" left in the name column',
    ]);
    expect(vi.mocked(console.warn)).toHaveBeenCalledWith(`[Pipeline] ${result.warnings[0]}`);
  });

  it('should stop before the sink when nothing was extracted', async () => {
    const { deps, appendRecords } = fakeDeps([]);

    await expect(runIngest(loadConfig({}), deps)).rejects.toBeInstanceOf(PipelineError);
    expect(appendRecords).not.toHaveBeenCalled();
  });
});
