/**
 * 수집 → 파이프라인 → (JSON 저장) → 시트 추가
 */

import { runPipeline } from '../lib/pipeline.js';
import type { LimitRecord } from '../lib/types.js';
import type { AppConfig, SourceKind } from './config.js';
import { saveRecordsJson } from './json-dump.js';
import type { RecordSink } from './sheets-client.js';
import type { TableSources } from './table-sources.js';

export type IngestRequest = {
  sourceKind?: SourceKind;
  url?: string;
  pages?: string;
  dryRun?: boolean;
  saveJson?: boolean;
};

export type IngestDeps = {
  sources: TableSources;
  sink: RecordSink;
};

export type IngestResult = {
  sourceKind: SourceKind;
  url: string;
  records: LimitRecord[];
  warnings: string[];
  tableCount: number;
  appended: number;
  range?: string;
  jsonPath?: string;
};

export function defaultUrlFor(config: AppConfig, kind: SourceKind): string {
  return kind === 'pdf' ? config.pdfUrl : config.htmlUrl;
}

export async function runIngest(
  config: AppConfig,
  deps: IngestDeps,
  request: IngestRequest = {}
): Promise<IngestResult> {
  const sourceKind = request.sourceKind ?? config.sourceKind;
  const url = request.url ?? defaultUrlFor(config, sourceKind);
  const pages = request.pages ?? config.pages;

  const tables = await deps.sources[sourceKind].extract(url, pages);
  console.log(`[Ingest] ${tables.length} table(s) extracted from ${sourceKind.toUpperCase()}`);

  const { records, warnings, tableCount } = runPipeline(tables);
  for (const warning of warnings) {
    console.warn(`[Pipeline] ${warning}`);
  }
  console.log(`[Ingest] Records generated: ${records.length}`);

  let jsonPath: string | undefined;
  if (request.saveJson ?? config.saveJson) {
    jsonPath = await saveRecordsJson(records, config.jsonDir, config.jsonFilename);
  }

  if (request.dryRun) {
    return { sourceKind, url, records, warnings, tableCount, appended: 0, jsonPath };
  }

  console.log('[Ingest] Appending to Google Sheet ...');
  const { appended, range } = await deps.sink.appendRecords(records);

  return { sourceKind, url, records, warnings, tableCount, appended, range, jsonPath };
}
