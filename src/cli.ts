/**
 * PDF/HTML → 표 추출 → 정리 → 스프레드시트 추가
 *
 *   node dist/src/cli.js [url] [--pages 2-12] [--source pdf|html] [--dry-run] [--json]
 */

import 'dotenv/config';
import { parseArgs } from 'node:util';
import { loadConfig, type SourceKind } from './config.js';
import { runIngest } from './ingest.js';
import { createGoogleSpreadsheetApi, GoogleSheetsSink } from './sheets-client.js';
import { createTableSources } from './table-sources.js';

function parseSource(value: string | undefined): SourceKind | undefined {
  if (value === undefined) return undefined;
  if (value === 'pdf' || value === 'html') return value;
  throw new Error(`--source must be "pdf" or "html", got "${value}"`);
}

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      pages: { type: 'string' },
      source: { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
    },
  });

  const config = loadConfig();
  const sink = new GoogleSheetsSink(
    createGoogleSpreadsheetApi(config.credentialsFile),
    config.spreadsheetId,
    config.sheetTitle
  );

  const result = await runIngest(
    config,
    { sources: createTableSources(config), sink },
    {
      sourceKind: parseSource(values.source),
      url: positionals[0],
      pages: values.pages,
      dryRun: values['dry-run'],
      saveJson: values.json || undefined,
    }
  );

  if (result.range) {
    console.log(`[DONE] ${result.appended} rows → ${result.range}`);
  } else {
    console.log(`[DONE] ${result.records.length} records (nothing appended)`);
  }
}

main().catch(e => {
  console.error('[ERROR]', e instanceof Error ? e.message : e);
  process.exit(1);
});
