/**
 * 원문 종류별 표 추출기 (PDF / HTML)
 */

import { extractHtmlTables } from '../lib/html-tables.js';
import type { RawTable } from '../lib/types.js';
import type { AppConfig, SourceKind } from './config.js';
import { fetchDocumentBytes, fetchHtmlDocument } from './fetch-source.js';
import { extractPdfTables } from './pdf-tables.js';

export interface TableSource {
  extract(url: string, pages: string): Promise<RawTable[]>;
}

export type TableSources = Record<SourceKind, TableSource>;

export function createTableSources(config: AppConfig): TableSources {
  return {
    pdf: {
      async extract(url, pages) {
        console.log(`[Ingest] Downloading PDF ... ${url}`);
        const bytes = await fetchDocumentBytes(url, { timeoutMs: config.fetchTimeoutMs });
        return extractPdfTables(bytes, {
          pages,
          excludePages: config.excludePages,
          useAutoPageRange: config.useAutoPageRange,
          autoStartPage: config.autoStartPage,
          sourceUrl: url,
        });
      },
    },
    html: {
      async extract(url) {
        console.log(`[Ingest] Fetching HTML ... ${url}`);
        const { html } = await fetchHtmlDocument(url, {
          iframeFirst: config.iframeFirst,
          timeoutMs: config.fetchTimeoutMs,
        });
        // 레코드에는 iframe 주소가 아니라 요청한 고시 페이지 주소를 남긴다
        return extractHtmlTables(html, url);
      },
    },
  };
}
