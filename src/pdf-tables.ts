/**
 * PDF → 표 격자 추출
 * 페이지마다 텍스트 조각 좌표와 괘선을 읽어 격자로 복원하고, 2행 2열 미만은 버린다.
 */

import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { getDocument, GlobalWorkerOptions, OPS } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { normalizeRow } from '../lib/cell-normalizer.js';
import { buildGrid, type Glyph, type GridOptions } from '../lib/glyph-grid.js';
import { selectPages, type PageRangeOptions } from '../lib/page-selector.js';
import { collectRulingSegments, type PathOpCodes } from '../lib/ruling-lines.js';
import { columnCount } from '../lib/tokens.js';
import type { RawTable } from '../lib/types.js';

export type PdfTableOptions = PageRangeOptions & {
  pages: string;
  excludePages: readonly number[];
  sourceUrl: string;
  grid?: Partial<GridOptions>;
};

const configurePdfJsWorker = () => {
  const candidatePaths = [
    path.join(process.cwd(), 'node_modules/pdfjs-dist/legacy/build/pdf.worker.mjs'),
    path.join(process.cwd(), 'node_modules/pdfjs-dist/build/pdf.worker.mjs'),
  ];

  const resolvedPath = candidatePaths.find(candidate => fs.existsSync(candidate));
  if (resolvedPath) {
    GlobalWorkerOptions.workerSrc = pathToFileURL(resolvedPath).href;
  }
};

configurePdfJsWorker();

const PDF_PATH_OPS: PathOpCodes = {
  save: OPS.save,
  restore: OPS.restore,
  transform: OPS.transform,
  constructPath: OPS.constructPath,
  moveTo: OPS.moveTo,
  lineTo: OPS.lineTo,
  curveTo: OPS.curveTo,
  curveTo2: OPS.curveTo2,
  curveTo3: OPS.curveTo3,
  closePath: OPS.closePath,
  rectangle: OPS.rectangle,
  endPath: OPS.endPath,
  clip: OPS.clip,
  eoClip: OPS.eoClip,
};

/**
 * 격자가 표로 쓸 만한지 (2행 이상, 2열 이상)
 */
export function isUsableGrid(rows: readonly (readonly string[])[]): boolean {
  return rows.length >= 2 && columnCount(rows) >= 2;
}

export async function extractPdfTables(data: Uint8Array, options: PdfTableOptions): Promise<RawTable[]> {
  // pdfjs 가 버퍼를 넘겨받아 detach 하므로 복사본을 넘긴다
  const pdf = await getDocument({ data: data.slice(), isEvalSupported: false, useSystemFonts: true }).promise;

  try {
    const pages = selectPages(options.pages, pdf.numPages, options);
    console.log(`[PdfTables] pages=${pages.join(',') || '-'} exclude=${options.excludePages.join(',') || '-'}`);

    const tables: RawTable[] = [];
    let order = 0;

    for (const pageNumber of pages) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();

      const glyphs: Glyph[] = [];
      for (const item of content.items) {
        if (!('str' in item) || !item.str.trim()) continue;
        glyphs.push({
          text: item.str,
          x: item.transform[4],
          y: item.transform[5],
          width: item.width,
          height: item.height,
        });
      }
      const operators = await page.getOperatorList();
      const segments = collectRulingSegments(operators.fnArray, operators.argsArray, PDF_PATH_OPS);
      page.cleanup();

      const rows = buildGrid(glyphs, options.grid, segments).map(normalizeRow);
      const current = order++;
      if (!isUsableGrid(rows)) {
        console.warn(`[PdfTables] page ${pageNumber}: no table-like grid (${rows.length} row(s))`);
        continue;
      }

      tables.push({ rows, sourceUrl: options.sourceUrl, page: pageNumber, order: current });
    }

    return tables.sort((a, b) => a.page - b.page || a.order - b.order);
  } finally {
    await pdf.destroy();
  }
}
