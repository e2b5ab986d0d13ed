/**
 * 표 정규화 → 레코드 합성 파이프라인
 *
 * 표마다 독립적으로 처리하고 추출 순서(표 순서, 행 순서)를 그대로 유지해 이어 붙인다.
 * 행/표 단위 문제는 warnings 로 남기고 다음으로 넘어가며,
 * 표가 하나도 없거나 결과 레코드가 0건이면 PipelineError 를 던진다.
 */

import { z } from 'zod';
import { normalizeTable } from './cell-normalizer.js';
import { PipelineError } from './pipeline-error.js';
import { filterRecords } from './record-filter.js';
import { synthesizeRecords } from './record-synthesizer.js';
import { dropNoiseRows, type RowClassifierOptions } from './row-classifier.js';
import { redistributeAmountTokens } from './token-redistributor.js';
import { squashLeadingColumn } from './token-squasher.js';
import { columnCount, padRows } from './tokens.js';
import type { LimitRecord, RawTable } from './types.js';

export const rawTableSchema = z.object({
  rows: z.array(z.array(z.string())),
  sourceUrl: z.string(),
  page: z.number().int(),
  order: z.number().int(),
});

export type PipelineOptions = RowClassifierOptions;

export interface TableResult {
  records: LimitRecord[];
  warnings: string[];
}

export interface PipelineResult {
  records: LimitRecord[];
  warnings: string[];
  tableCount: number;
}

function tableLabel(table: Pick<RawTable, 'page' | 'order'>): string {
  return `page ${table.page} table #${table.order}`;
}

/**
 * 표 하나 처리: 셀 정규화 → 잡음 행 삭제 → 토큰 이동 → 0열 합치기 → 합성 → 필터
 */
export function processTable(table: RawTable, options: PipelineOptions = {}): TableResult {
  const cleaned = dropNoiseRows(normalizeTable(table), options);
  const rectangular: RawTable = { ...cleaned, rows: padRows(cleaned.rows, columnCount(cleaned.rows)) };
  const prepared = squashLeadingColumn(redistributeAmountTokens(rectangular));

  const { records, issues } = synthesizeRecords(prepared);
  const warnings = issues.map(issue =>
    issue.rowIndex === undefined
      ? `[${issue.code}] ${tableLabel(table)}: ${issue.message}`
      : `[${issue.code}] ${tableLabel(table)} row ${issue.rowIndex}: ${issue.message}`
  );

  return { records: filterRecords(records), warnings };
}

export function runPipeline(tables: readonly RawTable[], options: PipelineOptions = {}): PipelineResult {
  if (tables.length === 0) {
    throw new PipelineError('EXTRACTION_EMPTY', 'No tables were extracted from the source document');
  }

  const records: LimitRecord[] = [];
  const warnings: string[] = [];

  tables.forEach((table, index) => {
    const parsed = rawTableSchema.safeParse(table);
    if (!parsed.success) {
      const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      warnings.push(`[MALFORMED_TABLE] table #${index}: ${detail}`);
      return;
    }

    const result = processTable(parsed.data, options);
    records.push(...result.records);
    warnings.push(...result.warnings);
  });

  if (records.length === 0) {
    throw new PipelineError(
      'NO_RECORDS',
      `No records could be synthesized from ${tables.length} table(s)`,
      warnings
    );
  }

  return { records, warnings, tableCount: tables.length };
}
