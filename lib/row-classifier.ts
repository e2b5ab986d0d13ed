/**
 * 잡음 행 판별
 * - 페이지 번호 / 각주 번호처럼 숫자만 있는 행
 * - "成分名" 헤더 행
 * - HTML 원문의 3열 헤더 행
 */

import type { RawTable } from './types.js';

// 비어 있지 않은 셀 중 "숫자만" 셀 비율이 이 값 이상이면 삭제
export const DIGIT_ROW_MIN_RATIO = 0.8;

export const SUBSTANCE_NAME_HEADER = '成分名';

export const HTML_HEADER_TEMPLATE: readonly string[] = [
  '粘膜に使用されることがない化粧品のうち洗い流すもの',
  '粘膜に使用されることがない化粧品のうち洗い流さないもの',
  '粘膜に使用されることがある化粧品',
];

export interface RowClassifierOptions {
  digitRowMinRatio?: number;
}

function normalizeForHeader(text: string): string {
  return text.replace(/　/g, ' ').replace(/\s+/g, ' ').trim();
}

function isIntegerString(text: string): boolean {
  return /^\p{Nd}+$/u.test(text);
}

export function digitRatio(row: readonly string[]): number | null {
  const nonempty = row
    .map(c => c.trim())
    .filter(c => c !== '' && c.toLowerCase() !== 'nan');
  if (nonempty.length === 0) return null;
  return nonempty.filter(isIntegerString).length / nonempty.length;
}

export function isHeaderTemplateRow(row: readonly string[]): boolean {
  if (row.length !== HTML_HEADER_TEMPLATE.length) return false;
  return row.every((cell, i) => normalizeForHeader(cell) === normalizeForHeader(HTML_HEADER_TEMPLATE[i]));
}

export function shouldDropRow(row: readonly string[], options: RowClassifierOptions = {}): boolean {
  const minRatio = options.digitRowMinRatio ?? DIGIT_ROW_MIN_RATIO;

  const ratio = digitRatio(row);
  if (ratio !== null && ratio >= minRatio) return true;

  const first = row.length > 0 ? row[0].replace(/\s+/g, '') : '';
  if (first === SUBSTANCE_NAME_HEADER) return true;

  return isHeaderTemplateRow(row);
}

export function dropNoiseRows(table: RawTable, options: RowClassifierOptions = {}): RawTable {
  return { ...table, rows: table.rows.filter(row => !shouldDropRow(row, options)) };
}
