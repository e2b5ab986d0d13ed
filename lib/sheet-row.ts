/**
 * 레코드 → 스프레드시트 행 (A..O, 15열)
 *
 * A: 변경 플래그, B: 날짜, C: 그룹 ID, D: 성분명, E: 규제 구분(빈칸),
 * F: 상한값(일반), G: 사용 대상·조건, H: 비점막·씻어내는 것, I: 비점막·씻어내지 않는 것,
 * J: 점막용, K: 단위, L: 비고, M/N: 예비, O: 원문 URL
 */

import type { LimitRecord } from './types.js';

export type SheetCell = string | number;

export const SHEET_COLUMN_COUNT = 15;
export const SHEET_FIRST_COLUMN = 'A';
export const SHEET_LAST_COLUMN = 'O';

export function formatSheetDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}/${month}/${day}`;
}

export function recordToSheetRow(record: LimitRecord, dateText: string): SheetCell[] {
  return [
    0,
    dateText,
    0,
    record.substanceName,
    '',
    record.amount1,
    record.condition,
    record.amount2,
    record.amount3,
    record.amount4,
    record.unit,
    record.note,
    '',
    '',
    record.sourceUrl,
  ];
}

export function sheetRange(title: string, startRow: number, rowCount: number): string {
  const endRow = startRow + rowCount - 1;
  const quoted = `'${title.replace(/'/g, "''")}'`;
  return `${quoted}!${SHEET_FIRST_COLUMN}${startRow}:${SHEET_LAST_COLUMN}${endRow}`;
}
