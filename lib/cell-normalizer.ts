/**
 * 셀 문자열 정규화
 * - 전각 공백 → 반각
 * - 전각 괄호 안 공백 제거: "（８ ～ 10 E.O. ）" → "（８～10E.O.）"
 * - 표식 주변 공백 고정 치환
 * - 연속 공백 정리
 *
 * 같은 셀에 두 번 적용해도 결과는 같다.
 */

import type { RawTable } from './types.js';

const FULLWIDTH_SPACE = /　/g;
const FULLWIDTH_PAREN_GROUP = /（([^）]*)）/g;
const AFTER_AGGREGATE_TOTAL = /(合計量として)\s+/g;
const BEFORE_INTERNATIONAL_UNIT = /\s+(?=国際単位)/g;
// 추출 과정에서 두 성분이 한 셀로 붙는 경우: "… 2－エチル…" 앞에 쉼표를 넣어 분리
const MERGED_ETHYL_ENTRY = /(^|[^,])\s2－エチル/g;

export function normalizeCell(text: string): string {
  let y = text.replace(FULLWIDTH_SPACE, ' ');

  y = y.replace(FULLWIDTH_PAREN_GROUP, (_, inner: string) => `（${inner.replace(/\s+/g, '')}）`);

  y = y.replace(AFTER_AGGREGATE_TOTAL, '$1');
  y = y.replace(BEFORE_INTERNATIONAL_UNIT, '');
  y = y.replace(MERGED_ETHYL_ENTRY, '$1,2－エチル');

  return y.replace(/\s+/g, ' ').trim();
}

export function normalizeRow(row: readonly string[]): string[] {
  return row.map(normalizeCell);
}

export function normalizeTable(table: RawTable): RawTable {
  return { ...table, rows: table.rows.map(normalizeRow) };
}
