import { columnCount, splitTokens, withCells } from './tokens.js';
import type { RawTable } from './types.js';

/**
 * 0열 토큰 3개 이상 & 1열 토큰 정확히 1개
 * → 긴 성분명 하나가 공백으로 잘린 것이므로 0열을 공백 없이 붙인다
 */
export function squashRow(row: readonly string[]): string[] {
  const names = splitTokens(row[0]);
  const amounts = splitTokens(row[1]);
  if (names.length >= 3 && amounts.length === 1) {
    return withCells(row, { 0: names.join('') });
  }
  return [...row];
}

export function squashLeadingColumn(table: RawTable): RawTable {
  if (columnCount(table.rows) < 2) return table;
  return { ...table, rows: table.rows.map(squashRow) };
}
