/**
 * 성분명 열(0열)에 잘못 붙은 수량 토큰을 수량 열(1열)로 옮긴다.
 * 행 안의 항목은 문자열 인접이 아니라 위치로 짝지어지므로,
 * 0열 i번째 토큰은 1열 i-1 위치로 간다.
 */

import { isAmountToken } from './markers.js';
import { columnCount, joinTokens, splitTokens, withCells } from './tokens.js';
import type { RawTable } from './types.js';

export function redistributeRow(row: readonly string[]): string[] {
  const names = splitTokens(row[0]);
  const amounts = splitTokens(row[1]);

  const hits = names.map((token, i) => (isAmountToken(token) ? i : -1)).filter(i => i >= 0);

  // 뒤에서부터 처리해야 앞쪽 인덱스가 유지된다
  for (const hit of hits.reverse()) {
    const insertAt = hit - 1;
    if (insertAt < 0) continue;

    const [moved] = names.splice(hit, 1);
    while (amounts.length < insertAt) amounts.push('');
    amounts.splice(insertAt, 0, moved);
  }

  return withCells(row, { 0: joinTokens(names), 1: joinTokens(amounts) });
}

export function redistributeAmountTokens(table: RawTable): RawTable {
  if (columnCount(table.rows) < 2) return table;
  return { ...table, rows: table.rows.map(redistributeRow) };
}
