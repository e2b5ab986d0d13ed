export function splitTokens(cell: string | undefined): string[] {
  if (!cell) return [];
  return cell
    .trim()
    .split(/\s+/)
    .filter(t => t.length > 0);
}

// 빈 토큰(패딩)은 버리고 공백 하나로 잇는다
export function joinTokens(tokens: readonly string[]): string {
  return tokens.filter(t => t !== '').join(' ');
}

export function columnCount(rows: readonly (readonly string[])[]): number {
  return rows.reduce((max, row) => Math.max(max, row.length), 0);
}

/**
 * 부족한 칸을 빈 문자열로 채워 직사각형 격자로 만든다
 */
export function padRows(rows: readonly (readonly string[])[], width: number): string[][] {
  return rows.map(row => {
    const padded = [...row];
    while (padded.length < width) padded.push('');
    return padded;
  });
}

/**
 * 행의 특정 칸만 바꾼 새 행
 */
export function withCells(row: readonly string[], updates: Record<number, string>): string[] {
  const next = [...row];
  for (const [key, value] of Object.entries(updates)) {
    const index = Number(key);
    while (next.length <= index) next.push('');
    next[index] = value;
  }
  return next;
}
