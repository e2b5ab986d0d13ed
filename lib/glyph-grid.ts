/**
 * 좌표가 있는 텍스트 조각(glyph) → 셀 격자
 *
 * 괘선이 있으면 괘선으로 칸을 나눈다 (lattice).
 * - 세로 괘선들이 차지하는 영역을 표 영역으로 보고, 영역 안의 가로/세로 괘선 위치로 칸을 만든다
 * - 같은 칸 안의 여러 줄은 공백 하나로 이어 한 셀이 된다
 *
 * 괘선이 없으면 텍스트 위치만으로 복원한다 (stream).
 * - 행: 기준선(y)이 허용 오차 안이면 같은 행
 * - 열: 칸이 둘 이상으로 갈라지는 줄만 가로로 투영해 간격이 columnGap 보다 넓은 곳에서 나눈다
 * - 표 열 두 개 이상에 걸치는 한 덩어리 줄(제목, 본문, 각주)은 표 행이 아니므로 버린다
 */

export type Glyph = {
  text: string;
  x: number;
  y: number; // PDF 좌표계 (아래가 0)
  width: number;
  height: number;
};

/**
 * 괘선 한 토막 (PDF 좌표계)
 */
export type RulingSegment = {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
};

export interface GridOptions {
  rowTolerance: number;
  columnGap: number;
  // 같은 셀의 두 조각 사이 간격이 (글자 높이 × 이 값)보다 넓으면 공백을 넣는다
  spaceGapRatio: number;
  // 괘선 위치를 같은 선으로 볼 허용 오차
  ruleTolerance: number;
}

export const DEFAULT_GRID_OPTIONS: GridOptions = {
  rowTolerance: 3,
  columnGap: 12,
  spaceGapRatio: 0.25,
  ruleTolerance: 2,
};

type Span = { start: number; end: number };

export type Lattice = {
  xs: number[]; // 세로 괘선 x (왼쪽 → 오른쪽)
  ys: number[]; // 가로 괘선 y (위 → 아래)
};

function groupRows(glyphs: readonly Glyph[], tolerance: number): Glyph[][] {
  const sorted = [...glyphs].sort((a, b) => b.y - a.y || a.x - b.x);
  const rows: Glyph[][] = [];
  let anchorY = Number.NaN;

  for (const g of sorted) {
    const current = rows[rows.length - 1];
    if (current && Math.abs(anchorY - g.y) <= tolerance) {
      current.push(g);
    } else {
      rows.push([g]);
      anchorY = g.y;
    }
  }

  return rows.map(row => row.sort((a, b) => a.x - b.x));
}

function columnSpans(glyphs: readonly Glyph[], gap: number): Span[] {
  const intervals = glyphs
    .map(g => ({ start: g.x, end: g.x + Math.max(g.width, 0) }))
    .sort((a, b) => a.start - b.start);

  const spans: Span[] = [];
  for (const interval of intervals) {
    const last = spans[spans.length - 1];
    if (last && interval.start <= last.end + gap) {
      last.end = Math.max(last.end, interval.end);
    } else {
      spans.push({ ...interval });
    }
  }
  return spans;
}

function columnIndexOf(spans: Span[], g: Glyph): number {
  const center = g.x + Math.max(g.width, 0) / 2;
  let best = 0;
  let bestDistance = Number.POSITIVE_INFINITY;

  spans.forEach((span, i) => {
    const distance = center < span.start ? span.start - center : center > span.end ? center - span.end : 0;
    if (distance < bestDistance) {
      best = i;
      bestDistance = distance;
    }
  });

  return best;
}

function joinCell(parts: Glyph[], spaceGapRatio: number): string {
  let text = '';
  let previous: Glyph | null = null;

  for (const part of parts) {
    if (previous) {
      const gap = part.x - (previous.x + previous.width);
      const threshold = Math.max(previous.height, part.height) * spaceGapRatio;
      text += gap > threshold ? ' ' : '';
    }
    text += part.text;
    previous = part;
  }

  return text.trim();
}

/**
 * 가까운 좌표끼리 묶어 대표값(평균) 하나로
 */
function clusterPositions(values: readonly number[], tolerance: number): number[] {
  const sorted = [...values].sort((a, b) => a - b);
  const clusters: number[][] = [];
  for (const value of sorted) {
    const current = clusters[clusters.length - 1];
    if (current && value - current[current.length - 1] <= tolerance) {
      current.push(value);
    } else {
      clusters.push([value]);
    }
  }
  return clusters.map(c => c.reduce((sum, v) => sum + v, 0) / c.length);
}

/**
 * 괘선 토막 → 칸 경계
 * 세로 괘선이 둘 이상, 표 영역에 걸친 가로 괘선이 둘 이상 있어야 격자로 본다.
 */
export function latticeFromSegments(
  segments: readonly RulingSegment[],
  tolerance: number = DEFAULT_GRID_OPTIONS.ruleTolerance
): Lattice | null {
  const verticals = segments
    .filter(s => Math.abs(s.x1 - s.x2) <= tolerance && Math.abs(s.y1 - s.y2) > tolerance)
    .map(s => ({ x: (s.x1 + s.x2) / 2, bottom: Math.min(s.y1, s.y2), top: Math.max(s.y1, s.y2) }));
  const horizontals = segments
    .filter(s => Math.abs(s.y1 - s.y2) <= tolerance && Math.abs(s.x1 - s.x2) > tolerance)
    .map(s => ({ y: (s.y1 + s.y2) / 2, left: Math.min(s.x1, s.x2), right: Math.max(s.x1, s.x2) }));

  if (verticals.length < 2 || horizontals.length < 2) return null;

  const left = Math.min(...verticals.map(v => v.x));
  const right = Math.max(...verticals.map(v => v.x));
  const bottom = Math.min(...verticals.map(v => v.bottom));
  const top = Math.max(...verticals.map(v => v.top));

  // 머리말 밑줄처럼 표 영역 밖에 있는 가로선은 제외
  const inside = horizontals.filter(
    h =>
      h.y >= bottom - tolerance &&
      h.y <= top + tolerance &&
      h.left < right - tolerance &&
      h.right > left + tolerance
  );

  const xs = clusterPositions(verticals.map(v => v.x), tolerance);
  const ys = clusterPositions(inside.map(h => h.y), tolerance).reverse();

  if (xs.length < 2 || ys.length < 2) return null;
  return { xs, ys };
}

function bandIndex(bounds: readonly number[], value: number, descending: boolean): number {
  for (let i = 0; i < bounds.length - 1; i++) {
    const inBand = descending
      ? value <= bounds[i] && value > bounds[i + 1]
      : value >= bounds[i] && value < bounds[i + 1];
    if (inBand) return i;
  }
  return -1;
}

function buildLatticeGrid(glyphs: readonly Glyph[], lattice: Lattice, options: GridOptions): string[][] {
  const { xs, ys } = lattice;
  const cells: Glyph[][][] = ys.slice(1).map(() => xs.slice(1).map(() => []));

  for (const g of glyphs) {
    const row = bandIndex(ys, g.y + Math.max(g.height, 0) / 2, true);
    const column = bandIndex(xs, g.x + Math.max(g.width, 0) / 2, false);
    if (row < 0 || column < 0) continue;
    cells[row][column].push(g);
  }

  return cells
    .map(row =>
      row.map(parts =>
        groupRows(parts, options.rowTolerance)
          .map(line => joinCell(line, options.spaceGapRatio))
          .filter(text => text !== '')
          .join(' ')
      )
    )
    .filter(row => row.some(cell => cell !== ''));
}

function buildStreamGrid(glyphs: readonly Glyph[], options: GridOptions): string[][] {
  const lines = groupRows(glyphs, options.rowTolerance);
  const tableLines = lines.filter(line => columnSpans(line, options.columnGap).length >= 2);
  if (tableLines.length === 0) return [];

  const spans = columnSpans(tableLines.flat(), options.columnGap);

  return lines
    .filter(line =>
      columnSpans(line, options.columnGap).every(
        own => spans.filter(span => own.start < span.end && own.end > span.start).length <= 1
      )
    )
    .map(line => {
      const cells: Glyph[][] = spans.map(() => []);
      for (const g of line) {
        cells[columnIndexOf(spans, g)].push(g);
      }
      return cells.map(parts => joinCell(parts, options.spaceGapRatio));
    });
}

export function buildGrid(
  glyphs: readonly Glyph[],
  options: Partial<GridOptions> = {},
  segments: readonly RulingSegment[] = []
): string[][] {
  const resolved: GridOptions = { ...DEFAULT_GRID_OPTIONS, ...options };
  const visible = glyphs.filter(g => g.text.trim() !== '');
  if (visible.length === 0) return [];

  const lattice = latticeFromSegments(segments, resolved.ruleTolerance);
  return lattice ? buildLatticeGrid(visible, lattice, resolved) : buildStreamGrid(visible, resolved);
}
