/**
 * 페이지 지정 문자열 해석
 * "all" / "2-12" / "2,4,9" / "1,3-5"
 */

export interface PageRangeOptions {
  useAutoPageRange: boolean;
  autoStartPage: number;
}

type SelectorPart = { start: number; end: number | 'end' };

function isAllPages(trimmed: string): boolean {
  return trimmed === '' || trimmed === 'all';
}

function parsePart(token: string): SelectorPart | null {
  const range = token.match(/^(\d+)\s*-\s*(\d+|end)$/);
  if (range) {
    return { start: Number(range[1]), end: range[2] === 'end' ? 'end' : Number(range[2]) };
  }
  if (/^\d+$/.test(token)) {
    const page = Number(token);
    return { start: page, end: page };
  }
  return null;
}

/**
 * 페이지 수를 모르는 상태에서 형식만 검사 (요청 / 설정 검증용)
 */
export function isPageSelector(selector: string): boolean {
  const trimmed = selector.trim().toLowerCase();
  if (isAllPages(trimmed)) return true;
  return trimmed.split(',').every(part => {
    const parsed = parsePart(part.trim());
    return parsed !== null && (parsed.end === 'end' || parsed.start <= parsed.end);
  });
}

export function parsePageSelector(selector: string, pageCount: number): number[] {
  const trimmed = selector.trim().toLowerCase();
  if (isAllPages(trimmed)) {
    return Array.from({ length: pageCount }, (_, i) => i + 1);
  }

  const pages = new Set<number>();
  for (const part of trimmed.split(',')) {
    const token = part.trim();
    const parsed = parsePart(token);
    if (!parsed) {
      throw new RangeError(`Invalid page selector "${selector}"`);
    }
    const end = parsed.end === 'end' ? pageCount : parsed.end;
    if (parsed.end !== 'end' && parsed.start > end) {
      throw new RangeError(`Invalid page range "${token}": start is after end`);
    }
    for (let p = parsed.start; p <= end; p++) pages.add(p);
  }

  return [...pages].filter(p => p >= 1 && p <= pageCount).sort((a, b) => a - b);
}

/**
 * 자동 범위 사용 시 "시작 페이지-마지막 페이지"로 대체
 */
export function resolvePageSelector(selector: string, pageCount: number, options: PageRangeOptions): string {
  if (!options.useAutoPageRange) return selector;
  const start = Math.min(Math.max(1, Math.trunc(options.autoStartPage)), pageCount);
  return `${start}-${pageCount}`;
}

export function selectPages(
  selector: string,
  pageCount: number,
  options: PageRangeOptions & { excludePages: readonly number[] }
): number[] {
  const resolved = resolvePageSelector(selector, pageCount, options);
  const excluded = new Set(options.excludePages);
  return parsePageSelector(resolved, pageCount).filter(p => !excluded.has(p));
}
