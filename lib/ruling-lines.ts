/**
 * PDF 연산자 목록 → 괘선 토막
 *
 * 경로(constructPath)의 직선과 사각형을 현재 변환 행렬(CTM)로 옮겨 수평/수직 토막만 남긴다.
 * 칠하지 않고 끝난 경로(클리핑 등, endPath)는 버린다.
 */

import type { RulingSegment } from './glyph-grid.js';

/**
 * 필요한 연산자 번호 (pdfjs OPS 의 부분집합)
 */
export interface PathOpCodes {
  save: number;
  restore: number;
  transform: number;
  constructPath: number;
  moveTo: number;
  lineTo: number;
  curveTo: number;
  curveTo2: number;
  curveTo3: number;
  closePath: number;
  rectangle: number;
  endPath: number;
  clip: number;
  eoClip: number;
}

export interface RulingOptions {
  // 이 두께 이하의 채운 사각형은 선 하나로 본다
  maxRuleThickness: number;
  // 기울기 허용 오차
  axisTolerance: number;
}

const DEFAULT_RULING_OPTIONS: RulingOptions = {
  maxRuleThickness: 3,
  axisTolerance: 1,
};

type Matrix = [number, number, number, number, number, number];
type Point = [number, number];

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

// 새 행렬 m 을 먼저 적용한 뒤 ctm
function concat(ctm: Matrix, m: Matrix): Matrix {
  return [
    ctm[0] * m[0] + ctm[2] * m[1],
    ctm[1] * m[0] + ctm[3] * m[1],
    ctm[0] * m[2] + ctm[2] * m[3],
    ctm[1] * m[2] + ctm[3] * m[3],
    ctm[0] * m[4] + ctm[2] * m[5] + ctm[4],
    ctm[1] * m[4] + ctm[3] * m[5] + ctm[5],
  ];
}

function apply(m: Matrix, [x, y]: Point): Point {
  return [m[0] * x + m[2] * y + m[4], m[1] * x + m[3] * y + m[5]];
}

function numbersOf(value: unknown): number[] | null {
  if (!Array.isArray(value)) return null;
  const out: number[] = [];
  for (const item of value) {
    if (typeof item !== 'number') return null;
    out.push(item);
  }
  return out;
}

function toMatrix(value: unknown): Matrix | null {
  const n = numbersOf(value);
  if (!n || n.length < 6) return null;
  return [n[0], n[1], n[2], n[3], n[4], n[5]];
}

function segment(ctm: Matrix, from: Point, to: Point, tolerance: number): RulingSegment | null {
  const [x1, y1] = apply(ctm, from);
  const [x2, y2] = apply(ctm, to);
  const horizontal = Math.abs(y1 - y2) <= tolerance;
  const vertical = Math.abs(x1 - x2) <= tolerance;
  if (horizontal === vertical) return null; // 사선 또는 점
  return { x1, y1, x2, y2 };
}

function rectangleSegments(
  ctm: Matrix,
  [x, y, w, h]: number[],
  options: RulingOptions
): (RulingSegment | null)[] {
  const tol = options.axisTolerance;
  if (Math.abs(h) <= options.maxRuleThickness) {
    return [segment(ctm, [x, y + h / 2], [x + w, y + h / 2], tol)];
  }
  if (Math.abs(w) <= options.maxRuleThickness) {
    return [segment(ctm, [x + w / 2, y], [x + w / 2, y + h], tol)];
  }
  return [
    segment(ctm, [x, y], [x + w, y], tol),
    segment(ctm, [x + w, y], [x + w, y + h], tol),
    segment(ctm, [x + w, y + h], [x, y + h], tol),
    segment(ctm, [x, y + h], [x, y], tol),
  ];
}

function pathSegments(ctm: Matrix, args: unknown, codes: PathOpCodes, options: RulingOptions): RulingSegment[] {
  if (!Array.isArray(args)) return [];
  const ops = numbersOf(args[0]);
  const coords = numbersOf(args[1]);
  if (!ops || !coords) return [];

  const out: (RulingSegment | null)[] = [];
  const tol = options.axisTolerance;
  let k = 0;
  let current: Point = [0, 0];
  let start: Point = [0, 0];

  for (const op of ops) {
    if (op === codes.moveTo) {
      current = [coords[k], coords[k + 1]];
      start = current;
      k += 2;
    } else if (op === codes.lineTo) {
      const next: Point = [coords[k], coords[k + 1]];
      out.push(segment(ctm, current, next, tol));
      current = next;
      k += 2;
    } else if (op === codes.curveTo) {
      current = [coords[k + 4], coords[k + 5]];
      k += 6;
    } else if (op === codes.curveTo2 || op === codes.curveTo3) {
      current = [coords[k + 2], coords[k + 3]];
      k += 4;
    } else if (op === codes.closePath) {
      out.push(segment(ctm, current, start, tol));
      current = start;
    } else if (op === codes.rectangle) {
      const rect = coords.slice(k, k + 4);
      out.push(...rectangleSegments(ctm, rect, options));
      current = [rect[0], rect[1]];
      start = current;
      k += 4;
    }
  }

  return out.filter((s): s is RulingSegment => s !== null);
}

export function collectRulingSegments(
  fnArray: readonly number[],
  argsArray: readonly unknown[],
  codes: PathOpCodes,
  options: Partial<RulingOptions> = {}
): RulingSegment[] {
  const resolved: RulingOptions = { ...DEFAULT_RULING_OPTIONS, ...options };
  const segments: RulingSegment[] = [];
  const stack: Matrix[] = [];
  let ctm: Matrix = IDENTITY;
  let pending: RulingSegment[] = [];

  fnArray.forEach((fn, i) => {
    const args = argsArray[i];

    if (fn === codes.constructPath) {
      segments.push(...pending);
      pending = pathSegments(ctm, args, codes, resolved);
      return;
    }
    if (fn === codes.clip || fn === codes.eoClip) return;
    if (fn === codes.endPath) {
      pending = [];
      return;
    }

    // 그 밖의 연산자(stroke / fill 등)가 오면 직전 경로는 그려진 것
    segments.push(...pending);
    pending = [];

    if (fn === codes.save) {
      stack.push(ctm);
    } else if (fn === codes.restore) {
      ctm = stack.pop() ?? IDENTITY;
    } else if (fn === codes.transform) {
      const m = toMatrix(args);
      if (m) ctm = concat(ctm, m);
    }
  });

  segments.push(...pending);
  return segments;
}
