import { describe, it, expect } from 'vitest';
import { collectRulingSegments, type PathOpCodes } from '../lib/ruling-lines.js';

const CODES: PathOpCodes = {
  save: 1,
  restore: 2,
  transform: 3,
  constructPath: 4,
  moveTo: 5,
  lineTo: 6,
  curveTo: 7,
  curveTo2: 8,
  curveTo3: 9,
  closePath: 10,
  rectangle: 11,
  endPath: 12,
  clip: 13,
  eoClip: 14,
};
const STROKE = 20;
const FILL = 21;

describe('collectRulingSegments', () => {
  it('should collect stroked horizontal and vertical lines', () => {
    const segments = collectRulingSegments(
      [CODES.constructPath, STROKE],
      [[[CODES.moveTo, CODES.lineTo, CODES.moveTo, CODES.lineTo], [50, 720, 400, 720, 50, 600, 50, 720]], null],
      CODES
    );

    expect(segments).toEqual([
      { x1: 50, y1: 720, x2: 400, y2: 720 },
      { x1: 50, y1: 600, x2: 50, y2: 720 },
    ]);
  });

  it('should apply the transform until the state is restored', () => {
    const segments = collectRulingSegments(
      [CODES.save, CODES.transform, CODES.constructPath, STROKE, CODES.restore, CODES.constructPath, STROKE],
      [
        null,
        [1, 0, 0, 1, 10, 20],
        [[CODES.moveTo, CODES.lineTo], [0, 0, 100, 0]],
        null,
        null,
        [[CODES.moveTo, CODES.lineTo], [0, 0, 0, 50]],
        null,
      ],
      CODES
    );

    expect(segments).toEqual([
      { x1: 10, y1: 20, x2: 110, y2: 20 },
      { x1: 0, y1: 0, x2: 0, y2: 50 },
    ]);
  });

  it('should read thin filled rectangles as single rules', () => {
    const segments = collectRulingSegments(
      [CODES.constructPath, FILL],
      [[[CODES.rectangle, CODES.rectangle], [0, 100, 200, 1, 0, 0, 10, 20]], null],
      CODES
    );

    expect(segments).toEqual([
      { x1: 0, y1: 100.5, x2: 200, y2: 100.5 },
      { x1: 0, y1: 0, x2: 10, y2: 0 },
      { x1: 10, y1: 0, x2: 10, y2: 20 },
      { x1: 10, y1: 20, x2: 0, y2: 20 },
      { x1: 0, y1: 20, x2: 0, y2: 0 },
    ]);
  });

  it('should discard clipping paths that are never painted', () => {
    const segments = collectRulingSegments(
      [CODES.constructPath, CODES.clip, CODES.endPath, CODES.constructPath, STROKE],
      [[[CODES.rectangle], [0, 0, 300, 400]], null, null, [[CODES.moveTo, CODES.lineTo], [0, 0, 100, 0]], null],
      CODES
    );

    expect(segments).toEqual([{ x1: 0, y1: 0, x2: 100, y2: 0 }]);
  });

  it('should skip diagonals and curves', () => {
    const segments = collectRulingSegments(
      [CODES.constructPath, STROKE],
      [
        [
          [CODES.moveTo, CODES.lineTo, CODES.curveTo, CODES.lineTo, CODES.lineTo, CODES.closePath],
          [0, 0, 10, 10, 1, 1, 2, 2, 20, 10, 30, 10, 30, 40],
        ],
        null,
      ],
      CODES
    );

    expect(segments).toEqual([
      { x1: 20, y1: 10, x2: 30, y2: 10 },
      { x1: 30, y1: 10, x2: 30, y2: 40 },
    ]);
  });

  it('should ignore malformed path arguments', () => {
    expect(collectRulingSegments([CODES.constructPath, STROKE], [['x', null], null], CODES)).toEqual([]);
  });
});
