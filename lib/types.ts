/**
 * 표 정규화 / 레코드 합성 파이프라인 공통 타입
 */

export type Cell = string;
export type Row = readonly Cell[];

/**
 * 추출기가 넘겨주는 표 하나
 * page/order는 표 정렬용 키일 뿐, 파이프라인 내부에서는 쓰지 않는다
 */
export interface RawTable {
  rows: readonly Row[];
  sourceUrl: string;
  page: number;
  order: number;
}

export type Table = RawTable;

export const UNIT = {
  weight: 'g',
  internationalUnit: '国際単位',
  none: '',
} as const;

export type Unit = (typeof UNIT)[keyof typeof UNIT];

export const NOTE = {
  aggregateTotal: '合計量として',
  none: '',
} as const;

export type Note = (typeof NOTE)[keyof typeof NOTE];

export interface LimitRecord {
  substanceName: string;
  condition: string;
  amount1: string;
  amount2: string;
  amount3: string;
  amount4: string;
  unit: Unit;
  note: Note;
  sourceUrl: string;
}

export type SynthesisIssueCode = 'MALFORMED_ROW' | 'UNKNOWN_COLUMN_SHAPE';

export interface SynthesisIssue {
  code: SynthesisIssueCode;
  message: string;
  rowIndex?: number;
}
