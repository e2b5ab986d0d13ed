/**
 * 정규화된 표 → 레코드 합성
 *
 * 열 구성으로 스키마를 구분한다.
 * - 2열: 성분명 | 상한값
 * - 4열 이상: 성분명 | 씻어내는 것 | 씻어내지 않는 것 | 점막용
 *
 * 한 행의 0열에 성분명이 여러 개 있으면 수량 열 토큰과 위치로 짝지어 여러 레코드로 펼친다.
 * 토큰 수가 다르면 0열 첫 토큰은 그 행 전체에 걸리는 "조건"이다.
 */

import {
  hasAggregateTotal,
  hasInternationalUnit,
  isNonCompliant,
  stripAggregateTotal,
  stripUnitMarkers,
  toAmountValue,
} from './markers.js';
import { columnCount, splitTokens } from './tokens.js';
import { NOTE, UNIT } from './types.js';
import type { LimitRecord, RawTable, SynthesisIssue, Unit } from './types.js';

export type ColumnShape = 'single' | 'categorized' | 'unknown';

export interface SynthesisResult {
  records: LimitRecord[];
  issues: SynthesisIssue[];
}

export function columnShape(width: number): ColumnShape {
  if (width === 2) return 'single';
  if (width >= 4) return 'categorized';
  return 'unknown';
}

function resolveUnit(rawValues: string[], amount1: string, hasQuantity: boolean): Unit {
  if (!hasQuantity) return UNIT.none;
  if (isNonCompliant(amount1)) return UNIT.none;
  return hasInternationalUnit(...rawValues) ? UNIT.internationalUnit : UNIT.weight;
}

function singleLimitRecord(name: string, condition: string, raw: string, sourceUrl: string): LimitRecord {
  const { value, aggregate } = stripAggregateTotal(raw);
  const amount1 = stripUnitMarkers(value);

  return {
    substanceName: name,
    condition,
    amount1,
    amount2: '',
    amount3: '',
    amount4: '',
    unit: resolveUnit([raw], amount1, amount1 !== ''),
    note: aggregate ? NOTE.aggregateTotal : NOTE.none,
    sourceUrl,
  };
}

function categorizedRecord(
  name: string,
  condition: string,
  raws: [string, string, string],
  sourceUrl: string
): LimitRecord {
  // 합계량 표식은 v2 → v3 → v4 순서로 처음 나온 것만 amount1 으로
  const aggregateSource = raws.find(hasAggregateTotal) ?? '';
  const amount1 = aggregateSource ? toAmountValue(aggregateSource) : '';
  const [amount2, amount3, amount4] = raws.map(toAmountValue);
  const hasQuantity = [amount1, amount2, amount3, amount4].some(v => v !== '');

  return {
    substanceName: name,
    condition,
    amount1,
    amount2,
    amount3,
    amount4,
    unit: resolveUnit([aggregateSource, ...raws], amount1, hasQuantity),
    note: aggregateSource ? NOTE.aggregateTotal : NOTE.none,
    sourceUrl,
  };
}

/**
 * 행 하나를 레코드 0개 이상으로 펼친다.
 * 성분명/수량 토큰을 맞출 수 없는 행은 issue 로 돌려주고 레코드는 만들지 않는다.
 */
export function synthesizeRow(
  row: readonly string[],
  shape: Exclude<ColumnShape, 'unknown'>,
  sourceUrl: string
): { records: LimitRecord[]; issue?: string } {
  const names = splitTokens(row[0]);
  const c2 = splitTokens(row[1]);
  const c3 = splitTokens(row[2]);
  const c4 = splitTokens(row[3]);

  const equalLen = names.length === c2.length;
  let condition = '';

  if (!equalLen) {
    if (names.length === 0) {
      return { records: [], issue: `no substance name for ${c2.length} amount token(s)` };
    }
    condition = names.shift() ?? '';
    if (names.length === 0) {
      return { records: [], issue: `only condition "${condition}" left in the name column` };
    }
    // 조건 토큰을 뗀 뒤에도 성분명이 더 많으면 짝을 정할 수 없다
    if (names.length > c2.length) {
      return {
        records: [],
        issue: `${names.length} names for ${c2.length} amount token(s) after taking condition "${condition}"`,
      };
    }
  }

  const records = names.map((name, i) =>
    shape === 'single'
      ? singleLimitRecord(name, condition, c2[i] ?? '', sourceUrl)
      : categorizedRecord(name, condition, [c2[i] ?? '', c3[i] ?? '', c4[i] ?? ''], sourceUrl)
  );

  return { records };
}

export function synthesizeRecords(table: RawTable): SynthesisResult {
  if (table.rows.length === 0) {
    return { records: [], issues: [] };
  }

  const width = columnCount(table.rows);
  const shape = columnShape(width);
  if (shape === 'unknown') {
    return {
      records: [],
      issues: [
        {
          code: 'UNKNOWN_COLUMN_SHAPE',
          message: `${width} column(s); expected 2 or at least 4`,
        },
      ],
    };
  }

  const records: LimitRecord[] = [];
  const issues: SynthesisIssue[] = [];

  table.rows.forEach((row, rowIndex) => {
    const result = synthesizeRow(row, shape, table.sourceUrl);
    records.push(...result.records);
    if (result.issue) {
      issues.push({ code: 'MALFORMED_ROW', message: result.issue, rowIndex });
    }
  });

  return { records, issues };
}
