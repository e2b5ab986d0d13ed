/**
 * 수량 셀에 붙는 표식(합계량 / 국제단위 / 중량 / 배합불가) 처리
 */

import { NOTE, UNIT } from './types.js';

export const AGGREGATE_TOTAL_MARKER = NOTE.aggregateTotal;
export const INTERNATIONAL_UNIT_MARKER = UNIT.internationalUnit;

// 숫자 바로 뒤의 반각 g / 전각 ｇ 만 중량 표식 (mg 등 다른 단위의 g 는 건드리지 않는다)
const WEIGHT_MARKER_PATTERN = /(\p{Nd})[gｇ](?=\s|$)/gu;

// 원문에는 오기(配合負荷)와 정식 표기(配合不可)가 섞여 있다
const NON_COMPLIANT_MARKERS = ['配合不可', '配合負荷'];

/**
 * 수량 토큰: 숫자(소수 허용) 바로 뒤에 중량/국제단위 표식
 * 숫자는 전각도 허용한다. 예: "12.5g", "１０ｇ", "300国際単位"
 */
export const AMOUNT_TOKEN_PATTERN = /^\p{Nd}+(?:\.\p{Nd}+)?(?:[gｇ]|国際単位)$/u;

export function isAmountToken(token: string): boolean {
  return AMOUNT_TOKEN_PATTERN.test(token);
}

export function hasAggregateTotal(value: string): boolean {
  return value.includes(AGGREGATE_TOTAL_MARKER);
}

export function hasInternationalUnit(...values: string[]): boolean {
  return values.some(v => v.includes(INTERNATIONAL_UNIT_MARKER));
}

export function isNonCompliant(value: string): boolean {
  return NON_COMPLIANT_MARKERS.some(marker => value.includes(marker));
}

/**
 * 합계량 표식 제거 + 표식 유무
 */
export function stripAggregateTotal(value: string): { value: string; aggregate: boolean } {
  if (!hasAggregateTotal(value)) {
    return { value, aggregate: false };
  }
  return { value: value.split(AGGREGATE_TOTAL_MARKER).join('').trim(), aggregate: true };
}

/**
 * 중량 / 국제단위 표식 제거
 */
export function stripUnitMarkers(value: string): string {
  return value
    .split(INTERNATIONAL_UNIT_MARKER)
    .join('')
    .replace(WEIGHT_MARKER_PATTERN, '$1')
    .trim();
}

/**
 * 수량 값만 남기기 (합계량 / 단위 표식 모두 제거)
 */
export function toAmountValue(raw: string): string {
  return stripUnitMarkers(stripAggregateTotal(raw).value);
}
