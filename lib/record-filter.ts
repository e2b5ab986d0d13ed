import type { LimitRecord } from './types.js';

const VALUE_FIELDS = ['amount1', 'amount2', 'amount3', 'amount4', 'unit', 'note'] as const;

/**
 * 성분명 외에 유효한 값(수량 1~4, 단위, 비고)이 하나라도 있는지
 */
export function hasMeaningfulValues(record: LimitRecord): boolean {
  return VALUE_FIELDS.some(key => record[key].trim() !== '');
}

export function isWritableRecord(record: LimitRecord): boolean {
  return record.substanceName.trim() !== '' && hasMeaningfulValues(record);
}

export function filterRecords(records: readonly LimitRecord[]): LimitRecord[] {
  return records.filter(isWritableRecord);
}
