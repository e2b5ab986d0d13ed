import { describe, it, expect } from 'vitest';
import { normalizeCell, normalizeTable } from '../lib/cell-normalizer.js';

describe('normalizeCell', () => {
  it('should remove whitespace inside full-width parentheses', () => {
    expect(normalizeCell('ポリオキシエチレン（８ ～ 10 E.O. ）')).toBe('ポリオキシエチレン（８～10E.O.）');
  });

  it('should turn full-width spaces into half-width and collapse runs', () => {
    expect(normalizeCell('安息香酸　 パラベン')).toBe('安息香酸 パラベン');
    expect(normalizeCell('  a \t b  ')).toBe('a b');
  });

  it('should glue the aggregate-total marker to its amount', () => {
    expect(normalizeCell('合計量として 10ｇ')).toBe('合計量として10ｇ');
    expect(normalizeCell('合計量として　1.0ｇ')).toBe('合計量として1.0ｇ');
  });

  it('should glue the international-unit marker to its number', () => {
    expect(normalizeCell('25000 国際単位')).toBe('25000国際単位');
  });

  it('should split merged 2-ethyl entries with a comma', () => {
    expect(normalizeCell('メチルパラベン 2－エチルヘキサン酸')).toBe('メチルパラベン,2－エチルヘキサン酸');
  });

  it('should leave 2-ethyl entries already preceded by a comma alone', () => {
    expect(normalizeCell('A, 2－エチルヘキサン酸')).toBe('A, 2－エチルヘキサン酸');
  });

  it('should be idempotent', () => {
    const samples = [
      'ポリオキシエチレン（８ ～ 10 E.O. ）',
      '合計量として 10ｇ 25000 国際単位',
      'メチルパラベン 2－エチルヘキサン酸',
      '（a\nb）\n 合計量として\n5g',
      '',
    ];
    for (const sample of samples) {
      const once = normalizeCell(sample);
      expect(normalizeCell(once)).toBe(once);
    }
  });
});

describe('normalizeTable', () => {
  it('should normalize every cell and keep table metadata', () => {
    const table = { rows: [['A　B', '5 国際単位']], sourceUrl: 'https://example.test/a.pdf', page: 3, order: 1 };

    expect(normalizeTable(table)).toEqual({
      rows: [['A B', '5国際単位']],
      sourceUrl: 'https://example.test/a.pdf',
      page: 3,
      order: 1,
    });
  });
});
