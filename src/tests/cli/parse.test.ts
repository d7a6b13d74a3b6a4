import { describe, it, expect } from 'vitest';
import { parseAmount, parseDate, parseDecision, parseFlatType, parseList, parseSortKey } from '../../cli/utils/parse';

describe('cli parsers', () => {
  it('accepts the usual ways of writing a flat type', () => {
    expect(['2', '2-room', 'two_room', ' TWO ROOM '].map(parseFlatType)).toEqual([
      'TWO_ROOM',
      'TWO_ROOM',
      'TWO_ROOM',
      'TWO_ROOM',
    ]);
    expect(parseFlatType('3')).toBe('THREE_ROOM');
    expect(() => parseFlatType('4')).toThrow('Invalid flat type: "4"');
  });

  it('maps decision words onto approval states', () => {
    expect(['approve', 'Reject', 'PENDING'].map(parseDecision)).toEqual(['SUCCESSFUL', 'UNSUCCESSFUL', 'PENDING']);
    expect(() => parseDecision('maybe')).toThrow('Invalid decision: "maybe"');
  });

  it('validates dates, amounts and sort keys', () => {
    expect(parseDate('2025-03-01')).toBe('2025-03-01');
    expect(() => parseDate('2025-13-01')).toThrow('Invalid date (expected YYYY-MM-DD): "2025-13-01"');
    expect(parseAmount('350000')).toBe(350000);
    expect(() => parseAmount('-5')).toThrow('Invalid amount: "-5"');
    expect(parseSortKey('price')).toBe('PRICE');
  });

  it('splits comma-separated lists', () => {
    expect(parseList('Yishun, Bedok,,')).toEqual(['Yishun', 'Bedok']);
  });
});
