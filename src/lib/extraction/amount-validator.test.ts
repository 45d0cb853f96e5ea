import { describe, it, expect } from 'vitest';
import { validateAmounts } from './amount-validator';
import { emptyCandidate, type AmountFields, type FieldCandidate } from './types';

function amount(value: number, confidence: number): FieldCandidate<number> {
  return { value, confidence, sourceBox: null, rawText: value.toFixed(2) };
}

function fields(subtotal: number, tax: number, total: number, confidence = [0.7, 0.6, 0.9]): AmountFields {
  return {
    subtotal: amount(subtotal, confidence[0] ?? 0),
    tax: amount(tax, confidence[1] ?? 0),
    total: amount(total, confidence[2] ?? 0),
  };
}

describe('validateAmounts', () => {
  it('boosts all three when subtotal + tax matches total', () => {
    const { amounts, check } = validateAmounts(fields(100, 8, 108));
    expect(check).toBe('consistent');
    expect(amounts.subtotal.confidence).toBeCloseTo(0.9);
    expect(amounts.tax.confidence).toBeCloseTo(0.8);
    expect(amounts.total.confidence).toBe(1);
  });

  it('penalizes all three on a mismatch', () => {
    const { amounts, check } = validateAmounts(fields(100, 8, 200));
    expect(check).toBe('inconsistent');
    expect(amounts.subtotal.confidence).toBeCloseTo(0.4);
    expect(amounts.tax.confidence).toBeCloseTo(0.3);
    expect(amounts.total.confidence).toBeCloseTo(0.6);
  });

  it('never drops confidence below zero', () => {
    const { amounts } = validateAmounts(fields(100, 8, 200, [0.1, 0.2, 0.25]));
    expect(amounts.subtotal.confidence).toBe(0);
    expect(amounts.tax.confidence).toBe(0);
    expect(amounts.total.confidence).toBe(0);
  });

  it('allows one percent of the total as tolerance', () => {
    expect(validateAmounts(fields(900, 90, 1000)).check).toBe('consistent');
    expect(validateAmounts(fields(900, 80, 1000)).check).toBe('inconsistent');
  });

  it('allows two cents on small totals', () => {
    expect(validateAmounts(fields(0.9, 0.09, 1)).check).toBe('consistent');
    expect(validateAmounts(fields(0.9, 0.05, 1)).check).toBe('inconsistent');
  });

  it('leaves amounts untouched when one is missing', () => {
    const input: AmountFields = { ...fields(100, 8, 108), tax: emptyCandidate() };
    const { amounts, check } = validateAmounts(input);
    expect(check).toBe('unchecked');
    expect(amounts.subtotal).toBe(input.subtotal);
    expect(amounts.total.confidence).toBe(0.9);
  });

  it('does not mutate its input', () => {
    const input = fields(100, 8, 108);
    validateAmounts(input);
    expect(input.subtotal.confidence).toBe(0.7);
    expect(input.total.confidence).toBe(0.9);
  });
});
