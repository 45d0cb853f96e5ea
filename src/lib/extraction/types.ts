import type { BoundingBox } from '@/lib/parsing/types';

/**
 * Best evidence found for one field. `value` is null (and confidence 0)
 * when nothing in the document supports the field.
 */
export interface FieldCandidate<T> {
  readonly value: T | null;
  /** 0–1 */
  readonly confidence: number;
  readonly sourceBox: BoundingBox | null;
  readonly rawText: string;
}

export type AmountKind = 'subtotal' | 'tax' | 'total';

export type AmountFields = Record<AmountKind, FieldCandidate<number>>;

export type AmountCheck = 'consistent' | 'inconsistent' | 'unchecked';

export interface ExtractionResult {
  readonly vendor: FieldCandidate<string>;
  /** ISO calendar date, YYYY-MM-DD */
  readonly date: FieldCandidate<string>;
  readonly subtotal: FieldCandidate<number>;
  readonly tax: FieldCandidate<number>;
  readonly total: FieldCandidate<number>;
  readonly overallConfidence: number;
  readonly amountCheck: AmountCheck;
}

export function emptyCandidate<T>(): FieldCandidate<T> {
  return { value: null, confidence: 0, sourceBox: null, rawText: '' };
}
