/**
 * Read-only rule tables for the field extractors.
 *
 * Pattern lists are evaluated top to bottom and the first qualifying rule
 * wins, so their order is part of the observable behaviour.
 */

import type { AmountKind } from './types';

const MONTH = '(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\\.?';

export interface VendorRules {
  readonly stopWords: readonly string[];
  /** Only this many lines from the top are considered */
  readonly maxLines: number;
  readonly minLength: number;
  readonly maxLength: number;
  /** Lines with a larger share of digits are rejected */
  readonly maxDigitRatio: number;
  /** Length at which the length score saturates */
  readonly lengthNorm: number;
  readonly positionWeight: number;
  readonly lengthWeight: number;
  readonly ocrWeight: number;
}

export interface AmountValidationRules {
  readonly boost: number;
  readonly penalty: number;
  readonly minTolerance: number;
  readonly relativeTolerance: number;
}

export interface ExtractionRules {
  readonly datePatterns: readonly RegExp[];
  readonly minYear: number;
  /** Latest accepted year, relative to the reference date's year */
  readonly maxYearsAhead: number;
  readonly currencyPatterns: readonly RegExp[];
  readonly amountKeywords: Readonly<Record<AmountKind, readonly string[]>>;
  readonly vendor: VendorRules;
  readonly validation: AmountValidationRules;
}

export const DEFAULT_RULES: ExtractionRules = {
  datePatterns: [
    /\b\d{1,2}[\/-]\d{1,2}[\/-]\d{2,4}\b/gi, // MM/DD/YYYY, MM-DD-YYYY
    /\b\d{1,2}[\/-]\d{1,2}[\/-]\d{2}\b/gi, // MM/DD/YY
    /\b\d{4}[\/-]\d{1,2}[\/-]\d{1,2}\b/gi, // YYYY-MM-DD
    new RegExp(`\\b${MONTH}\\s+\\d{1,2},?\\s+\\d{4}\\b`, 'gi'), // Mar 15, 2024
    new RegExp(`\\b\\d{1,2}\\s+${MONTH}\\s+\\d{4}\\b`, 'gi'), // 15 March 2024
  ],
  minYear: 2000,
  maxYearsAhead: 1,

  currencyPatterns: [
    /\$\s*\d{1,3}(?:,\d{3})*(?:\.\d{2})?/g, // $1,234.56
    /\d{1,3}(?:,\d{3})*(?:\.\d{2})?\s*\$/g, // 1,234.56$
    /\$\d+(?:\.\d{2})?/g, // $123.45
    /\d+(?:\.\d{2})?/g, // 123.45
  ],

  amountKeywords: {
    subtotal: ['subtotal', 'sub total', 'sub-total', 'amount before tax', 'net amount'],
    tax: ['tax', 'sales tax', 'vat', 'gst', 'hst', 'tax amount'],
    total: ['total', 'amount due', 'total amount', 'grand total', 'balance due', 'total due'],
  },

  vendor: {
    stopWords: [
      'receipt', 'invoice', 'bill', 'statement', 'order', 'purchase', 'sale',
      'date', 'time', 'total', 'tax', 'subtotal', 'amount', 'due', 'paid',
      'cash', 'credit', 'card', 'visa', 'mastercard', 'amex', 'discover',
    ],
    maxLines: 10,
    minLength: 3,
    maxLength: 100,
    maxDigitRatio: 0.5,
    lengthNorm: 50,
    // Empirical weights; tunable
    positionWeight: 0.4,
    lengthWeight: 0.2,
    ocrWeight: 0.4,
  },

  validation: {
    // Empirical adjustments; tunable
    boost: 0.2,
    penalty: 0.3,
    minTolerance: 0.02,
    relativeTolerance: 0.01,
  },
};
