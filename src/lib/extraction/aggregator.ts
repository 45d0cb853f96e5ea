import type { OCRDocument } from '@/lib/parsing/types';
import type { ExtractionResult } from './types';
import { DEFAULT_RULES, type ExtractionRules } from './rules';
import { extractDate } from './date-extractor';
import { extractAmounts } from './amount-extractor';
import { validateAmounts } from './amount-validator';
import { extractVendor } from './vendor-extractor';

export interface ExtractFieldsOptions {
  rules?: ExtractionRules;
  referenceDate?: Date;
}

/**
 * Run every field extractor over one OCR document and assemble the result.
 * The extractors only read the document, so their order is irrelevant.
 */
export function extractFields(
  document: OCRDocument,
  options: ExtractFieldsOptions = {}
): ExtractionResult {
  const rules = options.rules ?? DEFAULT_RULES;

  const vendor = extractVendor(document, rules.vendor);
  const date = extractDate(document, { rules, referenceDate: options.referenceDate });
  const { amounts, check } = validateAmounts(extractAmounts(document, rules), rules.validation);

  const confidences = [
    vendor.confidence,
    date.confidence,
    amounts.subtotal.confidence,
    amounts.tax.confidence,
    amounts.total.confidence,
  ];
  const overallConfidence = confidences.reduce((sum, c) => sum + c, 0) / confidences.length;

  return {
    vendor,
    date,
    subtotal: amounts.subtotal,
    tax: amounts.tax,
    total: amounts.total,
    overallConfidence,
    amountCheck: check,
  };
}
