import type { OCRDocument, OCRToken } from '@/lib/parsing/types';
import { emptyCandidate, type AmountFields, type AmountKind, type FieldCandidate } from './types';
import { DEFAULT_RULES, type ExtractionRules } from './rules';
import { fieldConfidence, findBox } from './confidence';

/**
 * Strip everything but digits and the decimal point. Returns null for
 * anything that is not a strictly positive number.
 */
export function parseAmount(raw: string): number | null {
  const cleaned = raw.replace(/[^\d.]/g, '');
  if (!cleaned) return null;
  const amount = Number(cleaned);
  return Number.isFinite(amount) && amount > 0 ? amount : null;
}

/**
 * First currency rule that yields a positive amount on the line, scanning
 * each rule's matches left to right.
 */
export function extractCurrencyFromLine(
  line: string,
  tokens: readonly OCRToken[],
  rules: ExtractionRules = DEFAULT_RULES
): FieldCandidate<number> | null {
  for (const pattern of rules.currencyPatterns) {
    for (const match of line.matchAll(pattern)) {
      const raw = match[0];
      const amount = parseAmount(raw);
      if (amount === null) continue;

      return {
        value: amount,
        confidence: fieldConfidence(raw, tokens),
        sourceBox: findBox(raw, tokens),
        rawText: raw,
      };
    }
  }
  return null;
}

function extractAmountKind(
  lines: readonly string[],
  keywords: readonly string[],
  tokens: readonly OCRToken[],
  rules: ExtractionRules
): FieldCandidate<number> {
  let best: FieldCandidate<number> | null = null;

  for (const line of lines) {
    if (!keywords.some((keyword) => line.includes(keyword))) continue;

    const candidate = extractCurrencyFromLine(line, tokens, rules);
    if (candidate && (best === null || candidate.confidence > best.confidence)) {
      best = candidate;
    }
  }

  return best ?? emptyCandidate();
}

/**
 * Subtotal, tax and total, each taken from keyword lines independently.
 * No cross-field checks happen here; see validateAmounts.
 */
export function extractAmounts(
  document: OCRDocument,
  rules: ExtractionRules = DEFAULT_RULES
): AmountFields {
  if (document.tokens.length === 0) {
    return { subtotal: emptyCandidate(), tax: emptyCandidate(), total: emptyCandidate() };
  }

  const lines = document.rawText.split('\n').map((line) => line.trim().toLowerCase());

  const extractKind = (kind: AmountKind) =>
    extractAmountKind(lines, rules.amountKeywords[kind], document.tokens, rules);

  return {
    subtotal: extractKind('subtotal'),
    tax: extractKind('tax'),
    total: extractKind('total'),
  };
}
