import { format, getYear, isValid, parse } from 'date-fns';
import type { OCRDocument } from '@/lib/parsing/types';
import { emptyCandidate, type FieldCandidate } from './types';
import { DEFAULT_RULES, type ExtractionRules } from './rules';
import { fieldConfidence, findBox } from './confidence';

/**
 * Tried in order against the normalized match. Month-first wins for
 * ambiguous numeric dates; day-first only when the month would be invalid.
 */
const DATE_FORMATS = [
  'M/d/yy',
  'd/M/yy',
  'M/d/yyyy',
  'd/M/yyyy',
  'yyyy/M/d',
  'MMM d yyyy',
  'MMMM d yyyy',
  'd MMM yyyy',
  'd MMMM yyyy',
] as const;

export interface DateExtractionOptions {
  rules?: ExtractionRules;
  /** "Now" for the year window and two-digit years */
  referenceDate?: Date;
}

/**
 * Lenient parse of a date-shaped string. Separators are unified,
 * punctuation after month names is dropped and "Sept" is shortened to the
 * three-letter form before matching.
 */
export function parseLenientDate(raw: string, referenceDate: Date = new Date()): Date | null {
  const normalized = raw
    .replace(/[.,]/g, ' ')
    .replace(/-/g, '/')
    .replace(/\s+/g, ' ')
    .replace(/\bsept\b/gi, 'Sep')
    .trim();

  for (const pattern of DATE_FORMATS) {
    const parsed = parse(normalized, pattern, referenceDate);
    if (isValid(parsed)) return parsed;
  }

  return null;
}

/**
 * Highest-confidence plausible date in the document. Ties keep the first
 * found, in rule order and then text order.
 */
export function extractDate(
  document: OCRDocument,
  options: DateExtractionOptions = {}
): FieldCandidate<string> {
  const rules = options.rules ?? DEFAULT_RULES;
  const referenceDate = options.referenceDate ?? new Date();
  const maxYear = getYear(referenceDate) + rules.maxYearsAhead;

  if (document.tokens.length === 0) return emptyCandidate();

  let best: FieldCandidate<string> | null = null;

  for (const pattern of rules.datePatterns) {
    for (const match of document.rawText.matchAll(pattern)) {
      const raw = match[0];
      const parsed = parseLenientDate(raw, referenceDate);
      if (!parsed) continue;

      const year = getYear(parsed);
      if (year < rules.minYear || year > maxYear) continue;

      const confidence = fieldConfidence(raw, document.tokens);
      if (best === null || confidence > best.confidence) {
        best = {
          value: format(parsed, 'yyyy-MM-dd'),
          confidence,
          sourceBox: findBox(raw, document.tokens),
          rawText: raw,
        };
      }
    }
  }

  return best ?? emptyCandidate();
}
