import type { OCRDocument } from '@/lib/parsing/types';
import { emptyCandidate, type FieldCandidate } from './types';
import { DEFAULT_RULES, type VendorRules } from './rules';
import { fieldConfidence, findBox } from './confidence';

/** Capitalize every run of letters, lowercase the rest: "TECH MART" → "Tech Mart" */
export function toTitleCase(text: string): string {
  return text.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

export function isVendorCandidate(line: string, rules: VendorRules = DEFAULT_RULES.vendor): boolean {
  const trimmed = line.trim();
  const lower = trimmed.toLowerCase();

  if (rules.stopWords.some((word) => lower.includes(word))) return false;

  const digits = trimmed.replace(/\D/g, '').length;
  if (digits > trimmed.length * rules.maxDigitRatio) return false;

  return trimmed.length >= rules.minLength && trimmed.length <= rules.maxLength;
}

/**
 * Vendor name from the top of the receipt, scored by how high the line
 * sits, how long it is, and how confidently it was read.
 */
export function extractVendor(
  document: OCRDocument,
  rules: VendorRules = DEFAULT_RULES.vendor
): FieldCandidate<string> {
  if (document.tokens.length === 0) return emptyCandidate();

  const topLines = document.rawText.split('\n').slice(0, rules.maxLines);
  let best: FieldCandidate<string> | null = null;

  for (const [index, rawLine] of topLines.entries()) {
    const line = rawLine.trim();
    if (!line || !isVendorCandidate(line, rules)) continue;

    const positionScore = (rules.maxLines - index) / rules.maxLines;
    const lengthScore = Math.min(line.length / rules.lengthNorm, 1);
    const ocrScore = fieldConfidence(line, document.tokens);
    const confidence =
      positionScore * rules.positionWeight +
      lengthScore * rules.lengthWeight +
      ocrScore * rules.ocrWeight;

    if (best === null || confidence > best.confidence) {
      best = {
        value: toTitleCase(line),
        confidence,
        sourceBox: findBox(line, document.tokens),
        rawText: line,
      };
    }
  }

  return best ?? emptyCandidate();
}
