import type { AmountCheck, AmountFields, FieldCandidate } from './types';
import { DEFAULT_RULES, type AmountValidationRules } from './rules';
import { clampConfidence } from './confidence';

export interface AmountValidation {
  amounts: AmountFields;
  check: AmountCheck;
}

function adjust(candidate: FieldCandidate<number>, delta: number): FieldCandidate<number> {
  return { ...candidate, confidence: clampConfidence(candidate.confidence + delta) };
}

/**
 * Cross-check subtotal + tax against total. Agreement within tolerance
 * raises all three confidences, disagreement lowers them; with any of the
 * three missing nothing changes. Inputs are not mutated.
 */
export function validateAmounts(
  amounts: AmountFields,
  rules: AmountValidationRules = DEFAULT_RULES.validation
): AmountValidation {
  const subtotal = amounts.subtotal.value;
  const tax = amounts.tax.value;
  const total = amounts.total.value;

  if (subtotal === null || tax === null || total === null) {
    return { amounts, check: 'unchecked' };
  }

  const expected = subtotal + tax;
  const tolerance = Math.max(rules.minTolerance, total * rules.relativeTolerance);
  const consistent = Math.abs(total - expected) <= tolerance;
  const delta = consistent ? rules.boost : -rules.penalty;

  return {
    amounts: {
      subtotal: adjust(amounts.subtotal, delta),
      tax: adjust(amounts.tax, delta),
      total: adjust(amounts.total, delta),
    },
    check: consistent ? 'consistent' : 'inconsistent',
  };
}
