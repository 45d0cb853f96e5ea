import { describe, it, expect } from 'vitest';
import {
  clampConfidence,
  DEFAULT_FIELD_CONFIDENCE,
  fieldConfidence,
  findBox,
  getConfidenceLevel,
} from './confidence';
import { token } from './test-utils';

const tokens = [
  token('TOTAL:', 90, { x1: 10, y1: 100, x2: 70, y2: 120 }),
  token('$160.91', 80, { x1: 200, y1: 100, x2: 280, y2: 120 }),
];

describe('findBox', () => {
  it('returns the box of the token equal to the text', () => {
    expect(findBox('$160.91', tokens)).toEqual({ x1: 200, y1: 100, x2: 280, y2: 120 });
  });

  it('matches case-insensitively and by containment', () => {
    expect(findBox('  Total  ', tokens)).toEqual({ x1: 10, y1: 100, x2: 70, y2: 120 });
  });

  it('returns null when no token overlaps', () => {
    expect(findBox('xyz', tokens)).toBeNull();
  });
});

describe('fieldConfidence', () => {
  it('averages the confidences of matching tokens on a 0-1 scale', () => {
    expect(fieldConfidence('TOTAL: $160.91', tokens)).toBeCloseTo(0.85);
  });

  it('counts a token once per word it matches', () => {
    expect(fieldConfidence('mart mart', [token('MART', 60), token('ELECTRONICS', 100)])).toBeCloseTo(0.6);
  });

  it('falls back to the default when nothing matches', () => {
    expect(fieldConfidence('nothing here', tokens)).toBe(DEFAULT_FIELD_CONFIDENCE);
    expect(fieldConfidence('anything', [])).toBe(0.5);
  });
});

describe('clampConfidence', () => {
  it('keeps values in [0, 1]', () => {
    expect(clampConfidence(1.3)).toBe(1);
    expect(clampConfidence(-0.2)).toBe(0);
    expect(clampConfidence(0.42)).toBe(0.42);
  });
});

describe('getConfidenceLevel', () => {
  it('maps scores to review levels', () => {
    expect(getConfidenceLevel(0.95)).toBe('high');
    expect(getConfidenceLevel(0.9)).toBe('high');
    expect(getConfidenceLevel(0.7)).toBe('medium');
    expect(getConfidenceLevel(0.69)).toBe('low');
  });
});
