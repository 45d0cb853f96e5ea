/**
 * Confidence fusion: ties an extracted string back to the OCR tokens that
 * produced it, for a bounding box and a normalized 0–1 confidence.
 */

import type { BoundingBox, OCRToken } from '@/lib/parsing/types';

export type ConfidenceLevel = 'high' | 'medium' | 'low';

/** Threshold: auto-accept */
const HIGH_THRESHOLD = 0.9;
/** Threshold: user review recommended */
const MEDIUM_THRESHOLD = 0.7;

/** Used when no token corroborates the text: unknown, not absent */
export const DEFAULT_FIELD_CONFIDENCE = 0.5;

export function clampConfidence(value: number): number {
  return Math.max(0, Math.min(1, value));
}

export function getConfidenceLevel(score: number): ConfidenceLevel {
  if (score >= HIGH_THRESHOLD) return 'high';
  if (score >= MEDIUM_THRESHOLD) return 'medium';
  return 'low';
}

function overlaps(a: string, b: string): boolean {
  return a.includes(b) || b.includes(a);
}

/**
 * Box of the first token whose text contains, or is contained in, the
 * target. Best-effort locator, not span alignment.
 */
export function findBox(text: string, tokens: readonly OCRToken[]): BoundingBox | null {
  const target = text.trim().toLowerCase();

  for (const token of tokens) {
    if (overlaps(target, token.text.toLowerCase())) {
      return token.box;
    }
  }

  return null;
}

/**
 * Mean OCR confidence (scaled to 0–1) of every token that overlaps any word
 * of the text. A token matching several words counts once per word.
 */
export function fieldConfidence(text: string, tokens: readonly OCRToken[]): number {
  const words = text.toLowerCase().split(/\s+/).filter(Boolean);
  const matched: number[] = [];

  for (const word of words) {
    for (const token of tokens) {
      if (overlaps(word, token.text.toLowerCase())) {
        matched.push(token.confidence);
      }
    }
  }

  if (matched.length === 0) return DEFAULT_FIELD_CONFIDENCE;

  const mean = matched.reduce((sum, c) => sum + c, 0) / matched.length;
  return clampConfidence(mean / 100);
}
