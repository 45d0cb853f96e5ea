import type { BoundingBox, OCRDocument, OCRToken, OcrAdapter, OcrRecognizeOptions } from '@/lib/parsing/types';

export function token(text: string, confidence: number, box?: Partial<BoundingBox>): OCRToken {
  return { text, confidence, box: { x1: 0, y1: 0, x2: 10, y2: 10, ...box } };
}

export function documentFromTokens(rawText: string, tokens: OCRToken[]): OCRDocument {
  return {
    rawText,
    tokens,
    wordCount: tokens.length,
    avgConfidence: tokens.length > 0 ? tokens.reduce((s, t) => s + t.confidence, 0) / tokens.length : 0,
  };
}

/**
 * One token per whitespace-separated word, all at the same confidence,
 * laid out on a 60×20 px grid.
 */
export function documentFromLines(lines: string[], confidence = 90): OCRDocument {
  const tokens: OCRToken[] = [];
  lines.forEach((line, row) => {
    line.split(/\s+/).filter(Boolean).forEach((word, col) => {
      tokens.push(token(word, confidence, { x1: col * 60, y1: row * 20, x2: col * 60 + 50, y2: row * 20 + 15 }));
    });
  });
  return documentFromTokens(lines.join('\n'), tokens);
}

export const EMPTY_DOCUMENT: OCRDocument = { rawText: '', tokens: [], wordCount: 0, avgConfidence: 0 };

/** The sample receipt: subtotal + tax matches total */
export const TECH_MART_LINES = [
  'TECH MART ELECTRONICS',
  'Date: 03/15/2024',
  'SUBTOTAL: $147.96',
  'TAX (8.75%): $12.95',
  'TOTAL: $160.91',
];

export function techMartTokens(totalText = '$160.91'): OCRToken[] {
  return [
    token('TECH', 95, { x1: 20, y1: 20, x2: 80, y2: 40 }),
    token('MART', 94, { x1: 90, y1: 20, x2: 150, y2: 40 }),
    token('ELECTRONICS', 92, { x1: 160, y1: 20, x2: 300, y2: 40 }),
    token('Date:', 90, { x1: 20, y1: 140, x2: 70, y2: 156 }),
    token('03/15/2024', 91, { x1: 80, y1: 140, x2: 180, y2: 156 }),
    token('SUBTOTAL:', 93, { x1: 20, y1: 380, x2: 110, y2: 396 }),
    token('$147.96', 88, { x1: 300, y1: 380, x2: 370, y2: 396 }),
    token('TAX', 90, { x1: 20, y1: 405, x2: 55, y2: 421 }),
    token('(8.75%):', 85, { x1: 60, y1: 405, x2: 130, y2: 421 }),
    token('$12.95', 89, { x1: 300, y1: 405, x2: 360, y2: 421 }),
    token('TOTAL:', 96, { x1: 20, y1: 430, x2: 90, y2: 450 }),
    token(totalText, 93, { x1: 300, y1: 430, x2: 380, y2: 450 }),
  ];
}

export function techMartDocument(): OCRDocument {
  return documentFromTokens(TECH_MART_LINES.join('\n'), techMartTokens());
}

/** OCR stand-in that returns a fixed document and records its calls */
export class FakeOcr implements OcrAdapter {
  readonly calls: { image: Buffer; options: OcrRecognizeOptions }[] = [];

  constructor(private readonly document: OCRDocument) {}

  async recognize(image: Buffer, options: OcrRecognizeOptions): Promise<OCRDocument> {
    this.calls.push({ image, options });
    return this.document;
  }
}
