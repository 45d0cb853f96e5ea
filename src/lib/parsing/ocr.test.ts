import { describe, it, expect, vi, beforeEach } from 'vitest';
import { buildOcrDocument, TesseractOcrAdapter, type RecognizedWord } from './ocr';

const tesseract = vi.hoisted(() => ({
  fail: false,
  failConfigure: false,
  text: '',
  words: [] as { text: string; confidence: number; bbox: { x0: number; y0: number; x1: number; y1: number } }[],
  created: 0,
  terminated: 0,
}));

vi.mock('tesseract.js', () => ({
  OEM: { DEFAULT: 3 },
  PSM: { SINGLE_BLOCK: '6' },
  createWorker: vi.fn(async () => {
    await new Promise((resolve) => setTimeout(resolve, 5));
    if (tesseract.fail) throw new Error('language data unavailable');
    tesseract.created++;
    return {
      setParameters: vi.fn(async () => {
        if (tesseract.failConfigure) throw new Error('bad parameter');
        return {};
      }),
      recognize: vi.fn(async () => ({ data: { text: tesseract.text, words: tesseract.words } })),
      terminate: vi.fn(async () => {
        tesseract.terminated++;
        return {};
      }),
    };
  }),
}));

function word(text: string, confidence: number, x0 = 0): RecognizedWord {
  return { text, confidence, bbox: { x0, y0: 10, x1: x0 + 40, y1: 30 } };
}

describe('buildOcrDocument', () => {
  it('keeps words strictly above the threshold', () => {
    const document = buildOcrDocument(
      'TOTAL $5.00',
      [word(' TOTAL ', 91.7), word('', 95), word('x', 30), word('$5.00', 31.2, 50)],
      30
    );

    expect(document.tokens).toEqual([
      { text: 'TOTAL', confidence: 91, box: { x1: 0, y1: 10, x2: 40, y2: 30 } },
      { text: '$5.00', confidence: 31, box: { x1: 50, y1: 10, x2: 90, y2: 30 } },
    ]);
    expect(document.wordCount).toBe(2);
    expect(document.avgConfidence).toBe(61);
    expect(document.rawText).toBe('TOTAL $5.00');
  });

  it('reports zero average confidence without tokens', () => {
    const document = buildOcrDocument('', [word('faint', 12)], 30);
    expect(document.tokens).toEqual([]);
    expect(document.avgConfidence).toBe(0);
  });
});

describe('TesseractOcrAdapter', () => {
  beforeEach(() => {
    tesseract.fail = false;
    tesseract.failConfigure = false;
    tesseract.created = 0;
    tesseract.terminated = 0;
    tesseract.text = 'TECH MART\nTOTAL $9.99';
    tesseract.words = [word('TECH', 93), word('MART', 88, 50), word('TOTAL', 20), word('$9.99', 75, 100)];
  });

  it('filters recognized words by the requested threshold', async () => {
    const adapter = new TesseractOcrAdapter('eng');
    const document = await adapter.recognize(Buffer.from('png'), { confidenceThreshold: 30 });

    expect(document.rawText).toBe('TECH MART\nTOTAL $9.99');
    expect(document.tokens.map((t) => t.text)).toEqual(['TECH', 'MART', '$9.99']);
    expect(document.wordCount).toBe(3);
  });

  it('reuses one worker across calls', async () => {
    const adapter = new TesseractOcrAdapter('eng');
    await adapter.recognize(Buffer.from('png'), { confidenceThreshold: 30 });
    await adapter.recognize(Buffer.from('png'), { confidenceThreshold: 80 });
    expect(tesseract.created).toBe(1);
    await adapter.terminate();
  });

  it('starts a single worker for concurrent first calls', async () => {
    const adapter = new TesseractOcrAdapter('eng');
    const documents = await Promise.all(
      [1, 2, 3, 4].map(() => adapter.recognize(Buffer.from('png'), { confidenceThreshold: 30 }))
    );

    expect(tesseract.created).toBe(1);
    expect(documents.map((d) => d.wordCount)).toEqual([3, 3, 3, 3]);

    await adapter.terminate();
    expect(tesseract.terminated).toBe(1);
  });

  it('terminates a worker that fails configuration and retries on the next call', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    tesseract.failConfigure = true;
    const adapter = new TesseractOcrAdapter('eng');

    const failed = await adapter.recognize(Buffer.from('png'), { confidenceThreshold: 30 });
    expect(failed.wordCount).toBe(0);
    expect(tesseract.terminated).toBe(1);

    tesseract.failConfigure = false;
    const recovered = await adapter.recognize(Buffer.from('png'), { confidenceThreshold: 30 });
    expect(recovered.wordCount).toBe(3);
    expect(tesseract.created).toBe(2);
  });

  it('returns an empty document when recognition fails', async () => {
    tesseract.fail = true;
    vi.spyOn(console, 'error').mockImplementation(() => {});

    const document = await new TesseractOcrAdapter('eng').recognize(Buffer.from('png'), {
      confidenceThreshold: 30,
    });
    expect(document).toEqual({ rawText: '', tokens: [], wordCount: 0, avgConfidence: 0 });
  });
});
