import { describe, it, expect } from 'vitest';
import {
  adaptiveThreshold,
  bilateralFilter,
  convexHull,
  estimateSkewAngle,
  minAreaRectAngle,
  normalizeSkewAngle,
  rotateReplicate,
  toLuminance,
} from './image-ops';
import type { RawImage } from './types';

function solid(width: number, height: number, value: number, channels = 1): RawImage {
  return { data: new Uint8Array(width * height * channels).fill(value), width, height, channels };
}

/** White page with a dark band tilted by `degrees` (clockwise on screen) */
function tiltedBand(degrees: number): RawImage {
  const image = solid(420, 120, 255);
  const slope = Math.tan((degrees * Math.PI) / 180);
  for (let x = 10; x < 410; x++) {
    const top = Math.round(50 + x * slope);
    for (let y = top; y <= top + 20; y++) {
      image.data[y * image.width + x] = 0;
    }
  }
  return image;
}

describe('toLuminance', () => {
  it('weights RGB channels', () => {
    const image: RawImage = { data: Uint8Array.from([255, 0, 0, 0, 0, 255]), width: 2, height: 1, channels: 3 };
    expect(Array.from(toLuminance(image))).toEqual([76, 29]);
  });

  it('returns single-channel data as is', () => {
    const image = solid(2, 2, 7);
    expect(toLuminance(image)).toBe(image.data);
  });
});

describe('bilateralFilter', () => {
  it('leaves a uniform image unchanged', () => {
    const gray = bilateralFilter(solid(12, 12, 200));
    expect(gray.data.every((v) => v === 200)).toBe(true);

    const rgb = bilateralFilter(solid(6, 6, 90, 3));
    expect(rgb.channels).toBe(3);
    expect(rgb.data.every((v) => v === 90)).toBe(true);
  });

  it('keeps a strong edge', () => {
    const image = solid(20, 10, 255);
    for (let y = 0; y < 10; y++) {
      for (let x = 0; x < 10; x++) image.data[y * 20 + x] = 0;
    }
    const out = bilateralFilter(image);
    expect(out.data[5 * 20 + 2]).toBe(0);
    expect(out.data[5 * 20 + 17]).toBe(255);
  });
});

describe('convexHull', () => {
  it('drops interior points', () => {
    const hull = convexHull([[0, 0], [10, 0], [10, 5], [0, 5], [5, 2], [3, 3]]);
    expect(hull).toEqual([[0, 0], [10, 0], [10, 5], [0, 5]]);
  });
});

describe('minAreaRectAngle', () => {
  it('finds an axis-aligned rectangle', () => {
    expect(minAreaRectAngle([[0, 0], [10, 0], [10, 5], [0, 5]])).toBe(0);
  });
});

describe('normalizeSkewAngle', () => {
  it('folds angles into (-45, 45]', () => {
    expect(normalizeSkewAngle(0)).toBe(0);
    expect(normalizeSkewAngle(90)).toBe(0);
    expect(normalizeSkewAngle(50)).toBe(-40);
    expect(normalizeSkewAngle(45)).toBe(45);
    expect(normalizeSkewAngle(-45)).toBe(45);
    expect(normalizeSkewAngle(-10)).toBe(-10);
  });
});

describe('estimateSkewAngle', () => {
  it('measures a tilted text band', () => {
    expect(Math.abs(estimateSkewAngle(tiltedBand(5)) - 5)).toBeLessThan(0.5);
    expect(Math.abs(estimateSkewAngle(tiltedBand(-3)) + 3)).toBeLessThan(0.5);
  });

  it('reports zero for a straight band', () => {
    expect(estimateSkewAngle(tiltedBand(0))).toBe(0);
  });

  it('throws on a blank page', () => {
    expect(() => estimateSkewAngle(solid(50, 50, 255))).toThrow(/Too few foreground pixels/);
  });
});

describe('rotateReplicate', () => {
  const image: RawImage = {
    data: Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8, 9]),
    width: 3,
    height: 3,
    channels: 1,
  };

  it('is the identity at zero degrees', () => {
    expect(Array.from(rotateReplicate(image, 0).data)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it('turns content a quarter clockwise at 90 degrees', () => {
    expect(Array.from(rotateReplicate(image, 90).data)).toEqual([7, 4, 1, 8, 5, 2, 9, 6, 3]);
  });

  it('straightens a tilted band', () => {
    const straightened = rotateReplicate(tiltedBand(5), -5);
    expect(Math.abs(estimateSkewAngle(straightened))).toBeLessThan(0.5);
  });
});

describe('adaptiveThreshold', () => {
  it('turns a uniform page white', () => {
    const out = adaptiveThreshold(solid(15, 15, 200));
    expect(out.channels).toBe(1);
    expect(out.data.every((v) => v === 255)).toBe(true);
  });

  it('keeps a dark dot black', () => {
    const image = solid(15, 15, 200);
    image.data[7 * 15 + 7] = 0;
    const out = adaptiveThreshold(image);
    expect(out.data[7 * 15 + 7]).toBe(0);
    expect(out.data[0]).toBe(255);
    expect(out.data[7 * 15 + 8]).toBe(255);
  });

  it('reduces colour input to one channel', () => {
    expect(adaptiveThreshold(solid(5, 5, 200, 3)).data).toHaveLength(25);
  });

  it('rejects an even block size', () => {
    expect(() => adaptiveThreshold(solid(5, 5, 200), { blockSize: 10 })).toThrow(/block size/);
  });
});
