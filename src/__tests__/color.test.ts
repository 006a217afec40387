import { describe, it, expect } from 'vitest';
import { channelStats, enhanceContrast, matchColor } from '@/lib/color';
import { createImage, imagesEqual, pixelAt } from '@/lib/image';
import { rasterizeMask } from '@/lib/mask';

const gray = (value: number) => createImage(4, 4, 3, [value, value, value]);

describe('color statistics', () => {
  it('computes per-channel mean and spread', () => {
    const image = createImage(2, 1, 3);
    image.data.set([0, 10, 20, 100, 10, 40]);
    const stats = channelStats(image);
    expect(stats).toEqual({ mean: [50, 10, 30], std: [50, 0, 10] });
  });

  it('returns null for a mask with no weight', () => {
    const mask = rasterizeMask([{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0, y: 1 }], 5, 4, 4);
    expect(channelStats(gray(10), { ...mask, alpha: new Float32Array(mask.alpha.length) })).toBeNull();
  });
});

describe('matchColor', () => {
  const target = { mean: [100, 100, 100] as [number, number, number], std: [0, 0, 0] as [number, number, number] };

  it('strength 0 leaves the image alone', () => {
    const image = gray(40);
    expect(imagesEqual(matchColor(image, target, 0), image)).toBe(true);
  });

  it('strength 1 moves a flat image onto the target mean', () => {
    const out = matchColor(gray(40), target, 1);
    expect(pixelAt(out, 2, 2)).toEqual([100, 100, 100]);
  });

  it('partial strength interpolates the mean', () => {
    const out = matchColor(gray(40), target, 0.25);
    expect(pixelAt(out, 0, 0)).toEqual([55, 55, 55]);
  });

  it('only touches masked pixels', () => {
    const image = createImage(20, 20, 3, [40, 40, 40]);
    const mask = rasterizeMask(
      [{ x: 0, y: 0 }, { x: 10, y: 0 }, { x: 10, y: 10 }, { x: 0, y: 10 }],
      0,
      20,
      20,
    );
    const out = matchColor(image, target, 1, mask);
    expect(pixelAt(out, 5, 5)).toEqual([100, 100, 100]);
    expect(pixelAt(out, 15, 15)).toEqual([40, 40, 40]);
  });
});

describe('enhanceContrast', () => {
  it('pushes values away from the midpoint monotonically', () => {
    expect(pixelAt(enhanceContrast(gray(100), 1.2), 0, 0)).toEqual([94, 94, 94]);
    expect(pixelAt(enhanceContrast(gray(100), 1.5), 0, 0)).toEqual([86, 86, 86]);
    expect(pixelAt(enhanceContrast(gray(200), 1.2), 0, 0)).toEqual([214, 214, 214]);
    expect(pixelAt(enhanceContrast(gray(200), 1.5), 0, 0)).toEqual([236, 236, 236]);
  });

  it('clamps to the 8-bit range', () => {
    expect(pixelAt(enhanceContrast(gray(250), 2), 0, 0)).toEqual([255, 255, 255]);
    expect(pixelAt(enhanceContrast(gray(10), 2), 0, 0)).toEqual([0, 0, 0]);
  });

  it('factor 1 is the identity and the input is never modified', () => {
    const image = gray(77);
    expect(imagesEqual(enhanceContrast(image, 1), image)).toBe(true);
    enhanceContrast(image, 1.8);
    expect(pixelAt(image, 0, 0)).toEqual([77, 77, 77]);
  });
});
