import { describe, it, expect } from 'vitest';
import {
  applyTransform,
  centroid,
  invertTransform,
  normalizeByEyes,
  spread,
  transformRMSE,
  translationBetween,
  IDENTITY_TRANSFORM,
} from '@/lib/geometry';

describe('geometry', () => {
  it('centroid averages points', () => {
    expect(centroid([{ x: 0, y: 0 }, { x: 4, y: 2 }])).toEqual({ x: 2, y: 1 });
  });

  it('invertTransform undoes applyTransform', () => {
    const t = { a: 1.2 * Math.cos(0.4), b: 1.2 * Math.sin(0.4), tx: 15, ty: -7 };
    const p = { x: 31, y: 12 };
    const back = applyTransform(invertTransform(t), applyTransform(t, p));
    expect(back.x).toBeCloseTo(31, 9);
    expect(back.y).toBeCloseTo(12, 9);
  });

  it('refuses to invert a zero-scale transform', () => {
    expect(() => invertTransform({ a: 0, b: 0, tx: 1, ty: 1 })).toThrow();
  });

  it('translationBetween moves centroid onto centroid', () => {
    const t = translationBetween([{ x: 0, y: 0 }, { x: 2, y: 0 }], [{ x: 10, y: 5 }, { x: 12, y: 5 }]);
    expect(t).toEqual({ a: 1, b: 0, tx: 10, ty: 5 });
    expect(transformRMSE(t, [{ x: 0, y: 0 }], [{ x: 10, y: 5 }])).toBe(0);
  });

  it('transformRMSE is infinite with nothing to compare', () => {
    expect(transformRMSE(IDENTITY_TRANSFORM, [], [])).toBe(Infinity);
  });

  it('spread ratio separates lines from areas', () => {
    const line = [{ x: 0, y: 0 }, { x: 1, y: 1 }, { x: 3, y: 3 }];
    const square = [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }, { x: 0, y: 1 }];
    expect(spread(line).ratio).toBeLessThan(1e-9);
    expect(spread(square).ratio).toBeCloseTo(1, 9);
    expect(spread(square).meanSquareRadius).toBeCloseTo(0.5, 9);
  });

  it('normalizeByEyes puts the eyes at (-0.5, 0) and (0.5, 0)', () => {
    const left = { x: 10, y: 20 };
    const right = { x: 30, y: 40 };
    const [l, r] = normalizeByEyes([left, right], left, right);
    expect(l.x).toBeCloseTo(-0.5, 9);
    expect(l.y).toBeCloseTo(0, 9);
    expect(r.x).toBeCloseTo(0.5, 9);
    expect(r.y).toBeCloseTo(0, 9);
  });
});
