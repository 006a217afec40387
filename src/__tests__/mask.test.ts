import { describe, it, expect } from 'vitest';
import { ellipsePolygon, maskArea, maskValueAt, pointInPolygon, rasterizeMask } from '@/lib/mask';

const square = (x0: number, y0: number, x1: number, y1: number) => [
  { x: x0, y: y0 },
  { x: x1, y: y0 },
  { x: x1, y: y1 },
  { x: x0, y: y1 },
];

describe('mask utilities', () => {
  it('pointInPolygon uses the even-odd rule', () => {
    const poly = square(0, 0, 10, 10);
    expect(pointInPolygon({ x: 5, y: 5 }, poly)).toBe(true);
    expect(pointInPolygon({ x: 15, y: 5 }, poly)).toBe(false);
  });

  it('ellipsePolygon samples points on the ellipse', () => {
    const poly = ellipsePolygon(50, 40, 20, 10, 32);
    expect(poly).toHaveLength(32);
    for (const p of poly) {
      const u = (p.x - 50) / 20;
      const v = (p.y - 40) / 10;
      expect(u * u + v * v).toBeCloseTo(1, 9);
    }
  });

  it('is fully opaque deeper than the feather radius', () => {
    const mask = rasterizeMask(square(0, 0, 20, 20), 4, 30, 30);
    expect(mask).toMatchObject({ x: 0, y: 0, width: 21, height: 21 });
    expect(maskValueAt(mask, 10, 10)).toBe(1);
  });

  it('falls linearly to zero at the boundary', () => {
    const mask = rasterizeMask(square(0, 0, 20, 20), 4, 30, 30);
    expect(maskValueAt(mask, 2, 10)).toBe(0.5);
    expect(maskValueAt(mask, 0, 10)).toBe(0);
    expect(maskValueAt(mask, 25, 10)).toBe(0);
  });

  it('is a hard edge without feathering', () => {
    const mask = rasterizeMask(square(0, 0, 20, 20), 0, 30, 30);
    expect(maskValueAt(mask, 1, 10)).toBe(1);
    expect(maskArea(mask)).toBe(400);
  });

  it('clips to the image', () => {
    const mask = rasterizeMask(square(-10, -10, 10, 10), 0, 30, 30);
    expect(mask).toMatchObject({ x: 0, y: 0, width: 11, height: 11 });
  });
});
