import type { Pt } from './points';

/**
 * Soft alpha map covering the bounding box of a region in template space.
 * `alpha[j * width + i]` is the weight of pixel (x + i, y + j), in 0..1.
 */
export type RegionMask = {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly alpha: Float32Array;
};

export function ellipsePolygon(cx: number, cy: number, rx: number, ry: number, segments = 64): Pt[] {
  const pts: Pt[] = [];
  for (let i = 0; i < segments; i++) {
    const t = (i / segments) * 2 * Math.PI;
    pts.push({ x: cx + rx * Math.cos(t), y: cy + ry * Math.sin(t) });
  }
  return pts;
}

// Even-odd rule ray cast
export function pointInPolygon(p: Pt, poly: readonly Pt[]): boolean {
  let inside = false;
  for (let i = 0, j = poly.length - 1; i < poly.length; j = i++) {
    const a = poly[i];
    const b = poly[j];
    if ((a.y > p.y) !== (b.y > p.y)) {
      const xCross = ((b.x - a.x) * (p.y - a.y)) / (b.y - a.y) + a.x;
      if (p.x < xCross) inside = !inside;
    }
  }
  return inside;
}

function segmentDistance(p: Pt, a: Pt, b: Pt): number {
  const vx = b.x - a.x, vy = b.y - a.y;
  const wx = p.x - a.x, wy = p.y - a.y;
  const len2 = vx * vx + vy * vy || 1e-12;
  const t = Math.max(0, Math.min(1, (vx * wx + vy * wy) / len2));
  return Math.hypot(p.x - (a.x + t * vx), p.y - (a.y + t * vy));
}

export function distanceToBoundary(p: Pt, poly: readonly Pt[]): number {
  let best = Infinity;
  for (let i = 0, j = poly.length - 1; i < poly.length; j = i++) {
    const d = segmentDistance(p, poly[j], poly[i]);
    if (d < best) best = d;
  }
  return best;
}

/**
 * Rasterize a closed polygon into a feathered mask clipped to the image.
 * Pixels deeper than `feather` inside the polygon get weight 1; the weight
 * falls linearly to 0 at the boundary. Outside pixels are 0.
 */
export function rasterizeMask(poly: readonly Pt[], feather: number, imageWidth: number, imageHeight: number): RegionMask {
  if (poly.length < 3) return { x: 0, y: 0, width: 0, height: 0, alpha: new Float32Array(0) };
  let xMin = Infinity, yMin = Infinity, xMax = -Infinity, yMax = -Infinity;
  for (const p of poly) {
    xMin = Math.min(xMin, p.x);
    yMin = Math.min(yMin, p.y);
    xMax = Math.max(xMax, p.x);
    yMax = Math.max(yMax, p.y);
  }
  const x0 = Math.max(0, Math.floor(xMin));
  const y0 = Math.max(0, Math.floor(yMin));
  const x1 = Math.min(imageWidth - 1, Math.ceil(xMax));
  const y1 = Math.min(imageHeight - 1, Math.ceil(yMax));
  const width = Math.max(0, x1 - x0 + 1);
  const height = Math.max(0, y1 - y0 + 1);
  const alpha = new Float32Array(width * height);

  for (let j = 0; j < height; j++) {
    for (let i = 0; i < width; i++) {
      const p = { x: x0 + i, y: y0 + j };
      if (!pointInPolygon(p, poly)) continue;
      if (feather <= 0) {
        alpha[j * width + i] = 1;
        continue;
      }
      const d = distanceToBoundary(p, poly);
      alpha[j * width + i] = Math.min(1, d / feather);
    }
  }
  return { x: x0, y: y0, width, height, alpha };
}

export function maskValueAt(mask: RegionMask, x: number, y: number): number {
  const i = x - mask.x;
  const j = y - mask.y;
  if (i < 0 || j < 0 || i >= mask.width || j >= mask.height) return 0;
  return mask.alpha[j * mask.width + i];
}

/** Number of pixels with non-zero weight */
export function maskArea(mask: RegionMask): number {
  let n = 0;
  for (const a of mask.alpha) if (a > 0) n++;
  return n;
}
