import type { Pt } from './points';

export type Vec2 = Pt;

/**
 * 2D similarity transform (uniform scale, rotation, translation):
 *   x' = a*x - b*y + tx
 *   y' = b*x + a*y + ty
 * where a = s*cos(theta), b = s*sin(theta).
 */
export type SimilarityTransform = {
  a: number;
  b: number;
  tx: number;
  ty: number;
};

export type SimilarityFit = {
  transform: SimilarityTransform;
  scale: number;
  rotation: number; // radians
  rmse: number;
};

export const IDENTITY_TRANSFORM: SimilarityTransform = { a: 1, b: 0, tx: 0, ty: 0 };

export function centroid(points: Vec2[]): Vec2 {
  const n = points.length || 1;
  const s = points.reduce(
    (acc, p) => ({ x: acc.x + p.x, y: acc.y + p.y }),
    { x: 0, y: 0 },
  );
  return { x: s.x / n, y: s.y / n };
}

export function distance(a: Vec2, b: Vec2) {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.hypot(dx, dy);
}

export function angle(a: Vec2, b: Vec2) {
  return Math.atan2(b.y - a.y, b.x - a.x);
}

export function applyTransform(t: SimilarityTransform, p: Vec2): Vec2 {
  return {
    x: t.a * p.x - t.b * p.y + t.tx,
    y: t.b * p.x + t.a * p.y + t.ty,
  };
}

export function invertTransform(t: SimilarityTransform): SimilarityTransform {
  const det = t.a * t.a + t.b * t.b;
  if (!(det > 0)) throw new Error('Cannot invert a zero-scale transform');
  const a = t.a / det;
  const b = -t.b / det;
  // inverse translation = -R^-1 * t
  return {
    a,
    b,
    tx: -(a * t.tx - b * t.ty),
    ty: -(b * t.tx + a * t.ty),
  };
}

export function translationBetween(from: Vec2[], to: Vec2[]): SimilarityTransform {
  const cf = centroid(from);
  const ct = centroid(to);
  return { a: 1, b: 0, tx: ct.x - cf.x, ty: ct.y - cf.y };
}

/** Root-mean-square distance between transformed source points and their targets. */
export function transformRMSE(t: SimilarityTransform, from: Vec2[], to: Vec2[]) {
  const n = Math.min(from.length, to.length);
  if (n === 0) return Infinity;
  let sum = 0;
  for (let i = 0; i < n; i++) {
    const p = applyTransform(t, from[i]);
    const dx = p.x - to[i].x;
    const dy = p.y - to[i].y;
    sum += dx * dx + dy * dy;
  }
  return Math.sqrt(sum / n);
}

/**
 * Mean squared radius and covariance eigenvalues of a point cloud.
 * `ratio` (smallest / largest eigenvalue) is ~0 for collinear points.
 */
export function spread(points: Vec2[]) {
  const c = centroid(points);
  let sxx = 0, syy = 0, sxy = 0;
  for (const p of points) {
    const dx = p.x - c.x;
    const dy = p.y - c.y;
    sxx += dx * dx;
    syy += dy * dy;
    sxy += dx * dy;
  }
  const n = points.length || 1;
  sxx /= n; syy /= n; sxy /= n;
  const tr = sxx + syy;
  const disc = Math.sqrt((sxx - syy) * (sxx - syy) + 4 * sxy * sxy);
  const major = (tr + disc) / 2;
  const minor = Math.max(0, (tr - disc) / 2);
  return { meanSquareRadius: tr, major, minor, ratio: major > 0 ? minor / major : 0 };
}

// Procrustes alignment (2D, similarity transform) using a closed-form 2x2 solution.
// Returns null when the source points have no spread to fit against.
export function fitSimilarity(a: Vec2[], b: Vec2[]): SimilarityFit | null {
  const n = Math.min(a.length, b.length);
  if (n < 2) return null;
  const ca = centroid(a.slice(0, n));
  const cb = centroid(b.slice(0, n));
  // Cross-covariance H = X^T Y
  let a00 = 0, a01 = 0, a10 = 0, a11 = 0;
  let sumXX = 0, sumYY = 0;
  for (let i = 0; i < n; i++) {
    const ax = a[i].x - ca.x;
    const ay = a[i].y - ca.y;
    const bx = b[i].x - cb.x;
    const by = b[i].y - cb.y;
    a00 += ax * bx;
    a01 += ax * by;
    a10 += ay * bx;
    a11 += ay * by;
    sumXX += ax * ax + ay * ay;
    sumYY += bx * bx + by * by;
  }
  if (!(sumXX > 1e-9)) return null;
  // Optimal rotation angle for 2D Kabsch
  const phi = Math.atan2(a01 - a10, a00 + a11);
  const c = Math.cos(phi);
  const s = Math.sin(phi);
  // trace(R H)
  const traceRH = c * (a00 + a11) + s * (a01 - a10);
  const scale = traceRH / sumXX;
  if (!Number.isFinite(scale) || scale <= 0) return null;
  const ta = scale * c;
  const tb = scale * s;
  const transform: SimilarityTransform = {
    a: ta,
    b: tb,
    tx: cb.x - (ta * ca.x - tb * ca.y),
    ty: cb.y - (tb * ca.x + ta * ca.y),
  };
  // Error sum: ||sRX - Y||^2 = s^2*sumXX + sumYY - 2*s*trace(RH)
  const errSum = scale * scale * sumXX + sumYY - 2 * scale * traceRH;
  const rmse = Math.sqrt(Math.max(errSum, 0) / n);
  return { transform, scale, rotation: phi, rmse };
}

export function normalizeByEyes(points: Vec2[], leftEye: Vec2, rightEye: Vec2) {
  const mid = { x: (leftEye.x + rightEye.x) / 2, y: (leftEye.y + rightEye.y) / 2 };
  const ipd = distance(leftEye, rightEye) || 1;
  const theta = -angle(leftEye, rightEye); // rotate so eyes are horizontal left->right
  const cos = Math.cos(theta);
  const sin = Math.sin(theta);
  const scale = 1 / ipd;
  return points.map((p) => {
    const tx = p.x - mid.x;
    const ty = p.y - mid.y;
    const rx = tx * cos - ty * sin;
    const ry = tx * sin + ty * cos;
    return { x: rx * scale, y: ry * scale };
  });
}
