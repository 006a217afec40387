import { fitSimilarity } from '@/lib/geometry';

const rot = (p: {x:number;y:number}, ang:number, s=1, t={x:0,y:0}) => ({
  x: s*(p.x*Math.cos(ang)-p.y*Math.sin(ang)) + t.x,
  y: s*(p.x*Math.sin(ang)+p.y*Math.cos(ang)) + t.y,
});

describe('procrustes', () => {
  it('recovers scale, rotation and translation of a similarity', () => {
    const a = [ {x:-1,y:0},{x:1,y:0},{x:0,y:1},{x:0,y:-1} ];
    const b = a.map(p => rot(p, Math.PI/6, 1.4, {x:2,y:-3}));
    const fit = fitSimilarity(a, b);
    expect(fit).not.toBeNull();
    if (!fit) return;
    expect(fit.scale).toBeCloseTo(1.4, 9);
    expect(fit.rotation).toBeCloseTo(Math.PI/6, 9);
    expect(fit.transform.tx).toBeCloseTo(2, 9);
    expect(fit.transform.ty).toBeCloseTo(-3, 9);
    expect(fit.rmse).toBeLessThan(1e-6);
  });

  it('reports residual error for non-similar shapes', () => {
    const a = [ {x:0,y:0},{x:1,y:0},{x:1,y:1},{x:0,y:1} ];
    const exact = fitSimilarity(a, a.map(p => rot(p, 0.1, 1.0, {x:0.2,y:-0.1})));
    // Anisotropic scaling cannot be expressed as a similarity
    const stretched = fitSimilarity(a, a.map(p => ({x: p.x * 1.2, y: p.y * 0.8})));
    expect(exact?.rmse ?? Infinity).toBeLessThan(1e-9);
    expect(stretched?.rmse ?? 0).toBeGreaterThan(0.05);
  });

  it('returns null without spread to fit against', () => {
    expect(fitSimilarity([{x:1,y:1}], [{x:2,y:2}])).toBeNull();
    expect(fitSimilarity([{x:1,y:1},{x:1,y:1},{x:1,y:1}], [{x:0,y:0},{x:1,y:0},{x:0,y:1}])).toBeNull();
  });

  it('returns null when the target collapses to a point', () => {
    expect(fitSimilarity([{x:0,y:0},{x:1,y:0}], [{x:5,y:5},{x:5,y:5}])).toBeNull();
  });
});
