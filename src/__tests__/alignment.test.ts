import { describe, it, expect } from 'vitest';
import { alignPoints, alignRegions, type AlignableRegion } from '@/lib/alignment';
import { applyTransform } from '@/lib/geometry';
import { DEFAULT_REGION_ANCHORS, REGION_NAMES } from '@/lib/regions';
import { syntheticLandmarks } from './fixtures/synthetic-face';

const regions: AlignableRegion[] = REGION_NAMES.map((name) => ({
  name,
  anchors: DEFAULT_REGION_ANCHORS[name],
  useOutline: name === 'face',
}));

describe('alignRegions', () => {
  const template = { landmarks: syntheticLandmarks({ cx: 128, cy: 108 }), regions };

  it('recovers the similarity between a photo face and the template', () => {
    const source = syntheticLandmarks({ cx: 150, cy: 130, scale: 1.25, rotation: 0.2 });
    const out = alignRegions(source, template);
    for (const name of REGION_NAMES) {
      const fit = out[name];
      expect(fit?.kind).toBe('similarity');
      expect(fit?.rmse).toBeLessThan(1e-6);
      expect(fit?.scale).toBeCloseTo(0.8, 9);
      expect(fit?.rotation).toBeCloseTo(-0.2, 9);
    }
  });

  it('maps source anchors onto template anchors', () => {
    const source = syntheticLandmarks({ cx: 150, cy: 130, scale: 1.25 });
    const fit = alignRegions(source, template).mouth;
    expect(fit).toBeDefined();
    if (!fit) return;
    const p = applyTransform(fit.transform, source.points.mouth_left);
    expect(p.x).toBeCloseTo(113, 9);
    expect(p.y).toBeCloseTo(160, 9);
  });

  it('only aligns regions the template declares', () => {
    const out = alignRegions(syntheticLandmarks({ cx: 150, cy: 130 }), { ...template, regions: regions.slice(0, 1) });
    expect(Object.keys(out)).toEqual(['face']);
  });
});

describe('alignPoints fallback', () => {
  it('uses translation for collinear anchors', () => {
    const fit = alignPoints(
      [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }],
      [{ x: 10, y: 10 }, { x: 11, y: 10 }, { x: 12, y: 10 }],
    );
    expect(fit.kind).toBe('translation');
    expect(fit.transform).toEqual({ a: 1, b: 0, tx: 10, ty: 10 });
    expect(fit.rmse).toBe(0);
  });

  it('uses translation when either side is coincident', () => {
    const spreadOut = [{ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 0, y: 4 }];
    const collapsed = [{ x: 5, y: 5 }, { x: 5, y: 5 }, { x: 5, y: 5 }];
    expect(alignPoints(collapsed, spreadOut).kind).toBe('translation');
    expect(alignPoints(spreadOut, collapsed).kind).toBe('translation');
  });
});
