import { CONTRAST_MIDPOINT, channelStats } from './color';
import { applyTransform, invertTransform, type SimilarityTransform } from './geometry';
import { cloneImage, sampleBilinear, type RasterImage } from './image';
import type { RegionMask } from './mask';
import { regionStrength, type ResolvedParameters } from './params';
import { BLEND_ORDER, type RegionName } from './regions';
import { clamp } from './utils';

// Source eyes are stretched away from the photo's mean colour before painting.
export const EYE_CONTRAST = 1.2;

export type RegionPlan =
  | { kind: 'eligible'; transform: SimilarityTransform }
  | { kind: 'excluded'; reason: string };

export type BlendPlan = Partial<Record<RegionName, RegionPlan>>;

export type BlendableRegion = { name: RegionName; mask: RegionMask };

type BlendStep = { region: BlendableRegion; transform: SimilarityTransform; strength: number; contrast: number };

type Pivot = readonly [number, number, number];

/**
 * Paint one region into `out` in place. `transform` maps source coordinates to
 * template coordinates; each template pixel is pulled back through its inverse.
 */
function paintRegion(out: RasterImage, source: RasterImage, step: BlendStep, pivot: Pivot) {
  const { mask } = step.region;
  const inverse = invertTransform(step.transform);
  for (let j = 0; j < mask.height; j++) {
    for (let i = 0; i < mask.width; i++) {
      const m = mask.alpha[j * mask.width + i];
      if (m <= 0) continue;
      const x = mask.x + i;
      const y = mask.y + j;
      const wm = step.strength * m;
      const s = applyTransform(inverse, { x, y });
      const o = (y * out.width + x) * out.channels;
      for (let c = 0; c < 3; c++) {
        const t = out.data[o + c];
        let v = sampleBilinear(source, s.x, s.y, c);
        if (step.contrast !== 1) v = clamp(pivot[c] + (v - pivot[c]) * step.contrast, 0, 255);
        out.data[o + c] = Math.round(t * (1 - wm) + v * wm);
      }
    }
  }
}

/** Regions that will actually be painted, in paint order. */
export function blendSteps(
  regions: readonly BlendableRegion[],
  plan: BlendPlan,
  params: ResolvedParameters,
): BlendStep[] {
  const steps: BlendStep[] = [];
  for (const name of BLEND_ORDER) {
    const region = regions.find((r) => r.name === name);
    const entry = plan[name];
    if (!region || !entry || entry.kind !== 'eligible') continue;
    const strength = regionStrength(params, name);
    if (strength <= 0) continue;
    const contrast = name === 'left_eye' || name === 'right_eye' ? EYE_CONTRAST : 1;
    steps.push({ region, transform: entry.transform, strength, contrast });
  }
  return steps;
}

/**
 * Composite aligned source regions over the template image in blend order
 * (face, nose, mouth, then eyes). Per pixel:
 *   out = t * (1 - w*m) + s * (w*m)
 * with m the feathered mask weight and w the region strength. Eye samples
 * get EYE_CONTRAST around the source image's per-channel mean first. The
 * template raster is never modified.
 */
export function blendRegions(
  source: RasterImage,
  template: { image: RasterImage; regions: readonly BlendableRegion[] },
  plan: BlendPlan,
  params: ResolvedParameters,
): RasterImage {
  const out = cloneImage(template.image);
  const steps = blendSteps(template.regions, plan, params);
  const midpoint: Pivot = [CONTRAST_MIDPOINT, CONTRAST_MIDPOINT, CONTRAST_MIDPOINT];
  const pivot = steps.some((s) => s.contrast !== 1) ? (channelStats(source)?.mean ?? midpoint) : midpoint;
  for (const step of steps) paintRegion(out, source, step, pivot);
  return out;
}
