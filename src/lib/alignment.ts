import {
  distance,
  fitSimilarity,
  spread,
  transformRMSE,
  translationBetween,
  type SimilarityTransform,
  type Vec2,
} from './geometry';
import { anchorPoints, type LandmarkSet } from './landmarks';
import type { LandmarkName, RegionName } from './regions';

// Smallest / largest covariance eigenvalue below this counts as a line.
export const COLLINEAR_RATIO = 1e-3;
const COINCIDENT_EPSILON = 1e-6;

export type AlignmentKind = 'similarity' | 'translation';

export type RegionAlignment = {
  kind: AlignmentKind;
  /** Maps source-image coordinates onto template coordinates. */
  transform: SimilarityTransform;
  rmse: number;
  scale: number;
  rotation: number;
};

export type AlignableRegion = {
  name: RegionName;
  anchors: readonly LandmarkName[];
  useOutline: boolean;
};

function coincident(points: Vec2[]) {
  return points.every((p) => distance(p, points[0]) < COINCIDENT_EPSILON);
}

function degenerate(points: Vec2[]) {
  if (points.length < 2 || coincident(points)) return true;
  return points.length >= 3 && spread(points).ratio < COLLINEAR_RATIO;
}

/**
 * Least-squares similarity from `source` anchors onto `target` anchors, or a
 * centroid-to-centroid translation when either side cannot support a
 * rotation and scale estimate.
 */
export function alignPoints(source: Vec2[], target: Vec2[]): RegionAlignment {
  if (!degenerate(source) && !degenerate(target)) {
    const fit = fitSimilarity(source, target);
    if (fit) {
      return { kind: 'similarity', transform: fit.transform, rmse: fit.rmse, scale: fit.scale, rotation: fit.rotation };
    }
  }
  const transform = translationBetween(source, target);
  return { kind: 'translation', transform, rmse: transformRMSE(transform, source, target), scale: 1, rotation: 0 };
}

export function alignRegion(source: LandmarkSet, template: LandmarkSet, region: AlignableRegion): RegionAlignment {
  return alignPoints(
    anchorPoints(source, region.anchors, region.useOutline),
    anchorPoints(template, region.anchors, region.useOutline),
  );
}

export function alignRegions(
  source: LandmarkSet,
  template: { landmarks: LandmarkSet; regions: readonly AlignableRegion[] },
): Partial<Record<RegionName, RegionAlignment>> {
  const out: Partial<Record<RegionName, RegionAlignment>> = {};
  for (const region of template.regions) {
    out[region.name] = alignRegion(source, template.landmarks, region);
  }
  return out;
}
