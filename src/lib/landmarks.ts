import { centroid, distance, normalizeByEyes } from './geometry';
import type { Point } from './points';
import {
  FACE_OVAL_INDICES,
  LANDMARK_NAMES,
  LEFT_EYE_CENTER_INDICES,
  MESH_LANDMARKS,
  RIGHT_EYE_CENTER_INDICES,
  type LandmarkName,
} from './regions';

export type Landmark = { x: number; y: number; confidence?: number };

/**
 * A complete set of named facial landmarks plus the face outline, in the pixel
 * space of the image it was detected on (or of a template).
 */
export type LandmarkSet = {
  readonly points: Readonly<Record<LandmarkName, Landmark>>;
  readonly outline: readonly Landmark[];
  readonly confidence: number;
};

function isUsable(p: Point | undefined): p is Point {
  return !!p && Number.isFinite(p.x) && Number.isFinite(p.y);
}

// Outline width (px) from which a mesh counts as fully resolved.
export const RELIABLE_FACE_WIDTH = 96;

/**
 * FaceMesh reports no per-face score, so confidence is a prior: 0.9 for a full
 * 3D mesh, 0.6 for a flat one, scaled down linearly for faces narrower than
 * RELIABLE_FACE_WIDTH since those meshes are fitted to few pixels.
 */
function meshConfidence(keypoints: readonly Point[], outline: readonly Landmark[]): number {
  const hasDepth = keypoints.some((p) => p.z !== undefined && p.z !== null);
  const prior = hasDepth ? 0.9 : 0.6;
  return prior * Math.min(1, boundingBox(outline).width / RELIABLE_FACE_WIDTH);
}

/**
 * Convert a dense FaceMesh keypoint array into a named landmark set.
 * Returns null if any index the set needs is missing or non-finite, so a
 * partially populated set never leaves this function.
 */
export function landmarksFromMesh(keypoints: Point[], confidence?: number): LandmarkSet | null {
  const pick = (i: number) => {
    const p = keypoints[i];
    return isUsable(p) ? { x: p.x, y: p.y } : null;
  };
  const eyeCenter = (indices: number[]) => {
    const pts = indices.map(pick);
    if (pts.some((p) => p === null)) return null;
    return centroid(pts.filter((p): p is Landmark => p !== null));
  };

  const leftEye = eyeCenter(LEFT_EYE_CENTER_INDICES);
  const rightEye = eyeCenter(RIGHT_EYE_CENTER_INDICES);
  if (!leftEye || !rightEye) return null;

  const named: Partial<Record<LandmarkName, Landmark>> = {
    left_eye_center: leftEye,
    right_eye_center: rightEye,
  };
  for (const [name, index] of MESH_LANDMARKS) {
    const p = pick(index);
    if (!p) return null;
    named[name] = p;
  }

  const outline: Landmark[] = [];
  for (const index of FACE_OVAL_INDICES) {
    const p = pick(index);
    if (!p) return null;
    outline.push(p);
  }

  if (!isCompleteLandmarks(named)) return null;
  return { points: named, outline, confidence: confidence ?? meshConfidence(keypoints, outline) };
}

export function isCompleteLandmarks(
  partial: Partial<Record<LandmarkName, Landmark>>,
): partial is Record<LandmarkName, Landmark> {
  return LANDMARK_NAMES.every((name) => isUsable(partial[name]));
}

export function anchorPoints(set: LandmarkSet, names: readonly LandmarkName[], withOutline = false): Landmark[] {
  const pts = names.map((n) => set.points[n]);
  return withOutline ? pts.concat(set.outline) : pts;
}

export function interEyeDistance(set: LandmarkSet): number {
  return distance(set.points.left_eye_center, set.points.right_eye_center);
}

export function boundingBox(points: readonly Landmark[]) {
  let xMin = Infinity, yMin = Infinity, xMax = -Infinity, yMax = -Infinity;
  for (const p of points) {
    if (p.x < xMin) xMin = p.x;
    if (p.y < yMin) yMin = p.y;
    if (p.x > xMax) xMax = p.x;
    if (p.y > yMax) yMax = p.y;
  }
  return { xMin, yMin, xMax, yMax, width: xMax - xMin, height: yMax - yMin };
}

/**
 * Feature positions in eye-normalized space: mid-eye at the origin, eyes on
 * the x axis and one unit of inter-eye distance.
 */
export function faceProportions(set: LandmarkSet) {
  const { left_eye_center, right_eye_center, nose_tip, mouth_left, mouth_right, chin } = set.points;
  const [nose, mouthL, mouthR, chinN] = normalizeByEyes(
    [nose_tip, mouth_left, mouth_right, chin],
    left_eye_center,
    right_eye_center,
  );
  const outlineBox = boundingBox(set.outline);
  return {
    noseDrop: nose.y,
    mouthDrop: (mouthL.y + mouthR.y) / 2,
    mouthWidth: Math.abs(mouthR.x - mouthL.x),
    chinDrop: chinN.y,
    faceWidth: outlineBox.width / (interEyeDistance(set) || 1),
  };
}
