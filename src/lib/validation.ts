import { interEyeDistance, type LandmarkSet } from './landmarks';
import { DEFAULT_POSE_LIMITS, estimateFacePose, formatPose, isPoseAcceptable, type FacePose, type PoseLimits } from './pose-estimation';
import { DEFAULT_REGION_ANCHORS, REGION_NAMES, type LandmarkName, type RegionName } from './regions';

export type QualityTier = 'low' | 'medium' | 'high';

export type RegionEligibility = { status: 'eligible' } | { status: 'excluded'; reason: string };

export type ValidationReport = {
  valid: boolean;
  imageQuality: QualityTier;
  issues: string[];
  faceDetected: boolean;
  landmarksDetected: boolean;
  pose: FacePose | null;
  interEyeDistance: number | null;
  regions: Partial<Record<RegionName, RegionEligibility>>;
};

/** A region's alignment anchors; `useOutline` regions also align on the face oval. */
export type RegionAnchors = { name: RegionName; anchors: readonly LandmarkName[]; useOutline?: boolean };

export type ValidationOptions = {
  /** A face was found even though no complete landmark set came out of it. */
  faceDetected?: boolean;
  poseLimits?: PoseLimits;
};

export const HIGH_RESOLUTION = 256;
export const MEDIUM_RESOLUTION = 128;
export const HIGH_CONFIDENCE = 0.8;
export const MEDIUM_CONFIDENCE = 0.5;
export const MIN_EYE_DISTANCE = 20;
export const MIN_ANCHOR_CONFIDENCE = 0.3;

const TIER_RANK: Record<QualityTier, number> = { low: 0, medium: 1, high: 2 };

const DEFAULT_REGIONS: RegionAnchors[] = REGION_NAMES.map((name) => ({
  name,
  anchors: DEFAULT_REGION_ANCHORS[name],
  useOutline: name === 'face',
}));

export function resolutionTier(width: number, height: number): QualityTier {
  const side = Math.min(width, height);
  if (side >= HIGH_RESOLUTION) return 'high';
  if (side >= MEDIUM_RESOLUTION) return 'medium';
  return 'low';
}

export function confidenceTier(confidence: number | null): QualityTier {
  if (confidence === null) return 'low';
  if (confidence >= HIGH_CONFIDENCE) return 'high';
  if (confidence >= MEDIUM_CONFIDENCE) return 'medium';
  return 'low';
}

function minTier(a: QualityTier, b: QualityTier): QualityTier {
  return TIER_RANK[a] <= TIER_RANK[b] ? a : b;
}

const outside = (p: { x: number; y: number }, width: number, height: number) =>
  p.x < 0 || p.y < 0 || p.x >= width || p.y >= height;

function regionEligibility(
  landmarks: LandmarkSet,
  region: RegionAnchors,
  width: number,
  height: number,
): RegionEligibility {
  for (const name of region.anchors) {
    const p = landmarks.points[name];
    if (outside(p, width, height)) {
      return { status: 'excluded', reason: `anchor ${name} lies outside the image` };
    }
    const confidence = p.confidence ?? landmarks.confidence;
    if (confidence < MIN_ANCHOR_CONFIDENCE) {
      return { status: 'excluded', reason: `anchor ${name} confidence ${confidence.toFixed(2)} is below ${MIN_ANCHOR_CONFIDENCE}` };
    }
  }
  if (region.useOutline) {
    // Any part of the oval out of frame would be painted from clamped edge pixels.
    const off = landmarks.outline.filter((p) => outside(p, width, height)).length;
    if (off > 0) {
      return { status: 'excluded', reason: `outline runs outside the image (${off} of ${landmarks.outline.length} points)` };
    }
  }
  return { status: 'eligible' };
}

/**
 * Judge whether a detection is good enough to composite. Never throws: every
 * failed check becomes an entry in `issues`, in check order.
 */
export function validate(
  landmarks: LandmarkSet | null,
  image: { width: number; height: number },
  regions: readonly RegionAnchors[] = DEFAULT_REGIONS,
  options: ValidationOptions = {},
): ValidationReport {
  const issues: string[] = [];
  const faceDetected = options.faceDetected ?? landmarks !== null;
  const { width, height } = image;

  if (!landmarks) {
    issues.push(faceDetected ? 'Could not extract facial landmarks' : 'No face detected in image');
  }

  const resolution = resolutionTier(width, height);
  if (resolution === 'low') {
    issues.push(`Image resolution too low (${width}x${height}; ${MEDIUM_RESOLUTION}x${MEDIUM_RESOLUTION} or more recommended)`);
  }

  const confidence = confidenceTier(landmarks ? landmarks.confidence : null);
  if (landmarks && confidence === 'low') {
    issues.push(`Low landmark confidence (${landmarks.confidence.toFixed(2)})`);
  }

  const out: ValidationReport = {
    valid: false,
    imageQuality: minTier(resolution, confidence),
    issues,
    faceDetected,
    landmarksDetected: landmarks !== null,
    pose: null,
    interEyeDistance: null,
    regions: {},
  };

  if (!landmarks) {
    for (const region of regions) out.regions[region.name] = { status: 'excluded', reason: 'no face detected' };
    return out;
  }

  const pose = estimateFacePose(landmarks);
  const poseOk = isPoseAcceptable(pose, options.poseLimits ?? DEFAULT_POSE_LIMITS);
  if (!poseOk) issues.push(`Head pose outside supported range (${formatPose(pose)})`);

  const eyes = interEyeDistance(landmarks);
  const eyesOk = eyes >= MIN_EYE_DISTANCE;
  if (!eyesOk) issues.push(`Eyes too close together (${eyes.toFixed(1)}px; minimum ${MIN_EYE_DISTANCE}px)`);

  for (const region of regions) {
    const eligibility = regionEligibility(landmarks, region, width, height);
    out.regions[region.name] = eligibility;
    if (eligibility.status === 'excluded') issues.push(`Region '${region.name}' excluded: ${eligibility.reason}`);
  }

  out.pose = pose;
  out.interEyeDistance = eyes;
  out.valid = poseOk && eyesOk;
  return out;
}
