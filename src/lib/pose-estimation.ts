/**
 * Head pose estimation from named facial landmarks
 *
 * Estimates head rotation (yaw, pitch, roll) from landmark asymmetry so that
 * extreme profile or tilted shots can be flagged before compositing.
 */
import type { LandmarkSet } from './landmarks';
import type { Pt } from './points';

export interface FacePose {
  yaw: number;    // Left-right rotation in degrees (-90 to +90, 0 = frontal)
  pitch: number;  // Up-down rotation in degrees (-90 to +90, 0 = level)
  roll: number;   // Tilt rotation in degrees (-180 to +180, 0 = upright)
}

export interface PoseLimits {
  yaw: number;
  pitch: number;
  roll: number;
}

export const DEFAULT_POSE_LIMITS: PoseLimits = { yaw: 35, pitch: 30, roll: 30 };

/**
 * Estimate face pose from a landmark set
 *
 * Uses geometric analysis of landmark asymmetry and positions to estimate
 * Euler angles without full 3D reconstruction.
 */
export function estimateFacePose(landmarks: LandmarkSet): FacePose {
  const p = landmarks.points;

  // When face turns right, right cheek moves away (smaller x), left cheek approaches (larger x)
  const yaw = estimateYaw(p.left_cheek, p.right_cheek, p.nose_tip);

  // When face tilts up, nose tip moves up relative to chin
  const pitch = estimatePitch(p.nose_bridge, p.nose_tip, p.chin);

  // Eye line angle from horizontal
  const roll = estimateRoll(p.left_eye_outer, p.left_eye_inner, p.right_eye_inner, p.right_eye_outer);

  return { yaw, pitch, roll };
}

/**
 * Estimate yaw (left-right head rotation) in degrees
 *
 * Uses asymmetry of left/right cheek landmarks relative to nose tip.
 */
function estimateYaw(leftCheek: Pt, rightCheek: Pt, noseTip: Pt): number {
  const leftDist = Math.abs(leftCheek.x - noseTip.x);
  const rightDist = Math.abs(rightCheek.x - noseTip.x);
  const total = rightDist + leftDist;
  if (total <= 0) return 0;

  // Asymmetry ratio: when frontal, distances are equal
  const asymmetry = (rightDist - leftDist) / total;

  // Scale factor calibrated empirically (asymmetry of ~0.3 ≈ 30° rotation)
  const yaw = asymmetry * 90;

  return Math.max(-90, Math.min(90, yaw));
}

/**
 * Estimate pitch (up-down head rotation) in degrees
 *
 * Uses vertical position of nose tip relative to nose bridge and chin.
 */
function estimatePitch(noseBridge: Pt, noseTip: Pt, chinBottom: Pt): number {
  const faceHeight = chinBottom.y - noseBridge.y;

  if (faceHeight <= 0) return 0; // Invalid landmarks

  // Expected position of nose tip in frontal view (approximately 0.45 down from bridge)
  const expectedNoseY = noseBridge.y + faceHeight * 0.45;
  const deviation = noseTip.y - expectedNoseY;

  // Deviation of 0.1 * faceHeight ≈ 6° pitch
  const pitch = (deviation / faceHeight) * 60;

  return Math.max(-90, Math.min(90, pitch));
}

/**
 * Estimate roll (tilt rotation) in degrees from the eye line.
 * Positive = clockwise in image space.
 */
function estimateRoll(leftEyeOuter: Pt, leftEyeInner: Pt, rightEyeInner: Pt, rightEyeOuter: Pt): number {
  const leftEyeCenter = {
    x: (leftEyeOuter.x + leftEyeInner.x) / 2,
    y: (leftEyeOuter.y + leftEyeInner.y) / 2,
  };
  const rightEyeCenter = {
    x: (rightEyeOuter.x + rightEyeInner.x) / 2,
    y: (rightEyeOuter.y + rightEyeInner.y) / 2,
  };
  const dx = rightEyeCenter.x - leftEyeCenter.x;
  const dy = rightEyeCenter.y - leftEyeCenter.y;
  return Math.atan2(dy, dx) * (180 / Math.PI);
}

export function isPoseAcceptable(pose: FacePose, limits: PoseLimits = DEFAULT_POSE_LIMITS): boolean {
  return (
    Math.abs(pose.yaw) <= limits.yaw &&
    Math.abs(pose.pitch) <= limits.pitch &&
    Math.abs(pose.roll) <= limits.roll
  );
}

/**
 * Format pose for display/logging
 */
export function formatPose(pose: FacePose): string {
  const yaw = pose.yaw >= 0 ? `right ${pose.yaw.toFixed(1)}°` : `left ${Math.abs(pose.yaw).toFixed(1)}°`;
  const pitch = pose.pitch >= 0 ? `up ${pose.pitch.toFixed(1)}°` : `down ${Math.abs(pose.pitch).toFixed(1)}°`;
  const roll = pose.roll >= 0 ? `CW ${pose.roll.toFixed(1)}°` : `CCW ${Math.abs(pose.roll).toFixed(1)}°`;

  return `yaw: ${yaw}, pitch: ${pitch}, roll: ${roll}`;
}
