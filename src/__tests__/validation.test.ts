import { describe, it, expect } from 'vitest';
import { confidenceTier, resolutionTier, validate } from '@/lib/validation';
import type { LandmarkSet } from '@/lib/landmarks';
import { syntheticLandmarks } from './fixtures/synthetic-face';

const image = { width: 300, height: 300 };

describe('validate', () => {
  it('accepts a frontal, well-resolved face', () => {
    const report = validate(syntheticLandmarks({ cx: 150, cy: 130, scale: 1.2 }), image);
    expect(report.valid).toBe(true);
    expect(report.imageQuality).toBe('high');
    expect(report.issues).toEqual([]);
    expect(report.faceDetected).toBe(true);
    expect(report.landmarksDetected).toBe(true);
    expect(report.interEyeDistance).toBeCloseTo(48, 9);
    expect(report.regions).toEqual({
      face: { status: 'eligible' },
      left_eye: { status: 'eligible' },
      right_eye: { status: 'eligible' },
      nose: { status: 'eligible' },
      mouth: { status: 'eligible' },
    });
  });

  it('reports a missing face without throwing', () => {
    const report = validate(null, image);
    expect(report.valid).toBe(false);
    expect(report.issues).toEqual(['No face detected in image']);
    expect(report.imageQuality).toBe('low');
    expect(report.pose).toBeNull();
    expect(report.regions.mouth).toEqual({ status: 'excluded', reason: 'no face detected' });
  });

  it('distinguishes a face whose landmarks could not be read', () => {
    const report = validate(null, image, undefined, { faceDetected: true });
    expect(report.faceDetected).toBe(true);
    expect(report.landmarksDetected).toBe(false);
    expect(report.issues).toEqual(['Could not extract facial landmarks']);
  });

  it('takes the lower of resolution and confidence quality', () => {
    const report = validate(syntheticLandmarks({ cx: 150, cy: 130, scale: 1.2, confidence: 0.6 }), image);
    expect(report.imageQuality).toBe('medium');
    expect(report.valid).toBe(true);

    const low = validate(syntheticLandmarks({ cx: 150, cy: 130, scale: 1.2, confidence: 0.4 }), image);
    expect(low.imageQuality).toBe('low');
    expect(low.issues).toContain('Low landmark confidence (0.40)');
  });

  it('flags eyes that are too close together', () => {
    const report = validate(syntheticLandmarks({ cx: 150, cy: 130, scale: 0.4 }), image);
    expect(report.valid).toBe(false);
    expect(report.issues).toEqual(['Eyes too close together (16.0px; minimum 20px)']);
  });

  it('flags a strongly tilted head', () => {
    const report = validate(syntheticLandmarks({ cx: 150, cy: 130, rotation: 0.7 }), image);
    expect(report.valid).toBe(false);
    expect(report.issues).toHaveLength(1);
    expect(report.issues[0]).toMatch(/^Head pose outside supported range \(yaw: .*roll: CW 40\.1°\)$/);
  });

  it('excludes a region whose anchor is outside the image', () => {
    const report = validate(syntheticLandmarks({ cx: 150, cy: 130, scale: 1.5 }), image);
    expect(report.valid).toBe(true);
    expect(report.regions.face).toEqual({ status: 'excluded', reason: 'anchor chin lies outside the image' });
    expect(report.regions.mouth).toEqual({ status: 'eligible' });
    expect(report.issues).toEqual(["Region 'face' excluded: anchor chin lies outside the image"]);
  });

  it('excludes the face region when its outline leaves the frame', () => {
    // oval top reaches y = -36; every named anchor stays inside
    const report = validate(syntheticLandmarks({ cx: 150, cy: 60, scale: 1.2 }), image);
    expect(report.valid).toBe(true);
    expect(report.regions.face).toEqual({ status: 'excluded', reason: 'outline runs outside the image (9 of 36 points)' });
    expect(report.regions.left_eye).toEqual({ status: 'eligible' });
    expect(report.issues).toEqual(["Region 'face' excluded: outline runs outside the image (9 of 36 points)"]);
  });

  it('only checks the outline for regions that align on it', () => {
    const report = validate(syntheticLandmarks({ cx: 150, cy: 60, scale: 1.2 }), image, [
      { name: 'face', anchors: ['left_eye_center', 'right_eye_center', 'chin'] },
    ]);
    expect(report.regions.face).toEqual({ status: 'eligible' });
  });

  it('excludes a region with a low-confidence anchor', () => {
    const face = syntheticLandmarks({ cx: 150, cy: 130, scale: 1.2 });
    const weak: LandmarkSet = {
      ...face,
      points: { ...face.points, mouth_top: { ...face.points.mouth_top, confidence: 0.2 } },
    };
    const report = validate(weak, image);
    expect(report.regions.mouth).toEqual({ status: 'excluded', reason: 'anchor mouth_top confidence 0.20 is below 0.3' });
    expect(report.regions.face).toEqual({ status: 'eligible' });
  });
});

describe('quality tiers', () => {
  it('grades resolution by the shorter side', () => {
    expect(resolutionTier(256, 300)).toBe('high');
    expect(resolutionTier(300, 200)).toBe('medium');
    expect(resolutionTier(100, 300)).toBe('low');
  });

  it('grades landmark confidence', () => {
    expect(confidenceTier(0.8)).toBe('high');
    expect(confidenceTier(0.5)).toBe('medium');
    expect(confidenceTier(0.49)).toBe('low');
    expect(confidenceTier(null)).toBe('low');
  });
});
