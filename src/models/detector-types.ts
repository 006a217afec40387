import type { RasterImage } from '@/lib/image';
import type { LandmarkSet } from '@/lib/landmarks';

export type DetectorName = 'facemesh';

export type FaceBox = { xMin: number; yMin: number; width: number; height: number };

// landmarks is null when the model found a face but its mesh was incomplete
export type DetectedFace = { box: FaceBox; landmarks: LandmarkSet | null };

export type FaceDetection = { faceCount: number; face: DetectedFace | null; landmarks: LandmarkSet | null };

export interface DetectorAdapter {
  readonly name: string;
  detectFaces(image: RasterImage): Promise<DetectedFace[]>;
}

export interface LandmarkDetector {
  /** Largest usable face, or null when there is none. */
  detect(image: RasterImage): Promise<LandmarkSet | null>;
  inspect(image: RasterImage): Promise<FaceDetection>;
}
