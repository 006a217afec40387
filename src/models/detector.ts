// Central detector with pluggable adapters.
// Selection is environment-driven (FACE_DETECTOR); tests inject their own adapter.
import { env } from '@/lib/config';
import { ImageTooSmall } from '@/lib/errors';
import type { RasterImage } from '@/lib/image';
import type { DetectedFace, DetectorAdapter, DetectorName, FaceDetection, LandmarkDetector } from './detector-types';

export const MIN_DETECTION_SIZE = 64;

let override: DetectorAdapter | DetectorName | null = null;
let currentName = '';

export function setAdapter(adapter?: DetectorAdapter | DetectorName) {
  override = adapter ?? null;
  adapterPromise = null; // reset to allow switching per session
}

async function selectAdapter(): Promise<DetectorAdapter> {
  if (override !== null && typeof override !== 'string') {
    currentName = override.name;
    return override;
  }
  const want = override ?? env.FACE_DETECTOR;
  // FaceMesh is the only bundled model; loaded lazily so tfjs stays out of startup
  const mod = await import('./facemesh-adapter');
  currentName = want;
  return mod.facemeshAdapter;
}

let adapterPromise: Promise<DetectorAdapter> | null = null;
async function getAdapter() {
  adapterPromise ??= selectAdapter();
  return adapterPromise;
}

export function currentAdapterName() {
  return currentName;
}

const area = (f: DetectedFace) => f.box.width * f.box.height;

/**
 * Pick the face to composite: largest box area, ties going to the top-most,
 * then left-most. Only this face is ever used, even when its landmark set is
 * incomplete and a smaller face's is not.
 */
export function selectLargestFace(faces: readonly DetectedFace[]): DetectedFace | null {
  let best: DetectedFace | null = null;
  for (const f of faces) {
    if (
      !best ||
      area(f) > area(best) ||
      (area(f) === area(best) && (f.box.yMin < best.box.yMin || (f.box.yMin === best.box.yMin && f.box.xMin < best.box.xMin)))
    ) {
      best = f;
    }
  }
  return best;
}

export function assertDetectable(image: RasterImage) {
  if (image.width < MIN_DETECTION_SIZE || image.height < MIN_DETECTION_SIZE) {
    throw new ImageTooSmall(image.width, image.height, MIN_DETECTION_SIZE);
  }
}

export function createLandmarkDetector(adapter?: DetectorAdapter): LandmarkDetector {
  const resolve = () => (adapter ? Promise.resolve(adapter) : getAdapter());
  const inspect = async (image: RasterImage): Promise<FaceDetection> => {
    assertDetectable(image);
    const faces = await (await resolve()).detectFaces(image);
    const face = selectLargestFace(faces);
    return { faceCount: faces.length, face, landmarks: face ? face.landmarks : null };
  };
  return {
    inspect,
    detect: async (image) => (await inspect(image)).landmarks,
  };
}

export async function detect(image: RasterImage) {
  return createLandmarkDetector().detect(image);
}
