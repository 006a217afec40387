import * as tf from '@tensorflow/tfjs-core';
import '@tensorflow/tfjs-backend-cpu';
import type {
  Face,
  FaceLandmarksDetector,
  MediaPipeFaceMeshTfjsModelConfig,
} from '@tensorflow-models/face-landmarks-detection';
import { env, isDev, modelUrls } from '@/lib/config';
import type { RasterImage } from '@/lib/image';
import { landmarksFromMesh } from '@/lib/landmarks';
import type { DetectedFace, DetectorAdapter } from './detector-types';

let detectorPromise: Promise<FaceLandmarksDetector> | null = null;

export async function getDetector(): Promise<FaceLandmarksDetector> {
  if (!detectorPromise) {
    detectorPromise = (async () => {
      const t0 = performance.now();
      await tf.setBackend('cpu');
      await tf.ready();
      const backend = tf.getBackend();
      if (isDev()) {
        console.info(`[detector] backend=${backend} init=${(performance.now() - t0).toFixed(0)}ms`);
      }

      const face = await import('@tensorflow-models/face-landmarks-detection');
      const cfg: MediaPipeFaceMeshTfjsModelConfig = {
        runtime: 'tfjs',
        refineLandmarks: false,
        maxFaces: env.FACE_MAX_FACES,
        ...modelUrls(),
      };
      return face.createDetector(face.SupportedModels.MediaPipeFaceMesh, cfg);
    })();
  }
  return detectorPromise;
}

// The model takes an int32 HxWx3 tensor; alpha is dropped.
function toTensor(image: RasterImage) {
  const { width, height, channels, data } = image;
  const rgb = new Int32Array(width * height * 3);
  for (let i = 0, o = 0; i < width * height; i++, o += channels) {
    rgb[i * 3] = data[o];
    rgb[i * 3 + 1] = data[o + 1];
    rgb[i * 3 + 2] = data[o + 2];
  }
  return tf.tensor3d(rgb, [height, width, 3], 'int32');
}

function toDetectedFace(f: Face): DetectedFace {
  const { xMin, yMin, width, height } = f.box;
  return { box: { xMin, yMin, width, height }, landmarks: landmarksFromMesh(f.keypoints) };
}

export async function detectFaces(image: RasterImage): Promise<DetectedFace[]> {
  const detector = await getDetector();
  const input = toTensor(image);
  try {
    const faces = await detector.estimateFaces(input, { flipHorizontal: false });
    return faces.map(toDetectedFace);
  } finally {
    input.dispose();
  }
}

export const facemeshAdapter: DetectorAdapter = { name: 'facemesh', detectFaces };
