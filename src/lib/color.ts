import { cloneImage, type RasterImage } from './image';
import type { RegionMask } from './mask';
import { lerp } from './utils';

export const CONTRAST_MIDPOINT = 128;

/** Per-channel (R, G, B) mean and standard deviation. */
export type ChannelStats = {
  mean: [number, number, number];
  std: [number, number, number];
};

type Span = { x0: number; y0: number; width: number; height: number };

function spanOf(image: RasterImage, mask?: RegionMask): Span {
  return mask
    ? { x0: mask.x, y0: mask.y, width: mask.width, height: mask.height }
    : { x0: 0, y0: 0, width: image.width, height: image.height };
}

/**
 * Alpha-weighted color statistics. Without a mask every pixel has weight 1.
 * Returns null when the mask has no weight at all.
 */
export function channelStats(image: RasterImage, mask?: RegionMask): ChannelStats | null {
  const { x0, y0, width, height } = spanOf(image, mask);
  const sum = [0, 0, 0];
  const sumSq = [0, 0, 0];
  let total = 0;
  for (let j = 0; j < height; j++) {
    for (let i = 0; i < width; i++) {
      const w = mask ? mask.alpha[j * width + i] : 1;
      if (w <= 0) continue;
      const o = ((y0 + j) * image.width + (x0 + i)) * image.channels;
      for (let c = 0; c < 3; c++) {
        const v = image.data[o + c];
        sum[c] += w * v;
        sumSq[c] += w * v * v;
      }
      total += w;
    }
  }
  if (total <= 0) return null;
  const mean: [number, number, number] = [sum[0] / total, sum[1] / total, sum[2] / total];
  const std: [number, number, number] = [0, 0, 0];
  for (let c = 0; c < 3; c++) {
    std[c] = Math.sqrt(Math.max(0, sumSq[c] / total - mean[c] * mean[c]));
  }
  return { mean, std };
}

/**
 * Shift the image's per-channel mean and spread toward `target`.
 * strength 0 leaves the image untouched; 1 matches the target statistics.
 * With a mask, statistics come from the masked pixels and the adjustment is
 * applied in proportion to each pixel's weight.
 */
export function matchColor(image: RasterImage, target: ChannelStats, strength: number, mask?: RegionMask): RasterImage {
  if (strength <= 0) return cloneImage(image);
  const current = channelStats(image, mask);
  if (!current) return cloneImage(image);
  const s = Math.min(1, strength);

  const mean = [0, 1, 2].map((c) => current.mean[c]);
  const shiftedMean = [0, 1, 2].map((c) => lerp(current.mean[c], target.mean[c], s));
  const gain = [0, 1, 2].map((c) => {
    const from = current.std[c];
    if (from < 1e-6) return 1; // flat channel: shift only
    return lerp(from, target.std[c], s) / from;
  });

  const out = cloneImage(image);
  const { x0, y0, width, height } = spanOf(image, mask);
  for (let j = 0; j < height; j++) {
    for (let i = 0; i < width; i++) {
      const w = mask ? mask.alpha[j * width + i] : 1;
      if (w <= 0) continue;
      const o = ((y0 + j) * image.width + (x0 + i)) * image.channels;
      for (let c = 0; c < 3; c++) {
        const p = image.data[o + c];
        const adjusted = shiftedMean[c] + (p - mean[c]) * gain[c];
        out.data[o + c] = Math.round(p + (adjusted - p) * w);
      }
    }
  }
  return out;
}

/**
 * Global contrast: p' = midpoint + (p - midpoint) * factor, clamped to 0..255.
 * Alpha, when present, is left alone.
 */
export function enhanceContrast(image: RasterImage, factor: number): RasterImage {
  const out = cloneImage(image);
  if (factor === 1) return out;
  const { data, channels } = image;
  for (let o = 0; o < data.length; o += channels) {
    for (let c = 0; c < 3; c++) {
      out.data[o + c] = Math.round(CONTRAST_MIDPOINT + (data[o + c] - CONTRAST_MIDPOINT) * factor);
    }
  }
  return out;
}
