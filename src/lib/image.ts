import bmp from 'bmp-js';
import sharp from 'sharp';
import { DecodeError, errorMessage } from './errors';

export type Channels = 3 | 4;

/**
 * Immutable 8-bit raster. Pixels are row-major and channel-interleaved.
 * Helpers in this module never mutate their inputs.
 */
export type RasterImage = {
  readonly width: number;
  readonly height: number;
  readonly channels: Channels;
  readonly data: Uint8ClampedArray;
};

export type RGB = readonly [number, number, number];

export function createImage(width: number, height: number, channels: Channels = 3, fill?: RGB): RasterImage {
  const data = new Uint8ClampedArray(width * height * channels);
  if (fill) {
    for (let i = 0; i < width * height; i++) {
      const o = i * channels;
      data[o] = fill[0];
      data[o + 1] = fill[1];
      data[o + 2] = fill[2];
      if (channels === 4) data[o + 3] = 255;
    }
  }
  return { width, height, channels, data };
}

export function cloneImage(image: RasterImage): RasterImage {
  return { ...image, data: new Uint8ClampedArray(image.data) };
}

export function imagesEqual(a: RasterImage, b: RasterImage): boolean {
  if (a.width !== b.width || a.height !== b.height || a.channels !== b.channels) return false;
  for (let i = 0; i < a.data.length; i++) if (a.data[i] !== b.data[i]) return false;
  return true;
}

export function pixelAt(image: RasterImage, x: number, y: number): number[] {
  const o = (y * image.width + x) * image.channels;
  return Array.from(image.data.subarray(o, o + image.channels));
}

/**
 * Bilinear sample of channel `c` at a continuous position; coordinates outside
 * the raster are clamped to the nearest edge pixel.
 */
export function sampleBilinear(image: RasterImage, x: number, y: number, c: number): number {
  const { width, height, channels, data } = image;
  const cx = Math.min(Math.max(x, 0), width - 1);
  const cy = Math.min(Math.max(y, 0), height - 1);
  const x0 = Math.floor(cx);
  const y0 = Math.floor(cy);
  const x1 = Math.min(x0 + 1, width - 1);
  const y1 = Math.min(y0 + 1, height - 1);
  const fx = cx - x0;
  const fy = cy - y0;
  const p00 = data[(y0 * width + x0) * channels + c];
  const p10 = data[(y0 * width + x1) * channels + c];
  const p01 = data[(y1 * width + x0) * channels + c];
  const p11 = data[(y1 * width + x1) * channels + c];
  const top = p00 + (p10 - p00) * fx;
  const bottom = p01 + (p11 - p01) * fx;
  return top + (bottom - top) * fy;
}

async function rawFromSharp(pipeline: sharp.Sharp): Promise<RasterImage> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  if (info.channels !== 3 && info.channels !== 4) {
    throw new DecodeError(`Unsupported channel count ${info.channels}`);
  }
  return {
    width: info.width,
    height: info.height,
    channels: info.channels,
    data: new Uint8ClampedArray(data.buffer, data.byteOffset, data.length),
  };
}

const isBmp = (bytes: Uint8Array) => bytes.length > 1 && bytes[0] === 0x42 && bytes[1] === 0x4d; // 'BM'

// sharp has no BMP loader; decode it here and hand sharp the raw pixels.
function bmpInput(bytes: Uint8Array) {
  const decoded = bmp.decode(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.length));
  const { width, height, data } = decoded;
  const rgb = Buffer.alloc(width * height * 3);
  for (let i = 0; i < width * height; i++) {
    rgb[i * 3] = data[i * 4 + 3];
    rgb[i * 3 + 1] = data[i * 4 + 2];
    rgb[i * 3 + 2] = data[i * 4 + 1];
  }
  return sharp(rgb, { raw: { width, height, channels: 3 } });
}

/**
 * Decode any format sharp understands, plus BMP, into an RGB raster.
 * Transparent sources are flattened onto white; EXIF orientation is applied.
 */
export async function decodeImage(bytes: Uint8Array): Promise<RasterImage> {
  if (!bytes.length) throw new DecodeError('Image data is empty');
  try {
    const input = isBmp(bytes) ? bmpInput(bytes) : sharp(bytes, { failOn: 'error' });
    const pipeline = input
      .rotate()
      .flatten({ background: { r: 255, g: 255, b: 255 } })
      .toColourspace('srgb')
      .removeAlpha();
    return await rawFromSharp(pipeline);
  } catch (err) {
    if (err instanceof DecodeError) throw err;
    throw new DecodeError(`Image could not be decoded: ${errorMessage(err)}`, err);
  }
}

export async function rasterizeSvg(svg: string): Promise<RasterImage> {
  return rawFromSharp(sharp(Buffer.from(svg)).flatten({ background: '#ffffff' }).removeAlpha());
}

function toSharp(image: RasterImage) {
  return sharp(Buffer.from(image.data.buffer, image.data.byteOffset, image.data.length), {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });
}

export async function encodePng(image: RasterImage): Promise<Buffer> {
  return toSharp(image).png().toBuffer();
}

/** Square-bounded thumbnail (aspect preserved), encoded as PNG. */
export async function encodeThumbnail(image: RasterImage, size = 150): Promise<Buffer> {
  return toSharp(image).resize(size, size, { fit: 'inside' }).png().toBuffer();
}
