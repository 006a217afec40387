// bmp-js ships no type declarations.
declare module 'bmp-js' {
  export interface BmpImage {
    width: number;
    height: number;
    /** ABGR, 4 bytes per pixel, top row first. */
    data: Buffer;
  }

  export function decode(buffer: Buffer): BmpImage;
  export function encode(image: BmpImage, quality?: number): BmpImage;

  const bmp: { decode: typeof decode; encode: typeof encode };
  export default bmp;
}
