/**
 * The external image library the editor delegates all pixel work to.
 *
 * Implementations must be synchronous and deterministic: the same input image
 * and parameters always produce the same output pixels. `MagickImageLibrary`
 * in ./magick is the production implementation.
 */

import type { ImageFormat, RgbaImage } from './types';

/**
 * Resampling filters used when resizing
 */
export type ResampleFilter = 'linear' | 'nearest';

export interface DecodedImage {
  image: RgbaImage;
  /** Format name reported by the decoder */
  format: string;
}

export interface ImageLibrary {
  /** Decodes encoded bytes. Throws on malformed input. */
  decode(bytes: Uint8Array): DecodedImage;
  /** Encodes an image. `quality` (1-100) only affects lossy formats. */
  encode(image: RgbaImage, format: ImageFormat, quality: number): Uint8Array;
  resize(image: RgbaImage, width: number, height: number, filter: ResampleFilter): RgbaImage;
  brightness(image: RgbaImage, delta: number): RgbaImage;
  contrast(image: RgbaImage, delta: number): RgbaImage;
  edgeDetection(image: RgbaImage, radius: number): RgbaImage;
}
