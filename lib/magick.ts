/**
 * Magick.WASM initialization and the ImageMagick-backed ImageLibrary
 */

import {
  FilterType,
  ImageMagick,
  initializeImageMagick,
  MagickFormat,
  MagickGeometry,
  MagickReadSettings,
} from '@imagemagick/magick-wasm';
import type { IMagickImage } from '@imagemagick/magick-wasm';
import { EFFECT_EXECUTORS } from './effects-definitions';
import type { DecodedImage, ImageLibrary, ResampleFilter } from './image-library';
import type { EffectKind, ImageFormat, RgbaImage } from './types';

/** Where the page serves magick.wasm unless told otherwise */
export const DEFAULT_WASM_URL = '/magick.wasm';

/** A URL to fetch magick.wasm from, or its bytes */
export type WasmSource = string | URL | Uint8Array;

let isInitialized = false;
let initializationPromise: Promise<void> | null = null;

async function loadWasmBytes(source: WasmSource): Promise<Uint8Array> {
  if (source instanceof Uint8Array) {
    return source;
  }
  const response = await fetch(source);
  if (!response.ok) {
    throw new Error(`Failed to fetch WASM: ${response.status}`);
  }
  return new Uint8Array(await response.arrayBuffer());
}

/**
 * Initializes the Magick.WASM library.
 * This function is idempotent - calling it multiple times will only initialize once
 *
 * @param wasm - URL of magick.wasm, or its bytes; defaults to `/magick.wasm`
 */
export async function initializeMagick(wasm: WasmSource = DEFAULT_WASM_URL): Promise<void> {
  if (isInitialized) {
    return;
  }

  if (initializationPromise) {
    return initializationPromise;
  }

  initializationPromise = (async () => {
    try {
      await initializeImageMagick(await loadWasmBytes(wasm));
      isInitialized = true;
    } catch (error) {
      console.error('WASM initialization error:', error);
      initializationPromise = null;
      throw new Error('Failed to initialize image processor', { cause: error });
    }
  })();

  return initializationPromise;
}

/**
 * Checks if Magick.WASM has been initialized
 */
export function isMagickInitialized(): boolean {
  return isInitialized;
}

const OUTPUT_FORMATS: Record<ImageFormat, MagickFormat> = {
  jpeg: MagickFormat.Jpeg,
  png: MagickFormat.Png,
};

const RESAMPLE_FILTERS: Record<ResampleFilter, FilterType> = {
  linear: FilterType.Triangle,
  nearest: FilterType.Point,
};

/**
 * Copies an image's pixels out as 8-bit RGBA
 */
function toRgbaImage(image: IMagickImage): RgbaImage {
  const width = image.width;
  const height = image.height;
  return image.write(MagickFormat.Rgba, (pixels) => ({
    pixels: new Uint8Array(pixels),
    width,
    height,
  }));
}

/**
 * ImageLibrary implementation on top of ImageMagick.
 *
 * Every call reads the RGBA input into a fresh MagickImage, works on that copy
 * and writes RGBA back out, so inputs are never modified. ImageMagick disposes
 * the image when the read callback returns.
 */
export class MagickImageLibrary implements ImageLibrary {
  constructor() {
    if (!isInitialized) {
      throw new Error('Magick.WASM is not initialized. Call initializeMagick() first.');
    }
  }

  /**
   * Runs `func` against a MagickImage holding a copy of `image`
   */
  private withImage<T>(image: RgbaImage, func: (magickImage: IMagickImage) => T): T {
    const settings = new MagickReadSettings({
      format: MagickFormat.Rgba,
      width: image.width,
      height: image.height,
    });
    return ImageMagick.read(image.pixels, settings, func);
  }

  private applyEffect(kind: EffectKind, image: RgbaImage, value: number): RgbaImage {
    return this.withImage(image, (magickImage) => {
      EFFECT_EXECUTORS[kind](magickImage, value);
      return toRgbaImage(magickImage);
    });
  }

  decode(bytes: Uint8Array): DecodedImage {
    return ImageMagick.read(bytes, (image) => ({
      image: toRgbaImage(image),
      format: image.format,
    }));
  }

  encode(image: RgbaImage, format: ImageFormat, quality: number): Uint8Array {
    return this.withImage(image, (magickImage) => {
      magickImage.quality = quality;
      return magickImage.write(OUTPUT_FORMATS[format], (data) => new Uint8Array(data));
    });
  }

  resize(image: RgbaImage, width: number, height: number, filter: ResampleFilter): RgbaImage {
    return this.withImage(image, (magickImage) => {
      const geometry = new MagickGeometry(width, height);
      // The caller already worked out the aspect-preserving size
      geometry.ignoreAspectRatio = true;
      magickImage.filterType = RESAMPLE_FILTERS[filter];
      magickImage.resize(geometry);
      return toRgbaImage(magickImage);
    });
  }

  brightness(image: RgbaImage, delta: number): RgbaImage {
    return this.applyEffect('brightness', image, delta);
  }

  contrast(image: RgbaImage, delta: number): RgbaImage {
    return this.applyEffect('contrast', image, delta);
  }

  edgeDetection(image: RgbaImage, radius: number): RgbaImage {
    return this.applyEffect('edge-detection', image, radius);
  }
}

/**
 * Initializes Magick.WASM and returns a ready ImageLibrary
 */
export async function createMagickImageLibrary(wasm?: WasmSource): Promise<MagickImageLibrary> {
  await initializeMagick(wasm);
  return new MagickImageLibrary();
}
