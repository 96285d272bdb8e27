/**
 * ImageMagick execution logic for each effect kind.
 *
 * Slider values live in the editor's own scale (-2..2 for every kind); these
 * executors translate them into ImageMagick arguments and mutate the image
 * in-place. `MagickImageLibrary` wraps each call in a read/write cycle so the
 * rest of the editor only ever sees pure functions.
 */

import type { IMagickImage } from '@imagemagick/magick-wasm';
import { Percentage } from '@imagemagick/magick-wasm';
import type { EffectKind } from './types';

/**
 * Function signature for executing an effect on an image.
 */
export type EffectExecutor = (image: IMagickImage, value: number) => void;

/** One slider unit in percent of ImageMagick's brightness/contrast range */
export const PERCENT_PER_UNIT = 50;

/** Lower/upper hysteresis thresholds for Canny edge detection */
export const CANNY_LOWER_PERCENT = 10;
export const CANNY_UPPER_PERCENT = 30;

/**
 * Converts a slider value to a percentage clamped to [-100, 100]
 */
export function toPercent(value: number): number {
  return Math.max(-100, Math.min(100, value * PERCENT_PER_UNIT));
}

/**
 * Map of effect kinds to their execution logic.
 */
export const EFFECT_EXECUTORS: Record<EffectKind, EffectExecutor> = {
  brightness: (image: IMagickImage, value: number): void => {
    if (value === 0) {
      return;
    }
    image.brightnessContrast(new Percentage(toPercent(value)), new Percentage(0));
  },

  contrast: (image: IMagickImage, value: number): void => {
    if (value === 0) {
      return;
    }
    // brightness = 0 (no change), contrast = value mapped to -100..100
    image.brightnessContrast(new Percentage(0), new Percentage(toPercent(value)));
  },

  'edge-detection': (image: IMagickImage, value: number): void => {
    // A non-positive radius leaves the image as it is
    if (value <= 0) {
      return;
    }
    // cannyEdge(radius, sigma, lowerPercent, upperPercent)
    // radius 0 lets ImageMagick pick the kernel size from sigma
    image.cannyEdge(0, value, new Percentage(CANNY_LOWER_PERCENT), new Percentage(CANNY_UPPER_PERCENT));
  },
};
