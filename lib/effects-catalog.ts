/**
 * Effect Catalog for the Prism image editor
 *
 * Static list of the effect kinds a user can add, with their slider ranges.
 * Adding a kind means adding an entry here and a matching method on the
 * ImageLibrary; the pipeline never needs to change.
 */

import type { LucideIcon } from 'lucide-react';
import { Contrast, Focus, Sun } from 'lucide-react';
import { UnknownKindError } from './errors';
import type { ImageLibrary } from './image-library';
import type { EffectKind, RgbaImage } from './types';

/**
 * Definition for a single effect kind in the catalog.
 */
export interface EffectKindDefinition {
  id: EffectKind;
  /** Display label shown in the UI */
  label: string;
  /** Minimum allowed value */
  min: number;
  /** Maximum allowed value */
  max: number;
  /** Slider granularity */
  step: number;
  /** Value a fresh instance starts with when none is given */
  defaultValue: number;
  /**
   * Pure transform: returns a new image with the effect applied.
   * @param library - The image library doing the pixel work
   * @param image - Input image, left untouched
   * @param value - Parameter already clamped to [min, max]
   */
  transform: (library: ImageLibrary, image: RgbaImage, value: number) => RgbaImage;
  /** Lucide icon component for UI display */
  icon: LucideIcon;
}

/**
 * Public description of a kind, as returned by `describeEffectKind`
 */
export interface EffectKindDescription {
  name: EffectKind;
  label: string;
  min: number;
  max: number;
  step: number;
  defaultValue: number;
}

/**
 * Registered effect kinds, in the order the effect selector lists them.
 */
export const EFFECT_CATALOG: Readonly<Record<EffectKind, EffectKindDefinition>> = {
  contrast: {
    id: 'contrast',
    label: 'Contrast',
    min: -2,
    max: 2,
    step: 0.1,
    defaultValue: 0,
    transform: (library, image, value) => library.contrast(image, value),
    icon: Contrast,
  },

  brightness: {
    id: 'brightness',
    label: 'Brightness',
    min: -2,
    max: 2,
    step: 0.1,
    defaultValue: 0,
    transform: (library, image, value) => library.brightness(image, value),
    icon: Sun,
  },

  'edge-detection': {
    id: 'edge-detection',
    label: 'Edge Detection',
    min: -2,
    max: 2,
    step: 0.1,
    defaultValue: 0,
    transform: (library, image, value) => library.edgeDetection(image, value),
    icon: Focus,
  },
};

const CATALOG_ORDER: readonly EffectKind[] = ['contrast', 'brightness', 'edge-detection'];

/**
 * Checks if a string names a registered effect kind.
 * Uses Object.hasOwn so keys like 'constructor' or '__proto__' are not kinds.
 */
export function isRegisteredEffect(kind: string): kind is EffectKind {
  return Object.hasOwn(EFFECT_CATALOG, kind);
}

/**
 * Gets the definition for a kind, or undefined if it is not registered.
 */
export function getEffectDefinition(kind: string): EffectKindDefinition | undefined {
  if (!isRegisteredEffect(kind)) {
    return undefined;
  }
  return EFFECT_CATALOG[kind];
}

/**
 * Gets the definition for a kind.
 * @throws UnknownKindError if the kind is not registered
 */
export function requireEffectDefinition(kind: string): EffectKindDefinition {
  const definition = getEffectDefinition(kind);
  if (!definition) {
    throw new UnknownKindError(kind);
  }
  return definition;
}

/**
 * Lists every registered kind. Returns the same kinds in the same order on every call.
 */
export function listAvailable(): EffectKindDefinition[] {
  return CATALOG_ORDER.map((kind) => EFFECT_CATALOG[kind]);
}

/**
 * Describes a kind's name and parameter range.
 * @throws UnknownKindError if the kind is not registered
 */
export function describeEffectKind(kind: string): EffectKindDescription {
  const { id, label, min, max, step, defaultValue } = requireEffectDefinition(kind);
  return { name: id, label, min, max, step, defaultValue };
}

/**
 * Clamps a value into a kind's range. NaN falls back to the kind's default.
 */
export function clampToKind(definition: EffectKindDefinition, value: number): number {
  if (Number.isNaN(value)) {
    return definition.defaultValue;
  }
  return Math.max(definition.min, Math.min(definition.max, value));
}

/**
 * Gets the icon for a given kind, or undefined if it is not registered.
 */
export function getEffectIcon(kind: string): LucideIcon | undefined {
  return getEffectDefinition(kind)?.icon;
}
