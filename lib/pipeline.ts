/**
 * Effect Pipeline: the ordered chain of effect instances applied to the preview.
 *
 * Instances are applied in insertion order. Values are clamped to their kind's
 * range on the way in, so the pipeline never holds an out-of-range value.
 */

import { clampToKind, requireEffectDefinition } from './effects-catalog';
import { NotFoundError } from './errors';
import type { ImageLibrary } from './image-library';
import type { ControlDescriptor, EffectInstance, RgbaImage } from './types';

export interface EffectPipelineOptions {
  /** Throw NotFoundError from update() for unknown ids instead of ignoring them */
  strictUpdates?: boolean;
}

export class EffectPipeline {
  private instances: EffectInstance[] = [];

  /** Only ever incremented, so ids are never reused within a pipeline */
  private counter = 0;

  private readonly strictUpdates: boolean;

  constructor(options?: EffectPipelineOptions) {
    this.strictUpdates = options?.strictUpdates ?? false;
  }

  /**
   * Creates a new instance of `kind` and appends it to the end of the chain.
   *
   * @param initialValue - Starting value, clamped into the kind's range
   * @returns A copy of the created instance; its id binds the UI control
   * @throws UnknownKindError if the kind is not registered (pipeline unchanged)
   */
  append(kind: string, initialValue?: number): EffectInstance {
    const definition = requireEffectDefinition(kind);

    this.counter += 1;
    const instance: EffectInstance = {
      id: `${definition.id}-${this.counter}`,
      kind: definition.id,
      value: clampToKind(definition, initialValue ?? definition.defaultValue),
    };
    this.instances.push(instance);

    return { ...instance };
  }

  /**
   * Sets the value of the instance with the given id, clamped to its kind's range.
   * Unknown ids are ignored with a warning, or throw NotFoundError in strict mode.
   */
  update(id: string, newValue: number): void {
    const index = this.instances.findIndex((instance) => instance.id === id);

    if (index === -1) {
      if (this.strictUpdates) {
        throw new NotFoundError(id);
      }
      console.warn(`EffectPipeline.update: no effect with id "${id}", update ignored`);
      return;
    }

    const current = this.instances[index];
    const definition = requireEffectDefinition(current.kind);
    this.instances[index] = { ...current, value: clampToKind(definition, newValue) };
  }

  /**
   * Folds the chain over `baseImage`, left to right.
   * Returns `baseImage` itself when the pipeline is empty.
   */
  apply(library: ImageLibrary, baseImage: RgbaImage): RgbaImage {
    return this.instances.reduce<RgbaImage>((image, instance) => {
      const definition = requireEffectDefinition(instance.kind);
      return definition.transform(library, image, instance.value);
    }, baseImage);
  }

  get(id: string): EffectInstance | undefined {
    const instance = this.instances.find((candidate) => candidate.id === id);
    return instance ? { ...instance } : undefined;
  }

  /**
   * Immutable copy of the chain in application order
   */
  snapshot(): readonly EffectInstance[] {
    return this.instances.map((instance) => ({ ...instance }));
  }

  get size(): number {
    return this.instances.length;
  }

  /**
   * Control descriptors for every instance, in pipeline order
   */
  controls(): ControlDescriptor[] {
    return this.instances.map(renderControlDescriptor);
  }
}

/**
 * Describes the slider for one effect instance.
 * Markup is left to the UI; this only carries the values it binds to.
 */
export function renderControlDescriptor(instance: EffectInstance): ControlDescriptor {
  const { label, min, max, step } = requireEffectDefinition(instance.kind);
  return {
    id: instance.id,
    kind: instance.kind,
    label,
    min,
    max,
    step,
    value: instance.value,
  };
}
