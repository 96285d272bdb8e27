/**
 * Render Coordinator: recomputes the displayed images from the current
 * ImageSource and Pipeline.
 *
 * It keeps no state of its own beyond those two references. Every call to
 * renderOutput() replays the whole chain over the preview; pipelines are short
 * and previews small, so no intermediate stage is cached.
 */

import { toDataUrl } from './data-url';
import { EncodeError, NoImageError, RenderError, describeError, isEditorError } from './errors';
import type { ImageLibrary } from './image-library';
import type { ImageSourceManager } from './image-source';
import type { EffectPipeline } from './pipeline';
import type { ImageFormat, RgbaImage } from './types';

export class RenderCoordinator {
  constructor(
    private readonly library: ImageLibrary,
    private readonly sources: ImageSourceManager,
    private readonly pipeline: EffectPipeline
  ) {}

  /**
   * The unmodified resized upload, for the "unedited preview" pane
   * @throws NoImageError if nothing has been loaded
   */
  previewBase(): RgbaImage {
    const source = this.sources.current();
    if (!source) {
      throw new NoImageError();
    }
    return source.preview;
  }

  /**
   * The preview with every effect in the pipeline applied, in order
   * @throws NoImageError if nothing has been loaded
   * @throws RenderError if the library fails on any effect
   */
  renderOutput(): RgbaImage {
    const preview = this.previewBase();
    try {
      return this.pipeline.apply(this.library, preview);
    } catch (error) {
      if (isEditorError(error)) {
        throw error;
      }
      console.error('RenderCoordinator.renderOutput error:', error);
      throw new RenderError(`Failed to apply effects: ${describeError(error)}`, error);
    }
  }

  /**
   * Encodes an image for display.
   * @param quality - Encoder quality, clamped to 1-100
   * @throws EncodeError if the encoder fails
   */
  encode(image: RgbaImage, format: ImageFormat = 'jpeg', quality = 90): Uint8Array {
    const clampedQuality = Math.max(1, Math.min(100, Math.round(quality)));
    try {
      return this.library.encode(image, format, clampedQuality);
    } catch (error) {
      console.error('RenderCoordinator.encode error:', error);
      throw new EncodeError(`Failed to encode ${format} image: ${describeError(error)}`, error);
    }
  }

  /**
   * Encodes an image straight to a data URL
   */
  encodeToDataUrl(image: RgbaImage, format: ImageFormat = 'jpeg', quality = 90): string {
    return toDataUrl(this.encode(image, format, quality), format);
  }
}
