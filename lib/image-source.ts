/**
 * Image Source Manager: turns an upload into the preview every effect works on.
 *
 * A load either fully replaces the current ImageSource or leaves it untouched;
 * callers never observe a half-loaded source.
 */

import { parseDataUrl } from './data-url';
import { DecodeError, InvalidDimensionsError, RenderError, UnsupportedFormatError, describeError } from './errors';
import type { ImageLibrary } from './image-library';
import type { ImageSource, RgbaImage } from './types';
import { detectImageFormat, formatFromMimeType, validateImageDimensions } from './validation';

/**
 * Preview size for a source image scaled to `targetWidth`, aspect ratio preserved.
 * Height is rounded up.
 * @throws InvalidDimensionsError for zero or negative source sizes
 */
export function calculatePreviewDimensions(
  sourceWidth: number,
  sourceHeight: number,
  targetWidth: number
): { width: number; height: number } {
  if (sourceWidth <= 0 || sourceHeight <= 0) {
    throw new InvalidDimensionsError(sourceWidth, sourceHeight);
  }
  return {
    width: targetWidth,
    height: Math.ceil((targetWidth * sourceHeight) / sourceWidth),
  };
}

export class ImageSourceManager {
  private source: ImageSource | null = null;

  constructor(
    private readonly library: ImageLibrary,
    private readonly previewWidth: number
  ) {}

  /**
   * Decodes an uploaded image and builds its preview.
   *
   * The format is detected from the leading bytes; `mimeHint` is only checked
   * against it and a mismatch is logged, not trusted.
   *
   * @throws UnsupportedFormatError if the bytes are neither JPEG nor PNG
   * @throws DecodeError if the library cannot decode the bytes
   * @throws InvalidDimensionsError for degenerate or oversized images
   * @throws RenderError if the preview cannot be resized
   */
  load(bytes: Uint8Array, mimeHint?: string): ImageSource {
    const format = detectImageFormat(bytes);
    if (!format) {
      throw new UnsupportedFormatError();
    }

    if (mimeHint !== undefined && formatFromMimeType(mimeHint) !== format) {
      console.warn(`ImageSourceManager.load: MIME hint "${mimeHint}" does not match detected ${format} data`);
    }

    let original: RgbaImage;
    try {
      original = this.library.decode(bytes).image;
    } catch (error) {
      console.error('ImageSourceManager.load decode error:', error);
      throw new DecodeError(`Failed to decode image: ${describeError(error)}`, error);
    }

    const validation = validateImageDimensions(original.width, original.height);
    if (!validation.isValid) {
      throw new InvalidDimensionsError(original.width, original.height, validation.error);
    }

    const { width, height } = calculatePreviewDimensions(original.width, original.height, this.previewWidth);
    let preview: RgbaImage;
    try {
      preview = this.library.resize(original, width, height, 'linear');
    } catch (error) {
      console.error('ImageSourceManager.load resize error:', error);
      throw new RenderError(`Failed to resize image: ${describeError(error)}`, error);
    }

    const next: ImageSource = { original, preview, format };
    this.source = next;
    return next;
  }

  /**
   * Loads a `data:image/jpeg;base64,` or `data:image/png;base64,` URL
   * as produced by FileReader.readAsDataURL.
   */
  loadDataUrl(dataUrl: string): ImageSource {
    const { bytes, mimeType } = parseDataUrl(dataUrl);
    return this.load(bytes, mimeType);
  }

  current(): ImageSource | null {
    return this.source;
  }

  /**
   * Drops the current source and its buffers
   */
  clear(): void {
    this.source = null;
  }
}
