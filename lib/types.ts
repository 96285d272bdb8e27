/**
 * Shared types for the Prism image editor
 */

/**
 * A decoded image as 8-bit RGBA pixels, row-major.
 * Every module treats these as immutable: transforms return new images.
 */
export interface RgbaImage {
  pixels: Uint8Array;
  width: number;
  height: number;
}

/**
 * Encodings the editor accepts on upload and can produce on output
 */
export type ImageFormat = 'jpeg' | 'png';

/**
 * Valid effect kinds that can be added to the pipeline
 */
export type EffectKind = 'brightness' | 'contrast' | 'edge-detection';

/**
 * One user-added, independently tunable occurrence of an effect kind.
 */
export interface EffectInstance {
  /** Stable identifier, assigned once and never reused */
  id: string;
  kind: EffectKind;
  /** Current slider value, always inside the kind's range */
  value: number;
}

/**
 * Everything a UI needs to draw the slider for one effect instance.
 */
export interface ControlDescriptor {
  id: string;
  kind: EffectKind;
  label: string;
  min: number;
  max: number;
  step: number;
  value: number;
}

/**
 * The decoded upload and the fixed-width preview all effects operate on.
 */
export interface ImageSource {
  original: RgbaImage;
  preview: RgbaImage;
  /** Encoding detected from the uploaded bytes */
  format: ImageFormat;
}

/**
 * Session lifecycle: empty until the first upload, closed after shutdown.
 */
export type SessionPhase = 'empty' | 'loaded' | 'closed';

/**
 * Error details surfaced to the UI after a rejected operation
 */
export interface RenderError {
  code: string;
  message: string;
}

/**
 * What the UI renders. Derived from the session after every event.
 */
export interface RenderState {
  phase: SessionPhase;
  /** Encoded unedited preview as a data URL, null without an image */
  previewBase: string | null;
  /** Encoded pipeline output as a data URL, null without an image */
  output: string | null;
  controls: ControlDescriptor[];
  error: RenderError | null;
}

/**
 * Initial render state before any event has been handled
 */
export const initialRenderState: RenderState = {
  phase: 'empty',
  previewBase: null,
  output: null,
  controls: [],
  error: null,
};
