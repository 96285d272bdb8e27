/**
 * Editor configuration with defaults
 */

import { z } from 'zod';
import type { ImageFormat } from './types';

export interface EditorConfig {
  /** Width of the preview every effect operates on, in pixels */
  previewWidth: number;
  /** Encoding used for the images handed to the UI */
  outputFormat: ImageFormat;
  /** Encoder quality (1-100) for lossy output */
  outputQuality: number;
  /**
   * When true, updating an effect id that does not exist throws NotFoundError.
   * When false the update is ignored with a warning.
   */
  strictUpdates: boolean;
  /** Largest upload accepted by the file picker, in bytes */
  maxUploadBytes: number;
}

export const DEFAULT_PREVIEW_WIDTH = 200;

export const DEFAULT_OUTPUT_QUALITY = 90;

/** 50MB */
export const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

export const DEFAULT_EDITOR_CONFIG: Readonly<EditorConfig> = {
  previewWidth: DEFAULT_PREVIEW_WIDTH,
  outputFormat: 'jpeg',
  outputQuality: DEFAULT_OUTPUT_QUALITY,
  strictUpdates: false,
  maxUploadBytes: DEFAULT_MAX_UPLOAD_BYTES,
};

const editorConfigSchema = z.object({
  previewWidth: z
    .number()
    .int({ message: 'must be a positive integer' })
    .positive({ message: 'must be a positive integer' }),
  outputFormat: z.enum(['jpeg', 'png']),
  outputQuality: z
    .number()
    .min(1, { message: 'must be between 1 and 100' })
    .max(100, { message: 'must be between 1 and 100' }),
  strictUpdates: z.boolean(),
  maxUploadBytes: z.number().positive({ message: 'must be positive' }),
});

/**
 * Merges overrides onto the defaults and validates the result.
 * @throws Error listing every invalid setting
 */
export function resolveEditorConfig(overrides: Partial<EditorConfig> = {}): EditorConfig {
  const parseResult = editorConfigSchema.safeParse({ ...DEFAULT_EDITOR_CONFIG, ...overrides });

  if (!parseResult.success) {
    const errorMessage = parseResult.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid editor config: ${errorMessage}`);
  }

  return parseResult.data;
}
