/**
 * Upload validation: accepted types, format sniffing and dimension limits
 */

import type { ImageFormat } from './types';

export const ACCEPTED_IMAGE_TYPES = ['image/jpeg', 'image/png'] as const;

export type AcceptedImageType = (typeof ACCEPTED_IMAGE_TYPES)[number];

/** Largest accepted side in pixels (8K) */
export const MAX_IMAGE_DIMENSION = 7680;

/** Largest accepted width × height: 7680 × 4320 */
export const MAX_TOTAL_PIXELS = 33_177_600;

const JPEG_MAGIC = [0xff, 0xd8, 0xff] as const;
const PNG_MAGIC = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] as const;

/**
 * Outcome of an upload check; `error` is a user-facing message when invalid
 */
export interface ValidationResult {
  isValid: boolean;
  error?: string;
}

const VALID: ValidationResult = { isValid: true };

function invalid(error: string): ValidationResult {
  return { isValid: false, error };
}

/**
 * Minimal shape of a picked file, so the check works on File and plain objects alike
 */
export interface UploadCandidate {
  type: string;
  size: number;
}

const toMegabytes = (bytes: number) => Math.round(bytes / (1024 * 1024));

/**
 * Checks a picked file's MIME type and size before it is read
 * @param maxBytes - Largest accepted size
 */
export function validateImageFile(file: UploadCandidate | null | undefined, maxBytes: number): ValidationResult {
  if (!file) return invalid('No file provided');
  if (!isAcceptedImageType(file.type)) return invalid('Please select a valid image file (JPEG or PNG).');
  if (file.size > maxBytes) {
    return invalid(`File size (${toMegabytes(file.size)}MB) exceeds maximum allowed size (${toMegabytes(maxBytes)}MB).`);
  }
  return VALID;
}

/**
 * Checks decoded image dimensions: positive integers, within the per-side
 * and total-pixel limits
 */
export function validateImageDimensions(width: number, height: number): ValidationResult {
  const size = `${width}×${height}`;

  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    return invalid(`Invalid image dimensions (${size}).`);
  }
  if (width > MAX_IMAGE_DIMENSION || height > MAX_IMAGE_DIMENSION) {
    return invalid(`Image dimensions (${size}) exceed maximum allowed (${MAX_IMAGE_DIMENSION}×${MAX_IMAGE_DIMENSION}).`);
  }
  const megapixels = Math.round((width * height) / 1_000_000);
  if (width * height > MAX_TOTAL_PIXELS) {
    return invalid(`Image resolution (${megapixels}MP) exceeds maximum allowed (~33MP).`);
  }
  return VALID;
}

function startsWith(bytes: Uint8Array, magic: readonly number[]): boolean {
  if (bytes.length < magic.length) return false;
  return magic.every((byte, index) => bytes[index] === byte);
}

/**
 * Detects the encoding from the leading magic bytes.
 * @returns The format, or null when the bytes are neither JPEG nor PNG
 */
export function detectImageFormat(bytes: Uint8Array): ImageFormat | null {
  if (startsWith(bytes, JPEG_MAGIC)) return 'jpeg';
  if (startsWith(bytes, PNG_MAGIC)) return 'png';
  return null;
}

/**
 * Maps a MIME type to a format, or null if it is not accepted
 */
export function formatFromMimeType(mimeType: string): ImageFormat | null {
  switch (mimeType.toLowerCase()) {
    case 'image/jpeg':
    case 'image/jpg':
      return 'jpeg';
    case 'image/png':
      return 'png';
    default:
      return null;
  }
}

export function mimeTypeForFormat(format: ImageFormat): AcceptedImageType {
  return format === 'jpeg' ? 'image/jpeg' : 'image/png';
}

/**
 * Checks if a MIME type is an accepted image type
 */
export function isAcceptedImageType(mimeType: string): mimeType is AcceptedImageType {
  return (ACCEPTED_IMAGE_TYPES as readonly string[]).includes(mimeType);
}
