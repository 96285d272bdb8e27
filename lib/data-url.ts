/**
 * Base64 data URL helpers for moving encoded images across the UI boundary
 */

import { DecodeError, UnsupportedFormatError } from './errors';
import type { ImageFormat } from './types';
import { mimeTypeForFormat } from './validation';

export const JPEG_DATA_URL_PREFIX = 'data:image/jpeg;base64,';
export const PNG_DATA_URL_PREFIX = 'data:image/png;base64,';

const DATA_URL_PREFIXES: ReadonlyArray<{ prefix: string; mimeType: string }> = [
  { prefix: JPEG_DATA_URL_PREFIX, mimeType: 'image/jpeg' },
  { prefix: PNG_DATA_URL_PREFIX, mimeType: 'image/png' },
];

/** Bytes per String.fromCharCode call; keeps the argument list under engine limits */
const CHUNK_SIZE = 0x8000;

export interface ParsedDataUrl {
  /** MIME type named by the prefix; a hint only, the bytes decide the format */
  mimeType: string;
  bytes: Uint8Array;
}

/**
 * Splits a JPEG or PNG data URL into its MIME type and decoded bytes.
 * @throws UnsupportedFormatError if the prefix is not a recognised image prefix
 * @throws DecodeError if the payload is not valid base64
 */
export function parseDataUrl(dataUrl: string): ParsedDataUrl {
  const match = DATA_URL_PREFIXES.find(({ prefix }) => dataUrl.startsWith(prefix));
  if (!match) {
    throw new UnsupportedFormatError();
  }

  return {
    mimeType: match.mimeType,
    bytes: base64ToBytes(dataUrl.slice(match.prefix.length)),
  };
}

export function base64ToBytes(base64: string): Uint8Array {
  let binary: string;
  try {
    binary = atob(base64);
  } catch (error) {
    throw new DecodeError('Image data is not valid base64', error);
  }

  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

export function bytesToBase64(bytes: Uint8Array): string {
  let binary = '';
  for (let offset = 0; offset < bytes.length; offset += CHUNK_SIZE) {
    binary += String.fromCharCode(...bytes.subarray(offset, offset + CHUNK_SIZE));
  }
  return btoa(binary);
}

/**
 * Builds a data URL an <img> element can display
 */
export function toDataUrl(bytes: Uint8Array, format: ImageFormat): string {
  return `data:${mimeTypeForFormat(format)};base64,${bytesToBase64(bytes)}`;
}
