/**
 * Error taxonomy for the editor core.
 *
 * Every failure is local and synchronous. The session stays usable after any
 * of these is thrown; callers report them and carry on.
 */

export type EditorErrorCode =
  | 'UNKNOWN_KIND'
  | 'UNSUPPORTED_FORMAT'
  | 'DECODE_FAILED'
  | 'INVALID_DIMENSIONS'
  | 'ENCODE_FAILED'
  | 'RENDER_FAILED'
  | 'NOT_FOUND'
  | 'NO_IMAGE'
  | 'SESSION_CLOSED';

export class EditorError extends Error {
  readonly code: EditorErrorCode;

  constructor(code: EditorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The requested effect kind is not registered in the catalog. */
export class UnknownKindError extends EditorError {
  readonly kind: string;

  constructor(kind: string) {
    super('UNKNOWN_KIND', `Unknown effect kind "${kind}"`);
    this.kind = kind;
  }
}

/** The upload is not a JPEG or PNG data URL / byte stream. */
export class UnsupportedFormatError extends EditorError {
  constructor(message = 'Unrecognized image format. Please upload a JPEG or PNG image.') {
    super('UNSUPPORTED_FORMAT', message);
  }
}

export class DecodeError extends EditorError {
  constructor(message: string, cause?: unknown) {
    super('DECODE_FAILED', message, { cause });
  }
}

export class InvalidDimensionsError extends EditorError {
  readonly width: number;
  readonly height: number;

  constructor(width: number, height: number, message?: string) {
    super('INVALID_DIMENSIONS', message ?? `Invalid image dimensions (${width}×${height}).`);
    this.width = width;
    this.height = height;
  }
}

export class EncodeError extends EditorError {
  constructor(message: string, cause?: unknown) {
    super('ENCODE_FAILED', message, { cause });
  }
}

/** The library failed while resizing or applying an effect. */
export class RenderError extends EditorError {
  constructor(message: string, cause?: unknown) {
    super('RENDER_FAILED', message, { cause });
  }
}

/** Raised by strict updates when no effect instance has the given id. */
export class NotFoundError extends EditorError {
  readonly id: string;

  constructor(id: string) {
    super('NOT_FOUND', `No effect with id "${id}"`);
    this.id = id;
  }
}

export class NoImageError extends EditorError {
  constructor() {
    super('NO_IMAGE', 'No image loaded. Upload an image first.');
  }
}

export class SessionClosedError extends EditorError {
  constructor(operation: string) {
    super('SESSION_CLOSED', `Cannot ${operation}: the editor session is closed`);
  }
}

export function isEditorError(error: unknown): error is EditorError {
  return error instanceof EditorError;
}

/**
 * Extracts a message from anything thrown by an external library
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
