import {
  ACCEPTED_IMAGE_TYPES,
  MAX_IMAGE_DIMENSION,
  detectImageFormat,
  formatFromMimeType,
  isAcceptedImageType,
  mimeTypeForFormat,
  validateImageDimensions,
  validateImageFile,
} from '../lib/validation';

const MB = 1024 * 1024;

describe('validateImageFile', () => {
  test('accepts JPEG and PNG within the size limit', () => {
    expect(validateImageFile({ type: 'image/jpeg', size: 1000 }, 50 * MB)).toEqual({ isValid: true });
    expect(validateImageFile({ type: 'image/png', size: 50 * MB }, 50 * MB)).toEqual({ isValid: true });
  });

  test('rejects a missing file', () => {
    expect(validateImageFile(null, 50 * MB)).toEqual({ isValid: false, error: 'No file provided' });
    expect(validateImageFile(undefined, 50 * MB)).toEqual({ isValid: false, error: 'No file provided' });
  });

  test('rejects other types', () => {
    for (const type of ['image/gif', 'image/webp', 'text/plain', '']) {
      expect(validateImageFile({ type, size: 10 }, 50 * MB)).toEqual({
        isValid: false,
        error: 'Please select a valid image file (JPEG or PNG).',
      });
    }
  });

  test('rejects oversized files', () => {
    expect(validateImageFile({ type: 'image/png', size: 60 * MB }, 50 * MB)).toEqual({
      isValid: false,
      error: 'File size (60MB) exceeds maximum allowed size (50MB).',
    });
  });

  test('works with File objects', () => {
    const file = new File([new Uint8Array([0xff, 0xd8, 0xff])], 'photo.jpg', { type: 'image/jpeg' });
    expect(validateImageFile(file, 50 * MB).isValid).toBe(true);
  });
});

describe('validateImageDimensions', () => {
  test('accepts ordinary sizes and the limits themselves', () => {
    expect(validateImageDimensions(400, 300)).toEqual({ isValid: true });
    expect(validateImageDimensions(7680, 4320)).toEqual({ isValid: true });
  });

  test('rejects zero, negative and fractional sizes', () => {
    expect(validateImageDimensions(0, 100)).toEqual({ isValid: false, error: 'Invalid image dimensions (0×100).' });
    expect(validateImageDimensions(100, -1).isValid).toBe(false);
    expect(validateImageDimensions(10.5, 10).isValid).toBe(false);
  });

  test('rejects sides above the maximum dimension', () => {
    expect(validateImageDimensions(MAX_IMAGE_DIMENSION + 1, 10)).toEqual({
      isValid: false,
      error: 'Image dimensions (7681×10) exceed maximum allowed (7680×7680).',
    });
  });

  test('rejects too many pixels', () => {
    expect(validateImageDimensions(7680, 7680)).toEqual({
      isValid: false,
      error: 'Image resolution (59MP) exceeds maximum allowed (~33MP).',
    });
  });
});

describe('format helpers', () => {
  test('detectImageFormat reads magic bytes', () => {
    expect(detectImageFormat(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]))).toBe('jpeg');
    expect(detectImageFormat(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]))).toBe('png');
    expect(detectImageFormat(new Uint8Array([0x89, 0x50, 0x4e, 0x47]))).toBeNull();
    expect(detectImageFormat(new Uint8Array([0x47, 0x49, 0x46, 0x38, 0x39, 0x61]))).toBeNull();
    expect(detectImageFormat(new Uint8Array(0))).toBeNull();
  });

  test('formatFromMimeType', () => {
    expect(formatFromMimeType('image/jpeg')).toBe('jpeg');
    expect(formatFromMimeType('image/jpg')).toBe('jpeg');
    expect(formatFromMimeType('IMAGE/PNG')).toBe('png');
    expect(formatFromMimeType('image/gif')).toBeNull();
  });

  test('mimeTypeForFormat', () => {
    expect(mimeTypeForFormat('jpeg')).toBe('image/jpeg');
    expect(mimeTypeForFormat('png')).toBe('image/png');
  });

  test('isAcceptedImageType matches ACCEPTED_IMAGE_TYPES exactly', () => {
    expect(ACCEPTED_IMAGE_TYPES).toEqual(['image/jpeg', 'image/png']);
    expect(isAcceptedImageType('image/jpeg')).toBe(true);
    expect(isAcceptedImageType('image/jpg')).toBe(false);
  });
});
