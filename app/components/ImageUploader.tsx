import { ChangeEvent, useCallback } from 'react';
import { Upload } from 'lucide-react';
import { useDataUrlReader } from '../../lib/hooks';
import { ACCEPTED_IMAGE_TYPES, validateImageFile } from '../../lib/validation';

export interface ImageUploaderProps {
  /** Receives the picked file as a data URL */
  onUpload: (dataUrl: string) => void;
  /** Receives a message when the file is rejected before upload */
  onReject: (message: string) => void;
  maxUploadBytes: number;
  disabled?: boolean;
}

/**
 * File picker that validates the file and hands it on as a data URL
 */
export default function ImageUploader({ onUpload, onReject, maxUploadBytes, disabled = false }: ImageUploaderProps) {
  const { read, isReading } = useDataUrlReader();

  const handleFileSelect = useCallback(async (event: ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    if (!file) return;

    const validation = validateImageFile(file, maxUploadBytes);
    if (!validation.isValid) {
      onReject(validation.error ?? 'Invalid file');
      return;
    }

    try {
      onUpload(await read(file));
    } catch (error) {
      console.error('ImageUploader file read error:', error);
      onReject('Failed to read the selected file.');
    }
  }, [read, onUpload, onReject, maxUploadBytes]);

  return (
    <div id="uploader" className="flex items-center gap-2">
      <Upload size={16} className="text-zinc-400" aria-hidden="true" />
      <label htmlFor="uploaderInput" className="text-sm text-zinc-300">
        Upload image
      </label>
      <input
        id="uploaderInput"
        name="uploader"
        type="file"
        accept={ACCEPTED_IMAGE_TYPES.join(',')}
        onChange={(event) => {
          void handleFileSelect(event);
        }}
        disabled={disabled || isReading}
        data-testid="image-uploader"
      />
    </div>
  );
}
