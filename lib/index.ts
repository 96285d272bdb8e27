export * from './types';
export * from './errors';
export { RenderError } from './errors';
export * from './editor-config';
export * from './effects-catalog';
export type { ImageLibrary, DecodedImage, ResampleFilter } from './image-library';
export { EffectPipeline, renderControlDescriptor } from './pipeline';
export type { EffectPipelineOptions } from './pipeline';
export { ImageSourceManager, calculatePreviewDimensions } from './image-source';
export { RenderCoordinator } from './render';
export { EditorSession } from './session';
export { reduceEditorEvent } from './dispatcher';
export type { EditorEvent, EditorEventType } from './dispatcher';
export { createEditorStore } from './store';
export type { EditorState, EditorStore, ProcessingStatus } from './store';
export { parseDataUrl, toDataUrl } from './data-url';
export { detectImageFormat, validateImageFile } from './validation';
export { createMagickImageLibrary, initializeMagick, MagickImageLibrary, DEFAULT_WASM_URL } from './magick';
export type { WasmSource } from './magick';
