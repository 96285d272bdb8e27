export { default as ImageEditor } from './components/ImageEditor';
export type { ImageEditorProps } from './components/ImageEditor';
export { default as EffectControls } from './components/EffectControls';
export { default as EffectSelector } from './components/EffectSelector';
export { default as ImageUploader } from './components/ImageUploader';
export { default as PreviewPanes } from './components/PreviewPanes';
export { default as Slider } from './components/ui/Slider';
