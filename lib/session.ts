/**
 * Editor session: one ImageSource and one Pipeline per mounted editor.
 *
 * The session is created once per UI mount and passed explicitly to whatever
 * handles events; nothing in the core reaches for ambient state.
 *
 * Phases: empty → (load) → loaded → (append/update)* → loaded → (shutdown) → closed.
 * Effects can be added while empty; rendering needs a loaded image.
 */

import { type EditorConfig, resolveEditorConfig } from './editor-config';
import { SessionClosedError } from './errors';
import type { ImageLibrary } from './image-library';
import { ImageSourceManager } from './image-source';
import { EffectPipeline } from './pipeline';
import { RenderCoordinator } from './render';
import type { ControlDescriptor, EffectInstance, ImageSource, RgbaImage, SessionPhase } from './types';

export type ShutdownListener = () => void;

export class EditorSession {
  readonly config: EditorConfig;

  private readonly sources: ImageSourceManager;
  private readonly pipeline: EffectPipeline;
  private readonly renderer: RenderCoordinator;

  private closed = false;
  private shutdownListeners: ShutdownListener[] = [];

  constructor(library: ImageLibrary, config?: Partial<EditorConfig>) {
    this.config = resolveEditorConfig(config);
    this.sources = new ImageSourceManager(library, this.config.previewWidth);
    this.pipeline = new EffectPipeline({ strictUpdates: this.config.strictUpdates });
    this.renderer = new RenderCoordinator(library, this.sources, this.pipeline);
  }

  get phase(): SessionPhase {
    if (this.closed) return 'closed';
    return this.sources.current() ? 'loaded' : 'empty';
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new SessionClosedError(operation);
    }
  }

  /**
   * Replaces the current image with an uploaded data URL.
   * On failure the previous image, if any, stays in place.
   */
  loadDataUrl(dataUrl: string): ImageSource {
    this.assertOpen('load an image');
    return this.sources.loadDataUrl(dataUrl);
  }

  load(bytes: Uint8Array, mimeHint?: string): ImageSource {
    this.assertOpen('load an image');
    return this.sources.load(bytes, mimeHint);
  }

  imageSource(): ImageSource | null {
    return this.sources.current();
  }

  appendEffect(kind: string, initialValue?: number): EffectInstance {
    this.assertOpen('add an effect');
    return this.pipeline.append(kind, initialValue);
  }

  updateEffect(id: string, value: number): void {
    this.assertOpen('update an effect');
    this.pipeline.update(id, value);
  }

  effects(): readonly EffectInstance[] {
    return this.pipeline.snapshot();
  }

  controls(): ControlDescriptor[] {
    return this.pipeline.controls();
  }

  previewBase(): RgbaImage {
    this.assertOpen('render');
    return this.renderer.previewBase();
  }

  renderOutput(): RgbaImage {
    this.assertOpen('render');
    return this.renderer.renderOutput();
  }

  /**
   * Encodes an image with the configured output format and quality, as a data URL
   */
  encodeForDisplay(image: RgbaImage): string {
    this.assertOpen('encode');
    return this.renderer.encodeToDataUrl(image, this.config.outputFormat, this.config.outputQuality);
  }

  encode(image: RgbaImage): Uint8Array {
    this.assertOpen('encode');
    return this.renderer.encode(image, this.config.outputFormat, this.config.outputQuality);
  }

  /**
   * Registers teardown work (e.g. releasing DOM listeners) run once on shutdown.
   * @returns Function that unregisters the listener
   */
  onShutdown(listener: ShutdownListener): () => void {
    this.assertOpen('register a shutdown listener');
    this.shutdownListeners.push(listener);
    return () => {
      this.shutdownListeners = this.shutdownListeners.filter((registered) => registered !== listener);
    };
  }

  /**
   * Closes the session. Idempotent; the session rejects every other operation afterwards.
   */
  shutdown(): void {
    if (this.closed) return;
    this.closed = true;
    this.sources.clear();

    const listeners = this.shutdownListeners;
    this.shutdownListeners = [];
    for (const listener of listeners) {
      try {
        listener();
      } catch (error) {
        console.error('EditorSession.shutdown listener error:', error);
      }
    }
  }
}
