import { useState, useEffect, useCallback } from 'react';
import { AlertTriangle, Power } from 'lucide-react';
import EffectControls from './EffectControls';
import EffectSelector from './EffectSelector';
import ImageUploader from './ImageUploader';
import PreviewPanes from './PreviewPanes';
import { useEditorStore } from '../../lib/hooks';
import type { EditorConfig } from '../../lib/editor-config';
import type { ImageLibrary } from '../../lib/image-library';
import { EditorSession } from '../../lib/session';
import { createEditorStore } from '../../lib/store';
import { cn } from '../../lib/utils';

export interface ImageEditorProps {
  library: ImageLibrary;
  config?: Partial<EditorConfig>;
  /** Called once when the user shuts the editor down */
  onShutdown?: () => void;
  /** Slider debounce, mostly for tests */
  sliderDebounceMs?: number;
}

/**
 * Editor root. Creates one session and one store per mount and wires the
 * uploader, effect selector, sliders and preview panes to them.
 */
export default function ImageEditor({ library, config, onShutdown, sliderDebounceMs }: ImageEditorProps) {
  const [session] = useState(() => new EditorSession(library, config));
  const [store] = useState(() => createEditorStore(session));

  const phase = useEditorStore(store, (state) => state.phase);
  const previewBase = useEditorStore(store, (state) => state.previewBase);
  const output = useEditorStore(store, (state) => state.output);
  const error = useEditorStore(store, (state) => state.error);
  const processingMessage = useEditorStore(store, (state) => state.processingMessage);
  const upload = useEditorStore(store, (state) => state.upload);
  const addEffect = useEditorStore(store, (state) => state.addEffect);
  const shutdown = useEditorStore(store, (state) => state.shutdown);
  const reportError = useEditorStore(store, (state) => state.reportError);

  useEffect(() => {
    if (!onShutdown || session.phase === 'closed') return;
    return session.onShutdown(onShutdown);
  }, [session, onShutdown]);

  const handleShutdown = useCallback(() => {
    shutdown();
  }, [shutdown]);

  const isClosed = phase === 'closed';

  return (
    <div className="flex flex-col gap-4 p-4 text-zinc-100" data-testid="image-editor">
      <div className="flex items-center justify-between">
        <span id="status" className="text-sm text-zinc-400" role="status">
          {isClosed ? 'Editor is closed' : processingMessage || (phase === 'loaded' ? 'Ready' : 'Upload an image to start')}
        </span>
        <button
          id="shutdownBtn"
          type="button"
          onClick={handleShutdown}
          disabled={isClosed}
          className={cn(
            'flex items-center gap-1 px-3 py-1 rounded-md text-sm',
            isClosed ? 'text-zinc-500 cursor-not-allowed' : 'bg-red-500/20 text-red-200 hover:bg-red-500/30'
          )}
        >
          <Power size={14} aria-hidden="true" />
          Shutdown
        </button>
      </div>

      {error && (
        <div role="alert" className="flex items-center gap-2 text-sm text-amber-300">
          <AlertTriangle size={16} aria-hidden="true" />
          <span>{error.message}</span>
        </div>
      )}

      {!isClosed && (
        <div id="app" className="flex flex-col gap-4">
          <ImageUploader
            onUpload={upload}
            onReject={reportError}
            maxUploadBytes={session.config.maxUploadBytes}
          />
          <div className="text-xs uppercase tracking-wider text-zinc-500">preview:</div>
          <PreviewPanes previewBase={previewBase} output={output} />
          <EffectSelector onAdd={addEffect} />
          <EffectControls store={store} debounceMs={sliderDebounceMs} />
        </div>
      )}
    </div>
  );
}
