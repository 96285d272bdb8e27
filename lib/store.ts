/**
 * Zustand store binding one EditorSession to the React components.
 *
 * A store is created per mounted editor with createEditorStore(session); the
 * session is captured here and nowhere else, so every UI event goes through
 * reduceEditorEvent.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import { reduceEditorEvent, type EditorEvent } from './dispatcher';
import { getEventMessage } from './processing-messages';
import type { EditorSession } from './session';
import { initialRenderState, type RenderState } from './types';

/**
 * Processing status for the most recent event
 */
export type ProcessingStatus = 'idle' | 'processing' | 'complete' | 'error';

/**
 * Editor state interface
 */
export interface EditorState extends RenderState {
  processingStatus: ProcessingStatus;
  processingMessage: string;

  // Actions
  dispatch: (event: EditorEvent) => void;
  upload: (dataUrl: string) => void;
  addEffect: (kind: string, initialValue?: number) => void;
  setValue: (id: string, value: number) => void;
  shutdown: () => void;
  /** Reports a failure that happened before an event reached the session (e.g. file picking) */
  reportError: (message: string) => void;
  clearError: () => void;
}

export type EditorStore = StoreApi<EditorState>;

function pickRenderState(state: EditorState): RenderState {
  return {
    phase: state.phase,
    previewBase: state.previewBase,
    output: state.output,
    controls: state.controls,
    error: state.error,
  };
}

/**
 * Creates the store for one editor mount
 */
export function createEditorStore(session: EditorSession): EditorStore {
  return createStore<EditorState>((set, get) => ({
    ...initialRenderState,
    phase: session.phase,
    controls: session.controls(),
    processingStatus: 'idle',
    processingMessage: '',

    /**
     * Runs an event through the reducer and publishes the next render state.
     * Sets the processing message for the duration of the event; an error the
     * reducer does not handle still ends the processing status.
     */
    dispatch: (event: EditorEvent) => {
      const effectKind = event.type === 'set-value'
        ? session.effects().find((effect) => effect.id === event.id)?.kind
        : undefined;
      set({ processingStatus: 'processing', processingMessage: getEventMessage(event, effectKind) });

      let next: RenderState;
      try {
        next = reduceEditorEvent(session, pickRenderState(get()), event);
      } catch (error) {
        set({ processingStatus: 'error', processingMessage: '' });
        throw error;
      }
      set({
        ...next,
        processingStatus: next.error ? 'error' : 'complete',
        processingMessage: '',
      });
    },

    upload: (dataUrl: string) => {
      get().dispatch({ type: 'upload', dataUrl });
    },

    addEffect: (kind: string, initialValue?: number) => {
      get().dispatch({ type: 'add-effect', kind, initialValue });
    },

    setValue: (id: string, value: number) => {
      get().dispatch({ type: 'set-value', id, value });
    },

    shutdown: () => {
      get().dispatch({ type: 'shutdown' });
    },

    reportError: (message: string) => {
      set({ error: { code: 'UPLOAD_REJECTED', message }, processingStatus: 'error' });
    },

    clearError: () => {
      set({ error: null });
    },
  }));
}
