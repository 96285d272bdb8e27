/**
 * Event dispatcher: the single entry point from the UI into the editor core.
 *
 * The UI emits typed events; the reducer mutates the session it is handed and
 * returns the next render state. Editor errors never escape: they come back in
 * `state.error` with the rest of the state describing the session as it is.
 * When rendering fails after the session changed, the panes that no longer
 * match it are cleared.
 */

import { isEditorError } from './errors';
import type { EditorSession } from './session';
import type { RenderState } from './types';

export type EditorEvent =
  | { type: 'upload'; dataUrl: string }
  | { type: 'add-effect'; kind: string; initialValue?: number }
  | { type: 'set-value'; id: string; value: number }
  | { type: 'shutdown' };

export type EditorEventType = EditorEvent['type'];

const CLOSED_STATE: RenderState = {
  phase: 'closed',
  previewBase: null,
  output: null,
  controls: [],
  error: null,
};

/**
 * Re-renders the pipeline output. The base preview is carried over when it is
 * already encoded and encoded again when it is missing.
 */
function withFreshOutput(session: EditorSession, state: RenderState): RenderState {
  const loaded = session.phase === 'loaded';
  return {
    phase: session.phase,
    previewBase: loaded ? state.previewBase ?? session.encodeForDisplay(session.previewBase()) : null,
    output: loaded ? session.encodeForDisplay(session.renderOutput()) : null,
    controls: session.controls(),
    error: null,
  };
}

/**
 * Applies one event to the session and derives the next render state.
 *
 * @param session - The session owned by the mounted editor
 * @param state - The state returned for the previous event
 * @param event - What the user did
 * @throws Only errors that are not EditorErrors
 */
export function reduceEditorEvent(session: EditorSession, state: RenderState, event: EditorEvent): RenderState {
  // Panes to fall back on if the event fails part way through
  let fallback = state;
  try {
    switch (event.type) {
      case 'upload': {
        session.loadDataUrl(event.dataUrl);
        // The session now holds the new image; the old panes no longer match it
        fallback = { ...state, previewBase: null, output: null };
        return withFreshOutput(session, fallback);
      }

      case 'add-effect':
        session.appendEffect(event.kind, event.initialValue);
        fallback = { ...state, output: null };
        return withFreshOutput(session, state);

      case 'set-value':
        session.updateEffect(event.id, event.value);
        fallback = { ...state, output: null };
        return withFreshOutput(session, state);

      case 'shutdown':
        session.shutdown();
        return CLOSED_STATE;
    }
  } catch (error) {
    if (!isEditorError(error)) {
      throw error;
    }
    console.warn(`reduceEditorEvent: ${event.type} rejected (${error.code}): ${error.message}`);
    const failure = { code: error.code, message: error.message };
    if (session.phase === 'closed') {
      return { ...CLOSED_STATE, error: failure };
    }
    return {
      ...fallback,
      phase: session.phase,
      controls: session.controls(),
      error: failure,
    };
  }
}
