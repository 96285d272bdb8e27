import { createEditorStore } from '../lib/store';
import { EditorSession } from '../lib/session';
import { FakeImageLibrary, fakeDataUrl, solidImage } from './helpers/fake-image-library';

describe('Editor store', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  function setup() {
    const session = new EditorSession(new FakeImageLibrary());
    const store = createEditorStore(session);
    return { session, store };
  }

  test('starts idle with the session phase', () => {
    const { store } = setup();
    const state = store.getState();

    expect(state.phase).toBe('empty');
    expect(state.processingStatus).toBe('idle');
    expect(state.processingMessage).toBe('');
    expect(state.previewBase).toBeNull();
    expect(state.output).toBeNull();
    expect(state.controls).toEqual([]);
  });

  test('upload publishes both panes and completes', () => {
    const { store } = setup();

    store.getState().upload(fakeDataUrl(solidImage(400, 300, [0, 0, 0, 255]), 'jpeg'));
    const state = store.getState();

    expect(state.phase).toBe('loaded');
    expect(state.previewBase).toMatch(/^data:image\/jpeg;base64,/);
    expect(state.output).toBe(state.previewBase);
    expect(state.processingStatus).toBe('complete');
    expect(state.processingMessage).toBe('');
  });

  test('shows the kind-specific message while an event is handled', () => {
    const { store } = setup();
    const messages: string[] = [];
    const unsubscribe = store.subscribe((state) => {
      if (state.processingStatus === 'processing') {
        messages.push(state.processingMessage);
      }
    });

    store.getState().upload(fakeDataUrl(solidImage(4, 4, [0, 0, 0, 255]), 'jpeg'));
    store.getState().addEffect('edge-detection');
    store.getState().setValue('edge-detection-1', 1);
    store.getState().setValue('missing-1', 1);
    store.getState().shutdown();
    unsubscribe();

    expect(messages).toEqual([
      'Loading Image...',
      'Detecting Edges...',
      'Detecting Edges...',
      'Processing...',
      'Closing Editor...',
    ]);
  });

  test('addEffect and setValue flow through to the controls', () => {
    const { store, session } = setup();

    store.getState().addEffect('brightness', 0.5);
    store.getState().setValue('brightness-1', -3);

    expect(store.getState().controls).toEqual([
      { id: 'brightness-1', kind: 'brightness', label: 'Brightness', min: -2, max: 2, step: 0.1, value: -2 },
    ]);
    expect(session.effects()).toEqual([{ id: 'brightness-1', kind: 'brightness', value: -2 }]);
  });

  test('a rejected event sets error status and the error', () => {
    const { store } = setup();

    store.getState().addEffect('sharpen');

    expect(store.getState().processingStatus).toBe('error');
    expect(store.getState().error).toEqual({ code: 'UNKNOWN_KIND', message: 'Unknown effect kind "sharpen"' });
  });

  test('a failing effect transform ends in error status without throwing', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const library = new FakeImageLibrary();
    library.edgeDetection = () => {
      throw new TypeError('edge detector missing');
    };
    const store = createEditorStore(new EditorSession(library));

    store.getState().upload(fakeDataUrl(solidImage(4, 4, [0, 0, 0, 255]), 'jpeg'));
    store.getState().addEffect('edge-detection', 1);
    const state = store.getState();

    expect(state.processingStatus).toBe('error');
    expect(state.processingMessage).toBe('');
    expect(state.error).toEqual({ code: 'RENDER_FAILED', message: 'Failed to apply effects: edge detector missing' });
    expect(state.output).toBeNull();
    errorSpy.mockRestore();
  });

  test('an unexpected error still ends the processing status', () => {
    const { store, session } = setup();
    const failure = new TypeError('controls unavailable');
    jest.spyOn(session, 'controls').mockImplementation(() => {
      throw failure;
    });

    expect(() => store.getState().addEffect('contrast')).toThrow(failure);
    expect(store.getState().processingStatus).toBe('error');
    expect(store.getState().processingMessage).toBe('');
  });

  test('reportError and clearError', () => {
    const { store } = setup();

    store.getState().reportError('Please select a valid image file (JPEG or PNG).');
    expect(store.getState().error).toEqual({
      code: 'UPLOAD_REJECTED',
      message: 'Please select a valid image file (JPEG or PNG).',
    });
    expect(store.getState().processingStatus).toBe('error');

    store.getState().clearError();
    expect(store.getState().error).toBeNull();
  });

  test('shutdown closes the session', () => {
    const { store, session } = setup();

    store.getState().shutdown();

    expect(store.getState().phase).toBe('closed');
    expect(session.phase).toBe('closed');
  });

  test('stores for separate sessions are independent', () => {
    const first = setup();
    const second = setup();

    first.store.getState().addEffect('contrast');

    expect(first.store.getState().controls).toHaveLength(1);
    expect(second.store.getState().controls).toHaveLength(0);
    expect(second.session.effects()).toEqual([]);
  });
});
