import { EditorSession } from '../lib/session';
import { NoImageError, NotFoundError, SessionClosedError, UnsupportedFormatError } from '../lib/errors';
import { parseDataUrl } from '../lib/data-url';
import { FakeImageLibrary, fakeDataUrl, solidImage } from './helpers/fake-image-library';

describe('EditorSession', () => {
  let library: FakeImageLibrary;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    library = new FakeImageLibrary();
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    warnSpy.mockRestore();
    errorSpy.mockRestore();
  });

  test('moves from empty to loaded to closed', () => {
    const session = new EditorSession(library);
    expect(session.phase).toBe('empty');

    session.loadDataUrl(fakeDataUrl(solidImage(400, 300, [0, 0, 0, 255]), 'jpeg'));
    expect(session.phase).toBe('loaded');

    session.shutdown();
    expect(session.phase).toBe('closed');
  });

  test('uses the default config', () => {
    const session = new EditorSession(library);
    expect(session.config.previewWidth).toBe(200);
    expect(session.config.outputFormat).toBe('jpeg');
    expect(session.config.outputQuality).toBe(90);
    expect(session.config.strictUpdates).toBe(false);
  });

  test('previewWidth override changes the preview size', () => {
    const session = new EditorSession(library, { previewWidth: 100 });
    const source = session.loadDataUrl(fakeDataUrl(solidImage(400, 300, [0, 0, 0, 255]), 'jpeg'));
    expect(source.preview.width).toBe(100);
    expect(source.preview.height).toBe(75);
  });

  test('effects can be added before an image is loaded, but rendering needs one', () => {
    const session = new EditorSession(library);

    expect(session.appendEffect('contrast').id).toBe('contrast-1');
    expect(session.controls()).toHaveLength(1);
    expect(() => session.renderOutput()).toThrow(NoImageError);
    expect(() => session.previewBase()).toThrow(NoImageError);
  });

  test('the pipeline survives a new upload', () => {
    const session = new EditorSession(library);
    session.loadDataUrl(fakeDataUrl(solidImage(400, 300, [100, 100, 100, 255]), 'jpeg'));
    session.appendEffect('brightness', 1);

    session.loadDataUrl(fakeDataUrl(solidImage(10, 10, [0, 0, 0, 255]), 'png'));

    expect(session.effects()).toEqual([{ id: 'brightness-1', kind: 'brightness', value: 1 }]);
    expect(Array.from(session.renderOutput().pixels.subarray(0, 4))).toEqual([64, 64, 64, 255]);
  });

  test('a rejected upload keeps the previous image', () => {
    const session = new EditorSession(library);
    const first = session.loadDataUrl(fakeDataUrl(solidImage(400, 300, [0, 0, 0, 255]), 'jpeg'));

    expect(() => session.loadDataUrl('data:image/webp;base64,AAAA')).toThrow(UnsupportedFormatError);
    expect(session.imageSource()).toBe(first);
    expect(session.phase).toBe('loaded');
  });

  test('strictUpdates config makes unknown ids throw', () => {
    const session = new EditorSession(library, { strictUpdates: true });
    expect(() => session.updateEffect('contrast-1', 1)).toThrow(NotFoundError);
  });

  test('encodeForDisplay uses the configured format and quality', () => {
    const session = new EditorSession(library, { outputFormat: 'png', outputQuality: 75 });
    const dataUrl = session.encodeForDisplay(solidImage(1, 1, [1, 1, 1, 255]));

    expect(parseDataUrl(dataUrl).mimeType).toBe('image/png');
    expect(library.calls).toEqual([{ op: 'encode', args: ['png', 75] }]);
  });

  describe('shutdown', () => {
    test('clears the image and rejects further operations', () => {
      const session = new EditorSession(library);
      session.loadDataUrl(fakeDataUrl(solidImage(4, 4, [0, 0, 0, 255]), 'jpeg'));
      session.shutdown();

      const dataUrl = fakeDataUrl(solidImage(4, 4, [0, 0, 0, 255]), 'jpeg');
      expect(session.imageSource()).toBeNull();
      expect(() => session.loadDataUrl(dataUrl)).toThrow(SessionClosedError);
      expect(() => session.appendEffect('contrast')).toThrow(SessionClosedError);
      expect(() => session.updateEffect('contrast-1', 1)).toThrow(SessionClosedError);
      expect(() => session.renderOutput()).toThrow(SessionClosedError);
      expect(() => session.encode(solidImage(1, 1, [0, 0, 0, 255]))).toThrow(
        'Cannot encode: the editor session is closed'
      );
    });

    test('is idempotent and runs listeners once', () => {
      const session = new EditorSession(library);
      const listener = jest.fn();
      session.onShutdown(listener);

      session.shutdown();
      session.shutdown();

      expect(listener).toHaveBeenCalledTimes(1);
      expect(session.phase).toBe('closed');
    });

    test('unregistered listeners do not run', () => {
      const session = new EditorSession(library);
      const listener = jest.fn();
      const unregister = session.onShutdown(listener);

      unregister();
      session.shutdown();

      expect(listener).not.toHaveBeenCalled();
    });

    test('a throwing listener is logged and does not stop the others', () => {
      const session = new EditorSession(library);
      const failure = new Error('listener failed');
      const second = jest.fn();
      session.onShutdown(() => {
        throw failure;
      });
      session.onShutdown(second);

      session.shutdown();

      expect(second).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledWith('EditorSession.shutdown listener error:', failure);
    });
  });
});
