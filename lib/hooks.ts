/**
 * Custom React hooks for the editor UI
 */
import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import { useStore } from 'zustand';
import type { EditorState, EditorStore } from './store';

/**
 * Debounced function returned by useDebouncedCallback
 */
export type DebouncedCallback<A extends unknown[]> = {
  (...args: A): void;
  /** Drops the pending call, if any */
  cancel: () => void;
};

/** Delay used when the requested one is negative or not finite */
const FALLBACK_DELAY_MS = 50;

/**
 * Delays `callback` until `delay` ms pass without another call.
 * Always runs the latest `callback`; a pending call is dropped on unmount.
 */
export function useDebouncedCallback<A extends unknown[]>(
  callback: (...args: A) => void,
  delay: number = FALLBACK_DELAY_MS
): DebouncedCallback<A> {
  const latest = useRef(callback);
  const pending = useRef<ReturnType<typeof setTimeout>>();

  useEffect(() => {
    latest.current = callback;
  }, [callback]);

  const debounced = useMemo(() => {
    const wait = Number.isFinite(delay) && delay >= 0 ? delay : FALLBACK_DELAY_MS;

    const cancel = () => {
      clearTimeout(pending.current);
      pending.current = undefined;
    };

    const call = (...args: A) => {
      cancel();
      pending.current = setTimeout(() => {
        pending.current = undefined;
        latest.current(...args);
      }, wait);
    };

    return Object.assign(call, { cancel });
  }, [delay]);

  useEffect(() => debounced.cancel, [debounced]);

  return debounced;
}

/**
 * Subscribes a component to a slice of an editor store
 */
export function useEditorStore<T>(store: EditorStore, selector: (state: EditorState) => T): T {
  return useStore(store, selector);
}

/**
 * Reads a File as a data URL, the form the editor's upload event takes.
 * Returns a stable reader function and whether a read is in flight.
 */
export function useDataUrlReader(): {
  read: (file: Blob) => Promise<string>;
  isReading: boolean;
} {
  const [isReading, setIsReading] = useState(false);

  const read = useCallback((file: Blob) => {
    setIsReading(true);
    return new Promise<string>((resolve, reject) => {
      const reader = new FileReader();
      reader.onload = () => {
        setIsReading(false);
        if (typeof reader.result === 'string') {
          resolve(reader.result);
        } else {
          reject(new Error('File could not be read as a data URL'));
        }
      };
      reader.onerror = () => {
        setIsReading(false);
        reject(reader.error ?? new Error('Failed to read file'));
      };
      reader.readAsDataURL(file);
    });
  }, []);

  return { read, isReading };
}
