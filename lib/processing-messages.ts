/**
 * Processing message utilities for dynamic feedback
 */

import type { EditorEvent } from './dispatcher';

/**
 * Maps effect kinds to user-friendly processing messages
 */
export const PROCESSING_MESSAGES: Record<string, string> = {
  brightness: 'Adjusting Brightness...',
  contrast: 'Adjusting Contrast...',
  'edge-detection': 'Detecting Edges...',
};

/**
 * Gets the processing message for a given effect kind.
 * Uses Object.hasOwn to avoid prototype chain issues with keys like 'toString' or '__proto__'
 *
 * @param kind - The effect kind being processed
 * @returns A kind-specific message, or "Processing..." for anything else
 */
export function getProcessingMessage(kind: string): string {
  if (!Object.hasOwn(PROCESSING_MESSAGES, kind)) {
    return 'Processing...';
  }
  return PROCESSING_MESSAGES[kind];
}

/**
 * Message shown while an event is being handled
 */
export function getEventMessage(event: EditorEvent, kindOfEffect?: string): string {
  switch (event.type) {
    case 'upload':
      return 'Loading Image...';
    case 'add-effect':
      return getProcessingMessage(event.kind);
    case 'set-value':
      return kindOfEffect ? getProcessingMessage(kindOfEffect) : 'Processing...';
    case 'shutdown':
      return 'Closing Editor...';
  }
}
