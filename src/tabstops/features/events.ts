/**
 * Event system for text blocks.
 * Lets an editor learn which lines to re-lay out after an edit.
 */

import type { EditResult } from '../../types/tab-stops.ts';

// =============================================================================
// Event Types
// =============================================================================

/**
 * Base event interface.
 */
export interface TextBlockEvent {
  readonly type: string;
  readonly timestamp: number;
}

/**
 * Fired after every successful edit.
 */
export interface EditEvent extends TextBlockEvent {
  readonly type: 'edit';
  readonly result: EditResult;
  /**
   * Lines [start, end) whose reported widths may differ from before the
   * edit: the inserted and re-pointed lines, plus the full runs of every
   * width tracker whose maximum changed.
   */
  readonly affectedRange: readonly [number, number];
}

/**
 * Fired after the line order was reversed.
 */
export interface ReverseEvent extends TextBlockEvent {
  readonly type: 'reverse';
  /** Number of lines in the block */
  readonly length: number;
}

/**
 * Event type to event mapping.
 */
export interface TextBlockEventMap {
  'edit': EditEvent;
  'reverse': ReverseEvent;
}

// =============================================================================
// Event Handler Types
// =============================================================================

/**
 * Handler function for a specific event type.
 */
export type EventHandler<T extends TextBlockEvent> = (event: T) => void;

/**
 * Unsubscribe function returned by addEventListener.
 */
export type Unsubscribe = () => void;

type HandlerSets = {
  [K in keyof TextBlockEventMap]: Set<EventHandler<TextBlockEventMap[K]>>;
};

// =============================================================================
// Event Emitter
// =============================================================================

/**
 * Type-safe pub/sub for text block events.
 */
export interface TextBlockEventEmitter {
  /**
   * Add an event listener for a specific event type.
   * @returns Unsubscribe function
   */
  addEventListener<K extends keyof TextBlockEventMap>(
    type: K,
    handler: EventHandler<TextBlockEventMap[K]>
  ): Unsubscribe;

  removeEventListener<K extends keyof TextBlockEventMap>(
    type: K,
    handler: EventHandler<TextBlockEventMap[K]>
  ): void;

  /**
   * Emit an event to all registered handlers.
   * A throwing handler is logged and does not stop the others.
   */
  emit<K extends keyof TextBlockEventMap>(
    type: K,
    event: TextBlockEventMap[K]
  ): void;

  /**
   * True if at least one handler is registered for `type`.
   */
  hasListeners(type: keyof TextBlockEventMap): boolean;

  removeAllListeners(): void;
}

/**
 * Create a new text block event emitter.
 */
export function createTextBlockEventEmitter(): TextBlockEventEmitter {
  const handlers: HandlerSets = {
    'edit': new Set(),
    'reverse': new Set(),
  };

  return {
    addEventListener<K extends keyof TextBlockEventMap>(
      type: K,
      handler: EventHandler<TextBlockEventMap[K]>
    ): Unsubscribe {
      const typeHandlers: Set<EventHandler<TextBlockEventMap[K]>> = handlers[type];
      typeHandlers.add(handler);
      return () => {
        typeHandlers.delete(handler);
      };
    },

    removeEventListener<K extends keyof TextBlockEventMap>(
      type: K,
      handler: EventHandler<TextBlockEventMap[K]>
    ): void {
      const typeHandlers: Set<EventHandler<TextBlockEventMap[K]>> = handlers[type];
      typeHandlers.delete(handler);
    },

    emit<K extends keyof TextBlockEventMap>(
      type: K,
      event: TextBlockEventMap[K]
    ): void {
      const typeHandlers: Set<EventHandler<TextBlockEventMap[K]>> = handlers[type];
      for (const handler of [...typeHandlers]) {
        try {
          handler(event);
        } catch (error) {
          // Don't let one handler's error affect others
          console.error(`Event handler error for '${type}':`, error);
        }
      }
    },

    hasListeners(type: keyof TextBlockEventMap): boolean {
      return handlers[type].size > 0;
    },

    removeAllListeners(): void {
      handlers['edit'].clear();
      handlers['reverse'].clear();
    },
  };
}

// =============================================================================
// Event Helpers
// =============================================================================

/**
 * Create an edit event.
 */
export function createEditEvent(
  result: EditResult,
  affectedRange: readonly [number, number]
): EditEvent {
  return Object.freeze({
    type: 'edit',
    timestamp: Date.now(),
    result,
    affectedRange,
  });
}

/**
 * Create a reverse event.
 */
export function createReverseEvent(length: number): ReverseEvent {
  return Object.freeze({
    type: 'reverse',
    timestamp: Date.now(),
    length,
  });
}
