/**
 * In-process event emitter for coordinator events
 */

import type { CoordinatorEvent, CoordinatorEventType } from '@taskloom/coordinator-contracts';
import type { CoordinatorEventBus, CoordinatorEventOf, CoordinatorLogger, Unsubscribe } from '@taskloom/coordinator-sdk';

type Listener = (event: CoordinatorEvent) => void;

/** A coordinator event without its timestamp */
export type UnstampedEvent = CoordinatorEvent extends infer E
  ? E extends CoordinatorEvent
    ? Omit<E, 'timestamp'>
    : never
  : never;

export function isEventOf<T extends CoordinatorEventType>(event: CoordinatorEvent, type: T): event is CoordinatorEventOf<T> {
  return event.type === type;
}

/**
 * Create a new event emitter. A throwing listener is logged and skipped.
 */
export function createEventEmitter(logger?: CoordinatorLogger): CoordinatorEventBus {
  const listeners: Set<Listener> = new Set();
  const typeListeners: Map<CoordinatorEventType, Set<Listener>> = new Map();
  const log = logger?.child({ component: 'event-emitter' });

  const notify = (callback: Listener, event: CoordinatorEvent): void => {
    try {
      callback(event);
    } catch (error) {
      log?.error('Event listener failed', error, { type: event.type, taskId: event.taskId });
    }
  };

  return {
    emit(event: CoordinatorEvent): void {
      for (const callback of [...listeners]) {
        notify(callback, event);
      }
      const typeCallbacks = typeListeners.get(event.type);
      if (typeCallbacks) {
        for (const callback of [...typeCallbacks]) {
          notify(callback, event);
        }
      }
    },

    on<T extends CoordinatorEventType>(type: T, listener: (event: CoordinatorEventOf<T>) => void): Unsubscribe {
      const wrapped: Listener = (event) => {
        if (isEventOf(event, type)) {
          listener(event);
        }
      };
      let callbacks = typeListeners.get(type);
      if (!callbacks) {
        callbacks = new Set();
        typeListeners.set(type, callbacks);
      }
      callbacks.add(wrapped);
      return () => {
        typeListeners.get(type)?.delete(wrapped);
      };
    },

    onAny(listener: Listener): Unsubscribe {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    clear(): void {
      listeners.clear();
      typeListeners.clear();
    },
  };
}

/**
 * Add the current timestamp to an event
 */
export function stampEvent(event: UnstampedEvent): CoordinatorEvent {
  return { ...event, timestamp: new Date().toISOString() };
}
