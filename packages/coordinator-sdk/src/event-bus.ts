/**
 * CoordinatorEventBus — typed pub/sub for passive observers.
 *
 * Observers never affect execution flow. A throwing listener is isolated
 * from the others and from the engine.
 */

import type { CoordinatorEvent, CoordinatorEventType } from '@taskloom/coordinator-contracts';

export type Unsubscribe = () => void;

export type CoordinatorEventOf<T extends CoordinatorEventType> = Extract<CoordinatorEvent, { type: T }>;

export interface CoordinatorEventBus {
  emit(event: CoordinatorEvent): void;

  /** Subscribe to one event type */
  on<T extends CoordinatorEventType>(type: T, listener: (event: CoordinatorEventOf<T>) => void): Unsubscribe;

  /** Subscribe to every event */
  onAny(listener: (event: CoordinatorEvent) => void): Unsubscribe;

  clear(): void;
}
