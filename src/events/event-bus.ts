/**
 * TypedEventEmitter - type-safe event bus for the tracking database
 *
 * Wraps Node.js EventEmitter so listeners and emitters agree on the
 * payload of each event at compile time.
 */

import { EventEmitter } from 'events';
import type {
  TrackingEventName,
  EventListener,
  EventPayload,
} from './types';

/**
 * @example
 * ```typescript
 * const bus = new TypedEventEmitter();
 *
 * bus.on('ownership:conflict', ({ conflict }) => {
 *   console.log(conflict.message);
 * });
 * ```
 */
export class TypedEventEmitter {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
  }

  /**
   * Subscribe to an event
   */
  on<E extends TrackingEventName>(event: E, listener: EventListener<E>): this {
    this.emitter.on(event, listener);
    return this;
  }

  /**
   * Subscribe to the next occurrence of an event only
   */
  once<E extends TrackingEventName>(event: E, listener: EventListener<E>): this {
    this.emitter.once(event, listener);
    return this;
  }

  /**
   * Unsubscribe a listener from an event
   */
  off<E extends TrackingEventName>(event: E, listener: EventListener<E>): this {
    this.emitter.off(event, listener);
    return this;
  }

  /**
   * Emit an event with a type-safe payload
   *
   * @returns True if the event had listeners
   */
  emit<E extends TrackingEventName>(event: E, payload: EventPayload<E>): boolean {
    return this.emitter.emit(event, payload);
  }

  /**
   * Remove all listeners for a specific event or all events
   */
  removeAllListeners(event?: TrackingEventName): this {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }

  listenerCount(event: TrackingEventName): number {
    return this.emitter.listenerCount(event);
  }
}

// =============================================================================
// Singleton Event Bus Instance
// =============================================================================

let eventBusInstance: TypedEventEmitter | null = null;

/**
 * Get the singleton event bus instance
 * Creates the instance on first call
 */
export function getEventBus(): TypedEventEmitter {
  if (!eventBusInstance) {
    eventBusInstance = new TypedEventEmitter();
  }
  return eventBusInstance;
}

/**
 * Remove every listener from the singleton (useful for testing)
 *
 * The instance itself is kept so modules holding `eventBus` stay wired.
 */
export function resetEventBus(): void {
  getEventBus().removeAllListeners();
}

/**
 * The global event bus singleton
 */
export const eventBus = getEventBus();
