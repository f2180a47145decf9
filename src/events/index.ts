/**
 * Events Module - tracking database event bus
 *
 * @example
 * ```typescript
 * import { eventBus } from './events';
 *
 * eventBus.on('data', ({ table, type, id }) => {
 *   console.log(`${table} ${id} ${type}`);
 * });
 * ```
 */

export {
  TypedEventEmitter,
  eventBus,
  getEventBus,
  resetEventBus,
} from './event-bus';

export type {
  BaseEventPayload,
  DataChangeType,
  DataChangeEvent,
  LinkChangeEvent,
  OwnershipConflictEvent,
  TrackingEvents,
  TrackingEventName,
  EventPayload,
  EventListener,
} from './types';

export { createEventTimestamp } from './types';
