/**
 * Event Types for the tracking database
 *
 * Repositories announce every row change on `data`, every join-row change
 * on `link` and every ownership mismatch found during get-or-create on
 * `ownership:conflict`.
 */

import type { LinkTable, TableName } from '../types';
import type { OwnershipConflict } from '../errors';

/**
 * Base event payload interface
 */
export interface BaseEventPayload {
  /** ISO timestamp of when the event occurred */
  timestamp: string;
}

export type DataChangeType = 'created' | 'updated' | 'deleted';

/**
 * A row was inserted, updated or hard-deleted
 */
export interface DataChangeEvent extends BaseEventPayload {
  table: TableName;
  type: DataChangeType;
  id: number;
}

/**
 * A join row was added or removed
 */
export interface LinkChangeEvent extends BaseEventPayload {
  link: LinkTable;
  type: 'linked' | 'unlinked';
  leftId: number;
  rightId: number;
}

/**
 * A get-or-create call matched a record owned by another parent.
 * The existing record was returned unchanged.
 */
export interface OwnershipConflictEvent extends BaseEventPayload {
  conflict: OwnershipConflict;
}

/**
 * Maps event names to their payload types
 */
export interface TrackingEvents {
  data: DataChangeEvent;
  link: LinkChangeEvent;
  'ownership:conflict': OwnershipConflictEvent;
}

/**
 * Union type of all event names
 */
export type TrackingEventName = keyof TrackingEvents;

/**
 * Helper type to get the payload type for a specific event
 */
export type EventPayload<E extends TrackingEventName> = TrackingEvents[E];

/**
 * Event listener function type
 */
export type EventListener<E extends TrackingEventName> = (payload: TrackingEvents[E]) => void;

/**
 * Helper function to create a timestamp for events
 */
export function createEventTimestamp(): string {
  return new Date().toISOString();
}
