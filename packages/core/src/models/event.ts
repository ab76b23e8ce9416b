/**
 * Anchor event factories
 *
 * Each factory captures the fields its event type carries: `created` and
 * `restored` carry transform and metadata, `moved` the transform, `updated`
 * the metadata, `deleted` neither.
 */

import { randomUUID } from 'node:crypto';
import type { Anchor, AnchorEvent, AnchorEventType } from '@anchorlog/shared-types';

export interface EventOptions {
  timestamp?: Date;
  actorId?: string;
}

function baseEvent(
  anchor: Anchor,
  type: AnchorEventType,
  version: number,
  options: EventOptions
): AnchorEvent {
  return {
    id: randomUUID(),
    anchorId: anchor.id,
    spaceId: anchor.spaceId,
    type,
    timestamp: options.timestamp ?? new Date(),
    version,
    ...(options.actorId !== undefined ? { actorId: options.actorId } : {}),
  };
}

export function createdEvent(anchor: Anchor, options: EventOptions = {}): AnchorEvent {
  return {
    ...baseEvent(anchor, 'created', 1, options),
    transform: anchor.transform,
    metadata: anchor.metadata,
  };
}

export function movedEvent(anchor: Anchor, previousVersion: number, options: EventOptions = {}): AnchorEvent {
  return { ...baseEvent(anchor, 'moved', previousVersion + 1, options), transform: anchor.transform };
}

export function updatedEvent(anchor: Anchor, previousVersion: number, options: EventOptions = {}): AnchorEvent {
  return { ...baseEvent(anchor, 'updated', previousVersion + 1, options), metadata: anchor.metadata };
}

export function deletedEvent(anchor: Anchor, previousVersion: number, options: EventOptions = {}): AnchorEvent {
  return baseEvent(anchor, 'deleted', previousVersion + 1, options);
}

export function restoredEvent(anchor: Anchor, previousVersion: number, options: EventOptions = {}): AnchorEvent {
  return {
    ...baseEvent(anchor, 'restored', previousVersion + 1, options),
    transform: anchor.transform,
    metadata: anchor.metadata,
  };
}

/** False only for `deleted` */
export function isActiveState(event: AnchorEvent): boolean {
  return event.type !== 'deleted';
}

/**
 * Order events by timestamp. Array.prototype.sort is stable, so ties keep
 * insertion order.
 */
export function sortByTimestamp(events: readonly AnchorEvent[]): AnchorEvent[] {
  return [...events].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

export function sortByVersion(events: readonly AnchorEvent[]): AnchorEvent[] {
  return [...events].sort((a, b) => a.version - b.version);
}
