/**
 * Event folding
 *
 * Shared by the timeline (all anchors of a space at an instant) and by
 * rollback (one anchor up to a version).
 */

import type { Anchor, AnchorEvent, Metadata, Transform } from '@anchorlog/shared-types';
import { IDENTITY_TRANSFORM } from '../models/anchor.js';
import { sortByVersion } from '../models/event.js';
import { ReconstructionFailedError } from '../utils/errors.js';

export interface AnchorState {
  id: string;
  spaceId: string;
  transform: Transform;
  metadata: Metadata;
  createdAt: Date;
  updatedAt: Date;
  deletedAt?: Date;
}

/**
 * Apply one event to the running state of its anchor. Returns the new state,
 * or `undefined` when the anchor has no state yet and the event is not
 * `created`.
 */
export function applyEvent(state: AnchorState | undefined, event: AnchorEvent): AnchorState | undefined {
  if (event.type === 'created') {
    return {
      id: event.anchorId,
      spaceId: event.spaceId,
      transform: event.transform ?? IDENTITY_TRANSFORM,
      metadata: event.metadata ?? {},
      createdAt: event.timestamp,
      updatedAt: event.timestamp,
    };
  }

  if (!state) {
    return undefined;
  }

  switch (event.type) {
    case 'moved':
      return { ...state, transform: event.transform ?? state.transform, updatedAt: event.timestamp };
    case 'updated':
      return { ...state, metadata: event.metadata ?? state.metadata, updatedAt: event.timestamp };
    case 'deleted':
      return { ...state, deletedAt: event.timestamp, updatedAt: event.timestamp };
    case 'restored':
      return {
        id: state.id,
        spaceId: state.spaceId,
        transform: event.transform ?? state.transform,
        metadata: event.metadata ?? state.metadata,
        createdAt: state.createdAt,
        updatedAt: event.timestamp,
      };
  }
}

export function stateToAnchor(state: AnchorState): Anchor {
  return {
    id: state.id,
    spaceId: state.spaceId,
    transform: state.transform,
    metadata: state.metadata,
    createdAt: state.createdAt,
    updatedAt: state.updatedAt,
    ...(state.deletedAt !== undefined ? { deletedAt: state.deletedAt } : {}),
  };
}

/**
 * Rebuild one anchor from its events, folded in version order. The first
 * event must be `created`.
 */
export function reconstructAnchor(anchorId: string, events: readonly AnchorEvent[]): Anchor {
  const ordered = sortByVersion(events.filter((event) => event.anchorId === anchorId));
  const first = ordered[0];

  if (!first) {
    throw new ReconstructionFailedError(anchorId, 'no events');
  }
  if (first.type !== 'created') {
    throw new ReconstructionFailedError(anchorId, `first event is '${first.type}', expected 'created'`);
  }

  let state: AnchorState | undefined;
  for (const event of ordered) {
    state = applyEvent(state, event);
  }

  if (!state) {
    throw new ReconstructionFailedError(anchorId, 'no state after folding events');
  }

  return stateToAnchor(state);
}
