/**
 * Diff Engine
 *
 * Compares the reconstructed state of a space at two instants.
 */

import type { Anchor, Metadata, Transform } from '@anchorlog/shared-types';
import {
  distanceBetween,
  transformPosition,
  transformsEqual,
  type Position,
} from '../models/anchor.js';
import { metadataEquals, metadataValueEquals } from '../models/metadata.js';
import type { Timeline } from './timeline.js';

export class MovedAnchor {
  constructor(
    /** State at the `to` instant */
    readonly anchor: Anchor,
    /** Transform at the `from` instant */
    readonly previousTransform: Transform
  ) {}

  get previousPosition(): Position {
    return transformPosition(this.previousTransform);
  }

  get currentPosition(): Position {
    return transformPosition(this.anchor.transform);
  }

  get distanceMoved(): number {
    return distanceBetween(this.previousPosition, this.currentPosition);
  }
}

export class UpdatedAnchor {
  constructor(
    readonly anchor: Anchor,
    readonly previousMetadata: Metadata
  ) {}

  get addedKeys(): Set<string> {
    return new Set(Object.keys(this.anchor.metadata).filter((key) => !(key in this.previousMetadata)));
  }

  get removedKeys(): Set<string> {
    return new Set(Object.keys(this.previousMetadata).filter((key) => !(key in this.anchor.metadata)));
  }

  get changedKeys(): Set<string> {
    const changed = new Set<string>();
    for (const [key, current] of Object.entries(this.anchor.metadata)) {
      const previous = this.previousMetadata[key];
      if (previous !== undefined && !metadataValueEquals(previous, current)) {
        changed.add(key);
      }
    }
    return changed;
  }
}

export interface AnchorDiffInit {
  spaceId: string;
  fromDate: Date;
  toDate: Date;
  added?: Anchor[];
  removed?: Anchor[];
  moved?: MovedAnchor[];
  updated?: UpdatedAnchor[];
  unchanged?: Anchor[];
}

export class AnchorDiff {
  readonly spaceId: string;
  readonly fromDate: Date;
  readonly toDate: Date;
  readonly added: readonly Anchor[];
  readonly removed: readonly Anchor[];
  readonly moved: readonly MovedAnchor[];
  readonly updated: readonly UpdatedAnchor[];
  readonly unchanged: readonly Anchor[];

  constructor(init: AnchorDiffInit) {
    this.spaceId = init.spaceId;
    this.fromDate = init.fromDate;
    this.toDate = init.toDate;
    this.added = init.added ?? [];
    this.removed = init.removed ?? [];
    this.moved = init.moved ?? [];
    this.updated = init.updated ?? [];
    this.unchanged = init.unchanged ?? [];
  }

  get changeCount(): number {
    return this.added.length + this.removed.length + this.moved.length + this.updated.length;
  }

  get hasChanges(): boolean {
    return this.changeCount > 0;
  }

  /** Anchors present at `toDate` */
  get currentAnchors(): Anchor[] {
    return [
      ...this.added,
      ...this.moved.map((entry) => entry.anchor),
      ...this.updated.map((entry) => entry.anchor),
      ...this.unchanged,
    ];
  }

  /** Anchors present at `fromDate`, in their `toDate` state where they survive */
  get previousAnchors(): Anchor[] {
    return [
      ...this.removed,
      ...this.moved.map((entry) => entry.anchor),
      ...this.updated.map((entry) => entry.anchor),
      ...this.unchanged,
    ];
  }

  /** e.g. "1 added, 2 moved" */
  get summary(): string {
    const parts: string[] = [];
    if (this.added.length > 0) parts.push(`${this.added.length} added`);
    if (this.removed.length > 0) parts.push(`${this.removed.length} removed`);
    if (this.moved.length > 0) parts.push(`${this.moved.length} moved`);
    if (this.updated.length > 0) parts.push(`${this.updated.length} updated`);
    return parts.length > 0 ? parts.join(', ') : 'No changes';
  }
}

/**
 * Diff the timeline between two instants. A transform change classifies an
 * anchor as moved even when its metadata also changed.
 */
export function computeDiff(timeline: Timeline, from: Date, to: Date): AnchorDiff {
  const fromState = new Map(timeline.state(from).map((anchor) => [anchor.id, anchor]));
  const toState = timeline.state(to);

  const added: Anchor[] = [];
  const moved: MovedAnchor[] = [];
  const updated: UpdatedAnchor[] = [];
  const unchanged: Anchor[] = [];
  const seen = new Set<string>();

  for (const current of toState) {
    seen.add(current.id);
    const previous = fromState.get(current.id);

    if (!previous) {
      added.push(current);
    } else if (!transformsEqual(previous.transform, current.transform)) {
      moved.push(new MovedAnchor(current, previous.transform));
    } else if (!metadataEquals(previous.metadata, current.metadata)) {
      updated.push(new UpdatedAnchor(current, previous.metadata));
    } else {
      unchanged.push(current);
    }
  }

  const removed = [...fromState.values()].filter((anchor) => !seen.has(anchor.id));

  return new AnchorDiff({
    spaceId: timeline.spaceId,
    fromDate: from,
    toDate: to,
    added,
    removed,
    moved,
    updated,
    unchanged,
  });
}
