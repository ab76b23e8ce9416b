/**
 * Timeline
 *
 * A space's events in timestamp order, with state reconstruction at any
 * instant. Derived from the event log and never persisted.
 */

import type { Anchor, AnchorEvent, AnchorEventType } from '@anchorlog/shared-types';
import { sortByTimestamp } from '../models/event.js';
import { AnchorDiff, computeDiff } from './diff.js';
import { applyEvent, stateToAnchor, type AnchorState } from './reconstruct.js';

export interface ScrubberOptions {
  from?: Date;
  to?: Date;
  steps?: number;
}

const DEFAULT_SCRUBBER_STEPS = 100;

function utcDayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class Timeline {
  readonly spaceId: string;
  readonly events: readonly AnchorEvent[];

  constructor(spaceId: string, events: readonly AnchorEvent[]) {
    this.spaceId = spaceId;
    this.events = sortByTimestamp(events);
  }

  // ============================================================================
  // Bounds
  // ============================================================================

  get startDate(): Date | undefined {
    return this.events[0]?.timestamp;
  }

  get endDate(): Date | undefined {
    return this.events[this.events.length - 1]?.timestamp;
  }

  /** Milliseconds between the first and last event */
  get durationMs(): number | undefined {
    const { startDate, endDate } = this;
    if (!startDate || !endDate) return undefined;
    return endDate.getTime() - startDate.getTime();
  }

  // ============================================================================
  // Queries
  // ============================================================================

  get anchorIds(): Set<string> {
    return new Set(this.events.map((event) => event.anchorId));
  }

  eventsFor(anchorId: string): AnchorEvent[] {
    return this.events.filter((event) => event.anchorId === anchorId);
  }

  /** Events with `from <= timestamp <= to` */
  eventsBetween(from: Date, to: Date): AnchorEvent[] {
    const start = from.getTime();
    const end = to.getTime();
    return this.events.filter((event) => {
      const time = event.timestamp.getTime();
      return time >= start && time <= end;
    });
  }

  eventsOfType(type: AnchorEventType): AnchorEvent[] {
    return this.events.filter((event) => event.type === type);
  }

  // ============================================================================
  // State
  // ============================================================================

  /**
   * Active anchors as of `at`, folding every event with `timestamp <= at`.
   * Anchors appear in the order they were created.
   */
  state(at: Date): Anchor[] {
    const cutoff = at.getTime();
    const states = new Map<string, AnchorState>();

    for (const event of this.events) {
      if (event.timestamp.getTime() > cutoff) {
        break;
      }
      const next = applyEvent(states.get(event.anchorId), event);
      if (next) {
        states.set(event.anchorId, next);
      }
    }

    return [...states.values()]
      .filter((state) => state.deletedAt === undefined)
      .map(stateToAnchor);
  }

  diff(from: Date, to: Date): AnchorDiff {
    return computeDiff(this, from, to);
  }

  // ============================================================================
  // Scrubbing
  // ============================================================================

  /**
   * Evenly spaced dates between `from` and `to` (defaulting to the timeline
   * bounds). A single date when the range is empty or `steps <= 1`.
   */
  scrubberDates(options: ScrubberOptions = {}): Date[] {
    const now = new Date();
    const start = options.from ?? this.startDate ?? now;
    const end = options.to ?? this.endDate ?? now;
    const steps = options.steps ?? DEFAULT_SCRUBBER_STEPS;

    if (start.getTime() >= end.getTime() || steps <= 1) {
      return [start];
    }

    const interval = (end.getTime() - start.getTime()) / (steps - 1);
    return Array.from({ length: steps }, (_, i) => new Date(start.getTime() + interval * i));
  }

  /** Earliest event among those nearest to `date` */
  closestEvent(date: Date): AnchorEvent | undefined {
    let closest: AnchorEvent | undefined;
    let closestDistance = Number.POSITIVE_INFINITY;

    for (const event of this.events) {
      const distance = Math.abs(event.timestamp.getTime() - date.getTime());
      if (distance < closestDistance) {
        closest = event;
        closestDistance = distance;
      }
    }

    return closest;
  }

  /** Timestamp of the first event on each UTC day */
  get significantDates(): Date[] {
    const seen = new Set<string>();
    const result: Date[] = [];

    for (const event of this.events) {
      const key = utcDayKey(event.timestamp);
      if (!seen.has(key)) {
        seen.add(key);
        result.push(event.timestamp);
      }
    }

    return result;
  }
}
