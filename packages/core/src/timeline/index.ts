export { Timeline, type ScrubberOptions } from './timeline.js';
export { AnchorDiff, MovedAnchor, UpdatedAnchor, computeDiff, type AnchorDiffInit } from './diff.js';
export { applyEvent, reconstructAnchor, stateToAnchor, type AnchorState } from './reconstruct.js';
