export * from './metadata.js';
export * from './anchor.js';
export * from './space.js';
export * from './event.js';
export * from './payload-codec.js';
