export { compress, decompress, MIN_OUTPUT_BOUND, type DecompressOptions } from './codec.js';
