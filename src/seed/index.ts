/**
 * Conversion between ASCII seeds and phrases of words.
 */
export { SeedCodec } from './seed-codec.js';

export type { SeedCodecOptions, ConvertOptions } from './seed-codec.js';
