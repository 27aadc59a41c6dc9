export { toAsciiBytes, toAsciiString, isAscii } from './ascii.js';
export {
    MaxChunkSize,
    bytesToBits,
    bitsToBytes,
    padToMultiple,
    splitChunks,
    concatBits,
    chunkToIndex,
    indexToChunk,
    removePadding,
    formatBits,
} from './bits.js';

// Types
export type { BitString, PaddedBits } from './bits.js';
