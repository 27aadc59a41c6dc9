// VERSION
export { version } from './_version.js';

// ENCODING
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
    toAsciiBytes,
    toAsciiString,
    isAscii,
} from './encoding/index.js';

// SEED
export { SeedCodec } from './seed/index.js';

// UTILS
export {
    isError,
    isWordseedError,
    assert,
    assertArgument,
    makeError,
    defineProperties,
    createLogger,
    resolveLogLevel,
    silentLogger,
} from './utils/index.js';

// WORDLISTS
export { Wordlist, WordlistIndex, LangEn, loadWordlist, parseWordlist } from './wordlists/index.js';

/////////////////////////////
// Types

// ENCODING
export type { BitString, PaddedBits } from './encoding/index.js';

// SEED
export type { SeedCodecOptions, ConvertOptions } from './seed/index.js';

// UTILS
export type {
    ErrorCode,
    ErrorInfo,
    WordseedError,
    CodedWordseedError,
    InvalidArgumentError,
    InvalidWordlistError,
    ChunkSizeTooLargeError,
    UnknownWordError,
    IndexOutOfRangeError,
    NonAsciiByteError,
    IndexOutOfChunkRangeError,
    InvalidBitLengthError,
    PaddingExceedsLengthError,
    NonAsciiInputError,
    EmptyInputError,
    RoundtripVerificationFailedError,
    Logger,
    LoggerOptions,
} from './utils/index.js';

// WORDLISTS
export type { WordlistIndexOptions } from './wordlists/index.js';
