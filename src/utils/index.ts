/**
 * Small utilities shared across the library: coded errors, read-only properties and logging.
 */

export { isError, isWordseedError, assert, assertArgument, assertPrivate, makeError } from './errors.js';

export { defineProperties } from './properties.js';

export { createLogger, resolveLogLevel, silentLogger } from './logger.js';

/////////////////////////////
// Types

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
} from './errors.js';

export type { Logger, LoggerOptions } from './logger.js';
