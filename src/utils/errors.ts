/**
 * All errors in wordseed include properties to ensure they are both human-readable (i.e. `.message`) and
 * machine-readable (i.e. `.code`).
 *
 * The {@link isError | **isError**} function can be used to check the error `code` and provide a type guard for the
 * properties present on that error interface.
 */

import { version } from '../_version.js';

import { defineProperties } from './properties.js';

/**
 * An error may contain additional properties, but those must not conflict with any implicit properties.
 *
 * @category Utils
 */
export type ErrorInfo<T> = Omit<T, 'code' | 'name' | 'message' | 'shortMessage'> & { shortMessage?: string };

function stringify(value: unknown): string {
    if (value == null) {
        return 'null';
    }

    if (Array.isArray(value)) {
        return '[ ' + value.map(stringify).join(', ') + ' ]';
    }

    if (value instanceof Uint8Array) {
        const HEX = '0123456789abcdef';
        let result = '0x';
        for (let i = 0; i < value.length; i++) {
            result += HEX[value[i] >> 4];
            result += HEX[value[i] & 0xf];
        }
        return result;
    }

    switch (typeof value) {
        case 'boolean':
        case 'symbol':
        case 'number':
            return value.toString();
        case 'bigint':
            return BigInt(value).toString();
        case 'string':
            return JSON.stringify(value);
        case 'object': {
            const entries: Array<[string, unknown]> = Object.entries(value);
            entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
            return '{ ' + entries.map(([k, v]) => `${stringify(k)}: ${stringify(v)}`).join(', ') + ' }';
        }
    }

    return `[ COULD NOT SERIALIZE ]`;
}

/**
 * All errors emitted by wordseed have an **ErrorCode** to help identify and coalesce errors to simplify programmatic
 * analysis.
 *
 * **Generic Errors**
 *
 * **`"INVALID_ARGUMENT"`** - see {@link InvalidArgumentError | **InvalidArgumentError**}
 *
 * **Wordlist Errors**
 *
 * **`"INVALID_WORDLIST"`** - see {@link InvalidWordlistError | **InvalidWordlistError**}
 *
 * **`"CHUNK_SIZE_TOO_LARGE"`** - see {@link ChunkSizeTooLargeError | **ChunkSizeTooLargeError**}
 *
 * **`"UNKNOWN_WORD"`** - see {@link UnknownWordError | **UnknownWordError**}
 *
 * **`"INDEX_OUT_OF_RANGE"`** - see {@link IndexOutOfRangeError | **IndexOutOfRangeError**}
 *
 * **Bit Packing Errors**
 *
 * **`"NON_ASCII_BYTE"`** - see {@link NonAsciiByteError | **NonAsciiByteError**}
 *
 * **`"INDEX_OUT_OF_CHUNK_RANGE"`** - see {@link IndexOutOfChunkRangeError | **IndexOutOfChunkRangeError**}
 *
 * **`"INVALID_BIT_LENGTH"`** - see {@link InvalidBitLengthError | **InvalidBitLengthError**}
 *
 * **`"PADDING_EXCEEDS_LENGTH"`** - see {@link PaddingExceedsLengthError | **PaddingExceedsLengthError**}
 *
 * **Codec Errors**
 *
 * **`"NON_ASCII_INPUT"`** - see {@link NonAsciiInputError | **NonAsciiInputError**}
 *
 * **`"EMPTY_INPUT"`** - see {@link EmptyInputError | **EmptyInputError**}
 *
 * **`"ROUNDTRIP_VERIFICATION_FAILED"`** - see {@link RoundtripVerificationFailedError |
 * **RoundtripVerificationFailedError**}
 */
export type ErrorCode =
    // Generic Errors
    | 'INVALID_ARGUMENT'

    // Wordlist Errors
    | 'INVALID_WORDLIST'
    | 'CHUNK_SIZE_TOO_LARGE'
    | 'UNKNOWN_WORD'
    | 'INDEX_OUT_OF_RANGE'

    // Bit Packing Errors
    | 'NON_ASCII_BYTE'
    | 'INDEX_OUT_OF_CHUNK_RANGE'
    | 'INVALID_BIT_LENGTH'
    | 'PADDING_EXCEEDS_LENGTH'

    // Codec Errors
    | 'NON_ASCII_INPUT'
    | 'EMPTY_INPUT'
    | 'ROUNDTRIP_VERIFICATION_FAILED';

/**
 * All errors in wordseed include properties to assist in machine-readable errors.
 *
 * @category Utils
 */
export interface WordseedError<T extends ErrorCode = ErrorCode> extends Error {
    /**
     * The string error code.
     */
    code: T;

    /**
     * A short message describing the error, with minimal additional details.
     */
    shortMessage: string;

    /**
     * Any related error.
     */
    error?: Error;
}

// Generic Errors

/**
 * This Error indicates an incorrect type or value was passed to a function or method.
 *
 * @category Utils
 */
export interface InvalidArgumentError extends WordseedError<'INVALID_ARGUMENT'> {
    /**
     * The name of the argument.
     */
    argument: string;

    /**
     * The value that was provided.
     */
    value: unknown;
}

// Wordlist Errors

/**
 * This Error indicates the words supplied to build a wordlist cannot be used, either because too few unique words
 * remain or because one of them is empty, non-ASCII or contains whitespace.
 *
 * @category Utils
 */
export interface InvalidWordlistError extends WordseedError<'INVALID_WORDLIST'> {
    /**
     * The number of unique words, if the list was rejected for its size.
     */
    size?: number;

    /**
     * The offending word, if one was rejected.
     */
    word?: string;
}

/**
 * This Error indicates a manually selected chunk size needs more words than the wordlist holds.
 *
 * @category Utils
 */
export interface ChunkSizeTooLargeError extends WordseedError<'CHUNK_SIZE_TOO_LARGE'> {
    /**
     * The requested number of bits per word.
     */
    chunkSize: number;

    /**
     * The number of words available.
     */
    size: number;
}

/**
 * This Error indicates a word is not part of the wordlist. This is the usual result of a typo in a hand-copied
 * phrase.
 *
 * @category Utils
 */
export interface UnknownWordError extends WordseedError<'UNKNOWN_WORD'> {
    /**
     * The word which could not be found.
     */
    word: string;

    /**
     * The position of the word within the phrase, when known.
     */
    position?: number;
}

/**
 * This Error indicates a word index beyond the end of the wordlist.
 *
 * @category Utils
 */
export interface IndexOutOfRangeError extends WordseedError<'INDEX_OUT_OF_RANGE'> {
    index: number;
    size: number;
}

// Bit Packing Errors

/**
 * This Error indicates reconstructed data contains a byte outside the 7-bit ASCII range.
 *
 * @category Utils
 */
export interface NonAsciiByteError extends WordseedError<'NON_ASCII_BYTE'> {
    /**
     * The byte offset of the offending value.
     */
    offset: number;

    /**
     * The offending byte.
     */
    value: number;
}

/**
 * This Error indicates an index cannot be represented in the requested number of bits.
 *
 * @category Utils
 */
export interface IndexOutOfChunkRangeError extends WordseedError<'INDEX_OUT_OF_CHUNK_RANGE'> {
    index: number;
    chunkSize: number;
}

/**
 * This Error indicates a bit string whose length is not a multiple of the required unit.
 *
 * @category Utils
 */
export interface InvalidBitLengthError extends WordseedError<'INVALID_BIT_LENGTH'> {
    /**
     * The bit length found.
     */
    length: number;

    /**
     * The unit the length must be a multiple of.
     */
    multiple: number;
}

/**
 * This Error indicates more padding bits were requested to be removed than the bit string holds.
 *
 * @category Utils
 */
export interface PaddingExceedsLengthError extends WordseedError<'PADDING_EXCEEDS_LENGTH'> {
    padding: number;
    length: number;
}

// Codec Errors

/**
 * This Error indicates a seed contains a character outside the 7-bit ASCII range.
 *
 * @category Utils
 */
export interface NonAsciiInputError extends WordseedError<'NON_ASCII_INPUT'> {
    /**
     * The position of the offending character.
     */
    position: number;

    /**
     * The offending character.
     */
    character: string;

    /**
     * The part of the seed before the offending character, which converted successfully.
     */
    converted: string;
}

/**
 * This Error indicates a phrase with no words was supplied for decoding.
 *
 * @category Utils
 */
export interface EmptyInputError extends WordseedError<'EMPTY_INPUT'> {}

/**
 * This Error indicates that re-running a conversion in the opposite direction did not reproduce the input.
 *
 * For seeds this should never occur and signals a bug. For phrases it means the phrase is not one the encoder would
 * produce (for example an impossible padding word), and so cannot be trusted.
 *
 * @category Utils
 */
export interface RoundtripVerificationFailedError extends WordseedError<'ROUNDTRIP_VERIFICATION_FAILED'> {
    /**
     * The direction that was being verified.
     */
    operation: 'seedToHuman' | 'humanToSeed';

    /**
     * The original value.
     */
    expected: string;

    /**
     * The value produced by the round trip.
     */
    actual: string;
}

/**
 * A conditional type that transforms the {@link ErrorCode | **ErrorCode**} T into its WordseedError type.
 *
 * @category Utils
 */
export type CodedWordseedError<T> = T extends 'INVALID_ARGUMENT'
    ? InvalidArgumentError
    : T extends 'INVALID_WORDLIST'
      ? InvalidWordlistError
      : T extends 'CHUNK_SIZE_TOO_LARGE'
        ? ChunkSizeTooLargeError
        : T extends 'UNKNOWN_WORD'
          ? UnknownWordError
          : T extends 'INDEX_OUT_OF_RANGE'
            ? IndexOutOfRangeError
            : T extends 'NON_ASCII_BYTE'
              ? NonAsciiByteError
              : T extends 'INDEX_OUT_OF_CHUNK_RANGE'
                ? IndexOutOfChunkRangeError
                : T extends 'INVALID_BIT_LENGTH'
                  ? InvalidBitLengthError
                  : T extends 'PADDING_EXCEEDS_LENGTH'
                    ? PaddingExceedsLengthError
                    : T extends 'NON_ASCII_INPUT'
                      ? NonAsciiInputError
                      : T extends 'EMPTY_INPUT'
                        ? EmptyInputError
                        : T extends 'ROUNDTRIP_VERIFICATION_FAILED'
                          ? RoundtripVerificationFailedError
                          : never;

/**
 * Returns true if the `error` matches an error thrown by wordseed that matches the error `code`.
 *
 * In TypeScript environments, this can be used to check that `error` matches an WordseedError type, which means the
 * expected properties will be set.
 *
 * @category Utils
 * @example
 *
 * ```ts
 * try {
 *     codec.humanToSeed('apple pie');
 * } catch (e) {
 *     if (isError(e, 'UNKNOWN_WORD')) {
 *         console.log(e.word);
 *     }
 * }
 * ```
 *
 * @see [ErrorCodes](api:ErrorCode)
 */
export function isError<K extends ErrorCode, T extends CodedWordseedError<K>>(error: unknown, code: K): error is T {
    return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Returns true if `error` is any error thrown by wordseed.
 *
 * @category Utils
 */
export function isWordseedError(error: unknown): error is WordseedError {
    return error instanceof Error && 'code' in error && typeof error.code === 'string' && 'shortMessage' in error;
}

/**
 * Returns a new Error configured to the format wordseed emits errors, with the `message`,
 * {@link ErrorCode | **ErrorCode**} `code` and additional properties for the corresponding WordseedError.
 *
 * Each error in wordseed includes the version of wordseed, a machine-readable {@link ErrorCode | **ErrorCode**}, and
 * depending on `code`, additional required properties. The error message will also include the `message`, wordseed
 * version, `code` and all additional properties, serialized.
 *
 * @category Utils
 * @param {string} message - The error message.
 * @param {ErrorCode} code - The error code.
 * @param {ErrorInfo<T>} [info] - Additional properties for the error.
 * @returns {T} The new error.
 */
export function makeError<K extends ErrorCode, T extends CodedWordseedError<K>>(
    message: string,
    code: K,
    info?: ErrorInfo<T>,
): T {
    const shortMessage = message;

    {
        const details: Array<string> = [];
        if (info) {
            if ('message' in info || 'code' in info || 'name' in info) {
                throw new Error(`value will overwrite populated values: ${stringify(info)}`);
            }
            for (const [key, value] of Object.entries(info)) {
                if (key === 'shortMessage') {
                    continue;
                }
                details.push(key + '=' + stringify(value));
            }
        }
        details.push(`code=${code}`);
        details.push(`version=${version}`);

        if (details.length) {
            message += ' (' + details.join(', ') + ')';
        }
    }

    let error: Error;
    switch (code) {
        case 'INVALID_ARGUMENT':
            error = new TypeError(message);
            break;
        case 'INDEX_OUT_OF_RANGE':
        case 'INDEX_OUT_OF_CHUNK_RANGE':
        case 'PADDING_EXCEEDS_LENGTH':
            error = new RangeError(message);
            break;
        default:
            error = new Error(message);
    }

    defineProperties<WordseedError>(<WordseedError>error, { code });

    if (info) {
        Object.assign(error, info);
    }

    if (!('shortMessage' in error)) {
        defineProperties<WordseedError>(<WordseedError>error, { shortMessage });
    }

    return <T>error;
}

/**
 * Throws a WordseedError with `message`, `code` and additional error `info` when `check` is falsish.
 *
 * @category Utils
 * @param {unknown} check - The value to check.
 * @param {string} message - The error message.
 * @param {ErrorCode} code - The error code.
 * @param {ErrorInfo<T>} [info] - Additional properties for the error.
 * @throws {T} Throws the error if `check` is falsish.
 */
export function assert<K extends ErrorCode, T extends CodedWordseedError<K>>(
    check: unknown,
    message: string,
    code: K,
    info?: ErrorInfo<T>,
): asserts check {
    if (!check) {
        throw makeError(message, code, info);
    }
}

/**
 * Throws an {@link InvalidArgumentError} unless an argument meets its constraints.
 *
 * In TypeScript environments, the `check` has been asserted true, so any further code does not need additional
 * compile-time checks.
 *
 * @category Utils
 * @param {unknown} check - The value to check.
 * @param {string} message - The error message.
 * @param {string} name - The name of the argument.
 * @param {unknown} value - The value of the argument.
 * @throws {InvalidArgumentError} Throws if `check` is falsish.
 */
export function assertArgument(check: unknown, message: string, name: string, value: unknown): asserts check {
    assert(check, message, 'INVALID_ARGUMENT', { argument: name, value: value });
}

/**
 * Throws if the private `givenGuard` does not match `guard`, which prevents a class from being constructed directly.
 *
 * @ignore
 */
export function assertPrivate(givenGuard: unknown, guard: unknown, className?: string): void {
    if (className == null) {
        className = '';
    }
    if (givenGuard !== guard) {
        let method = className,
            operation = 'new';
        if (className) {
            method += '.';
            operation += ' ' + className;
        }
        assertArgument(false, `private constructor; use ${method}from* methods`, 'guard', operation);
    }
}
