import { toAsciiBytes, toAsciiString } from '../encoding/ascii.js';
import {
    bitsToBytes,
    bytesToBits,
    chunkToIndex,
    concatBits,
    formatBits,
    indexToChunk,
    padToMultiple,
    removePadding,
    splitChunks,
} from '../encoding/bits.js';
import { assert, assertArgument, makeError } from '../utils/errors.js';
import { createLogger, silentLogger } from '../utils/logger.js';
import { defineProperties } from '../utils/properties.js';
import { LangEn } from '../wordlists/lang-en.js';
import { WordlistIndex } from '../wordlists/wordlist-index.js';

import type { Logger } from '../utils/logger.js';

/**
 * Options for creating a {@link SeedCodec | **SeedCodec**}.
 *
 * @category Seed
 */
export interface SeedCodecOptions {
    /**
     * The words to encode with, either a prepared index or a list of words. Defaults to the
     * {@link LangEn | **English wordlist**}.
     */
    wordlist?: WordlistIndex | ReadonlyArray<string>;

    /**
     * Bits per word. Defaults to the largest size the wordlist supports.
     */
    chunkSize?: number;

    /**
     * Accept words regardless of case when decoding.
     */
    ignoreCase?: boolean;

    /**
     * Log each chunk of every conversion at `debug` level to stderr. Ignored when a `logger` is given.
     */
    verbose?: boolean;

    /**
     * The logger to write diagnostics to.
     */
    logger?: Logger;
}

/**
 * Options for a single conversion.
 *
 * @category Seed
 */
export interface ConvertOptions {
    /**
     * Skip converting the result back and comparing it with the input.
     */
    skipCheck?: boolean;
}

interface DecodedWords {
    seed: string;
    indices: Array<number>;
}

function resolveWordlist(options: SeedCodecOptions): WordlistIndex {
    const { wordlist, ignoreCase } = options;

    if (wordlist == null) {
        return LangEn.wordlist(ignoreCase);
    }

    if (wordlist instanceof WordlistIndex) {
        if (ignoreCase && !wordlist.ignoreCase) {
            return WordlistIndex.build(wordlist.words, { locale: wordlist.locale, ignoreCase: true });
        }
        return wordlist;
    }

    assertArgument(Array.isArray(wordlist), 'invalid wordlist', 'options.wordlist', wordlist);
    return WordlistIndex.build(wordlist, { ignoreCase });
}

/**
 * A **SeedCodec** turns an ASCII seed into a phrase of words and back.
 *
 * The seed's bits are cut into chunks of {@link SeedCodec.chunkSize | **chunkSize**} bits, zero-padded at the end,
 * and each chunk becomes the word at that index. The first word of a phrase records how many padding bits were
 * added.
 *
 * Every conversion is checked by converting its result back; pass `skipCheck` to avoid the extra work.
 *
 * @category Seed
 * @example
 *
 * ```ts
 * const codec = new SeedCodec({ wordlist: ['ant', 'bee', 'cat', 'dog'] });
 *
 * codec.seedToHuman('A');
 * // [ 'ant', 'bee', 'ant', 'ant', 'bee' ]
 *
 * codec.humanToSeed('ant bee ant ant bee');
 * // 'A'
 * ```
 */
export class SeedCodec {
    /**
     * The wordlist phrases are written with.
     */
    readonly wordlist!: WordlistIndex;

    /**
     * The number of bits carried by each word after the first.
     */
    readonly chunkSize!: number;

    readonly #logger: Logger;

    /**
     * Creates a new codec.
     *
     * @param {SeedCodecOptions} [options] - The wordlist, chunk size and diagnostics.
     * @throws {InvalidWordlistError} If the wordlist is unusable.
     * @throws {ChunkSizeTooLargeError} If `chunkSize` needs more words than the wordlist has.
     */
    constructor(options: SeedCodecOptions = {}) {
        const wordlist = resolveWordlist(options);

        let chunkSize: number;
        if (options.chunkSize == null) {
            chunkSize = wordlist.chunkSize();
        } else {
            wordlist.validateChunkSize(options.chunkSize);
            chunkSize = options.chunkSize;
        }

        defineProperties<SeedCodec>(this, { wordlist, chunkSize }, { chunkSize: 'number' });

        this.#logger = options.logger ?? (options.verbose ? createLogger({ verbose: true }) : silentLogger);
        this.#logger.debug({ locale: wordlist.locale, size: wordlist.size, chunkSize }, 'codec ready');
    }

    /**
     * Converts `seed` into words.
     *
     * The result has `1 + ceil(8 * seed.length / chunkSize)` words.
     *
     * @param {string} seed - An ASCII string.
     * @param {ConvertOptions} [options] - Conversion options.
     * @returns {string[]} The words, padding word first.
     * @throws {NonAsciiInputError} If `seed` contains a non-ASCII character.
     */
    seedToHuman(seed: string, options?: ConvertOptions): Array<string> {
        assertArgument(typeof seed === 'string', 'invalid seed', 'seed', seed);

        const words = this.#encode(seed);

        if (!options?.skipCheck) {
            const { seed: reconstructed } = this.#decode(words);
            this.#verify(reconstructed === seed, 'seedToHuman', seed, reconstructed);
        }

        return words;
    }

    /**
     * Converts `words` back into the seed they encode.
     *
     * Only phrases the encoder can produce are accepted: the recovered seed is encoded again and must give the same
     * word indices.
     *
     * @param {string | string[]} words - The words, or a phrase of whitespace separated words.
     * @param {ConvertOptions} [options] - Conversion options.
     * @returns {string} The seed.
     * @throws {EmptyInputError} If there are no words.
     * @throws {UnknownWordError} If a word is not part of the wordlist.
     * @throws {RoundtripVerificationFailedError} If the phrase is not one the encoder produces.
     */
    humanToSeed(words: string | ReadonlyArray<string>, options?: ConvertOptions): string {
        const list = typeof words === 'string' ? this.wordlist.split(words) : Array.from(words);

        const { seed, indices } = this.#decode(list);

        if (!options?.skipCheck) {
            const reencoded = this.#encode(seed);
            const matches =
                reencoded.length === indices.length &&
                reencoded.every((word, i) => this.wordlist.getWordIndex(word) === indices[i]);
            this.#verify(matches, 'humanToSeed', this.wordlist.join(list), this.wordlist.join(reencoded));
        }

        return seed;
    }

    /**
     * Converts `seed` into a phrase of words joined by the wordlist.
     *
     * @param {string} seed - An ASCII string.
     * @param {ConvertOptions} [options] - Conversion options.
     * @returns {string} The phrase.
     */
    toPhrase(seed: string, options?: ConvertOptions): string {
        return this.wordlist.join(this.seedToHuman(seed, options));
    }

    /**
     * Converts a `phrase` produced by {@link SeedCodec.toPhrase | **toPhrase**} back into its seed.
     *
     * @param {string} phrase - The phrase.
     * @param {ConvertOptions} [options] - Conversion options.
     * @returns {string} The seed.
     */
    fromPhrase(phrase: string, options?: ConvertOptions): string {
        return this.humanToSeed(this.wordlist.split(phrase), options);
    }

    #encode(seed: string): Array<string> {
        const trace = this.#logger.isLevelEnabled('debug');

        const { bits, padding } = padToMultiple(bytesToBits(toAsciiBytes(seed)), this.chunkSize);

        const words = [this.wordlist.wordAt(padding)];
        splitChunks(bits, this.chunkSize).forEach((chunk, i) => {
            const index = chunkToIndex(chunk);
            const word = this.wordlist.wordAt(index);
            words.push(word);
            if (trace) {
                this.#logger.debug({ chunk: i + 1, bits: formatBits(chunk), index, word }, 'encoded chunk');
            }
        });

        return words;
    }

    #decode(words: ReadonlyArray<string>): DecodedWords {
        assert(words.length >= 1, 'no words to decode', 'EMPTY_INPUT');

        const trace = this.#logger.isLevelEnabled('debug');

        const indices = words.map((word, position) => this.wordlist.indexOf(word, position));

        const chunks = indices.slice(1).map((index, i) => {
            const chunk = indexToChunk(index, this.chunkSize);
            if (trace) {
                this.#logger.debug({ word: words[i + 1], index, bits: formatBits(chunk) }, 'decoded word');
            }
            return chunk;
        });

        const bits = removePadding(concatBits(chunks), indices[0]);
        const seed = toAsciiString(bitsToBytes(bits));

        return { seed, indices };
    }

    #verify(check: boolean, operation: 'seedToHuman' | 'humanToSeed', expected: string, actual: string): void {
        if (check) {
            return;
        }

        this.#logger.fatal({ operation, expected, actual }, 'round trip verification failed');
        throw makeError('round trip verification failed', 'ROUNDTRIP_VERIFICATION_FAILED', {
            operation,
            expected,
            actual,
        });
    }
}
