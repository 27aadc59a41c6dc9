import { isAscii } from '../encoding/ascii.js';
import { assert, assertArgument, assertPrivate } from '../utils/errors.js';
import { defineProperties } from '../utils/properties.js';

import { Wordlist } from './wordlist.js';

const _guard = {};

/**
 * Options for {@link WordlistIndex.build | **WordlistIndex.build**}.
 *
 * @category Wordlists
 */
export interface WordlistIndexOptions {
    /**
     * The locale, or a name for where the words came from. Defaults to `"custom"`.
     */
    locale?: string;

    /**
     * Match words regardless of case. Words which differ only in case are treated as duplicates.
     */
    ignoreCase?: boolean;
}

/**
 * A **WordlistIndex** is an immutable, ordered list of unique words with a lookup in each direction, and the number
 * of bits each word can carry.
 *
 * @category Wordlists
 */
export class WordlistIndex extends Wordlist {
    /**
     * Whether lookups ignore case.
     */
    readonly ignoreCase!: boolean;

    readonly #words: ReadonlyArray<string>;
    readonly #indices: ReadonlyMap<string, number>;

    /**
     * @ignore
     */
    constructor(guard: unknown, locale: string, words: ReadonlyArray<string>, ignoreCase: boolean) {
        super(locale);
        assertPrivate(guard, _guard, 'WordlistIndex');
        defineProperties<WordlistIndex>(this, { ignoreCase });

        const indices = new Map<string, number>();
        const unique: Array<string> = [];
        for (const word of words) {
            const key = ignoreCase ? word.toLowerCase() : word;
            if (!indices.has(key)) {
                indices.set(key, unique.length);
                unique.push(word);
            }
        }

        assert(unique.length >= 2, 'wordlist must contain at least 2 unique words', 'INVALID_WORDLIST', {
            size: unique.length,
        });

        this.#words = Object.freeze(unique);
        this.#indices = indices;
    }

    /**
     * Creates a **WordlistIndex** from `words`.
     *
     * Duplicates are dropped, keeping the position of their first occurrence.
     *
     * @param {Iterable<string>} words - The candidate words.
     * @param {WordlistIndexOptions} [options] - The locale and case handling.
     * @returns {WordlistIndex} The new index.
     * @throws {InvalidWordlistError} If a word is empty, not ASCII or contains whitespace, or if fewer than 2 unique
     *   words remain.
     */
    static build(words: Iterable<string>, options?: WordlistIndexOptions): WordlistIndex {
        const list = Array.from(words);
        for (const word of list) {
            assert(
                typeof word === 'string' && word.length > 0 && isAscii(word) && !/\s/.test(word),
                'wordlist entries must be non-empty ASCII words without whitespace',
                'INVALID_WORDLIST',
                { word },
            );
        }
        return new WordlistIndex(_guard, options?.locale ?? 'custom', list, !!options?.ignoreCase);
    }

    /**
     * The number of unique words.
     */
    get size(): number {
        return this.#words.length;
    }

    /**
     * The words, in index order.
     */
    get words(): ReadonlyArray<string> {
        return this.#words;
    }

    /**
     * The number of bits each word carries, the largest `n` with `2^n <= size`.
     *
     * @returns {number} The chunk size.
     */
    chunkSize(): number {
        return 31 - Math.clz32(this.size);
    }

    /**
     * Throws unless `chunkSize` bits can be carried by a word of this list.
     *
     * @param {number} chunkSize - A manually selected chunk size.
     * @throws {ChunkSizeTooLargeError} If `2^chunkSize` exceeds the number of words.
     */
    validateChunkSize(chunkSize: number): void {
        assertArgument(
            Number.isInteger(chunkSize) && chunkSize >= 1,
            'chunk size must be a positive integer',
            'chunkSize',
            chunkSize,
        );
        assert(
            2 ** chunkSize <= this.size,
            `a chunk size of ${chunkSize} needs at least ${2 ** chunkSize} words`,
            'CHUNK_SIZE_TOO_LARGE',
            { chunkSize, size: this.size },
        );
    }

    /**
     * Returns the word at `index`.
     *
     * @param {number} index - The index of the word.
     * @returns {string} The word.
     * @throws {IndexOutOfRangeError} If there is no word at `index`.
     */
    wordAt(index: number): string {
        assertArgument(Number.isSafeInteger(index), 'invalid word index', 'index', index);
        assert(index >= 0 && index < this.size, `invalid word index: ${index}`, 'INDEX_OUT_OF_RANGE', {
            index,
            size: this.size,
        });
        return this.#words[index];
    }

    /**
     * Returns the index of `word`.
     *
     * @param {string} word - The word to find.
     * @param {number} [position] - The position of `word` within a phrase, reported if it is not found.
     * @returns {number} The index.
     * @throws {UnknownWordError} If `word` is not part of the list.
     */
    indexOf(word: string, position?: number): number {
        const index = this.getWordIndex(word);
        if (index < 0) {
            if (position == null) {
                assert(false, `unknown word ${JSON.stringify(word)}`, 'UNKNOWN_WORD', { word });
            }
            assert(false, `unknown word ${JSON.stringify(word)} at position ${position}`, 'UNKNOWN_WORD', {
                word,
                position,
            });
        }
        return index;
    }

    /**
     * Returns true if `word` is part of the list.
     */
    has(word: string): boolean {
        return this.getWordIndex(word) >= 0;
    }

    getWord(index: number): string {
        return this.wordAt(index);
    }

    getWordIndex(word: string): number {
        return this.#indices.get(this.ignoreCase ? word.toLowerCase() : word) ?? -1;
    }
}
