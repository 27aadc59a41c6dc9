import { defineProperties } from '../utils/properties.js';

/**
 * A Wordlist represents a collection of words used to encode and decode seeds into phrases that people can read
 * aloud or copy by hand.
 *
 * Sub-classes must implement {@link Wordlist.getWord | **getWord**} and {@link Wordlist.getWordIndex |
 * **getWordIndex**}.
 *
 * @category Wordlists
 */
export abstract class Wordlist {
    /**
     * The locale of the words, or a name describing where they came from.
     */
    readonly locale!: string;

    /**
     * Creates a new Wordlist instance.
     *
     * @param {string} locale - The locale of the wordlist.
     */
    constructor(locale: string) {
        defineProperties<Wordlist>(this, { locale });
    }

    /**
     * Sub-classes may override this to provide a language-specific method for splitting `phrase` into individual
     * words.
     *
     * By default, `phrase` is split on any whitespace and empty entries are dropped.
     *
     * @param {string} phrase - The phrase to split.
     * @returns {string[]} The split words in the phrase.
     */
    split(phrase: string): Array<string> {
        return phrase.split(/\s+/g).filter((w) => w.length > 0);
    }

    /**
     * Sub-classes may override this to provide a language-specific method for joining `words` into a phrase.
     *
     * By default, `words` are joined by a single space.
     *
     * @param {string[]} words - The words to join.
     * @returns {string} The joined phrase.
     */
    join(words: ReadonlyArray<string>): string {
        return words.join(' ');
    }

    /**
     * Maps an `index` to its word.
     *
     * @param {number} index - The index of the word.
     * @returns {string} The word at the given index.
     */
    abstract getWord(index: number): string;

    /**
     * Maps a `word` to its index, or -1 if the word is not part of the list.
     *
     * @param {string} word - The word to get the index for.
     * @returns {number} The index of the word.
     */
    abstract getWordIndex(word: string): number;
}
