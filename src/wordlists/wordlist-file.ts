import { readFileSync } from 'node:fs';

import { WordlistIndex } from './wordlist-index.js';

import type { WordlistIndexOptions } from './wordlist-index.js';

/**
 * Splits the contents of a wordlist file into words. Words are separated by any whitespace, usually one per line.
 *
 * @category Wordlists
 */
export function parseWordlist(text: string): Array<string> {
    return text.split(/\s+/g).filter((w) => w.length > 0);
}

/**
 * Reads the wordlist file at `path` and builds a {@link WordlistIndex | **WordlistIndex**} from it.
 *
 * @category Wordlists
 * @param {string | URL} path - The file to read.
 * @param {WordlistIndexOptions} [options] - Index options; the locale defaults to the file path.
 * @returns {WordlistIndex} The new index.
 */
export function loadWordlist(path: string | URL, options?: WordlistIndexOptions): WordlistIndex {
    const words = parseWordlist(readFileSync(path, 'utf8'));
    return WordlistIndex.build(words, { locale: String(path), ...options });
}
