import { readFileSync } from 'node:fs';

import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';

import { parseWordlist } from './wordlist-file.js';
import { WordlistIndex } from './wordlist-index.js';

const checksum = '195f41c001ce4abf16df0fb46a4c0bc101bd433eb436e7de86d855d9ae4f3fb8';

const source = new URL('../../wordlists/en.txt', import.meta.url);

let wordlist: WordlistIndex | null = null;
let caseless: WordlistIndex | null = null;

function loadWords(): Array<string> {
    const words = parseWordlist(readFileSync(source, 'utf8'));

    // Verify the loaded list matches the one shipped with this version
    const computed = bytesToHex(sha256(utf8ToBytes(words.join('\n') + '\n')));
    if (computed !== checksum) {
        throw new Error(`default wordlist for en FAILED checksum (${computed})`);
    }

    return words;
}

/**
 * The default English wordlist of 512 short, common, easily spelled nouns, so each word carries 9 bits.
 *
 * The words are read from `wordlists/en.txt` on first use and cached for the life of the process.
 *
 * @category Wordlists
 */
export class LangEn {
    /**
     * Returns a singleton instance of the default English wordlist, loading it on first use.
     *
     * @param {boolean} [ignoreCase] - Return the variant whose lookups ignore case.
     * @returns {WordlistIndex} The English wordlist.
     */
    static wordlist(ignoreCase?: boolean): WordlistIndex {
        if (ignoreCase) {
            if (caseless == null) {
                caseless = WordlistIndex.build(LangEn.wordlist().words, { locale: 'en', ignoreCase: true });
            }
            return caseless;
        }
        if (wordlist == null) {
            wordlist = WordlistIndex.build(loadWords(), { locale: 'en' });
        }
        return wordlist;
    }
}
