/**
 * A Wordlist is an ordered list of unique words used to turn seeds into phrases that are easier for people to read
 * aloud, write down and type back in.
 *
 * Each word carries `n` bits, where `2^n` is the largest power of two not exceeding the number of words, so larger
 * lists give shorter phrases. The {@link LangEn | **English wordlist**} is used unless another is supplied.
 */
export { Wordlist } from './wordlist.js';
export { WordlistIndex } from './wordlist-index.js';
export { LangEn } from './lang-en.js';
export { loadWordlist, parseWordlist } from './wordlist-file.js';

export type { WordlistIndexOptions } from './wordlist-index.js';
