import assert from 'assert';

import { LangEn, WordlistIndex, isError } from '../../index.js';

function makeWords(count: number): Array<string> {
    return Array.from({ length: count }, (_, i) => `w${i}`);
}

describe('Test WordlistIndex', function () {
    const farm = WordlistIndex.build(['ant', 'bee', 'cat', 'dog']);

    it('drops duplicates keeping the first position', function () {
        const wordlist = WordlistIndex.build(['ant', 'bee', 'ant', 'cat', 'bee', 'dog']);
        assert.deepStrictEqual(wordlist.words, ['ant', 'bee', 'cat', 'dog']);
        assert.strictEqual(wordlist.size, 4);
        assert.strictEqual(wordlist.indexOf('cat'), 2);
    });

    it('maps words to indices and back', function () {
        assert.strictEqual(farm.wordAt(2), 'cat');
        assert.strictEqual(farm.getWord(3), 'dog');
        assert.strictEqual(farm.indexOf('dog'), 3);
        assert.strictEqual(farm.getWordIndex('bee'), 1);
        assert.strictEqual(farm.has('ant'), true);
        assert.strictEqual(farm.has('emu'), false);
    });

    it('defaults the locale', function () {
        assert.strictEqual(farm.locale, 'custom');
        assert.strictEqual(WordlistIndex.build(['a', 'b'], { locale: 'test' }).locale, 'test');
    });

    it('keeps its words read-only', function () {
        assert.ok(Object.isFrozen(farm.words));
    });

    it('cannot be constructed directly', function () {
        assert.throws(
            () => new WordlistIndex({}, 'custom', ['ant', 'bee'], false),
            (error: unknown) => isError(error, 'INVALID_ARGUMENT'),
        );
    });

    it('reports an unknown word', function () {
        assert.strictEqual(farm.getWordIndex('emu'), -1);
        assert.throws(
            () => farm.indexOf('emu'),
            (error: unknown) =>
                isError(error, 'UNKNOWN_WORD') &&
                error.word === 'emu' &&
                error.position === undefined &&
                error.shortMessage === 'unknown word "emu"',
        );
        assert.throws(
            () => farm.indexOf('emu', 3),
            (error: unknown) =>
                isError(error, 'UNKNOWN_WORD') &&
                error.position === 3 &&
                error.shortMessage === 'unknown word "emu" at position 3',
        );
    });

    it('reports an index past the end', function () {
        assert.throws(
            () => farm.wordAt(4),
            (error: unknown) =>
                isError(error, 'INDEX_OUT_OF_RANGE') &&
                error instanceof RangeError &&
                error.index === 4 &&
                error.size === 4,
        );
        assert.throws(() => farm.getWord(-1), (error: unknown) => isError(error, 'INDEX_OUT_OF_RANGE'));
    });

    it('splits and joins phrases on whitespace', function () {
        assert.deepStrictEqual(farm.split('  ant \n bee\tcat '), ['ant', 'bee', 'cat']);
        assert.deepStrictEqual(farm.split('   '), []);
        assert.strictEqual(farm.join(['ant', 'bee', 'cat']), 'ant bee cat');
    });
});

describe('Test WordlistIndex validation', function () {
    const tooSmall = [
        { name: 'single word', words: ['solo'] },
        { name: 'only duplicates', words: ['echo', 'echo', 'echo'] },
        { name: 'no words', words: [] },
    ];

    for (const test of tooSmall) {
        it(`rejects a wordlist with fewer than 2 unique words: ${test.name}`, function () {
            assert.throws(
                () => WordlistIndex.build(test.words),
                (error: unknown) => isError(error, 'INVALID_WORDLIST') && error.size === new Set(test.words).size,
            );
        });
    }

    const badWords = [
        { name: 'empty word', word: '' },
        { name: 'embedded space', word: 'two words' },
        { name: 'embedded tab', word: 'tab\tbed' },
        { name: 'non-ASCII', word: 'café' },
    ];

    for (const test of badWords) {
        it(`rejects a wordlist entry: ${test.name}`, function () {
            assert.throws(
                () => WordlistIndex.build(['ok', 'fine', test.word]),
                (error: unknown) => isError(error, 'INVALID_WORDLIST') && error.word === test.word,
            );
        });
    }
});

describe('Test chunk size', function () {
    for (let k = 1; k <= 12; k++) {
        it(`derives ${k} bits from ${2 ** k} words`, function () {
            assert.strictEqual(WordlistIndex.build(makeWords(2 ** k)).chunkSize(), k);
        });

        if (k >= 2) {
            it(`derives ${k - 1} bits from ${2 ** k - 1} words`, function () {
                assert.strictEqual(WordlistIndex.build(makeWords(2 ** k - 1)).chunkSize(), k - 1);
            });
        }
    }

    it('accepts a manual chunk size the wordlist can carry', function () {
        const wordlist = WordlistIndex.build(makeWords(5));
        assert.doesNotThrow(() => wordlist.validateChunkSize(1));
        assert.doesNotThrow(() => wordlist.validateChunkSize(2));
    });

    it('rejects a manual chunk size needing more words', function () {
        const wordlist = WordlistIndex.build(makeWords(5));
        assert.throws(
            () => wordlist.validateChunkSize(3),
            (error: unknown) =>
                isError(error, 'CHUNK_SIZE_TOO_LARGE') &&
                error.chunkSize === 3 &&
                error.size === 5 &&
                error.shortMessage === 'a chunk size of 3 needs at least 8 words',
        );
    });

    it('rejects a manual chunk size wider than any wordlist', function () {
        const wordlist = WordlistIndex.build(['ant', 'bee', 'cat', 'dog']);
        assert.throws(
            () => wordlist.validateChunkSize(33),
            (error: unknown) =>
                isError(error, 'CHUNK_SIZE_TOO_LARGE') &&
                !(error instanceof TypeError) &&
                error.chunkSize === 33 &&
                error.size === 4,
        );
    });

    it('rejects a malformed manual chunk size', function () {
        const wordlist = WordlistIndex.build(makeWords(5));
        for (const chunkSize of [0, -1, 1.5, NaN]) {
            assert.throws(
                () => wordlist.validateChunkSize(chunkSize),
                (error: unknown) => isError(error, 'INVALID_ARGUMENT'),
            );
        }
    });
});

describe('Test case-insensitive wordlists', function () {
    it('treats words differing only in case as duplicates', function () {
        const wordlist = WordlistIndex.build(['Ant', 'bee', 'ANT'], { ignoreCase: true });
        assert.deepStrictEqual(wordlist.words, ['Ant', 'bee']);
        assert.strictEqual(wordlist.indexOf('aNT'), 0);
        assert.strictEqual(wordlist.indexOf('BEE'), 1);
    });

    it('keeps case-sensitive lookups by default', function () {
        const wordlist = WordlistIndex.build(['Ant', 'bee', 'ANT']);
        assert.strictEqual(wordlist.size, 3);
        assert.strictEqual(wordlist.getWordIndex('ant'), -1);
        assert.strictEqual(wordlist.indexOf('ANT'), 2);
    });
});

describe('Test the English wordlist', function () {
    it('loads 512 words carrying 9 bits each', function () {
        const wordlist = LangEn.wordlist();
        assert.strictEqual(wordlist.locale, 'en');
        assert.strictEqual(wordlist.size, 512);
        assert.strictEqual(wordlist.chunkSize(), 9);
        assert.strictEqual(wordlist.wordAt(0), 'acorn');
        assert.strictEqual(wordlist.wordAt(511), 'zipper');
    });

    it('is loaded once', function () {
        assert.strictEqual(LangEn.wordlist(), LangEn.wordlist());
        assert.strictEqual(LangEn.wordlist(true), LangEn.wordlist(true));
    });

    it('holds only lower-case ASCII letters', function () {
        for (const word of LangEn.wordlist().words) {
            assert.match(word, /^[a-z]+$/);
        }
    });

    it('has a case-insensitive variant', function () {
        const wordlist = LangEn.wordlist(true);
        assert.strictEqual(wordlist.ignoreCase, true);
        assert.strictEqual(wordlist.size, 512);
        assert.strictEqual(wordlist.indexOf('ACORN'), 0);
    });
});
