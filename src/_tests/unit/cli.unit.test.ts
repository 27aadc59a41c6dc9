import assert from 'assert';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { run } from '../../cli/program.js';
import { version } from '../../index.js';

import type { CliOutput } from '../../cli/options.js';

interface CapturedOutput extends CliOutput {
    stdout: Array<string>;
    stderr: Array<string>;
    logs: Array<string>;
}

function capture(): CapturedOutput {
    const stdout: Array<string> = [];
    const stderr: Array<string> = [];
    const logs: Array<string> = [];
    return {
        stdout,
        stderr,
        logs,
        out: (text) => stdout.push(text),
        err: (text) => stderr.push(text),
        logDestination: { write: (line: string) => logs.push(line) },
    };
}

describe('Test command line', function () {
    let dir: string;
    let farm: string;

    before(function () {
        dir = mkdtempSync(join(tmpdir(), 'wordseed-'));
        farm = join(dir, 'farm.txt');
        writeFileSync(farm, 'ant\nbee\ncat\ndog\n');
    });

    after(function () {
        rmSync(dir, { recursive: true, force: true });
    });

    it('prints the words for a seed', function () {
        const output = capture();
        assert.strictEqual(run(['--wordlist', farm, 'toread', 'A'], output), 0);
        assert.deepStrictEqual(output.stdout, ['ant bee ant ant bee']);
        assert.deepStrictEqual(output.stderr, []);
    });

    it('prints the seed for separate words', function () {
        const output = capture();
        assert.strictEqual(run(['--wordlist', farm, 'toseed', 'ant', 'bee', 'ant', 'ant', 'bee'], output), 0);
        assert.deepStrictEqual(output.stdout, ['A']);
    });

    it('prints the seed for a quoted phrase', function () {
        const output = capture();
        assert.strictEqual(run(['--wordlist', farm, 'toseed', 'ant bee ant ant bee'], output), 0);
        assert.deepStrictEqual(output.stdout, ['A']);
    });

    it('round trips with the English wordlist', function () {
        const encoded = capture();
        assert.strictEqual(run(['toread', 'test-secret'], encoded), 0);
        assert.strictEqual(encoded.stdout.length, 1);
        assert.strictEqual(encoded.stdout[0].split(' ').length, 1 + Math.ceil((8 * 11) / 9));

        const decoded = capture();
        assert.strictEqual(run(['toseed', encoded.stdout[0]], decoded), 0);
        assert.deepStrictEqual(decoded.stdout, ['test-secret']);
    });

    it('accepts any case when asked to', function () {
        const output = capture();
        assert.strictEqual(run(['--wordlist', farm, '--ignore-case', 'toseed', 'ANT BEE ANT ANT BEE'], output), 0);
        assert.deepStrictEqual(output.stdout, ['A']);
    });

    it('uses a manual chunk size', function () {
        const output = capture();
        assert.strictEqual(run(['--wordlist', farm, '--chunk-size', '1', 'toread', 'A'], output), 0);
        assert.deepStrictEqual(output.stdout, ['ant ant bee ant ant ant ant ant bee']);
    });

    it('reports an unknown word', function () {
        const output = capture();
        assert.strictEqual(run(['--wordlist', farm, 'toseed', 'ant', 'emu'], output), 1);
        assert.deepStrictEqual(output.stdout, []);
        assert.deepStrictEqual(output.stderr, ['Error [UNKNOWN_WORD]: unknown word "emu" at position 1']);
    });

    it('reports a non-ASCII seed', function () {
        const output = capture();
        assert.strictEqual(run(['--wordlist', farm, 'toread', 'café'], output), 1);
        assert.deepStrictEqual(output.stderr, ['Error [NON_ASCII_INPUT]: input must contain only ASCII characters']);
    });

    it('reports a chunk size the wordlist cannot carry', function () {
        const output = capture();
        assert.strictEqual(run(['--wordlist', farm, '--chunk-size', '3', 'toread', 'A'], output), 1);
        assert.deepStrictEqual(output.stderr, ['Error [CHUNK_SIZE_TOO_LARGE]: a chunk size of 3 needs at least 8 words']);
    });

    it('reports a chunk size wider than any wordlist', function () {
        const output = capture();
        assert.strictEqual(run(['--wordlist', farm, '--chunk-size', '40', 'toread', 'A'], output), 1);
        assert.deepStrictEqual(output.stderr, [
            'Error [CHUNK_SIZE_TOO_LARGE]: a chunk size of 40 needs at least 1099511627776 words',
        ]);
    });

    it('converts a seed starting with a dash after a separator', function () {
        const encoded = capture();
        assert.strictEqual(run(['--wordlist', farm, 'toread', '--', '-abc'], encoded), 0);
        assert.deepStrictEqual(encoded.stdout, [
            'ant ant cat dog bee bee cat ant bee bee cat ant cat bee cat ant dog',
        ]);

        const decoded = capture();
        assert.strictEqual(run(['--wordlist', farm, 'toseed', encoded.stdout[0]], decoded), 0);
        assert.deepStrictEqual(decoded.stdout, ['-abc']);
    });

    it('reads a seed starting with a dash as an option without a separator', function () {
        const output = capture();
        assert.strictEqual(run(['--wordlist', farm, 'toread', '-abc'], output), 1);
        assert.deepStrictEqual(output.stdout, []);
    });

    it('reports a malformed chunk size', function () {
        const output = capture();
        assert.strictEqual(run(['--chunk-size', '0', 'toread', 'A'], output), 1);
        assert.deepStrictEqual(output.stderr, ['Error [INVALID_ARGUMENT]: chunk size must be a positive integer']);
    });

    it('reports a missing argument', function () {
        const output = capture();
        assert.strictEqual(run(['toread'], output), 1);
        assert.deepStrictEqual(output.stderr, ["error: missing required argument 'seed'"]);
    });

    it('prints the version', function () {
        const output = capture();
        assert.strictEqual(run(['--version'], output), 0);
        assert.deepStrictEqual(output.stdout, [version]);
    });

    it('logs every chunk when verbose', function () {
        const output = capture();
        assert.strictEqual(run(['--verbose', '--wordlist', farm, 'toread', 'A'], output), 0);
        assert.deepStrictEqual(output.stdout, ['ant bee ant ant bee']);

        const messages = output.logs.map((line) => JSON.parse(line).msg);
        assert.strictEqual(messages.filter((msg) => msg === 'encoded chunk').length, 4);
        assert.strictEqual(messages.filter((msg) => msg === 'decoded word').length, 4);
    });
});
