import { Command, CommanderError } from 'commander';
import { ZodError } from 'zod';

import { version } from '../_version.js';
import { isWordseedError } from '../utils/errors.js';

import { createToReadCommand } from './commands/toread.js';
import { createToSeedCommand } from './commands/toseed.js';

import type { CliOutput } from './options.js';

const stdio: CliOutput = {
    out: (text) => process.stdout.write(text + '\n'),
    err: (text) => process.stderr.write(text + '\n'),
};

/**
 * Formats an error thrown while running a command as a single line.
 */
export function formatCliError(error: unknown): string {
    if (isWordseedError(error)) {
        return `Error [${error.code}]: ${error.shortMessage}`;
    }
    if (error instanceof ZodError) {
        return `Error [INVALID_ARGUMENT]: ${error.issues.map((issue) => issue.message).join('; ')}`;
    }
    if (error instanceof Error) {
        return `Error: ${error.message}`;
    }
    return `Error: ${String(error)}`;
}

/**
 * Create CLI program
 */
export function createCliProgram(output: CliOutput = stdio): Command {
    const program = new Command();

    program
        .name('wordseed')
        .description('Reversible conversion between ASCII seeds and human readable words')
        .version(version, '-V, --version', 'Print the version')
        .option('--verbose', 'Log every chunk of the conversion to stderr', false)
        .option('--wordlist <file>', 'Read the words from a file instead of the built-in English list')
        .option('--chunk-size <bits>', 'Number of bits carried by each word')
        .option('--ignore-case', 'Accept words regardless of case', false)
        .exitOverride()
        .configureOutput({
            writeOut: (text) => output.out(text.replace(/\n$/, '')),
            writeErr: (text) => output.err(text.replace(/\n$/, '')),
        });

    for (const command of [createToReadCommand(output), createToSeedCommand(output)]) {
        program.addCommand(command.copyInheritedSettings(program));
    }

    return program;
}

/**
 * Runs the command line for `args` (without the node and script paths) and returns the exit code.
 */
export function run(args: ReadonlyArray<string>, output: CliOutput = stdio): number {
    const program = createCliProgram(output);

    try {
        program.parse([...args], { from: 'user' });
        return 0;
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }
        output.err(formatCliError(error));
        return 1;
    }
}
