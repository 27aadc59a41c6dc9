import { z } from 'zod';

import { SeedCodec } from '../seed/seed-codec.js';
import { createLogger } from '../utils/logger.js';
import { loadWordlist } from '../wordlists/wordlist-file.js';

import type { DestinationStream } from 'pino';

/**
 * Options shared by every command.
 */
export const GlobalOptionsSchema = z.object({
    verbose: z.boolean().default(false),
    ignoreCase: z.boolean().default(false),
    wordlist: z.string().min(1, 'wordlist path must not be empty').optional(),
    chunkSize: z
        .string()
        .regex(/^[1-9]\d*$/, 'chunk size must be a positive integer')
        .transform(Number)
        .optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

/**
 * Where a command writes its result, its errors and its diagnostics.
 */
export interface CliOutput {
    out: (text: string) => void;
    err: (text: string) => void;
    logDestination?: DestinationStream;
}

/**
 * Builds the codec a command runs with from its parsed options.
 */
export function createCodec(options: GlobalOptions, output: CliOutput): SeedCodec {
    const logger = createLogger({ verbose: options.verbose, destination: output.logDestination });
    const wordlist =
        options.wordlist == null ? undefined : loadWordlist(options.wordlist, { ignoreCase: options.ignoreCase });

    return new SeedCodec({
        wordlist,
        chunkSize: options.chunkSize,
        ignoreCase: options.ignoreCase,
        logger,
    });
}
