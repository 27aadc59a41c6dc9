import { Command } from 'commander';

import { GlobalOptionsSchema, createCodec } from '../options.js';

import type { CliOutput } from '../options.js';

export function createToSeedCommand(output: CliOutput): Command {
    const command = new Command('toseed')
        .description('Convert words back into the seed they encode')
        .argument('<words...>', 'The words, as separate arguments or a single quoted phrase')
        .action((words: Array<string>, _options: unknown, cmd: Command) => {
            const options = GlobalOptionsSchema.parse(cmd.optsWithGlobals());
            const codec = createCodec(options, output);
            output.out(codec.fromPhrase(words.join(' ')));
        });

    return command;
}
