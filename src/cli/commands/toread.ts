import { Command } from 'commander';

import { GlobalOptionsSchema, createCodec } from '../options.js';

import type { CliOutput } from '../options.js';

export function createToReadCommand(output: CliOutput): Command {
    const command = new Command('toread')
        .description('Convert an ASCII seed into words')
        .argument('<seed>', 'The seed to convert (write "toread -- <seed>" for a seed starting with "-")')
        .action((seed: string, _options: unknown, cmd: Command) => {
            const options = GlobalOptionsSchema.parse(cmd.optsWithGlobals());
            const codec = createCodec(options, output);
            output.out(codec.toPhrase(seed));
        });

    return command;
}
