import { destination as pinoDestination, pino } from 'pino';

import type { DestinationStream, Level, Logger } from 'pino';

export type { Logger } from 'pino';

const LEVELS: ReadonlyArray<Level> = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

/**
 * Options for {@link createLogger | **createLogger**}.
 *
 * @category Utils
 */
export interface LoggerOptions {
    /**
     * Lower the level to `debug`, which includes the per-chunk trace of every conversion.
     */
    verbose?: boolean;

    /**
     * Overrides the level; when omitted the `PINO_LEVEL` environment variable is used if it names a level.
     */
    level?: Level | 'silent';

    /**
     * Where records are written. Defaults to a synchronous stderr stream, so results printed on stdout stay clean.
     */
    destination?: DestinationStream;
}

/**
 * Resolves the log level from, in order, the explicit `level`, the `PINO_LEVEL` environment variable and the
 * `verbose` flag.
 *
 * @category Utils
 */
export function resolveLogLevel(options: LoggerOptions = {}, env: NodeJS.ProcessEnv = process.env): Level | 'silent' {
    if (options.level != null) {
        return options.level;
    }

    const fromEnv = env['PINO_LEVEL'];
    if (fromEnv === 'silent') {
        return fromEnv;
    }
    const level = LEVELS.find((l) => l === fromEnv);
    if (level != null) {
        return level;
    }

    return options.verbose ? 'debug' : 'info';
}

/**
 * Creates the pino logger used by the codec and the command line tool.
 *
 * @category Utils
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    const destination = options.destination ?? pinoDestination({ dest: 2, sync: true });
    return pino({ name: 'wordseed', level: resolveLogLevel(options) }, destination);
}

/**
 * A logger which discards everything, used when no logger is injected and verbose output is off.
 *
 * @category Utils
 */
export const silentLogger: Logger = pino({ level: 'silent' });
