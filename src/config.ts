/**
 * @module
 * Configuration: defaults, overridden by environment variables, overridden by command-line flags.
 */
import {
    InvalidCommand,
} from './errors';
import {
    Verbosity,
} from './task';

/**
 * Settings shared by all commands.
 */
export interface Config {
    /** Path of the dependency store file. */
    dbFile: string;
    /** Path of the task file. */
    taskFile: string;
    /** Name of the reporter used by `run`. */
    reporter: string;
    /** Run verbosity. Tasks without an override use 1 if this is unset. */
    verbosity?: Verbosity;
    /** Maximum number of tasks run concurrently. */
    maxWorkers: number;
}

export const DEFAULT_CONFIG: Readonly<Config> = {
    dbFile: '.freshen.json',
    maxWorkers: 1,
    reporter: 'console',
    taskFile: 'freshen.yaml',
};

/**
 * Resolves the configuration. Undefined values in `overrides` are ignored.
 */
export function resolveConfig(overrides: Partial<Config>, env: NodeJS.ProcessEnv = process.env): Config {
    const config: Config = { ...DEFAULT_CONFIG };

    if (env.FRESHEN_DB)
        config.dbFile = env.FRESHEN_DB;
    if (env.FRESHEN_FILE)
        config.taskFile = env.FRESHEN_FILE;
    if (env.FRESHEN_REPORTER)
        config.reporter = env.FRESHEN_REPORTER;
    if (env.FRESHEN_VERBOSITY)
        config.verbosity = parseVerbosity(env.FRESHEN_VERBOSITY, 'FRESHEN_VERBOSITY');
    if (env.FRESHEN_WORKERS)
        config.maxWorkers = parseWorkers(env.FRESHEN_WORKERS, 'FRESHEN_WORKERS');

    if (overrides.dbFile !== undefined)
        config.dbFile = overrides.dbFile;
    if (overrides.taskFile !== undefined)
        config.taskFile = overrides.taskFile;
    if (overrides.reporter !== undefined)
        config.reporter = overrides.reporter;
    if (overrides.verbosity !== undefined)
        config.verbosity = overrides.verbosity;
    if (overrides.maxWorkers !== undefined)
        config.maxWorkers = overrides.maxWorkers;
    return config;
}

export function parseVerbosity(value: string, source: string = 'verbosity'): Verbosity {
    switch (value.trim()) {
        case '0':
            return 0;
        case '1':
            return 1;
        case '2':
            return 2;
        default:
            throw new InvalidCommand(`${source} must be 0, 1 or 2, got '${value}'`);
    }
}

export function parseWorkers(value: string, source: string = 'workers'): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1)
        throw new InvalidCommand(`${source} must be a positive integer, got '${value}'`);
    return n;
}
