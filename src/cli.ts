#!/usr/bin/env node
/**
 * @module
 * freshen command-line interface.
 */
import {
    IgnoreOutcome,
    autoCommand,
    cleanCommand,
    forgetCommand,
    ignoreCommand,
    listCommand,
    runCommand,
} from './commands';
import {
    Config,
    parseVerbosity,
    parseWorkers,
    resolveConfig,
} from './config';
import {
    InvalidCommand,
    SelectionError,
    StoreError,
    WatchSetupError,
    getErrorMessage,
} from './errors';
import {
    EXIT_ENVIRONMENT_ERROR,
    EXIT_INVALID_COMMAND,
    EXIT_SUCCESS,
} from './exitCodes';
import {
    loadTaskFile,
} from './loader';
import {
    Task,
} from './task';
import {
    Command,
    CommanderError,
    Option,
} from 'commander';
import path = require('path');

type GlobalFlags = {
    file?: string;
    db?: string;
};

type RunFlags = GlobalFlags & {
    verbosity?: string;
    always?: boolean;
    continue?: boolean;
    reporter?: string;
    output?: string;
    workers?: string;
};

type ListFlags = GlobalFlags & {
    all?: boolean;
    status?: boolean;
    private?: boolean;
    doc?: boolean;
    subtasks?: boolean;
};

/**
 * Streams the CLI writes to.
 */
export interface CliIO {
    stdout: NodeJS.WritableStream;
    stderr: NodeJS.WritableStream;
}

interface Project {
    config: Config;
    tasks: Task[];
}

/**
 * Resolves the configuration, loads the task file and moves into its directory, where tasks run.
 */
async function loadProject(flags: RunFlags): Promise<Project> {
    const config = resolveConfig({
        dbFile: flags.db,
        maxWorkers: flags.workers === undefined ? undefined : parseWorkers(flags.workers),
        reporter: flags.reporter,
        taskFile: flags.file,
        verbosity: flags.verbosity === undefined ? undefined : parseVerbosity(flags.verbosity),
    });
    const taskFile = path.resolve(config.taskFile);
    config.dbFile = path.resolve(config.dbFile);
    const tasks = await loadTaskFile(taskFile);
    process.chdir(path.dirname(taskFile));
    return { config, tasks };
}

/**
 * Builds the commander program. Commands report their exit code through `setExitCode`.
 */
export function createProgram(io: CliIO, setExitCode: (code: number) => void): Command {
    const program = new Command()
        .name('freshen')
        .description('Run tasks whose dependencies changed, in dependency order')
        .option('-f, --file <path>', 'task file (default: freshen.yaml)')
        .option('--db <path>', 'dependency store file (default: .freshen.json)')
        .exitOverride()
        .configureOutput({
            writeErr: str => io.stderr.write(str),
            writeOut: str => io.stdout.write(str),
        });

    program.command('run', { isDefault: true })
        .description('run stale tasks')
        .argument('[tasks...]', 'tasks to run (default: all top-level tasks)')
        .addOption(new Option('-v, --verbosity <level>', 'output verbosity').choices(['0', '1', '2']))
        .option('-a, --always', 'execute tasks even if up-to-date')
        .option('-c, --continue', 'keep running independent tasks after a failure')
        .option('-r, --reporter <name>', 'reporter (default: console)')
        .option('-o, --output <path>', 'write the report to a file')
        .option('-n, --workers <n>', 'maximum number of tasks run concurrently')
        .action(async (names: string[], _options: unknown, cmd: Command) => {
            const flags = cmd.optsWithGlobals<RunFlags>();
            const { config, tasks } = await loadProject(flags);
            setExitCode(await runCommand({
                alwaysExecute: flags.always,
                continueOnError: flags.continue,
                dbFile: config.dbFile,
                maxWorkers: config.maxWorkers,
                names,
                output: flags.output ?? io.stdout,
                reporter: config.reporter,
                tasks,
                verbosity: config.verbosity,
            }));
        });

    program.command('list')
        .description('list tasks')
        .argument('[tasks...]', 'tasks to list (default: all)')
        .option('--all', 'include sub-tasks')
        .option('--status', 'show status: R (run), U (up-to-date) or I (ignored)')
        .option('-p, --private', 'include private tasks')
        .option('--doc', 'show task documentation')
        .option('-s, --subtasks', 'show sub-tasks under their task')
        .action(async (names: string[], _options: unknown, cmd: Command) => {
            const flags = cmd.optsWithGlobals<ListFlags>();
            const { config, tasks } = await loadProject(flags);
            setExitCode(await listCommand({
                all: flags.all,
                dbFile: config.dbFile,
                doc: flags.doc,
                names,
                output: io.stdout,
                private: flags.private,
                status: flags.status,
                subtasks: flags.subtasks,
                tasks,
            }));
        });

    program.command('clean')
        .description('clean task targets')
        .argument('[tasks...]', 'tasks to clean (default: all)')
        .option('--dry-run', 'print what would be removed without removing it')
        .action(async (names: string[], _options: unknown, cmd: Command) => {
            const flags = cmd.optsWithGlobals<GlobalFlags & { dryRun?: boolean }>();
            const { tasks } = await loadProject(flags);
            setExitCode(await cleanCommand({ dryRun: flags.dryRun, names, output: io.stdout, tasks }));
        });

    program.command('forget')
        .description('forget saved fingerprints, so tasks run again')
        .argument('[tasks...]', 'tasks to forget (default: all)')
        .action(async (names: string[], _options: unknown, cmd: Command) => {
            const { config, tasks } = await loadProject(cmd.optsWithGlobals<GlobalFlags>());
            setExitCode(await forgetCommand({ dbFile: config.dbFile, names, output: io.stdout, tasks }));
        });

    program.command('ignore')
        .description('ignore tasks until they are unignored')
        .argument('[tasks...]', 'tasks to ignore')
        .option('--undo', 'unignore the tasks')
        .action(async (names: string[], _options: unknown, cmd: Command) => {
            const flags = cmd.optsWithGlobals<GlobalFlags & { undo?: boolean }>();
            const { config, tasks } = await loadProject(flags);
            const outcome = await ignoreCommand({ dbFile: config.dbFile, names, output: io.stdout, tasks, undo: flags.undo });
            setExitCode(outcome === IgnoreOutcome.Done ? EXIT_SUCCESS : EXIT_INVALID_COMMAND);
        });

    program.command('auto')
        .description('run tasks again whenever one of their file dependencies changes')
        .argument('[tasks...]', 'tasks to watch (default: all top-level tasks)')
        .action(async (names: string[], _options: unknown, cmd: Command) => {
            const { config, tasks } = await loadProject(cmd.optsWithGlobals<GlobalFlags>());
            await autoCommand({
                dbFile: config.dbFile,
                names,
                output: io.stdout,
                tasks,
                verbosity: config.verbosity,
            });
        });

    return program;
}

/**
 * Runs the CLI and returns the process exit code. User errors are printed as a single line.
 */
export async function main(argv: string[], io: CliIO = { stderr: process.stderr, stdout: process.stdout }): Promise<number> {
    let exitCode = EXIT_SUCCESS;
    const program = createProgram(io, code => {
        exitCode = code;
    });
    try {
        await program.parseAsync(argv);
    } catch (e) {
        if (e instanceof CommanderError)
            return e.exitCode; // commander already printed the message
        if (e instanceof InvalidCommand || e instanceof SelectionError) {
            io.stderr.write(`ERROR: ${e.message}\n`);
            return EXIT_INVALID_COMMAND;
        }
        if (e instanceof StoreError || e instanceof WatchSetupError) {
            io.stderr.write(`ERROR: ${e.message}\n`);
            return EXIT_ENVIRONMENT_ERROR;
        }
        throw e;
    }
    return exitCode;
}

if (require.main === module) {
    main(process.argv).then(code => {
        process.exitCode = code;
    }, (e: unknown) => {
        process.stderr.write(`ERROR: ${getErrorMessage(e)}\n`);
        process.exitCode = EXIT_ENVIRONMENT_ERROR;
    });
}
