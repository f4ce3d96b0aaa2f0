/**
 * @module
 * Commands: each one selects tasks, works on the dependency store and writes to an output stream.
 */
import {
    DependencyStore,
    Status,
    withStore,
} from './db';
import {
    ActionError,
    InvalidCommand,
    getErrorMessage,
} from './errors';
import {
    ReporterRegistry,
    createReporterRegistry,
} from './reporter';
import {
    Runner,
} from './runner';
import {
    expandGroup,
    getSubtasks,
    indexTasks,
    lookupTask,
    selectTasks,
} from './selector';
import {
    DEFAULT_VERBOSITY,
    Task,
    Verbosity,
    isPrivateTask,
} from './task';
import {
    FileModifyWatcher,
    WatchEventSource,
} from './watch';
import fs = require('fs-extra');

/**
 * Options shared by the commands that work on a task list.
 */
export interface TaskListOptions {
    /** Every task, in declaration order. */
    tasks: readonly Task[];
    /** Requested task names. Empty means all tasks. */
    names?: readonly string[];
    output: NodeJS.WritableStream;
}

/**
 * Options for {@link runCommand}.
 */
export interface RunCommandOptions extends Omit<TaskListOptions, 'output'> {
    dbFile: string;
    /** A stream, or the path of a file to write to. */
    output: NodeJS.WritableStream | string;
    verbosity?: Verbosity;
    alwaysExecute?: boolean;
    continueOnError?: boolean;
    /** Default: `console`. */
    reporter?: string;
    /** Default: the built-in reporters. */
    registry?: ReporterRegistry;
    maxWorkers?: number;
}

/**
 * Runs the selected tasks. Returns the process exit code.
 * Unknown task or reporter names fail before any task runs.
 */
export async function runCommand(options: RunCommandOptions): Promise<number> {
    const plan = selectTasks(options.tasks, options.names);
    const registry = options.registry || createReporterRegistry();
    const createReporter = registry.get(options.reporter || 'console');
    const verbosity = options.verbosity ?? DEFAULT_VERBOSITY;

    const output = options.output;
    let reportFile: ReportFile | undefined;
    let outstream: NodeJS.WritableStream;
    if (typeof output === 'string') {
        reportFile = await openReportFile(output);
        outstream = reportFile.stream;
    } else {
        outstream = output;
    }

    let exitCode: number;
    try {
        const reporter = createReporter(outstream, { showFailuresOnClose: true, showOut: verbosity < 2 });
        exitCode = await withStore(options.dbFile, store => {
            const runner = new Runner(store, reporter, {
                alwaysExecute: options.alwaysExecute,
                continueOnError: options.continueOnError,
                maxWorkers: options.maxWorkers,
                verbosity: options.verbosity,
            });
            return runner.run(plan);
        });
    } catch (e) {
        // the run error is the one reported
        await reportFile?.close().catch(() => undefined);
        throw e;
    }
    await reportFile?.close();
    return exitCode;
}

/**
 * Report file opened by {@link runCommand}.
 */
interface ReportFile {
    stream: NodeJS.WritableStream;
    /** Rejects with the first error the stream met. */
    close(): Promise<void>;
}

/**
 * Opens `filename` for writing. Fails with {@link InvalidCommand} if it cannot be opened.
 */
async function openReportFile(filename: string): Promise<ReportFile> {
    const stream = fs.createWriteStream(filename);
    let failure: Error | undefined;
    stream.on('error', e => {
        failure = failure || e;
    });
    await new Promise<void>((resolve, reject) => {
        stream.once('open', () => resolve());
        stream.once('error', e => reject(new InvalidCommand(`cannot write report to ${filename}: ${e.message}`)));
    });
    return {
        close: () => new Promise<void>((resolve, reject) => {
            if (failure)
                return reject(failure);
            stream.once('error', reject);
            stream.end(() => (failure ? reject(failure) : resolve()));
        }),
        stream,
    };
}

/**
 * Options for {@link listCommand}.
 */
export interface ListCommandOptions extends TaskListOptions {
    /** Needed for `status`. */
    dbFile?: string;
    /** Include sub-tasks in the listing. */
    all?: boolean;
    /** Prefix every line with the task status: `I`gnore, `U`p-to-date or `R`un. */
    status?: boolean;
    /** Include private tasks (names starting with `_`). */
    private?: boolean;
    /** Append the task documentation. */
    doc?: boolean;
    /** Print sub-tasks under their parent. */
    subtasks?: boolean;
}

const STATUS_LETTERS: Record<Status, string> = {
    'ignore': 'I',
    'run': 'R',
    'up-to-date': 'U',
};

/**
 * Lists tasks, one per line, in declaration order.
 */
export async function listCommand(options: ListCommandOptions): Promise<number> {
    const index = indexTasks(options.tasks);
    const names = options.names || [];
    const filtered = names.length > 0;
    const printTasks = filtered ? names.map(name => lookupTask(index, name)) : options.tasks;

    const print = async (store: DependencyStore | undefined): Promise<void> => {
        const printTask = async (task: Task, indent: string): Promise<void> => {
            let line = `${indent}${task.name}`;
            if (options.doc && task.doc)
                line += `\t* ${task.doc}`;
            if (store)
                line = `${STATUS_LETTERS[await store.getStatus(task, index)]} ${line}`;
            options.output.write(`${line}\n`);
            if (options.subtasks) {
                for (const subtask of getSubtasks(index, task))
                    await printTask(subtask, `${indent}  `);
            }
        };
        for (const task of printTasks) {
            // named tasks are never excluded
            if (!filtered && task.isSubtask && !options.all)
                continue;
            if (!filtered && isPrivateTask(task) && !options.private)
                continue;
            await printTask(task, '');
        }
    };

    if (!options.status) {
        await print(undefined);
        return 0;
    }
    const dbFile = options.dbFile;
    if (!dbFile)
        throw new InvalidCommand('listing task status requires a dependency store file');
    await withStore(dbFile, print);
    return 0;
}

/**
 * Options for {@link cleanCommand}.
 */
export interface CleanCommandOptions extends TaskListOptions {
    /** Only print what would be done. */
    dryRun?: boolean;
}

/**
 * Cleans the named tasks (and the members of named group tasks), or all tasks.
 */
export async function cleanCommand(options: CleanCommandOptions): Promise<number> {
    const index = indexTasks(options.tasks);
    const names = options.names || [];
    const toClean: Task[] = [];
    if (!names.length) {
        toClean.push(...options.tasks);
    } else {
        const seen = new Set<string>();
        for (const name of names) {
            for (const task of expandGroup(index, name)) {
                if (seen.has(task.name))
                    continue;
                seen.add(task.name);
                toClean.push(task);
            }
        }
    }

    let exitCode = 0;
    for (const task of toClean) {
        if (!(await cleanTask(task, options.output, !!options.dryRun)))
            exitCode = 1;
    }
    return exitCode;
}

/**
 * Runs the clean procedure of one task. Returns false if a clean action failed.
 */
export async function cleanTask(task: Task, output: NodeJS.WritableStream, dryRun: boolean): Promise<boolean> {
    const clean = task.clean;
    if (clean === false)
        return true;
    if (clean === true) {
        // remove targets, last produced first
        for (const target of [...task.targets].reverse()) {
            if (!(await fs.pathExists(target)))
                continue;
            output.write(`${task.name} - removing file '${target}'\n`);
            if (!dryRun)
                await fs.remove(target);
        }
        return true;
    }
    for (const action of clean) {
        output.write(`${task.name} - executing clean action: ${action.description}\n`);
        if (dryRun)
            continue;
        try {
            await action.execute({ stderr: output, stdout: output, taskName: task.name });
        } catch (error) {
            if (!(error instanceof ActionError))
                throw error;
            output.write(`${task.name} - clean action failed: ${getErrorMessage(error)}\n`);
            return false;
        }
    }
    return true;
}

/**
 * Options for the commands that change the dependency store.
 */
export interface StoreCommandOptions extends TaskListOptions {
    dbFile: string;
}

/**
 * Removes the saved fingerprints of the named tasks and their group members, or of all tasks.
 */
export async function forgetCommand(options: StoreCommandOptions): Promise<number> {
    const index = indexTasks(options.tasks);
    const names = options.names || [];
    // resolve every name before touching the store
    for (const name of names)
        lookupTask(index, name);

    await withStore(options.dbFile, async store => {
        if (!names.length) {
            store.removeAll();
            options.output.write('forgetting all tasks\n');
            return;
        }
        for (const name of names) {
            for (const task of expandGroup(index, name)) {
                store.remove(task.name);
                options.output.write(`forgetting ${task.name}\n`);
            }
        }
    });
    return 0;
}

/**
 * Outcome of {@link ignoreCommand}.
 */
export enum IgnoreOutcome {
    Done,
    /** No task was named: nothing was changed. */
    NothingSelected,
}

/**
 * Options for {@link ignoreCommand}.
 */
export interface IgnoreCommandOptions extends StoreCommandOptions {
    /** Remove the ignore mark instead of setting it. */
    undo?: boolean;
}

/**
 * Marks the named tasks and their group members as ignored. At least one task must be named.
 */
export async function ignoreCommand(options: IgnoreCommandOptions): Promise<IgnoreOutcome> {
    const names = options.names || [];
    if (!names.length) {
        options.output.write('You cannot ignore all tasks! Please select a task.\n');
        return IgnoreOutcome.NothingSelected;
    }
    const index = indexTasks(options.tasks);
    for (const name of names)
        lookupTask(index, name);

    await withStore(options.dbFile, async store => {
        for (const name of names) {
            for (const task of expandGroup(index, name)) {
                if (options.undo) {
                    store.unignore(task.name);
                    options.output.write(`unignoring ${task.name}\n`);
                } else {
                    store.ignore(task);
                    options.output.write(`ignoring ${task.name}\n`);
                }
            }
        }
    });
    return IgnoreOutcome.Done;
}

/**
 * Options for {@link autoCommand}.
 */
export interface AutoCommandOptions extends StoreCommandOptions {
    verbosity?: Verbosity;
    registry?: ReporterRegistry;
    /** Checked after every re-run; the loop ends when it returns true. */
    stop?: () => boolean;
    signal?: AbortSignal;
    /** Default: `fs.watch`. */
    source?: WatchEventSource;
}

/**
 * Runs the selected tasks, then runs them again every time one of their file dependencies is modified.
 * The set of watched files is computed once, from the initial selection.
 */
export async function autoCommand(options: AutoCommandOptions): Promise<void> {
    const plan = selectTasks(options.tasks, options.names);
    const files = new Set<string>();
    for (const task of plan) {
        for (const filename of task.fileDep)
            files.add(filename);
    }

    const run = () => runCommand({
        dbFile: options.dbFile,
        names: options.names,
        output: options.output,
        registry: options.registry,
        reporter: 'executed-only',
        tasks: options.tasks,
        verbosity: options.verbosity,
    });

    await run();
    if (options.signal?.aborted || options.stop?.())
        return;
    const watcher = new FileModifyWatcher(files, options.source);
    await watcher.loop(async () => {
        await run();
    }, { signal: options.signal, stop: options.stop });
}
