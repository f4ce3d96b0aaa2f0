/**
 * @module
 * freshen Public API
 */
import {
    RunCommandOptions,
    runCommand,
} from './commands';
import {
    DEFAULT_CONFIG,
} from './config';
import {
    InvalidCommand,
} from './errors';
import {
    Task,
    TaskDefinition,
    createTask,
} from './task';

/**
 * Options for {@link Builder#run}
 */
export type BuilderRunOptions = Partial<Omit<RunCommandOptions, 'tasks' | 'dbFile'>>;

/**
 * Represents a set of tasks to be run.
 */
export interface Builder {
    /** Add a task. Returns the normalized task. */
    addTask(task: TaskDefinition): Task;
    /** Run the stale tasks. Resolves to the exit code. */
    run(options?: BuilderRunOptions): Promise<number>;
}

class BuilderImpl implements Builder {
    private readonly dbFilename: string;
    private readonly tasks: Task[];

    constructor(dbFilename: string) {
        this.dbFilename = dbFilename;
        this.tasks = [];
    }

    addTask(def: TaskDefinition): Task {
        if (this.tasks.some(task => task.name === def.name))
            throw new InvalidCommand(`Task names must be unique: '${def.name}' is defined twice.`);
        const task = createTask(def);
        this.tasks.push(task);
        return task;
    }

    run(options?: BuilderRunOptions): Promise<number> {
        const runOptions = options || {};
        return runCommand({
            ...runOptions,
            dbFile: this.dbFilename,
            output: runOptions.output || process.stdout,
            tasks: this.tasks,
        });
    }
}

/**
 * Construct a new build context.
 *
 * @param dbFilename the dependency store file, or `.freshen.json` if not provided.
 */
export function newBuilder(dbFilename: string = DEFAULT_CONFIG.dbFile): Builder {
    return new BuilderImpl(dbFilename);
}

export {
    autoCommand,
    cleanCommand,
    forgetCommand,
    ignoreCommand,
    IgnoreOutcome,
    listCommand,
    runCommand,
} from './commands';
export type {
    AutoCommandOptions,
    CleanCommandOptions,
    IgnoreCommandOptions,
    ListCommandOptions,
    RunCommandOptions,
    StoreCommandOptions,
} from './commands';
export {
    CallableAction,
    CommandAction,
} from './action';
export {
    DependencyStore,
    openStore,
    withStore,
} from './db';
export type {
    DependencyRecord,
    Fingerprints,
    Status,
} from './db';
export {
    ActionError,
    DependencyFailed,
    InvalidCommand,
    SelectionError,
    StoreError,
    TaskError,
    TaskFailed,
    WatchSetupError,
} from './errors';
export {
    loadTaskFile,
    parseTaskFile,
} from './loader';
export {
    ConsoleReporter,
    createReporterRegistry,
    ExecutedOnlyReporter,
    JsonReporter,
    ReporterRegistry,
} from './reporter';
export type {
    CapturedOutput,
    Reporter,
    ReporterFactory,
    ReporterOptions,
} from './reporter';
export {
    Runner,
} from './runner';
export type {
    RunOptions,
    TaskResult,
} from './runner';
export {
    expandGroup,
    selectTasks,
} from './selector';
export {
    createTask,
} from './task';
export type {
    Action,
    ActionContext,
    ActionFunction,
    Task,
    TaskDefinition,
    Verbosity,
} from './task';
export {
    FileModifyWatcher,
    FsWatchSource,
} from './watch';
export type {
    WatchEvent,
    WatchEventSource,
} from './watch';
