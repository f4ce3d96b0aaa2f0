/**
 * @module
 * Reporters render task lifecycle events.
 */
import {
    ActionError,
    InvalidCommand,
} from './errors';
import {
    Task,
} from './task';
import chalk = require('chalk');

/**
 * Output an action produced while its task ran, kept back until the task finished.
 */
export interface CapturedOutput {
    stdout: string;
    stderr: string;
}

/**
 * Options every reporter is constructed with.
 */
export interface ReporterOptions {
    /** Show captured output of failed tasks. */
    showOut: boolean;
    /** Print failure details once at the end of the run instead of as they happen. */
    showFailuresOnClose: boolean;
    /** Colorize output. Default: true if the output stream is a TTY. */
    color?: boolean;
}

/**
 * Receives task lifecycle events from the runner.
 */
export interface Reporter {
    executeTask(task: Task): void;
    skipUptodate(task: Task): void;
    skipIgnore(task: Task): void;
    addSuccess(task: Task): void;
    /** `output` holds whatever was captured and not yet written. */
    addFailure(task: Task, error: ActionError, output: CapturedOutput): void;
    /** Output streamed while a task runs. */
    writeStdout(chunk: string | Buffer): void;
    writeStderr(chunk: string | Buffer): void;
    /** Called once, after the last task. */
    completeRun(): void;
}

/**
 * Constructs a reporter writing to `outstream`.
 */
export type ReporterFactory = (outstream: NodeJS.WritableStream, options: ReporterOptions) => Reporter;

interface Failure {
    task: Task;
    error: ActionError;
    output: CapturedOutput;
}

/**
 * Default reporter: one line per task, failure details with the captured output.
 */
export class ConsoleReporter implements Reporter {
    protected readonly stream: NodeJS.WritableStream;
    protected readonly options: ReporterOptions;
    private readonly failures: Failure[];
    private readonly chalk: chalk.Chalk;

    constructor(stream: NodeJS.WritableStream, options: ReporterOptions) {
        this.stream = stream;
        this.options = options;
        this.failures = [];
        this.chalk = new chalk.Instance({ level: (options.color ?? isTTY(stream)) ? 1 : 0 });
    }

    executeTask(task: Task): void {
        // group tasks have nothing to show
        if (task.actions.length)
            this.write(`.  ${task.name}\n`);
    }

    skipUptodate(task: Task): void {
        this.write(`${this.chalk.dim(`-- ${task.name}`)}\n`);
    }

    skipIgnore(task: Task): void {
        this.write(`${this.chalk.yellow(`!! ${task.name}`)}\n`);
    }

    addSuccess(_task: Task): void {
        // nothing to report
    }

    addFailure(task: Task, error: ActionError, output: CapturedOutput): void {
        const failure = { error, output, task };
        if (this.options.showFailuresOnClose)
            this.failures.push(failure);
        else
            this.writeFailure(failure);
    }

    writeStdout(chunk: string | Buffer): void {
        this.write(chunk);
    }

    writeStderr(chunk: string | Buffer): void {
        this.write(chunk);
    }

    completeRun(): void {
        for (const failure of this.failures)
            this.writeFailure(failure);
        this.failures.length = 0;
    }

    protected write(chunk: string | Buffer): void {
        this.stream.write(chunk);
    }

    private writeFailure(failure: Failure): void {
        this.write(`${'#'.repeat(40)}\n`);
        this.write(`${this.chalk.red(`${failure.error.name} - ${failure.task.name}`)}\n`);
        this.write(`${failure.error.message}\n`);
        if (!this.options.showOut)
            return;
        for (const text of [failure.output.stdout, failure.output.stderr]) {
            if (text)
                this.write(text.endsWith('\n') ? text : `${text}\n`);
        }
    }
}

/**
 * Like {@link ConsoleReporter}, but silent about tasks that were not executed.
 */
export class ExecutedOnlyReporter extends ConsoleReporter {
    skipUptodate(_task: Task): void {
        // skipped tasks are not shown
    }

    skipIgnore(_task: Task): void {
        // skipped tasks are not shown
    }
}

/**
 * Result entry of {@link JsonReporter}.
 */
export interface JsonTaskResult {
    name: string;
    result: 'success' | 'fail' | 'up-to-date' | 'ignore';
    out: string;
    err: string;
    error?: string;
}

/**
 * Writes a single JSON document with the result of every task when the run completes.
 */
export class JsonReporter implements Reporter {
    private readonly stream: NodeJS.WritableStream;
    private readonly results: JsonTaskResult[];
    private out: string;
    private err: string;

    constructor(stream: NodeJS.WritableStream, _options: ReporterOptions) {
        this.stream = stream;
        this.results = [];
        this.out = '';
        this.err = '';
    }

    executeTask(_task: Task): void {
        // result is recorded when the task finishes
    }

    skipUptodate(task: Task): void {
        this.results.push({ err: '', name: task.name, out: '', result: 'up-to-date' });
    }

    skipIgnore(task: Task): void {
        this.results.push({ err: '', name: task.name, out: '', result: 'ignore' });
    }

    addSuccess(task: Task): void {
        this.results.push({ err: '', name: task.name, out: '', result: 'success' });
    }

    addFailure(task: Task, error: ActionError, output: CapturedOutput): void {
        this.results.push({
            err: output.stderr,
            error: error.message,
            name: task.name,
            out: output.stdout,
            result: 'fail',
        });
    }

    writeStdout(chunk: string | Buffer): void {
        this.out += chunk.toString();
    }

    writeStderr(chunk: string | Buffer): void {
        this.err += chunk.toString();
    }

    completeRun(): void {
        const doc = {
            err: this.err,
            out: this.out,
            tasks: this.results,
        };
        this.stream.write(JSON.stringify(doc, undefined, 2) + '\n');
    }
}

/**
 * Maps reporter names to reporter factories.
 */
export class ReporterRegistry {
    private readonly factories: Map<string, ReporterFactory>;

    constructor() {
        this.factories = new Map();
    }

    register(name: string, factory: ReporterFactory): this {
        this.factories.set(name, factory);
        return this;
    }

    has(name: string): boolean {
        return this.factories.has(name);
    }

    /**
     * Returns the factory registered as `name`.
     */
    get(name: string): ReporterFactory {
        const factory = this.factories.get(name);
        if (!factory)
            throw new InvalidCommand(`No reporter named '${name}'. Available reporters: ${this.names().join(', ')}.`);
        return factory;
    }

    names(): string[] {
        return [...this.factories.keys()];
    }
}

/**
 * Creates a registry holding the built-in reporters.
 */
export function createReporterRegistry(): ReporterRegistry {
    return new ReporterRegistry()
        .register('console', (stream, options) => new ConsoleReporter(stream, options))
        .register('executed-only', (stream, options) => new ExecutedOnlyReporter(stream, options))
        .register('json', (stream, options) => new JsonReporter(stream, options));
}

function isTTY(stream: NodeJS.WritableStream): boolean {
    return 'isTTY' in stream && stream.isTTY === true;
}
