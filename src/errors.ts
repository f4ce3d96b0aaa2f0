/**
 * @module
 * Error taxonomy.
 *
 * {@link InvalidCommand} and {@link SelectionError} are raised before any task runs.
 * {@link ActionError} subclasses never leave the runner: they are handed to the reporter.
 */

/**
 * User-facing error in the command request: unknown task, unknown reporter, bad option value.
 */
export class InvalidCommand extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidCommand';
    }
}

/**
 * The task dependency graph cannot be ordered.
 */
export class SelectionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SelectionError';
    }
}

/**
 * The dependency store file could not be read or written.
 */
export class StoreError extends Error {
    readonly filename: string;

    constructor(filename: string, message: string, options?: { cause?: unknown }) {
        super(`dependency store ${filename}: ${message}`, options);
        this.name = 'StoreError';
        this.filename = filename;
    }
}

/**
 * The filesystem notification mechanism could not be set up.
 */
export class WatchSetupError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'WatchSetupError';
    }
}

/**
 * Base class for the outcome of a task that did not succeed.
 */
export abstract class ActionError extends Error {
    /** Name of the task the error belongs to. */
    readonly taskName: string;

    constructor(taskName: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.taskName = taskName;
    }
}

/**
 * An action completed but reported failure: non-zero exit code or a `false` return value.
 */
export class TaskFailed extends ActionError {
    constructor(taskName: string, message: string) {
        super(taskName, message);
        this.name = 'TaskFailed';
    }
}

/**
 * An action could not complete: it threw, or its process could not be spawned.
 */
export class TaskError extends ActionError {
    constructor(taskName: string, message: string, options?: { cause?: unknown }) {
        super(taskName, message, options);
        this.name = 'TaskError';
    }
}

/**
 * The task was not started because one of its task dependencies failed.
 */
export class DependencyFailed extends ActionError {
    readonly dependency: string;

    constructor(taskName: string, dependency: string) {
        super(taskName, `dependency '${dependency}' failed`);
        this.name = 'DependencyFailed';
        this.dependency = dependency;
    }
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
