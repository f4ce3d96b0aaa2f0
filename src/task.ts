import {
    CallableAction,
    CommandAction,
} from './action';

/**
 * Output verbosity: 0 and 1 capture stdout and stderr, 2 streams both as they are written.
 * Captured output is only shown when the task fails.
 */
export type Verbosity = 0 | 1 | 2;

export const DEFAULT_VERBOSITY: Verbosity = 1;

/**
 * Destination for action output.
 */
export interface OutputWriter {
    write(chunk: string | Buffer): void;
}

/**
 * Context that will be passed to an action during execution.
 */
export interface ActionContext {
    /** Name of the task being executed. */
    readonly taskName: string;
    readonly stdout: OutputWriter;
    readonly stderr: OutputWriter;
}

/**
 * Value returned by an in-process action. `false` signals failure, a string is treated as output.
 */
export type ActionReturn = void | undefined | boolean | string;

/**
 * Function that implements an in-process action.
 */
export type ActionFunction = (ctx: ActionContext) => ActionReturn | Promise<ActionReturn>;

/**
 * A single executable step of a task.
 * `execute()` rejects with an {@link ActionError} when the step does not succeed.
 */
export interface Action {
    readonly description: string;
    execute(ctx: ActionContext): Promise<void>;
}

/**
 * How a task is cleaned: not at all, by removing its targets, or by running actions.
 */
export type CleanSpec = boolean | readonly Action[];

/**
 * Represents a task.
 */
export interface Task {
    /** Unique task name. Sub-tasks are named `parent:child`. */
    readonly name: string;
    readonly actions: readonly Action[];
    /** Files read by the task. */
    readonly fileDep: readonly string[];
    /** Tasks that must be resolved before this one. */
    readonly taskDep: readonly string[];
    /** Files produced by the task. */
    readonly targets: readonly string[];
    readonly doc?: string;
    readonly isSubtask: boolean;
    /** Overrides the verbosity requested for the run. */
    readonly verbosity?: Verbosity;
    readonly clean: CleanSpec;
}

/**
 * Anything that can be turned into an {@link Action}: a shell command, an argv array,
 * a function or an action object.
 */
export type ActionDefinition = string | readonly string[] | ActionFunction | Action;

/**
 * Loose task description accepted by {@link createTask}.
 */
export interface TaskDefinition {
    name: string;
    actions?: readonly ActionDefinition[];
    fileDep?: readonly string[];
    taskDep?: readonly string[];
    targets?: readonly string[];
    doc?: string;
    isSubtask?: boolean;
    verbosity?: Verbosity;
    clean?: boolean | readonly ActionDefinition[];
}

/**
 * Converts an action definition into an action.
 */
export function toAction(def: ActionDefinition): Action {
    if (typeof def === 'string')
        return new CommandAction(def);
    if (typeof def === 'function')
        return new CallableAction(def);
    if (isArgv(def))
        return new CommandAction(def);
    return def;
}

/**
 * Constructs a new {@link Task}.
 */
export function createTask(def: TaskDefinition): Task {
    if (!def.name)
        throw new Error('task name must not be empty');
    const clean = def.clean;
    return {
        actions: (def.actions || []).map(toAction),
        clean: typeof clean === 'boolean' || clean === undefined ? !!clean : clean.map(toAction),
        doc: def.doc,
        fileDep: dedupe(def.fileDep || []),
        isSubtask: !!def.isSubtask,
        name: def.name,
        targets: dedupe(def.targets || []),
        taskDep: dedupe(def.taskDep || []),
        verbosity: def.verbosity,
    };
}

/**
 * A group task has no actions of its own and only aggregates its task dependencies.
 */
export function isGroupTask(task: Task): boolean {
    return !task.actions.length && task.taskDep.length > 0;
}

/**
 * Private tasks are hidden from listings unless asked for.
 */
export function isPrivateTask(task: Task): boolean {
    return task.name.startsWith('_');
}

function isArgv(def: ActionDefinition): def is readonly string[] {
    return Array.isArray(def);
}

function dedupe(items: readonly string[]): string[] {
    return [...new Set(items)];
}
