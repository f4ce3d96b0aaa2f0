/**
 * @module
 * Task selection: turns requested task names into an ordered execution plan.
 */
import {
    InvalidCommand,
    SelectionError,
} from './errors';
import {
    Task,
} from './task';

interface Frame {
    task: Task;
    /** Index of the next task dependency to visit. */
    next: number;
}

/**
 * Builds the name to task index. Task names must be unique.
 */
export function indexTasks(tasks: Iterable<Task>): Map<string, Task> {
    const index = new Map<string, Task>();
    for (const task of tasks) {
        if (index.has(task.name))
            throw new InvalidCommand(`Task names must be unique: '${task.name}' is defined twice.`);
        index.set(task.name, task);
    }
    return index;
}

/**
 * Returns the task called `name`.
 *
 * @param dependent the task that refers to `name`, if any, for the error message
 */
export function lookupTask(index: ReadonlyMap<string, Task>, name: string, dependent?: Task): Task {
    const task = index.get(name);
    if (!task) {
        const suffix = dependent ? ` (task dependency of '${dependent.name}')` : '';
        throw new InvalidCommand(`'${name}' is not a task${suffix}.`);
    }
    return task;
}

/**
 * Returns the execution plan for `requested`, or for every top-level task if nothing is requested.
 *
 * Every task comes after all of its transitive task dependencies and appears only once.
 * Independent tasks keep the order in which they were requested or declared.
 */
export function selectTasks(allTasks: readonly Task[], requested?: readonly string[]): Task[] {
    const index = indexTasks(allTasks);
    const roots = requested && requested.length ?
        requested.map(name => lookupTask(index, name)) :
        allTasks.filter(task => !task.isSubtask);

    const plan: Task[] = [];
    const state = new Map<string, 'visiting' | 'done'>();
    for (const root of roots) {
        if (state.has(root.name))
            continue;
        state.set(root.name, 'visiting');
        const path: Frame[] = [{ next: 0, task: root }];
        while (path.length) {
            const frame = path[path.length - 1];
            if (frame.next >= frame.task.taskDep.length) {
                path.pop();
                state.set(frame.task.name, 'done');
                plan.push(frame.task);
                continue;
            }
            const dep = lookupTask(index, frame.task.taskDep[frame.next++], frame.task);
            const depState = state.get(dep.name);
            if (depState === 'done')
                continue;
            if (depState === 'visiting') {
                const names = path.map(x => x.task.name);
                const cycle = [...names.slice(names.indexOf(dep.name)), dep.name];
                throw new SelectionError(`circular task dependency: ${cycle.join(' -> ')}`);
            }
            state.set(dep.name, 'visiting');
            path.push({ next: 0, task: dep });
        }
    }
    return plan;
}

/**
 * Yields the task called `name` and, if it is a group task, its members, breadth-first.
 * Each task is yielded once even if it is reachable through several groups.
 */
export function* expandGroup(index: ReadonlyMap<string, Task>, name: string): IterableIterator<Task> {
    const queue = [lookupTask(index, name)];
    const seen = new Set<string>([name]);
    for (let i = 0; i < queue.length; i++) {
        const task = queue[i];
        yield task;
        if (task.actions.length)
            continue;
        for (const depName of task.taskDep) {
            if (seen.has(depName))
                continue;
            seen.add(depName);
            queue.push(lookupTask(index, depName, task));
        }
    }
}

/**
 * Returns the sub-tasks generated for `task`, in declaration order.
 */
export function getSubtasks(index: ReadonlyMap<string, Task>, task: Task): Task[] {
    const prefix = `${task.name}:`;
    const subtasks: Task[] = [];
    for (const name of task.taskDep) {
        const subtask = index.get(name);
        if (subtask && subtask.isSubtask && name.startsWith(prefix))
            subtasks.push(subtask);
    }
    return subtasks;
}
