/**
 * @module
 * Loads task definitions from a YAML or JSON task file.
 *
 * ```yaml
 * tasks:
 *   compile:
 *     actions: ["tsc -p ."]
 *     file_dep: [src/main.ts]
 *     targets: [dist/main.js]
 *   lint:
 *     subtasks:
 *       src: { actions: [["eslint", "src"]] }
 *       test: { actions: [["eslint", "test"]] }
 * ```
 *
 * Paths in the file are relative to the directory the tasks run in.
 */
import {
    InvalidCommand,
    getErrorMessage,
} from './errors';
import {
    Task,
    TaskDefinition,
    createTask,
} from './task';
import {
    z,
} from 'zod';
import fs = require('fs-extra');
import path = require('path');
import YAML = require('yaml');

const actionSchema = z.union([
    z.string().min(1),
    z.array(z.string()).min(1),
]);

const taskSpecSchema = z.object({
    actions: z.array(actionSchema).optional(),
    clean: z.union([z.boolean(), z.array(actionSchema)]).optional(),
    doc: z.string().optional(),
    file_dep: z.array(z.string()).optional(),
    targets: z.array(z.string()).optional(),
    task_dep: z.array(z.string()).optional(),
    verbosity: z.union([z.literal(0), z.literal(1), z.literal(2)]).optional(),
}).strict();

const parentSpecSchema = taskSpecSchema.extend({
    subtasks: z.record(taskSpecSchema).optional(),
}).strict();

const taskFileSchema = z.object({
    tasks: z.record(parentSpecSchema),
}).strict();

type TaskSpec = z.infer<typeof taskSpecSchema>;

/**
 * Reads and validates a task file. `.yaml`/`.yml` files are parsed as YAML, `.json` as JSON.
 */
export async function loadTaskFile(filename: string): Promise<Task[]> {
    const ext = path.extname(filename).toLowerCase();
    if (ext !== '.yaml' && ext !== '.yml' && ext !== '.json')
        throw new InvalidCommand(`${filename}: unsupported task file type '${ext}', use .yaml, .yml or .json`);

    let contents: string;
    try {
        contents = await fs.readFile(filename, 'utf-8');
    } catch (e) {
        throw new InvalidCommand(`${filename}: cannot read task file: ${getErrorMessage(e)}`);
    }

    let data: unknown;
    try {
        data = ext === '.json' ? JSON.parse(contents) : YAML.parse(contents);
    } catch (e) {
        throw new InvalidCommand(`${filename}: ${getErrorMessage(e)}`);
    }
    return parseTaskFile(data, filename);
}

/**
 * Validates parsed task file contents and converts them into tasks, in declaration order.
 * A task with `subtasks` becomes a group over its `parent:child` sub-tasks.
 */
export function parseTaskFile(data: unknown, source: string): Task[] {
    const parsed = taskFileSchema.safeParse(data);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue.path.length ? `${issue.path.join('.')}: ` : '';
        throw new InvalidCommand(`${source}: ${where}${issue.message}`);
    }

    const tasks: Task[] = [];
    for (const [name, spec] of Object.entries(parsed.data.tasks)) {
        const subtasks = Object.entries(spec.subtasks || {});
        if (subtasks.length && spec.actions && spec.actions.length)
            throw new InvalidCommand(`${source}: tasks.${name}: a task with subtasks cannot have actions`);
        const subtaskNames = subtasks.map(([child]) => `${name}:${child}`);
        tasks.push(createTask({
            ...toDefinition(name, spec),
            taskDep: [...subtaskNames, ...(spec.task_dep || [])],
        }));
        for (const [child, subspec] of subtasks)
            tasks.push(createTask({ ...toDefinition(`${name}:${child}`, subspec), isSubtask: true }));
    }
    return tasks;
}

function toDefinition(name: string, spec: TaskSpec): TaskDefinition {
    return {
        actions: spec.actions,
        clean: spec.clean,
        doc: spec.doc,
        fileDep: spec.file_dep,
        name,
        targets: spec.targets,
        taskDep: spec.task_dep,
        verbosity: spec.verbosity,
    };
}
