/**
 * @module
 * Dependency store: persisted fingerprints of every task's last successful execution.
 */
import {
    InvalidCommand,
    SelectionError,
    StoreError,
    TaskError,
    getErrorMessage,
} from './errors';
import {
    Task,
} from './task';
import {
    z,
} from 'zod';
import crypto = require('crypto');
import fs = require('fs-extra');

// Record types
// The key names are very short to reduce database file size.

/**
 * Fingerprint of a file dependency.
 */
export interface FileFingerprint {
    /** mtime in milliseconds. */
    m: number;
    /** Size in bytes. */
    s: number;
    /** md5 digest of the content. */
    h: string;
}

/**
 * Fingerprints of everything a task depends on, taken right after it succeeded.
 */
export interface Fingerprints {
    /** File path to fingerprint. */
    files: Record<string, FileFingerprint>;
    /** Task dependency name to the `rev` of its record. */
    tasks: Record<string, string>;
}

/**
 * Persisted state of one task.
 */
export interface DependencyRecord extends Fingerprints {
    /** Digest of the fingerprints. Absent if the task never succeeded. */
    rev?: string;
    ignored?: boolean;
}

/**
 * Task status as computed by {@link DependencyStore#getStatus}.
 */
export type Status = 'ignore' | 'up-to-date' | 'run';

const fileFingerprintSchema = z.object({
    h: z.string(),
    m: z.number(),
    s: z.number(),
});

const recordSchema = z.object({
    files: z.record(fileFingerprintSchema),
    ignored: z.boolean().optional(),
    rev: z.string().optional(),
    tasks: z.record(z.string()),
});

const storeSchema = z.record(recordSchema);

/**
 * Store for persisting task fingerprints between runs.
 * The store is the only writer of the file; call {@link close} (or use {@link withStore}) to flush it.
 */
export class DependencyStore {
    private readonly records: Map<string, DependencyRecord>;
    private readonly filename?: string;
    private dirty: boolean;
    private closed: boolean;

    constructor(records?: Iterable<[string, DependencyRecord]>, filename?: string) {
        this.records = new Map(records || []);
        this.filename = filename;
        this.dirty = false;
        this.closed = false;
    }

    getRecord(name: string): DependencyRecord | undefined {
        return this.records.get(name);
    }

    names(): string[] {
        return [...this.records.keys()];
    }

    /**
     * Computes the status of `task`. `tasks` is used to look up its task dependencies.
     */
    getStatus(task: Task, tasks: ReadonlyMap<string, Task>): Promise<Status> {
        return new StatusChecker(this.records, tasks).check(task);
    }

    /**
     * Takes the fingerprints of the file and task dependencies of `task` as they are now.
     */
    async computeFingerprints(task: Task): Promise<Fingerprints> {
        const files: Record<string, FileFingerprint> = {};
        for (const filename of task.fileDep) {
            const fingerprint = await fingerprintFile(filename);
            if (!fingerprint)
                throw new TaskError(task.name, `Dependent file '${filename}' does not exist.`);
            files[filename] = fingerprint;
        }
        const tasks: Record<string, string> = {};
        for (const name of task.taskDep)
            tasks[name] = this.records.get(name)?.rev ?? '';
        return { files, tasks };
    }

    /**
     * Replaces the record of `task`. Only call this after its actions succeeded.
     */
    commit(task: Task, fingerprints: Fingerprints): void {
        this.assertOpen();
        const record: DependencyRecord = {
            files: { ...fingerprints.files },
            rev: digest(fingerprints),
            tasks: { ...fingerprints.tasks },
        };
        if (this.records.get(task.name)?.ignored)
            record.ignored = true;
        this.records.set(task.name, record);
        this.dirty = true;
    }

    remove(name: string): void {
        this.assertOpen();
        if (this.records.delete(name))
            this.dirty = true;
    }

    removeAll(): void {
        this.assertOpen();
        if (this.records.size)
            this.dirty = true;
        this.records.clear();
    }

    /**
     * Marks the task as ignored. Existing fingerprints are kept.
     */
    ignore(task: Task): void {
        this.assertOpen();
        const record = this.records.get(task.name);
        this.records.set(task.name, record ? { ...record, ignored: true } : { files: {}, ignored: true, tasks: {} });
        this.dirty = true;
    }

    unignore(name: string): void {
        this.assertOpen();
        const record = this.records.get(name);
        if (!record || !record.ignored)
            return;
        const unignored: DependencyRecord = { files: record.files, tasks: record.tasks };
        if (record.rev !== undefined)
            unignored.rev = record.rev;
        this.records.set(name, unignored);
        this.dirty = true;
    }

    /**
     * Writes the store to its file, if it has one and anything changed.
     * The file is replaced atomically.
     */
    async close(): Promise<void> {
        if (this.closed)
            return;
        this.closed = true;
        if (!this.filename || !this.dirty)
            return;
        const data: Record<string, DependencyRecord> = {};
        for (const name of [...this.records.keys()].sort()) {
            const record = this.records.get(name);
            if (record)
                data[name] = record;
        }
        const tmp = `${this.filename}.tmp.${process.pid}`;
        try {
            await fs.writeFile(tmp, JSON.stringify(data, undefined, 1) + '\n');
            await fs.rename(tmp, this.filename);
        } catch (e) {
            throw new StoreError(this.filename, `cannot write: ${getErrorMessage(e)}`, { cause: e });
        }
        this.dirty = false;
    }

    private assertOpen(): void {
        if (this.closed)
            throw new Error('dependency store is closed');
    }
}

/**
 * Computes statuses for one query, memoizing task dependencies that are reached more than once.
 */
class StatusChecker {
    private readonly records: ReadonlyMap<string, DependencyRecord>;
    private readonly tasks: ReadonlyMap<string, Task>;
    private readonly memo: Map<string, Status>;
    private readonly stack: string[];

    constructor(records: ReadonlyMap<string, DependencyRecord>, tasks: ReadonlyMap<string, Task>) {
        this.records = records;
        this.tasks = tasks;
        this.memo = new Map();
        this.stack = [];
    }

    async check(task: Task): Promise<Status> {
        const known = this.memo.get(task.name);
        if (known)
            return known;
        if (this.stack.includes(task.name)) {
            const cycle = [...this.stack.slice(this.stack.indexOf(task.name)), task.name];
            throw new SelectionError(`circular task dependency: ${cycle.join(' -> ')}`);
        }
        this.stack.push(task.name);
        const status = await this.compute(task);
        this.stack.pop();
        this.memo.set(task.name, status);
        return status;
    }

    private async compute(task: Task): Promise<Status> {
        const record = this.records.get(task.name);
        if (record && record.ignored)
            return 'ignore';
        if (!record || record.rev === undefined)
            return 'run';

        for (const target of task.targets) {
            if (!(await fs.pathExists(target)))
                return 'run';
        }

        // A dependency added or removed since the last run also makes the task stale.
        if (Object.keys(record.files).length !== task.fileDep.length)
            return 'run';
        for (const filename of task.fileDep) {
            const fingerprint = record.files[filename];
            if (!fingerprint || !(await fileMatches(filename, fingerprint)))
                return 'run';
        }

        if (Object.keys(record.tasks).length !== task.taskDep.length)
            return 'run';
        for (const name of task.taskDep) {
            const dep = this.tasks.get(name);
            if (!dep)
                throw new InvalidCommand(`'${name}' is not a task (task dependency of '${task.name}').`);
            if ((await this.check(dep)) === 'run')
                return 'run';
            if ((this.records.get(name)?.rev ?? '') !== record.tasks[name])
                return 'run';
        }
        return 'up-to-date';
    }
}

/**
 * Open the store persisted in `filename`. A missing file gives an empty store.
 */
export async function openStore(filename: string): Promise<DependencyStore> {
    let contents: string;
    try {
        if (!(await fs.pathExists(filename)))
            return new DependencyStore(undefined, filename);
        contents = await fs.readFile(filename, 'utf-8');
    } catch (e) {
        throw new StoreError(filename, `cannot read: ${getErrorMessage(e)}`, { cause: e });
    }

    let raw: unknown;
    try {
        raw = JSON.parse(contents);
    } catch (e) {
        throw new StoreError(filename, `malformed data: ${getErrorMessage(e)}`, { cause: e });
    }
    const parsed = storeSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new StoreError(filename, `invalid record at '${issue.path.join('.')}': ${issue.message}`);
    }
    return new DependencyStore(Object.entries(parsed.data), filename);
}

/**
 * Opens the store, passes it to `fn` and closes it on every exit path.
 * When `fn` throws, its error is the one that propagates, even if closing fails too.
 */
export async function withStore<T>(filename: string, fn: (store: DependencyStore) => Promise<T>): Promise<T> {
    const store = await openStore(filename);
    let result: T;
    try {
        result = await fn(store);
    } catch (e) {
        await store.close().catch(() => undefined);
        throw e;
    }
    await store.close();
    return result;
}

/**
 * Returns the mtime and size of the file.
 */
export async function statFile(filename: string): Promise<[number, number]> {
    let stats;
    try {
        stats = await fs.stat(filename);
    } catch (e) {
        return [-1, -1];
    }
    return [stats.mtimeMs, stats.size];
}

/**
 * Returns the fingerprint of the file, or undefined if it does not exist.
 */
export async function fingerprintFile(filename: string): Promise<FileFingerprint | undefined> {
    const [m, s] = await statFile(filename);
    if (s < 0)
        return undefined;
    return { h: await hashFile(filename), m, s };
}

async function fileMatches(filename: string, fingerprint: FileFingerprint): Promise<boolean> {
    const [mtime, size] = await statFile(filename);
    if (size < 0 || size !== fingerprint.s)
        return false;
    if (mtime === fingerprint.m)
        return true;
    // touched but maybe not modified
    return (await hashFile(filename)) === fingerprint.h;
}

async function hashFile(filename: string): Promise<string> {
    const hash = crypto.createHash('md5');
    hash.update(await fs.readFile(filename));
    return hash.digest('hex');
}

function digest(fingerprints: Fingerprints): string {
    const hash = crypto.createHash('md5');
    for (const name of Object.keys(fingerprints.files).sort())
        hash.update(`f\0${name}\0${fingerprints.files[name].h}\n`);
    for (const name of Object.keys(fingerprints.tasks).sort())
        hash.update(`t\0${name}\0${fingerprints.tasks[name]}\n`);
    return hash.digest('hex');
}
