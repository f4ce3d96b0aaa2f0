/**
 * @module
 * Watches file dependencies and reports their modifications.
 */
import {
    WatchSetupError,
    getErrorMessage,
} from './errors';
import fs = require('fs-extra');
import path = require('path');

/**
 * A filesystem notification. `path` is absolute.
 */
export interface WatchEvent {
    type: 'change' | 'rename';
    path: string;
}

/**
 * Stream of events for a set of watched directories.
 */
export interface WatchSubscription extends AsyncIterable<WatchEvent> {
    close(): void;
    /** Drops the queued events that `match` accepts. */
    discard(match: (event: WatchEvent) => boolean): void;
}

/**
 * Filesystem notification mechanism. Only directory granularity is required.
 */
export interface WatchEventSource {
    /** Throws {@link WatchSetupError} if the directories cannot be watched. */
    watch(dirs: readonly string[]): WatchSubscription;
}

/**
 * Unbounded queue consumed through async iteration.
 */
export class EventChannel<T> implements AsyncIterable<T> {
    private readonly queue: T[];
    private waiting?: {
        resolve: (result: IteratorResult<T>) => void;
        reject: (error: unknown) => void;
    };
    private failure?: { error: unknown };
    private done: boolean;

    constructor() {
        this.queue = [];
        this.done = false;
    }

    push(item: T): void {
        if (this.done)
            return;
        const waiting = this.waiting;
        if (waiting) {
            this.waiting = undefined;
            waiting.resolve({ done: false, value: item });
        } else {
            this.queue.push(item);
        }
    }

    /**
     * Removes the queued items that `match` accepts.
     */
    discard(match: (item: T) => boolean): void {
        const kept = this.queue.filter(item => !match(item));
        this.queue.splice(0, this.queue.length, ...kept);
    }

    close(): void {
        this.done = true;
        const waiting = this.waiting;
        this.waiting = undefined;
        waiting?.resolve({ done: true, value: undefined });
    }

    fail(error: unknown): void {
        if (this.done)
            return;
        this.failure = { error };
        this.done = true;
        const waiting = this.waiting;
        this.waiting = undefined;
        waiting?.reject(error);
    }

    next(): Promise<IteratorResult<T>> {
        if (this.queue.length) {
            const [value] = this.queue.splice(0, 1);
            return Promise.resolve({ done: false, value });
        }
        if (this.failure)
            return Promise.reject(this.failure.error);
        if (this.done)
            return Promise.resolve({ done: true, value: undefined });
        return new Promise<IteratorResult<T>>((resolve, reject) => {
            this.waiting = { reject, resolve };
        });
    }

    [Symbol.asyncIterator](): AsyncIterator<T> {
        return { next: () => this.next() };
    }
}

/**
 * {@link WatchEventSource} on top of `fs.watch`, one watcher per directory.
 */
export class FsWatchSource implements WatchEventSource {
    watch(dirs: readonly string[]): WatchSubscription {
        const channel = new EventChannel<WatchEvent>();
        const watchers: fs.FSWatcher[] = [];
        const close = () => {
            for (const watcher of watchers)
                watcher.close();
            channel.close();
        };
        for (const dir of dirs) {
            let watcher: fs.FSWatcher;
            try {
                watcher = fs.watch(dir, (type, filename) => {
                    if (filename)
                        channel.push({ path: path.join(dir, filename), type });
                });
            } catch (e) {
                close();
                throw new WatchSetupError(`cannot watch directory ${dir}: ${getErrorMessage(e)}`, { cause: e });
            }
            watcher.on('error', e => channel.fail(new WatchSetupError(`watching ${dir} failed: ${e.message}`, { cause: e })));
            watchers.push(watcher);
        }
        return {
            [Symbol.asyncIterator]: () => channel[Symbol.asyncIterator](),
            close,
            discard: match => channel.discard(match),
        };
    }
}

/**
 * Options for {@link FileModifyWatcher#loop}.
 */
export interface WatchLoopOptions {
    /** Checked after each handled event; the loop ends when it returns true. */
    stop?: () => boolean;
    /** Ends the loop when aborted. */
    signal?: AbortSignal;
}

/**
 * Watches a fixed set of files. Directories are watched and events filtered down to the files.
 */
export class FileModifyWatcher {
    readonly files: ReadonlySet<string>;
    readonly dirs: readonly string[];
    private readonly source: WatchEventSource;

    constructor(fileList: Iterable<string>, source?: WatchEventSource) {
        const files = new Set<string>();
        for (const filename of fileList)
            files.add(path.resolve(filename));
        this.files = files;
        this.dirs = [...new Set([...files].map(filename => path.dirname(filename)))];
        this.source = source || new FsWatchSource();
    }

    /**
     * Returns true if `event` modifies one of the watched files.
     */
    isWatched(event: WatchEvent): boolean {
        return this.files.has(path.resolve(event.path));
    }

    /**
     * Calls `handler` for every modification of a watched file, one event at a time.
     * Events for the same file that queued up while the handler ran are dropped:
     * a single save often produces several notifications.
     * Only returns when stopped through `options`, or when the event source fails.
     */
    async loop(handler: (event: WatchEvent) => Promise<void> | void, options?: WatchLoopOptions): Promise<void> {
        const signal = options?.signal;
        if (signal?.aborted)
            return;
        const subscription = this.source.watch(this.dirs);
        const onAbort = () => subscription.close();
        signal?.addEventListener('abort', onAbort, { once: true });
        try {
            for await (const event of subscription) {
                if (!this.isWatched(event))
                    continue;
                await handler(event);
                const handled = path.resolve(event.path);
                subscription.discard(queued => path.resolve(queued.path) === handled);
                if (signal?.aborted || options?.stop?.())
                    break;
            }
        } finally {
            signal?.removeEventListener('abort', onAbort);
            subscription.close();
        }
    }
}
