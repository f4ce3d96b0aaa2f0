/**
 * @module
 * Helpers shared by the test suites.
 */
import {
    ActionError,
} from './errors';
import {
    CapturedOutput,
    Reporter,
} from './reporter';
import {
    Task,
} from './task';
import fs = require('fs-extra');
import os = require('os');
import path = require('path');
import stream = require('stream');

/**
 * Writable stream that keeps everything written to it.
 */
export class StringStream extends stream.Writable {
    text = '';

    _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        this.text += chunk.toString();
        callback();
    }
}

/**
 * Reporter that records events as strings, e.g. `execute:a` or `failure:a:TaskFailed`.
 */
export class RecordingReporter implements Reporter {
    readonly events: string[] = [];
    readonly failures = new Map<string, { error: ActionError; output: CapturedOutput }>();

    executeTask(task: Task): void {
        this.events.push(`execute:${task.name}`);
    }

    skipUptodate(task: Task): void {
        this.events.push(`up-to-date:${task.name}`);
    }

    skipIgnore(task: Task): void {
        this.events.push(`ignore:${task.name}`);
    }

    addSuccess(task: Task): void {
        this.events.push(`success:${task.name}`);
    }

    addFailure(task: Task, error: ActionError, output: CapturedOutput): void {
        this.events.push(`failure:${task.name}:${error.name}`);
        this.failures.set(task.name, { error, output });
    }

    writeStdout(chunk: string | Buffer): void {
        this.events.push(`stdout:${chunk.toString()}`);
    }

    writeStderr(chunk: string | Buffer): void {
        this.events.push(`stderr:${chunk.toString()}`);
    }

    completeRun(): void {
        this.events.push('complete');
    }
}

export function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'freshen-'));
}
