/**
 * @module
 * Implements the two kinds of actions: commands and in-process functions.
 */
import {
    ActionError,
    getErrorMessage,
    TaskError,
    TaskFailed,
} from './errors';
import type {
    Action,
    ActionContext,
    ActionFunction,
    ActionReturn,
} from './task';
import childProcess = require('child_process');

/**
 * Runs a command. A string runs through the system shell, an argv array is spawned directly.
 */
export class CommandAction implements Action {
    readonly command: string | readonly string[];
    readonly description: string;

    constructor(command: string | readonly string[]) {
        if (typeof command !== 'string' && !command.length)
            throw new Error('command must not be empty');
        this.command = command;
        this.description = typeof command === 'string' ? command : command.map(quote).join(' ');
    }

    execute(ctx: ActionContext): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const command = this.command;
            const stdio: childProcess.StdioOptions = ['ignore', 'pipe', 'pipe'];
            const cp = typeof command === 'string' ?
                childProcess.spawn(command, { shell: true, stdio }) :
                childProcess.spawn(command[0], command.slice(1), { stdio });
            cp.on('error', e => {
                reject(new TaskError(ctx.taskName, `Command error: '${this.description}': ${e.message}`, { cause: e }));
            });
            cp.on('close', (code, signal) => {
                if (code === 0)
                    return resolve();
                const reason = signal ? `signal ${signal}` : `code ${code}`;
                reject(new TaskFailed(ctx.taskName, `Command failed: '${this.description}' returned ${reason}`));
            });
            cp.stdout?.on('data', (chunk: Buffer) => ctx.stdout.write(chunk));
            cp.stderr?.on('data', (chunk: Buffer) => ctx.stderr.write(chunk));
        });
    }
}

/**
 * Runs a function in the current process.
 */
export class CallableAction implements Action {
    readonly fn: ActionFunction;
    readonly description: string;

    constructor(fn: ActionFunction) {
        this.fn = fn;
        this.description = fn.name ? `${fn.name}()` : '<anonymous>';
    }

    async execute(ctx: ActionContext): Promise<void> {
        let ret: ActionReturn;
        try {
            ret = await this.fn(ctx);
        } catch (error) {
            if (error instanceof ActionError)
                throw error;
            throw new TaskError(ctx.taskName, `${this.description} raised: ${getErrorMessage(error)}`, { cause: error });
        }
        if (ret === false)
            throw new TaskFailed(ctx.taskName, `${this.description} returned false`);
        if (typeof ret === 'string')
            ctx.stdout.write(ret);
    }
}

/**
 * Return a shell-escaped version of `x`
 */
export function quote(x: string): string {
    if (!x.length)
        return '\'\'';
    else if (!/[^\w@%+=:,./-]/.test(x))
        return x;

    const y = x.replace(/'/g, `'"'"'`);
    return `'${y}'`;
}
