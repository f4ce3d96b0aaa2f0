import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    DependencyStore,
    openStore,
    withStore,
} from './db';
import {
    SelectionError,
    StoreError,
    TaskError,
} from './errors';
import {
    indexTasks,
} from './selector';
import {
    Task,
    createTask,
} from './task';
import {
    makeTempDir,
} from './testing';
import assert = require('assert');
import fs = require('fs-extra');
import path = require('path');

/**
 * Tests for fingerprint persistence and status computation
 */
@suite('DependencyStore')
export class DependencyStoreTest {
    private dir = '';

    async before(): Promise<void> {
        this.dir = await makeTempDir();
    }

    async after(): Promise<void> {
        await fs.remove(this.dir);
    }

    private file(name: string): string {
        return path.join(this.dir, name);
    }

    private async commit(store: DependencyStore, task: Task): Promise<void> {
        store.commit(task, await store.computeFingerprints(task));
    }

    @test
    async 'getStatus() is run for a task that never ran'(): Promise<void> {
        const task = createTask({ name: 'a' });
        const store = new DependencyStore();
        assert.strictEqual(await store.getStatus(task, indexTasks([task])), 'run');
    }

    @test
    async 'commit() makes the task up-to-date'(): Promise<void> {
        await fs.writeFile(this.file('in.txt'), 'one');
        const task = createTask({ fileDep: [this.file('in.txt')], name: 'a' });
        const store = new DependencyStore();
        await this.commit(store, task);
        assert.strictEqual(await store.getStatus(task, indexTasks([task])), 'up-to-date');
    }

    @test
    async 'getStatus() is run after a file dependency is modified'(): Promise<void> {
        await fs.writeFile(this.file('in.txt'), 'one');
        const task = createTask({ fileDep: [this.file('in.txt')], name: 'a' });
        const store = new DependencyStore();
        await this.commit(store, task);

        await fs.writeFile(this.file('in.txt'), 'three');
        assert.strictEqual(await store.getStatus(task, indexTasks([task])), 'run');
    }

    @test
    async 'rewriting a file with the same content keeps the task up-to-date'(): Promise<void> {
        await fs.writeFile(this.file('in.txt'), 'one');
        const task = createTask({ fileDep: [this.file('in.txt')], name: 'a' });
        const store = new DependencyStore();
        await this.commit(store, task);

        await fs.writeFile(this.file('in.txt'), 'one');
        assert.strictEqual(await store.getStatus(task, indexTasks([task])), 'up-to-date');
    }

    @test
    async 'getStatus() is run when a file dependency is added'(): Promise<void> {
        await fs.writeFile(this.file('one.txt'), '1');
        await fs.writeFile(this.file('two.txt'), '2');
        const store = new DependencyStore();
        await this.commit(store, createTask({ fileDep: [this.file('one.txt')], name: 'a' }));

        const changed = createTask({ fileDep: [this.file('one.txt'), this.file('two.txt')], name: 'a' });
        assert.strictEqual(await store.getStatus(changed, indexTasks([changed])), 'run');
    }

    @test
    async 'getStatus() is run when a target is missing'(): Promise<void> {
        await fs.writeFile(this.file('out.txt'), 'built');
        const task = createTask({ name: 'a', targets: [this.file('out.txt')] });
        const store = new DependencyStore();
        await this.commit(store, task);
        assert.strictEqual(await store.getStatus(task, indexTasks([task])), 'up-to-date');

        await fs.remove(this.file('out.txt'));
        assert.strictEqual(await store.getStatus(task, indexTasks([task])), 'run');
    }

    @test
    async 'a task is run when its task dependency changed'(): Promise<void> {
        await fs.writeFile(this.file('in.txt'), 'one');
        const a = createTask({ fileDep: [this.file('in.txt')], name: 'a' });
        const b = createTask({ name: 'b', taskDep: ['a'] });
        const tasks = indexTasks([a, b]);
        const store = new DependencyStore();
        await this.commit(store, a);
        await this.commit(store, b);
        assert.strictEqual(await store.getStatus(b, tasks), 'up-to-date');

        await fs.writeFile(this.file('in.txt'), 'three');
        assert.strictEqual(await store.getStatus(a, tasks), 'run');
        assert.strictEqual(await store.getStatus(b, tasks), 'run');

        // a ran again: b still has to, because a produced something new
        await this.commit(store, a);
        assert.strictEqual(await store.getStatus(a, tasks), 'up-to-date');
        assert.strictEqual(await store.getStatus(b, tasks), 'run');
    }

    @test
    async 'an ignored task dependency does not make its dependents stale'(): Promise<void> {
        const a = createTask({ name: 'a' });
        const b = createTask({ name: 'b', taskDep: ['a'] });
        const tasks = indexTasks([a, b]);
        const store = new DependencyStore();
        store.ignore(a);
        await this.commit(store, b);
        assert.strictEqual(await store.getStatus(a, tasks), 'ignore');
        assert.strictEqual(await store.getStatus(b, tasks), 'up-to-date');
    }

    @test
    async 'ignore() keeps the fingerprints'(): Promise<void> {
        await fs.writeFile(this.file('in.txt'), 'one');
        const task = createTask({ fileDep: [this.file('in.txt')], name: 'a' });
        const store = new DependencyStore();
        await this.commit(store, task);

        store.ignore(task);
        await fs.writeFile(this.file('in.txt'), 'three');
        assert.strictEqual(await store.getStatus(task, indexTasks([task])), 'ignore');

        await fs.writeFile(this.file('in.txt'), 'one');
        store.unignore('a');
        assert.strictEqual(await store.getStatus(task, indexTasks([task])), 'up-to-date');
    }

    @test
    async 'unignore() of a task that never ran leaves it to run'(): Promise<void> {
        const task = createTask({ name: 'a' });
        const store = new DependencyStore();
        store.ignore(task);
        store.unignore('a');
        assert.strictEqual(await store.getStatus(task, indexTasks([task])), 'run');
    }

    @test
    async 'commit() keeps the ignore mark'(): Promise<void> {
        const task = createTask({ name: 'a' });
        const store = new DependencyStore();
        store.ignore(task);
        await this.commit(store, task);
        assert.strictEqual(store.getRecord('a')?.ignored, true);
    }

    @test
    'remove() is idempotent'(): void {
        const store = new DependencyStore([['a', { files: {}, rev: 'x', tasks: {} }]]);
        store.remove('a');
        store.remove('a');
        assert.deepStrictEqual(store.names(), []);
    }

    @test
    'removeAll()'(): void {
        const store = new DependencyStore([
            ['a', { files: {}, rev: 'x', tasks: {} }],
            ['b', { files: {}, rev: 'y', tasks: {} }],
        ]);
        store.removeAll();
        assert.deepStrictEqual(store.names(), []);
    }

    @test
    async 'computeFingerprints() fails on a missing file dependency'(): Promise<void> {
        const task = createTask({ fileDep: [this.file('missing.txt')], name: 'a' });
        const store = new DependencyStore();
        await assert.rejects(store.computeFingerprints(task), (e: unknown) => {
            assert(e instanceof TaskError);
            assert.strictEqual(e.message, `Dependent file '${this.file('missing.txt')}' does not exist.`);
            return true;
        });
    }

    @test
    async 'getStatus() detects circular task dependencies'(): Promise<void> {
        const a = createTask({ name: 'a', taskDep: ['b'] });
        const b = createTask({ name: 'b', taskDep: ['a'] });
        const store = new DependencyStore();
        await this.commit(store, a);
        await this.commit(store, b);
        await assert.rejects(store.getStatus(a, indexTasks([a, b])), (e: unknown) => {
            assert(e instanceof SelectionError);
            assert.strictEqual(e.message, 'circular task dependency: a -> b -> a');
            return true;
        });
    }

    @test
    async 'close() persists records that openStore() reads back'(): Promise<void> {
        await fs.writeFile(this.file('in.txt'), 'one');
        const task = createTask({ fileDep: [this.file('in.txt')], name: 'a' });
        const dbFile = this.file('db.json');

        const store = await openStore(dbFile);
        await this.commit(store, task);
        await store.close();

        const reopened = await openStore(dbFile);
        assert.deepStrictEqual(reopened.getRecord('a'), store.getRecord('a'));
        assert.strictEqual(await reopened.getStatus(task, indexTasks([task])), 'up-to-date');
    }

    @test
    async 'a closed store rejects changes'(): Promise<void> {
        const store = new DependencyStore();
        await store.close();
        assert.throws(() => store.remove('a'), /dependency store is closed/);
    }

    @test
    async 'openStore() of a missing file gives an empty store'(): Promise<void> {
        const store = await openStore(this.file('none.json'));
        assert.deepStrictEqual(store.names(), []);
        await store.close();
        assert(!(await fs.pathExists(this.file('none.json'))));
    }

    @test
    async 'openStore() rejects malformed data'(): Promise<void> {
        await fs.writeFile(this.file('db.json'), '{"a": ');
        await assert.rejects(openStore(this.file('db.json')), StoreError);
    }

    @test
    async 'openStore() rejects invalid records'(): Promise<void> {
        await fs.writeFile(this.file('db.json'), '{"a": {"files": {}, "tasks": {}, "rev": 3}}');
        await assert.rejects(openStore(this.file('db.json')), (e: unknown) => {
            assert(e instanceof StoreError);
            assert(e.message.startsWith(`dependency store ${this.file('db.json')}: invalid record at 'a.rev': `));
            return true;
        });
    }

    @test
    async 'withStore() flushes when the callback throws'(): Promise<void> {
        const task = createTask({ name: 'a' });
        const dbFile = this.file('db.json');
        await assert.rejects(withStore(dbFile, async store => {
            await this.commit(store, task);
            throw new Error('interrupted');
        }), /interrupted/);

        const reopened = await openStore(dbFile);
        assert.deepStrictEqual(reopened.names(), ['a']);
    }

    @test
    async 'withStore() reports the callback error when closing fails too'(): Promise<void> {
        const task = createTask({ name: 'a' });
        const dbFile = this.file(path.join('missing', 'db.json'));
        await assert.rejects(withStore(dbFile, async store => {
            await this.commit(store, task);
            throw new Error('interrupted');
        }), (e: unknown) => {
            assert(e instanceof Error);
            assert.strictEqual(e.message, 'interrupted');
            return true;
        });
    }

    @test
    async 'withStore() reports a failed close'(): Promise<void> {
        const task = createTask({ name: 'a' });
        const dbFile = this.file(path.join('missing', 'db.json'));
        await assert.rejects(withStore(dbFile, store => this.commit(store, task)), (e: unknown) => {
            assert(e instanceof StoreError);
            assert(e.message.startsWith(`dependency store ${dbFile}: cannot write: `));
            return true;
        });
    }
}
