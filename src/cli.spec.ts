import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    main,
} from './cli';
import {
    StringStream,
    makeTempDir,
} from './testing';
import assert = require('assert');
import fs = require('fs-extra');
import path = require('path');

interface CliResult {
    code: number;
    stdout: string;
    stderr: string;
}

/**
 * Tests for the command-line interface
 */
@suite('main()')
export class CliTest {
    private cwd = '';
    private dir = '';

    async before(): Promise<void> {
        this.cwd = process.cwd();
        this.dir = await makeTempDir();
        await fs.writeFile(path.join(this.dir, 'freshen.yaml'), [
            'tasks:',
            '  hello:',
            '    doc: say hello',
            '    actions: ["echo hello"]',
            '  broken:',
            '    actions: ["exit 1"]',
            '',
        ].join('\n'));
    }

    async after(): Promise<void> {
        process.chdir(this.cwd);
        await fs.remove(this.dir);
    }

    private async cli(...args: string[]): Promise<CliResult> {
        const stdout = new StringStream();
        const stderr = new StringStream();
        const code = await main([
            'node',
            'freshen',
            '-f',
            path.join(this.dir, 'freshen.yaml'),
            '--db',
            path.join(this.dir, 'db.json'),
            ...args,
        ], { stderr, stdout });
        return { code, stderr: stderr.text, stdout: stdout.text };
    }

    @test
    async 'run is the default command'(): Promise<void> {
        assert.deepStrictEqual(await this.cli('hello'), { code: 0, stderr: '', stdout: '.  hello\n' });
        assert.deepStrictEqual(await this.cli('run', 'hello'), { code: 0, stderr: '', stdout: '-- hello\n' });
    }

    @test
    async 'a failed task exits with 1'(): Promise<void> {
        const result = await this.cli('run', 'broken');
        assert.strictEqual(result.code, 1);
        assert(result.stdout.startsWith('.  broken\n'));
    }

    @test
    async 'an unknown task exits with 2'(): Promise<void> {
        assert.deepStrictEqual(await this.cli('run', 'nope'), {
            code: 2,
            stderr: `ERROR: 'nope' is not a task.\n`,
            stdout: '',
        });
    }

    @test
    async 'an invalid option value exits with commander\'s code'(): Promise<void> {
        const result = await this.cli('run', '-v', '5');
        assert.strictEqual(result.code, 1);
        assert.strictEqual(result.stdout, '');
    }

    @test
    async 'an invalid worker count exits with 2'(): Promise<void> {
        const result = await this.cli('run', '-n', 'none');
        assert.strictEqual(result.code, 2);
        assert.strictEqual(result.stderr, `ERROR: workers must be a positive integer, got 'none'\n`);
    }

    @test
    async 'ignore without task names exits with 2'(): Promise<void> {
        const result = await this.cli('ignore');
        assert.strictEqual(result.code, 2);
        assert.strictEqual(result.stdout, 'You cannot ignore all tasks! Please select a task.\n');
    }

    @test
    async 'list prints documented tasks'(): Promise<void> {
        assert.deepStrictEqual(await this.cli('list', '--doc'), {
            code: 0,
            stderr: '',
            stdout: 'hello\t* say hello\nbroken\n',
        });
    }

    @test
    async 'a corrupt dependency store exits with 3'(): Promise<void> {
        await fs.writeFile(path.join(this.dir, 'db.json'), 'not json');
        const result = await this.cli('run', 'hello');
        assert.strictEqual(result.code, 3);
        assert(result.stderr.startsWith(`ERROR: dependency store ${path.join(this.dir, 'db.json')}: malformed data: `));
    }

    @test
    async 'a missing task file exits with 2'(): Promise<void> {
        const stderr = new StringStream();
        const missing = path.join(this.dir, 'none.yaml');
        const code = await main(['node', 'freshen', '-f', missing, 'list'], { stderr, stdout: new StringStream() });
        assert.strictEqual(code, 2);
        assert(stderr.text.startsWith(`ERROR: ${missing}: cannot read task file: `));
    }

    @test
    async '--help exits with 0'(): Promise<void> {
        const stdout = new StringStream();
        const code = await main(['node', 'freshen', '--help'], { stderr: new StringStream(), stdout });
        assert.strictEqual(code, 0);
        assert(stdout.text.startsWith('Usage: freshen [options] [command]\n'));
    }
}
