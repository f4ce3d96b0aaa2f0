import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    DEFAULT_CONFIG,
    parseVerbosity,
    parseWorkers,
    resolveConfig,
} from './config';
import {
    InvalidCommand,
} from './errors';
import assert = require('assert');

/**
 * Tests for configuration resolution
 */
@suite('resolveConfig()')
export class ResolveConfigTest {
    @test
    'defaults'(): void {
        assert.deepStrictEqual(resolveConfig({}, {}), { ...DEFAULT_CONFIG });
        assert.strictEqual(resolveConfig({}, {}).verbosity, undefined);
    }

    @test
    'environment variables override defaults'(): void {
        const config = resolveConfig({}, {
            FRESHEN_DB: 'state.json',
            FRESHEN_FILE: 'tasks.json',
            FRESHEN_REPORTER: 'json',
            FRESHEN_VERBOSITY: '2',
            FRESHEN_WORKERS: '4',
        });
        assert.deepStrictEqual(config, {
            dbFile: 'state.json',
            maxWorkers: 4,
            reporter: 'json',
            taskFile: 'tasks.json',
            verbosity: 2,
        });
    }

    @test
    'flags override environment variables'(): void {
        const config = resolveConfig({ dbFile: 'flag.json', maxWorkers: 2, verbosity: 0 }, {
            FRESHEN_DB: 'env.json',
            FRESHEN_VERBOSITY: '2',
        });
        assert.strictEqual(config.dbFile, 'flag.json');
        assert.strictEqual(config.maxWorkers, 2);
        assert.strictEqual(config.verbosity, 0);
        assert.strictEqual(config.taskFile, DEFAULT_CONFIG.taskFile);
    }

    @test
    'undefined overrides are ignored'(): void {
        const config = resolveConfig({ dbFile: undefined }, { FRESHEN_DB: 'env.json' });
        assert.strictEqual(config.dbFile, 'env.json');
    }

    @test
    'invalid environment values name the variable'(): void {
        assert.throws(() => resolveConfig({}, { FRESHEN_VERBOSITY: 'loud' }), (e: unknown) => {
            assert(e instanceof InvalidCommand);
            assert.strictEqual(e.message, `FRESHEN_VERBOSITY must be 0, 1 or 2, got 'loud'`);
            return true;
        });
        assert.throws(() => resolveConfig({}, { FRESHEN_WORKERS: '0' }), (e: unknown) => {
            assert(e instanceof InvalidCommand);
            assert.strictEqual(e.message, `FRESHEN_WORKERS must be a positive integer, got '0'`);
            return true;
        });
    }

    @test
    'parseVerbosity()'(): void {
        assert.strictEqual(parseVerbosity('0'), 0);
        assert.strictEqual(parseVerbosity(' 1 '), 1);
        assert.strictEqual(parseVerbosity('2'), 2);
        assert.throws(() => parseVerbosity('3'), /verbosity must be 0, 1 or 2, got '3'/);
    }

    @test
    'parseWorkers()'(): void {
        assert.strictEqual(parseWorkers('8'), 8);
        assert.throws(() => parseWorkers('1.5'), /workers must be a positive integer, got '1\.5'/);
        assert.throws(() => parseWorkers('many'), InvalidCommand);
    }
}
