import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CONFIG_FILE_NAME, DEFAULTS, loadConfig, loadWorkedExample, resolveApiKey } from '../src/config';
import { AutodocError, ConfigurationError } from '../src/structured_error';

function withTempDir(fn: (dir: string) => void): void {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'autodoc-config-'));
    try {
        fn(dir);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
}

function messageOf(fn: () => unknown): string {
    try {
        fn();
    } catch (e) {
        return e instanceof Error ? e.message : String(e);
    }
    return '';
}

test('defaults apply when nothing is configured', () => {
    withTempDir((dir) => {
        const config = loadConfig({ env: {}, cwd: dir });
        assert.equal(config.contextMode, 'growing');
        assert.equal(config.style, 'inline');
        assert.equal(config.temperature, 0);
        assert.equal(config.maxTokens, 1500);
        assert.equal(config.maxRetries, DEFAULTS.maxRetries);
        assert.equal(config.apiKeyVar, 'GPT_API_KEY');
        assert.equal(config.language, undefined);
        assert.equal(config.examplePath, undefined);
    });
});

test('file < environment < flags', () => {
    withTempDir((dir) => {
        const file = path.join(dir, 'custom.json');
        fs.writeFileSync(file, JSON.stringify({ max_retries: 5, style: 'docstring', temperature: 0.2, concurrency: 2 }));

        const config = loadConfig({
            configFile: file,
            env: { AUTODOC_MAX_RETRIES: '7', AUTODOC_CONCURRENCY: '4' },
            flags: { temperature: 0.5, concurrency: undefined },
            cwd: dir,
        });
        assert.equal(config.style, 'docstring');
        assert.equal(config.maxRetries, 7);
        assert.equal(config.temperature, 0.5);
        assert.equal(config.concurrency, 4);
    });
});

test('autodoc.config.json in the working directory is picked up', () => {
    withTempDir((dir) => {
        fs.writeFileSync(path.join(dir, CONFIG_FILE_NAME), JSON.stringify({ top_level_only: true, patch: true }));
        const config = loadConfig({ env: {}, cwd: dir });
        assert.equal(config.topLevelOnly, true);
        assert.equal(config.patch, true);
    });
});

test('environment booleans and numbers are parsed', () => {
    withTempDir((dir) => {
        const config = loadConfig({ env: { AUTODOC_MARK_SKIPPED: 'yes', AUTODOC_TIMEOUT_MS: '5000' }, cwd: dir });
        assert.equal(config.markSkipped, true);
        assert.equal(config.timeoutMs, 5000);
        assert.throws(() => loadConfig({ env: { AUTODOC_PATCH: 'maybe' }, cwd: dir }), ConfigurationError);
        assert.throws(() => loadConfig({ env: { AUTODOC_MAX_TOKENS: 'lots' }, cwd: dir }), ConfigurationError);
    });
});

test('config files are validated', () => {
    withTempDir((dir) => {
        const unknown = path.join(dir, 'unknown.json');
        fs.writeFileSync(unknown, JSON.stringify({ retries: 3 }));
        assert.throws(() => loadConfig({ configFile: unknown, env: {} }), ConfigurationError);

        const wrongType = path.join(dir, 'wrong.json');
        fs.writeFileSync(wrongType, JSON.stringify({ temperature: 'high' }));
        assert.throws(() => loadConfig({ configFile: wrongType, env: {} }), ConfigurationError);

        const broken = path.join(dir, 'broken.json');
        fs.writeFileSync(broken, '{ not json');
        assert.throws(() => loadConfig({ configFile: broken, env: {} }), ConfigurationError);

        const missing = path.join(dir, 'missing.json');
        assert.equal(messageOf(() => loadConfig({ configFile: missing, env: {} })), `Config file not found: ${missing}`);
    });
});

test('ranges and cross-field rules are enforced', () => {
    withTempDir((dir) => {
        assert.equal(
            messageOf(() => loadConfig({ flags: { concurrency: 64 }, env: {}, cwd: dir })),
            'concurrency must be within [1, 32], got 64'
        );
        assert.throws(() => loadConfig({ flags: { maxRetries: 1.5 }, env: {}, cwd: dir }), ConfigurationError);
        assert.throws(
            () => loadConfig({ flags: { backoffBaseMs: 500, backoffMaxMs: 100 }, env: {}, cwd: dir }),
            ConfigurationError
        );
    });
});

test('the API key comes from the configured variable', () => {
    withTempDir((dir) => {
        const config = loadConfig({ env: {}, cwd: dir });
        assert.equal(resolveApiKey(config, { GPT_API_KEY: 'test-secret' }), 'test-secret');

        assert.throws(
            () => resolveApiKey(config, {}),
            (e: unknown) =>
                e instanceof AutodocError &&
                e.code === 'CONFIGURATION_ERROR' &&
                e.message === 'GPT_API_KEY environment variable not set'
        );

        const custom = loadConfig({ env: { AUTODOC_API_KEY_VAR: 'MY_KEY' }, cwd: dir });
        assert.equal(resolveApiKey(custom, { MY_KEY: 'test-secret' }), 'test-secret');
    });
});

test('worked examples load only in fixed-example mode', () => {
    withTempDir((dir) => {
        assert.equal(loadWorkedExample(loadConfig({ env: {}, cwd: dir })), undefined);

        const example = path.join(dir, 'example.txt');
        fs.writeFileSync(example, 'EXAMPLE\n');
        const config = loadConfig({ flags: { contextMode: 'fixed_example', examplePath: example }, env: {}, cwd: dir });
        assert.equal(loadWorkedExample(config), 'EXAMPLE\n');

        const missing = loadConfig({ flags: { contextMode: 'fixed_example', examplePath: path.join(dir, 'none.txt') }, env: {}, cwd: dir });
        assert.throws(() => loadWorkedExample(missing), ConfigurationError);

        const bundled = loadConfig({ flags: { contextMode: 'fixed_example' }, env: {}, cwd: dir });
        assert.ok((loadWorkedExample(bundled) ?? '').startsWith('Original code:\n'));
    });
});
