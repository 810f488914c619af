// test/config-loader.spec.ts
import {afterEach, describe, it, expect} from 'vitest';
import path from 'path';
import {loadComposeConfig, parseComposeConfig} from '../src/core/config-loader';
import {captureError, captureErrorAsync, cleanupTempDirs, makeTempDir, writeTree} from './helpers';

afterEach(() => cleanupTempDirs());

describe('loadComposeConfig', () => {
    it('falls back to defaults without a config file', async () => {
        const cwd = makeTempDir();
        expect(await loadComposeConfig(cwd)).toEqual({config: {}, configPath: null});
    });

    it('loads a TypeScript config file', async () => {
        const cwd = writeTree(makeTempDir(), {
            'charm-compose.config.ts': [
                "const series: string = 'xenial';",
                'export default {',
                '    series,',
                "    existing: 'overwrite',",
                "    ignore: ['*.log'],",
                '    callbacks: {',
                '        preCompose: [{fn: (): void => undefined}],',
                '    },',
                '};',
                '',
            ].join('\n'),
        });

        const {config, configPath} = await loadComposeConfig(cwd);

        expect(configPath).toBe(path.join(cwd, 'charm-compose.config.ts'));
        expect(config.series).toBe('xenial');
        expect(config.existing).toBe('overwrite');
        expect(config.ignore).toEqual(['*.log']);
        expect(typeof config.callbacks?.preCompose?.[0]?.fn).toBe('function');
    });

    it('loads a CommonJS config given explicitly', async () => {
        const cwd = writeTree(makeTempDir(), {
            'conf/compose.cjs': "module.exports = {outputDir: 'build', logLevel: 'debug'};\n",
        });

        const {config} = await loadComposeConfig(cwd, {configPath: 'conf/compose.cjs'});

        expect(config).toEqual({outputDir: 'build', logLevel: 'debug'});
    });

    it('fails when an explicit config path does not exist', async () => {
        const cwd = makeTempDir();
        const err = await captureErrorAsync(() => loadComposeConfig(cwd, {configPath: 'nope.ts'}));

        expect(err.code).toBe('ConfigInvalid');
        expect(err.exitCode).toBe(10);
        expect(err.path).toBe(path.join(cwd, 'nope.ts'));
    });

    it('fails on a config that does not compile', async () => {
        const cwd = writeTree(makeTempDir(), {
            'charm-compose.config.ts': 'export default {series: \n',
        });

        const err = await captureErrorAsync(() => loadComposeConfig(cwd));
        expect(err.code).toBe('ConfigInvalid');
        expect(err.message).toContain('Could not compile');
    });

    it('fails on invalid values', async () => {
        const cwd = writeTree(makeTempDir(), {
            'charm-compose.config.ts': "export default {series: 'Not A Series'};\n",
        });

        const err = await captureErrorAsync(() => loadComposeConfig(cwd));
        expect(err.code).toBe('ConfigInvalid');
        expect(err.message).toBe(
            `${path.join(cwd, 'charm-compose.config.ts')}: series must be a series name like "trusty"`,
        );
    });
});

describe('parseComposeConfig', () => {
    it('requires callbacks to be functions', () => {
        const err = captureError(() =>
            parseComposeConfig({callbacks: {postCompose: [{fn: 'echo hi'}]}}, 'inline'),
        );
        expect(err.message).toBe('inline: callbacks.postCompose.0.fn must be a function');
    });

    it('rejects unknown existing-output policies', () => {
        const err = captureError(() => parseComposeConfig({existing: 'merge'}, 'inline'));
        expect(err.code).toBe('ConfigInvalid');
    });
});
