// test/inspect.spec.ts
import {afterEach, describe, it, expect} from 'vitest';
import fs from 'fs';
import path from 'path';
import {compose} from '../src/core/composer';
import {inspectCharm, renderInspection} from '../src/core/inspect';
import {Logger} from '../src/util/logger';
import {captureError, cleanupTempDirs, makeTempDir, writeTree} from './helpers';

afterEach(() => cleanupTempDirs());

async function composedCharm(): Promise<string> {
    const root = makeTempDir();
    writeTree(root, {
        'base/metadata.yaml': 'name: tester\n',
        'base/README': 'base readme\n',
        'base/hooks/install': {content: '#!/bin/sh\necho install\n', mode: 0o755},
        'layer/compose.yaml': [
            'baseReference: ../base',
            'fileRules:',
            '  - source: helper.sh',
            '    dest: scripts/helper.sh',
            '',
        ].join('\n'),
        'layer/helper.sh': 'echo helper\n',
    });

    const result = await compose({
        layerDir: path.join(root, 'layer'),
        name: 'foo',
        outputDir: path.join(root, 'repo'),
        searchPath: [],
        logger: new Logger({level: 'silent'}),
    });
    return result.outputDir;
}

describe('inspectCharm', () => {
    it('reports nothing for a freshly composed charm', async () => {
        const charm = await composedCharm();

        const result = inspectCharm(charm);

        expect(result.deleted).toEqual([]);
        expect(result.files.map((f) => [f.path, f.source, f.status])).toEqual([
            ['README', 'base', 'unchanged'],
            ['hooks/install', 'base', 'unchanged'],
            ['metadata.yaml', 'compose', 'unchanged'],
            ['scripts/helper.sh', 'layer', 'unchanged'],
        ]);
    });

    it('detects added, changed and deleted files', async () => {
        const charm = await composedCharm();
        fs.writeFileSync(path.join(charm, 'hooks/install'), '#!/bin/sh\necho edited\n');
        fs.writeFileSync(path.join(charm, 'notes.txt'), 'local notes\n');
        fs.rmSync(path.join(charm, 'README'));
        fs.appendFileSync(path.join(charm, 'metadata.yaml'), 'summary: edited\n');

        const result = inspectCharm(charm);

        expect(result.deleted).toEqual(['README']);
        expect(renderInspection(result)).toBe(
            [
                'hooks/',
                '  install [base] *',
                'scripts/',
                '  helper.sh [layer]',
                'metadata.yaml [compose]',
                'notes.txt [unsigned] +',
                'deleted:',
                '  README',
            ].join('\n'),
        );
    });

    it('fails when the directory was not composed', () => {
        const dir = writeTree(makeTempDir(), {'metadata.yaml': 'name: tester\n'});
        expect(captureError(() => inspectCharm(dir)).code).toBe('ManifestMissing');
    });
});
