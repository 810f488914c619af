// test/tree-copier.spec.ts
import {afterEach, describe, it, expect} from 'vitest';
import fs from 'fs';
import path from 'path';
import {copyTree, isIgnored} from '../src/core/tree-copier';
import {DEFAULT_IGNORE} from '../src/schema';
import {listEntriesSync} from '../src/util/fs-utils';
import {cleanupTempDirs, makeTempDir, modeOf, readText, writeTree} from './helpers';

afterEach(() => cleanupTempDirs());

describe('isIgnored', () => {
    it('matches directory-only patterns against directories only', () => {
        expect(isIgnored('.git', true, ['.git/'])).toBe(true);
        expect(isIgnored('.git', false, ['.git/'])).toBe(false);
        expect(isIgnored('vendor/.git', true, ['.git/'])).toBe(true);
    });

    it('matches slash-free patterns at any depth', () => {
        expect(isIgnored('hooks/lib/util.pyc', false, ['*.pyc'])).toBe(true);
        expect(isIgnored('hooks/install~', false, ['*~'])).toBe(true);
        expect(isIgnored('hooks/install', false, ['*.pyc', '*~'])).toBe(false);
    });

    it('anchors patterns with a leading slash to the root', () => {
        expect(isIgnored('notes.txt', false, ['/notes.txt'])).toBe(true);
        expect(isIgnored('docs/notes.txt', false, ['/notes.txt'])).toBe(false);
    });

    it('handles globstar patterns', () => {
        expect(isIgnored('lib/deep/.ropeproject', true, ['**/.ropeproject/'])).toBe(true);
        expect(isIgnored('.ropeproject', true, ['**/.ropeproject/'])).toBe(true);
    });
});

describe('copyTree', () => {
    it('copies files in name order and keeps their modes', () => {
        const src = writeTree(makeTempDir(), {
            'metadata.yaml': 'name: tester\n',
            'hooks/install': {content: '#!/bin/sh\necho install\n', mode: 0o755},
            'README': 'readme\n',
            'files/secret.conf': {content: 'key=value\n', mode: 0o600},
        });
        const dest = makeTempDir();

        const copied = copyTree(src, dest);

        expect(copied).toEqual([
            {path: 'README', type: 'file'},
            {path: 'files/secret.conf', type: 'file'},
            {path: 'hooks/install', type: 'file'},
            {path: 'metadata.yaml', type: 'file'},
        ]);
        expect(readText(dest, 'hooks/install')).toBe('#!/bin/sh\necho install\n');
        expect(modeOf(dest, 'hooks/install')).toBe(0o755);
        expect(modeOf(dest, 'files/secret.conf')).toBe(0o600);
    });

    it('recreates symbolic links instead of following them', () => {
        const src = writeTree(makeTempDir(), {
            'metadata.yaml': 'name: tester\n',
            'hooks/hooks.py': {content: '#!/bin/sh\n', mode: 0o755},
            'hooks/install': {symlink: 'hooks.py'},
            'hooks/stop': {symlink: 'missing-target'},
        });
        const dest = makeTempDir();

        const copied = copyTree(src, dest);

        expect(copied).toContainEqual({path: 'hooks/install', type: 'symlink'});
        expect(copied).toContainEqual({path: 'hooks/stop', type: 'symlink'});
        expect(fs.lstatSync(path.join(dest, 'hooks/install')).isSymbolicLink()).toBe(true);
        expect(fs.readlinkSync(path.join(dest, 'hooks/install'))).toBe('hooks.py');
        expect(fs.readlinkSync(path.join(dest, 'hooks/stop'))).toBe('missing-target');
    });

    it('skips default ignores, extra patterns and tooling files', () => {
        const src = writeTree(makeTempDir(), {
            'metadata.yaml': 'name: tester\n',
            '.git/HEAD': 'ref: refs/heads/main\n',
            'hooks/lib.pyc': 'bytecode',
            'hooks/install~': 'backup',
            'hooks/install': 'install\n',
            'docs/guide.md': 'guide\n',
            'compose.yaml': 'baseReference: ../other\n',
            '.compose.manifest': '{}\n',
            'templates/compose.yaml': 'kept: true\n',
        });
        const dest = makeTempDir();

        copyTree(src, dest, {ignore: [...DEFAULT_IGNORE, 'docs/']});

        expect(listEntriesSync(dest)).toEqual([
            'hooks/install',
            'metadata.yaml',
            'templates/compose.yaml',
        ]);
    });
});
