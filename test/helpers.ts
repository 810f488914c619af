// test/helpers.ts
import fs from 'fs';
import os from 'os';
import path from 'path';
import {ComposeError} from '../src/schema';

export type FileSpec =
    | string
    | {content: string; mode: number}
    | {symlink: string};

const created: string[] = [];

export function makeTempDir(prefix = 'charm-compose-test-'): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
    created.push(dir);
    return dir;
}

export function cleanupTempDirs(): void {
    while (created.length) {
        const dir = created.pop();
        if (dir) fs.rmSync(dir, {recursive: true, force: true});
    }
}

/**
 * Write a tree of files under `root`; keys are POSIX relative paths.
 */
export function writeTree(root: string, files: Record<string, FileSpec>): string {
    for (const [rel, spec] of Object.entries(files)) {
        const abs = path.join(root, rel);
        fs.mkdirSync(path.dirname(abs), {recursive: true});
        if (typeof spec === 'string') {
            fs.writeFileSync(abs, spec, 'utf8');
        } else if ('symlink' in spec) {
            fs.symlinkSync(spec.symlink, abs);
        } else {
            fs.writeFileSync(abs, spec.content, 'utf8');
            fs.chmodSync(abs, spec.mode);
        }
    }
    return root;
}

export function readText(root: string, rel: string): string {
    return fs.readFileSync(path.join(root, rel), 'utf8');
}

export function modeOf(root: string, rel: string): number {
    return fs.statSync(path.join(root, rel)).mode & 0o777;
}

/**
 * Shell hook that appends `label` to the file named by its first argument.
 */
export function recordingHook(label: string, exitCode = 0): {content: string; mode: number} {
    const lines = ['#!/bin/sh', `echo ${label} >> "$1"`];
    if (exitCode !== 0) lines.push(`exit ${exitCode}`);
    return {content: lines.join('\n') + '\n', mode: 0o755};
}

export function captureError(fn: () => unknown): ComposeError {
    try {
        fn();
    } catch (err) {
        if (err instanceof ComposeError) return err;
        throw err;
    }
    throw new Error('expected a ComposeError to be thrown');
}

export async function captureErrorAsync(fn: () => Promise<unknown>): Promise<ComposeError> {
    try {
        await fn();
    } catch (err) {
        if (err instanceof ComposeError) return err;
        throw err;
    }
    throw new Error('expected a ComposeError to be thrown');
}
