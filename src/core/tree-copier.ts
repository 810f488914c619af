// src/core/tree-copier.ts

import fs from 'fs';
import path from 'path';
import { minimatch } from 'minimatch';

import { ComposeError, DEFAULT_IGNORE, MANIFEST_FILE, SIGNATURE_FILE } from '../schema';
import { ensureDirSync, toPosixPath } from '../util/fs-utils';
import { defaultLogger } from '../util/logger';

const logger = defaultLogger.child('[copy]');

/**
 * Files of a source tree that belong to the tooling, not to the charm.
 */
const TOOLING_FILES = [`/${MANIFEST_FILE}`, `/${SIGNATURE_FILE}`];

export interface CopyTreeOptions {
   /**
    * gitignore-flavoured globs relative to the source root. A trailing "/"
    * only matches directories; a leading "/" anchors to the root; a pattern
    * without "/" matches the entry name at any depth.
    *
    * Default: DEFAULT_IGNORE.
    */
   ignore?: string[];
}

export interface CopiedEntry {
   /**
    * Source-relative POSIX path.
    */
   path: string;
   type: 'file' | 'symlink';
}

/**
 * Whether `relPath` is excluded by any of `patterns`.
 */
export function isIgnored(relPath: string, isDirectory: boolean, patterns: string[]): boolean {
   return patterns.some((raw) => {
      let pattern = raw;
      if (pattern.endsWith('/')) {
         if (!isDirectory) return false;
         pattern = pattern.slice(0, -1);
      }
      const anchored = pattern.startsWith('/');
      if (anchored) {
         pattern = pattern.slice(1);
      }
      return minimatch(relPath, pattern, {
         dot: true,
         matchBase: !anchored && !pattern.includes('/'),
      });
   });
}

function copyFailed(message: string, targetPath: string, cause: unknown): ComposeError {
   const reason = cause instanceof Error ? cause.message : String(cause);
   return new ComposeError('CopyFailed', `${message}: ${reason}`, { path: targetPath, cause });
}

/**
 * Duplicate `source` into `dest`: file and directory modes are kept and
 * symbolic links are recreated with the same target text. Entries are
 * visited in name order. On failure the partial copy stays on disk.
 */
export function copyTree(source: string, dest: string, options: CopyTreeOptions = {}): CopiedEntry[] {
   const srcRoot = path.resolve(source);
   const destRoot = path.resolve(dest);
   const patterns = [...(options.ignore ?? DEFAULT_IGNORE), ...TOOLING_FILES];
   const copied: CopiedEntry[] = [];

   function copyDir(srcDir: string, destDir: string) {
      let dirents: fs.Dirent[];
      try {
         dirents = fs.readdirSync(srcDir, { withFileTypes: true });
         ensureDirSync(destDir);
      } catch (err) {
         throw copyFailed(`Could not copy directory ${srcDir}`, srcDir, err);
      }

      dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

      for (const dirent of dirents) {
         const srcAbs = path.join(srcDir, dirent.name);
         const destAbs = path.join(destDir, dirent.name);
         const rel = toPosixPath(path.relative(srcRoot, srcAbs));

         if (isIgnored(rel, dirent.isDirectory(), patterns)) {
            logger.debug(`ignored ${rel}`);
            continue;
         }

         if (dirent.isDirectory()) {
            copyDir(srcAbs, destAbs);
            continue;
         }

         try {
            if (dirent.isSymbolicLink()) {
               fs.rmSync(destAbs, { force: true });
               fs.symlinkSync(fs.readlinkSync(srcAbs), destAbs);
               copied.push({ path: rel, type: 'symlink' });
            } else if (dirent.isFile()) {
               fs.copyFileSync(srcAbs, destAbs);
               fs.chmodSync(destAbs, fs.statSync(srcAbs).mode & 0o7777);
               copied.push({ path: rel, type: 'file' });
            } else {
               logger.warn(`skipping ${rel}: not a regular file, directory or link`);
            }
         } catch (err) {
            throw copyFailed(`Could not copy ${rel}`, srcAbs, err);
         }
      }

      // Applied last so a read-only source directory can still be filled.
      try {
         fs.chmodSync(destDir, fs.statSync(srcDir).mode & 0o7777);
      } catch (err) {
         throw copyFailed(`Could not set mode of ${destDir}`, destDir, err);
      }
   }

   copyDir(srcRoot, destRoot);
   logger.debug(`Copied ${copied.length} entries from ${srcRoot} to ${destRoot}`);
   return copied;
}
