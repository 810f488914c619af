// src/util/fs-utils.ts

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Ensure a directory exists (like mkdir -p).
 */
export function ensureDirSync(dirPath: string): string {
   if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
   }
   return dirPath;
}

/**
 * lstat that returns null instead of throwing when the path is missing.
 * Symbolic links are reported as links, not as their targets.
 */
export function lstatSafeSync(targetPath: string): fs.Stats | null {
   try {
      return fs.lstatSync(targetPath);
   } catch {
      return null;
   }
}

/**
 * Get file stats (following links) if they exist, otherwise null.
 */
export function statSafeSync(targetPath: string): fs.Stats | null {
   try {
      return fs.statSync(targetPath);
   } catch {
      return null;
   }
}

export function isDirectorySync(targetPath: string): boolean {
   return statSafeSync(targetPath)?.isDirectory() ?? false;
}

export function isFileSync(targetPath: string): boolean {
   return statSafeSync(targetPath)?.isFile() ?? false;
}

/**
 * Resolve `relPath` against `root` and assert it stays within `root`.
 *
 * Throws if the resolved path escapes the root.
 */
export function resolveInside(root: string, relPath: string): string {
   const absRoot = path.resolve(root);
   const absTarget = path.resolve(absRoot, relPath);

   if (!isSubPath(absRoot, absTarget)) {
      throw new Error(
         `Attempted to resolve path outside root: ` +
         `root="${absRoot}", target="${absTarget}"`,
      );
   }

   return absTarget;
}

/**
 * Convert an absolute path back to a root-relative POSIX path.
 */
export function toRelativePosix(root: string, absolutePath: string): string {
   return toPosixPath(path.relative(path.resolve(root), path.resolve(absolutePath)));
}

/**
 * Check if `target` is inside (or equal to) `base` directory.
 */
export function isSubPath(base: string, target: string): boolean {
   const absBase = path.resolve(base);
   const absTarget = path.resolve(target);

   const baseWithSep = absBase.endsWith(path.sep) ? absBase : absBase + path.sep;
   return absTarget === absBase || absTarget.startsWith(baseWithSep);
}

/**
 * Hex SHA-256 of a file's bytes, or of the link text for a symbolic link.
 */
export function hashEntrySync(targetPath: string): string {
   const stats = fs.lstatSync(targetPath);
   const content = stats.isSymbolicLink()
      ? Buffer.from(fs.readlinkSync(targetPath), 'utf8')
      : fs.readFileSync(targetPath);
   return crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Add execute permission for everyone who can read the file.
 */
export function makeExecutableSync(filePath: string): void {
   const mode = fs.statSync(filePath).mode & 0o7777;
   const readBits = mode & 0o444;
   fs.chmodSync(filePath, mode | (readBits >> 2));
}

/**
 * Every file and symbolic link under `root` as sorted POSIX relative paths.
 * Directories themselves are not listed.
 */
export function listEntriesSync(root: string): string[] {
   const out: string[] = [];

   function walk(dirAbs: string) {
      const dirents = fs.readdirSync(dirAbs, { withFileTypes: true });
      for (const dirent of dirents) {
         const abs = path.join(dirAbs, dirent.name);
         if (dirent.isDirectory()) {
            walk(abs);
         } else {
            out.push(toRelativePosix(root, abs));
         }
      }
   }

   walk(path.resolve(root));
   return out.sort();
}
