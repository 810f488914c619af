// src/core/file-overlay.ts

import fs from 'fs';
import path from 'path';

import { ComposeError, type FileRule } from '../schema';
import { ensureDirSync, isFileSync, lstatSafeSync, resolveInside } from '../util/fs-utils';
import { defaultLogger } from '../util/logger';
import type { OutputTree } from './output-tree';

const logger = defaultLogger.child('[overlay]');

/**
 * Copy one layer file over the output tree, replacing whatever is at the
 * destination.
 */
export function applyFileRule(tree: OutputTree, layerDir: string, rule: FileRule): string {
   const sourceAbs = resolveInside(layerDir, rule.source);
   if (!isFileSync(sourceAbs)) {
      throw new ComposeError(
         'OverlaySourceMissing',
         `Layer file "${rule.source}" does not exist`,
         { path: sourceAbs },
      );
   }

   const destAbs = tree.resolve(rule.dest);
   ensureDirSync(path.dirname(destAbs));

   const existing = lstatSafeSync(destAbs);
   if (existing && (existing.isSymbolicLink() || existing.isDirectory())) {
      fs.rmSync(destAbs, { recursive: true, force: true });
   }

   fs.copyFileSync(sourceAbs, destAbs);
   fs.chmodSync(destAbs, fs.statSync(sourceAbs).mode & 0o7777);
   tree.record(rule.dest, 'layer', 'static');

   logger.debug(`${existing ? 'replaced' : 'added'} ${rule.dest} from ${rule.source}`);
   return rule.dest;
}

/**
 * Apply file rules in manifest order; later rules win on the same path.
 */
export function applyFileRules(tree: OutputTree, layerDir: string, rules: FileRule[]): string[] {
   return rules.map((rule) => applyFileRule(tree, layerDir, rule));
}
