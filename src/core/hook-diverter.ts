// src/core/hook-diverter.ts

import fs from 'fs';
import path from 'path';

import {
   ComposeError,
   DIVERT_DIR,
   HOOKS_DIR,
   type DivertDirection,
   type DivertRule,
} from '../schema';
import { ensureDirSync, isFileSync, lstatSafeSync, makeExecutableSync } from '../util/fs-utils';
import { defaultLogger } from '../util/logger';
import type { OutputTree } from './output-tree';

const logger = defaultLogger.child('[divert]');

/**
 * Reserved output-relative paths used when `hook` is diverted.
 * `.divert` can never name a lifecycle hook, and the runtime does not
 * descend into subdirectories of hooks/.
 */
export function divertPaths(hook: string): { hook: string; base: string; layer: string } {
   const dir = `${HOOKS_DIR}/${DIVERT_DIR}/${hook}`;
   return {
      hook: `${HOOKS_DIR}/${hook}`,
      base: `${dir}/base`,
      layer: `${dir}/layer`,
   };
}

/**
 * Shell dispatcher placed at hooks/<hook>. Runs the relocated scripts in
 * order with the hook's arguments; `set -e` stops at the first failure and
 * exits with its status.
 */
export function renderDispatcher(hook: string, direction: DivertDirection, hasBase: boolean): string {
   const base = `"$HOOK_DIR/${DIVERT_DIR}/${hook}/base" "$@"`;
   const layer = `"$HOOK_DIR/${DIVERT_DIR}/${hook}/layer" "$@"`;

   let steps: string[];
   if (!hasBase) {
      steps = [layer];
   } else if (direction === 'layer-then-base') {
      steps = [layer, base];
   } else {
      steps = [base, layer];
   }

   return [
      '#!/bin/sh',
      `# ${hook}: generated by charm-compose (${direction}).`,
      ...(hasBase ? [] : ['# The base charm has no such hook; only the layer runs.']),
      'set -e',
      'HOOK_DIR="$(dirname "$0")"',
      ...steps,
      '',
   ].join('\n');
}

/**
 * Move the base hook aside. A relative symbolic link (hooks/install ->
 * hooks.py) is re-pointed so it still reaches the same file from its new
 * directory.
 */
function relocateBaseHook(tree: OutputTree, fromRel: string, toRel: string): void {
   const fromAbs = tree.resolve(fromRel);
   const stats = fs.lstatSync(fromAbs);
   if (!stats.isSymbolicLink()) {
      tree.move(fromRel, toRel);
      return;
   }

   const linkText = fs.readlinkSync(fromAbs);
   const toAbs = tree.resolve(toRel);
   const target = path.isAbsolute(linkText)
      ? linkText
      : path.relative(path.dirname(toAbs), path.resolve(path.dirname(fromAbs), linkText));

   const origin = tree.get(fromRel)?.origin ?? 'base';
   ensureDirSync(path.dirname(toAbs));
   fs.symlinkSync(target, toAbs);
   fs.unlinkSync(fromAbs);
   tree.forget(fromRel);
   tree.record(toRel, origin, path.isAbsolute(linkText) ? 'static' : 'dynamic');
}

export interface DivertResult {
   hook: string;
   direction: DivertDirection;
   hasBase: boolean;
}

/**
 * Divert a single hook of the output tree to run both the base's and the
 * layer's script. The layer script is checked before anything is moved, so
 * a missing source leaves hooks/<hook> untouched.
 */
export function divertHook(tree: OutputTree, layerDir: string, rule: DivertRule): DivertResult {
   const { hook, direction } = rule;
   const paths = divertPaths(hook);
   const layerHook = path.join(path.resolve(layerDir), HOOKS_DIR, hook);

   if (!isFileSync(layerHook)) {
      throw new ComposeError(
         'DivertSourceMissing',
         `Layer does not provide ${HOOKS_DIR}/${hook} needed to divert "${hook}"`,
         { path: layerHook },
      );
   }

   const hookAbs = tree.resolve(paths.hook);
   const hasBase = isFileSync(hookAbs);
   if (hasBase) {
      relocateBaseHook(tree, paths.hook, paths.base);
   } else if (lstatSafeSync(hookAbs)) {
      // a directory or a dangling link in the way of the dispatcher
      fs.rmSync(hookAbs, { recursive: true, force: true });
      tree.forget(paths.hook);
   }

   const layerTarget = tree.resolve(paths.layer);
   ensureDirSync(path.dirname(layerTarget));
   fs.copyFileSync(layerHook, layerTarget);
   fs.chmodSync(layerTarget, fs.statSync(layerHook).mode & 0o7777);
   makeExecutableSync(layerTarget);
   tree.record(paths.layer, 'layer', 'static');

   if (hasBase) {
      makeExecutableSync(tree.resolve(paths.base));
   }

   ensureDirSync(path.dirname(hookAbs));
   fs.writeFileSync(hookAbs, renderDispatcher(hook, direction, hasBase), { encoding: 'utf8' });
   fs.chmodSync(hookAbs, 0o755);
   tree.record(paths.hook, 'compose', 'dynamic');

   logger.debug(
      hasBase
         ? `diverted ${paths.hook} (${direction})`
         : `installed ${paths.hook} from layer (base has no ${hook} hook)`,
   );
   return { hook, direction, hasBase };
}

/**
 * Apply divert rules in manifest order.
 */
export function divertHooks(tree: OutputTree, layerDir: string, rules: DivertRule[]): DivertResult[] {
   return rules.map((rule) => divertHook(tree, layerDir, rule));
}
