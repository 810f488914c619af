// src/core/callback-runner.ts

import { minimatch } from 'minimatch';
import type {
   CallbackFilter,
   CallbacksConfig,
   FileCallbackContext,
   RunCallbackContext,
   RunCallbackKind,
} from '../schema';

function matchesFilter(pathRel: string, cfg: CallbackFilter): boolean {
   const { include, exclude, files } = cfg;

   const patterns: string[] = [];
   if (include?.length) patterns.push(...include);
   if (files?.length) patterns.push(...files);

   if (patterns.length) {
      const ok = patterns.some((p) => minimatch(pathRel, p, { dot: true }));
      if (!ok) return false;
   }

   if (exclude?.length) {
      const blocked = exclude.some((p) => minimatch(pathRel, p, { dot: true }));
      if (blocked) return false;
   }

   return true;
}

/**
 * Invokes the callbacks a config file declares, one at a time in
 * declaration order. A throwing callback fails the run.
 */
export class CallbackRunner {
   constructor(private readonly callbacks: CallbacksConfig = {}) { }

   async run(kind: RunCallbackKind, ctx: RunCallbackContext): Promise<void> {
      for (const cfg of this.callbacks[kind] ?? []) {
         // eslint-disable-next-line no-await-in-loop
         await cfg.fn(ctx);
      }
   }

   async runForFile(ctx: FileCallbackContext): Promise<void> {
      for (const cfg of this.callbacks.postWriteFile ?? []) {
         if (!matchesFilter(ctx.targetPath, cfg)) continue;
         // eslint-disable-next-line no-await-in-loop
         await cfg.fn(ctx);
      }
   }

   hasFileCallbacks(): boolean {
      return (this.callbacks.postWriteFile?.length ?? 0) > 0;
   }
}
