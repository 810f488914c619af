// src/schema/manifest.ts

import { z } from 'zod';

/**
 * Order in which a diverted hook runs the layer's script relative to the
 * base's original script.
 */
export type DivertDirection = 'base-then-layer' | 'layer-then-base';

/**
 * Shape of a lifecycle hook name (install, config-changed, db-relation-joined).
 * Anything containing a dot or a slash can never be invoked as a hook.
 */
export const HOOK_NAME_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

/**
 * Copy `source` (relative to the layer) to `dest` (relative to the output).
 */
export interface FileRule {
   source: string;
   dest: string;
}

export interface DivertRule {
   hook: string;
   direction: DivertDirection;
}

/**
 * Post-merge key removal for one structured document.
 */
export interface DeleteRules {
   /**
    * Dotted key paths, e.g. "provides.website".
    */
   deletes: string[];
}

/**
 * Parsed layer manifest (compose.yaml).
 */
export interface ComposeManifest {
   /**
    * Path of the base charm: absolute, relative to the layer, or relative
    * to an entry of the search path.
    */
   baseReference: string;

   fileRules: FileRule[];

   divertRules: DivertRule[];

   /**
    * Extra glob patterns for base entries that must not be copied.
    */
   ignore: string[];

   metadata: DeleteRules;

   /**
    * Deletes for config.yaml, applied under its `options` key.
    */
   config: DeleteRules;
}

function isContainedRelativePath(p: string): boolean {
   if (p.length === 0 || p.startsWith('/') || /^[a-zA-Z]:[\\/]/.test(p)) {
      return false;
   }
   return !p.split(/[\\/]/).some((segment) => segment === '..');
}

const relativePath = z
   .string()
   .min(1)
   .refine(isContainedRelativePath, {
      message: 'must be a relative path that stays inside its root',
   });

const deleteRulesSchema = z
   .object({
      deletes: z.array(z.string().min(1)).default([]),
   })
   .default({ deletes: [] });

export const composeManifestSchema = z
   .object({
      baseReference: z.string().trim().min(1),
      fileRules: z
         .array(z.object({ source: relativePath, dest: relativePath }))
         .default([]),
      divertRules: z
         .array(
            z.object({
               hook: z.string().regex(HOOK_NAME_PATTERN, {
                  message: 'is not a lifecycle hook name',
               }),
               direction: z.enum(['base-then-layer', 'layer-then-base']),
            }),
         )
         .default([])
         .superRefine((rules, ctx) => {
            const seen = new Set<string>();
            rules.forEach((rule, index) => {
               if (seen.has(rule.hook)) {
                  ctx.addIssue({
                     code: z.ZodIssueCode.custom,
                     path: [index, 'hook'],
                     message: `hook "${rule.hook}" is diverted more than once`,
                  });
               }
               seen.add(rule.hook);
            });
         }),
      ignore: z.array(z.string().min(1)).default([]),
      metadata: deleteRulesSchema,
      config: deleteRulesSchema,
   });
