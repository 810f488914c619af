// src/core/config-loader.ts

import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import { createRequire } from 'module';
import { transform } from 'esbuild';
import { z } from 'zod';

import {
   ComposeError,
   type ComposeConfig,
   type FileCallbackConfig,
   type RunCallbackConfig,
} from '../schema';
import { defaultLogger, LOG_LEVELS } from '../util/logger';
import { ensureDirSync } from '../util/fs-utils';

const logger = defaultLogger.child('[config]');

export const CONFIG_CANDIDATES = [
   'charm-compose.config.ts',
   'charm-compose.config.cts',
   'charm-compose.config.js',
   'charm-compose.config.cjs',
];

export interface LoadComposeConfigOptions {
   /**
    * Optional explicit config file path (absolute or relative to cwd).
    * If not provided, we look for charm-compose.config.* inside cwd.
    */
   configPath?: string;
}

export interface LoadComposeConfigResult {
   config: ComposeConfig;

   /**
    * Absolute path of the file the config came from, or null when no
    * config file exists and defaults apply.
    */
   configPath: string | null;
}

function isFunction(value: unknown): boolean {
   return typeof value === 'function';
}

const filterFields = {
   include: z.array(z.string()).optional(),
   exclude: z.array(z.string()).optional(),
   files: z.array(z.string()).optional(),
};

const runCallbackSchema = z.object({
   fn: z.custom<RunCallbackConfig['fn']>(isFunction, { message: 'must be a function' }),
});

const fileCallbackSchema = z.object({
   ...filterFields,
   fn: z.custom<FileCallbackConfig['fn']>(isFunction, { message: 'must be a function' }),
});

export const composeConfigSchema = z.object({
   outputDir: z.string().min(1).optional(),
   series: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'must be a series name like "trusty"').optional(),
   existing: z.enum(['reject', 'overwrite']).optional(),
   ignore: z.array(z.string().min(1)).optional(),
   searchPath: z.array(z.string().min(1)).optional(),
   logLevel: z.enum(LOG_LEVELS).optional(),
   callbacks: z
      .object({
         preCompose: z.array(runCallbackSchema).optional(),
         postCompose: z.array(runCallbackSchema).optional(),
         postWriteFile: z.array(fileCallbackSchema).optional(),
      })
      .optional(),
});

/**
 * Validate a config object, e.g. the default export of a config file.
 */
export function parseComposeConfig(value: unknown, source: string): ComposeConfig {
   const result = composeConfigSchema.safeParse(value ?? {});
   if (!result.success) {
      const issues = result.error.issues
         .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
         .join('; ');
      throw new ComposeError('ConfigInvalid', `${source}: ${issues}`, {
         path: source,
         cause: result.error,
      });
   }
   const config: ComposeConfig = result.data;
   return config;
}

/**
 * Load the project config. With no explicit path, the first
 * charm-compose.config.* found in cwd is used; none at all means defaults.
 */
export async function loadComposeConfig(
   cwd: string,
   options: LoadComposeConfigOptions = {},
): Promise<LoadComposeConfigResult> {
   const absCwd = path.resolve(cwd);

   let configPath: string | null;
   if (options.configPath) {
      configPath = path.resolve(absCwd, options.configPath);
      if (!fs.existsSync(configPath)) {
         throw new ComposeError('ConfigInvalid', `Config file ${configPath} does not exist`, {
            path: configPath,
         });
      }
   } else {
      configPath = findConfigPath(absCwd);
   }

   if (!configPath) {
      logger.debug(`No config file in ${absCwd}; using defaults`);
      return { config: {}, configPath: null };
   }

   const exported = await importConfig(configPath);
   const config = parseComposeConfig(exported, configPath);
   logger.debug(`Loaded config from ${configPath}`);
   return { config, configPath };
}

function findConfigPath(dir: string): string | null {
   for (const file of CONFIG_CANDIDATES) {
      const full = path.join(dir, file);
      if (fs.existsSync(full)) {
         return full;
      }
   }
   return null;
}

/**
 * Transpile a config file with esbuild to CommonJS and load the result.
 * The compiled file is cached under the temp dir, keyed on path + mtime,
 * so edits invalidate it.
 */
async function importConfig(configPath: string): Promise<unknown> {
   const ext = path.extname(configPath).toLowerCase();
   const source = fs.readFileSync(configPath, 'utf8');
   const stat = fs.statSync(configPath);

   const hash = crypto
      .createHash('sha1')
      .update(configPath)
      .update(String(stat.mtimeMs))
      .digest('hex');

   const tmpDir = path.join(os.tmpdir(), 'charm-compose-config');
   ensureDirSync(tmpDir);

   const tmpFile = path.join(tmpDir, `${hash}.cjs`);

   if (!fs.existsSync(tmpFile)) {
      let code: string;
      try {
         const result = await transform(source, {
            loader: ext === '.ts' || ext === '.cts' ? 'ts' : 'js',
            format: 'cjs',
            platform: 'node',
            target: 'node20',
            sourcemap: 'inline',
            sourcefile: configPath,
         });
         code = result.code;
      } catch (err) {
         throw new ComposeError(
            'ConfigInvalid',
            `Could not compile ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
            { path: configPath, cause: err },
         );
      }

      fs.writeFileSync(tmpFile, code, 'utf8');
   }

   const load = createRequire(configPath);
   let mod: unknown;
   try {
      mod = load(tmpFile);
   } catch (err) {
      throw new ComposeError(
         'ConfigInvalid',
         `Could not load ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
         { path: configPath, cause: err },
      );
   }

   if (mod !== null && typeof mod === 'object' && 'default' in mod) {
      return mod.default;
   }
   return mod;
}
