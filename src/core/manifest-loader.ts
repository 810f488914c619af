// src/core/manifest-loader.ts

import fs from 'fs';
import path from 'path';
import { parse } from 'yaml';
import type { ZodIssue } from 'zod';

import {
   ComposeError,
   MANIFEST_FILE,
   composeManifestSchema,
   type ComposeManifest,
} from '../schema';
import { defaultLogger } from '../util/logger';

const logger = defaultLogger.child('[manifest]');

export function getManifestPath(layerDir: string): string {
   return path.join(path.resolve(layerDir), MANIFEST_FILE);
}

function formatIssue(issue: ZodIssue): string {
   const where = issue.path.length ? issue.path.join('.') : '(root)';
   return `${where} ${issue.message}`;
}

/**
 * Parse manifest text. `source` is only used in error messages.
 */
export function parseManifest(text: string, source: string): ComposeManifest {
   let raw: unknown;
   try {
      raw = parse(text);
   } catch (err) {
      throw new ComposeError(
         'ManifestMalformed',
         `${source} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
         { path: source, cause: err },
      );
   }

   if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
      throw new ComposeError(
         'ManifestMalformed',
         `${source} must be a mapping with at least a "baseReference" key`,
         { path: source },
      );
   }

   const result = composeManifestSchema.safeParse(raw);
   if (!result.success) {
      throw new ComposeError(
         'ManifestMalformed',
         `${source}: ${result.error.issues.map(formatIssue).join('; ')}`,
         { path: source, cause: result.error },
      );
   }

   const manifest: ComposeManifest = result.data;
   return manifest;
}

/**
 * Locate and parse the manifest of a layer directory.
 */
export function loadManifest(layerDir: string): ComposeManifest {
   const manifestPath = getManifestPath(layerDir);

   let text: string;
   try {
      text = fs.readFileSync(manifestPath, 'utf8');
   } catch (err) {
      throw new ComposeError(
         'ManifestMissing',
         `No ${MANIFEST_FILE} found in layer ${path.resolve(layerDir)}`,
         { path: manifestPath, cause: err },
      );
   }

   const manifest = parseManifest(text, manifestPath);
   logger.debug(
      `Loaded ${manifestPath}: base=${manifest.baseReference}, ` +
      `fileRules=${manifest.fileRules.length}, divertRules=${manifest.divertRules.length}`,
   );
   return manifest;
}
