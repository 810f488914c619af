// src/core/resolve-base.ts

import fs from 'fs';
import path from 'path';

import { ComposeError, METADATA_FILE } from '../schema';
import { isDirectorySync } from '../util/fs-utils';
import { defaultLogger } from '../util/logger';

const logger = defaultLogger.child('[base]');

export interface ResolveBaseOptions {
   /**
    * Layer directory; relative references are tried against it first.
    */
   layerDir: string;

   /**
    * Further directories to try, in order.
    */
   searchPath?: string[];
}

/**
 * Split a CHARM_COMPOSE_PATH-style value on the platform path delimiter.
 */
export function searchPathFromEnv(value: string | undefined = process.env.CHARM_COMPOSE_PATH): string[] {
   if (!value) return [];
   return value.split(path.delimiter).filter((entry) => entry.trim().length > 0);
}

/**
 * Candidate directories for a base reference, in lookup order.
 */
export function baseCandidates(reference: string, options: ResolveBaseOptions): string[] {
   if (path.isAbsolute(reference)) {
      return [path.normalize(reference)];
   }
   const roots = [options.layerDir, ...(options.searchPath ?? [])];
   return roots.map((root) => path.resolve(root, reference));
}

/**
 * Resolve the manifest's base reference to an absolute charm directory.
 * The first candidate that is a directory wins; it must hold metadata.yaml.
 */
export function resolveBase(reference: string, options: ResolveBaseOptions): string {
   const candidates = baseCandidates(reference, options);
   const found = candidates.find((candidate) => isDirectorySync(candidate));

   if (!found) {
      throw new ComposeError(
         'BaseUnresolvable',
         `Base "${reference}" not found. Looked in: ${candidates.join(', ')}`,
      );
   }

   const metadataPath = path.join(found, METADATA_FILE);
   if (!fs.existsSync(metadataPath)) {
      throw new ComposeError(
         'BaseUnresolvable',
         `Base "${reference}" resolved to ${found}, which has no ${METADATA_FILE}; is it a charm?`,
         { path: found },
      );
   }

   logger.debug(`Resolved base "${reference}" -> ${found}`);
   return found;
}
