// src/core/output-tree.ts

import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import { ComposeError, SIGNATURE_FILE, type FileOrigin } from '../schema';
import {
   ensureDirSync,
   hashEntrySync,
   listEntriesSync,
   resolveInside,
   toPosixPath,
} from '../util/fs-utils';
import { defaultLogger } from '../util/logger';

const logger = defaultLogger.child('[output]');

/**
 * `static` files are copied byte for byte from a source tree,
 * `dynamic` ones are generated or merged during the run.
 */
export type EntryKind = 'static' | 'dynamic';

export interface TreeEntry {
   /**
    * Output-relative POSIX path.
    */
   path: string;
   origin: FileOrigin;
   kind: EntryKind;
}

export const signatureFileSchema = z.object({
   signatures: z.record(
      z.tuple([z.string(), z.enum(['static', 'dynamic']), z.string()]),
   ),
});

/**
 * Contents of `.compose.manifest`: relative path -> [source, kind, sha256].
 * `source` is the directory name of the base or layer, or "compose".
 */
export type SignatureFile = z.infer<typeof signatureFileSchema>;

export type SourceNames = Record<FileOrigin, string>;

/**
 * Handle on the output charm directory that every compose stage writes
 * through. Tracks where each file came from so the run can be signed.
 */
export class OutputTree {
   private readonly entries = new Map<string, TreeEntry>();

   constructor(
      readonly root: string,
      private readonly sources: SourceNames,
   ) { }

   /**
    * Absolute path for an output-relative path. Throws if it escapes the tree.
    */
   resolve(relPath: string): string {
      return resolveInside(this.root, relPath);
   }

   record(relPath: string, origin: FileOrigin, kind: EntryKind): TreeEntry {
      const key = toPosixPath(path.normalize(relPath));
      const entry: TreeEntry = { path: key, origin, kind };
      this.entries.set(key, entry);
      return entry;
   }

   get(relPath: string): TreeEntry | undefined {
      return this.entries.get(toPosixPath(path.normalize(relPath)));
   }

   forget(relPath: string): void {
      this.entries.delete(toPosixPath(path.normalize(relPath)));
   }

   /**
    * Rename a file inside the tree, carrying its record along.
    */
   move(fromRel: string, toRel: string): void {
      const fromAbs = this.resolve(fromRel);
      const toAbs = this.resolve(toRel);
      ensureDirSync(path.dirname(toAbs));
      fs.renameSync(fromAbs, toAbs);

      const entry = this.get(fromRel);
      this.forget(fromRel);
      if (entry) {
         this.record(toRel, entry.origin, entry.kind);
      }
   }

   allEntries(): TreeEntry[] {
      return [...this.entries.values()];
   }

   /**
    * Hash every file and link currently in the tree. Paths nothing recorded
    * are attributed to the run itself.
    */
   sign(): SignatureFile {
      const signatures: SignatureFile['signatures'] = {};
      for (const rel of listEntriesSync(this.root)) {
         if (rel === SIGNATURE_FILE) continue;
         const entry = this.entries.get(rel);
         const origin = entry?.origin ?? 'compose';
         const kind = entry?.kind ?? 'dynamic';
         signatures[rel] = [this.sources[origin], kind, hashEntrySync(this.resolve(rel))];
      }
      return { signatures };
   }

   /**
    * Write `.compose.manifest`. Keys are sorted and no timestamps are
    * stored, so identical inputs give identical bytes.
    */
   saveSignatures(): SignatureFile {
      const signed = this.sign();
      const filePath = this.resolve(SIGNATURE_FILE);
      fs.writeFileSync(filePath, JSON.stringify(signed, null, 2) + '\n', 'utf8');
      logger.debug(`Wrote ${Object.keys(signed.signatures).length} signatures to ${filePath}`);
      return signed;
   }
}

/**
 * Read and validate the signature manifest of a composed charm.
 */
export function readSignatureFile(charmDir: string): SignatureFile {
   const filePath = path.join(path.resolve(charmDir), SIGNATURE_FILE);

   let raw: string;
   try {
      raw = fs.readFileSync(filePath, 'utf8');
   } catch (err) {
      throw new ComposeError(
         'ManifestMissing',
         `No ${SIGNATURE_FILE} in ${charmDir}; was it produced by charm-compose?`,
         { path: filePath, cause: err },
      );
   }

   let json: unknown;
   try {
      json = JSON.parse(raw);
   } catch (err) {
      throw new ComposeError('ManifestMalformed', `${filePath} is not valid JSON`, {
         path: filePath,
         cause: err,
      });
   }

   const result = signatureFileSchema.safeParse(json);
   if (!result.success) {
      throw new ComposeError(
         'ManifestMalformed',
         `${filePath} does not look like a signature manifest`,
         { path: filePath, cause: result.error },
      );
   }
   return result.data;
}
