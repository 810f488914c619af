// src/core/inspect.ts

import path from 'path';

import { SIGNATURE_FILE } from '../schema';
import { hashEntrySync, listEntriesSync } from '../util/fs-utils';
import { readSignatureFile, type EntryKind } from './output-tree';

export type DriftStatus = 'unchanged' | 'added' | 'changed';

export interface InspectedFile {
   path: string;
   /**
    * Source name from the signature manifest, null for unsigned files.
    */
   source: string | null;
   kind: EntryKind | null;
   status: DriftStatus;
}

export interface InspectionResult {
   charmDir: string;
   files: InspectedFile[];
   deleted: string[];
}

const COMPOSE_SOURCE = 'compose';

/**
 * Compare a composed charm against its `.compose.manifest`.
 *
 * Files written by the run itself (merged metadata, dispatchers) are never
 * reported as changed.
 */
export function inspectCharm(charmDir: string): InspectionResult {
   const absDir = path.resolve(charmDir);
   const { signatures } = readSignatureFile(absDir);

   const onDisk = listEntriesSync(absDir).filter((rel) => rel !== SIGNATURE_FILE);
   const present = new Set(onDisk);

   const files = onDisk.map((rel): InspectedFile => {
      const signed = signatures[rel];
      if (!signed) {
         return { path: rel, source: null, kind: null, status: 'added' };
      }
      const [source, kind, hash] = signed;
      const drifted = source !== COMPOSE_SOURCE && hashEntrySync(path.join(absDir, rel)) !== hash;
      return { path: rel, source, kind, status: drifted ? 'changed' : 'unchanged' };
   });

   const deleted = Object.keys(signatures)
      .filter((rel) => !present.has(rel))
      .sort();

   return { charmDir: absDir, files, deleted };
}

interface DirNode {
   dirs: Map<string, DirNode>;
   files: InspectedFile[];
}

function byName(a: string, b: string): number {
   if (a < b) return -1;
   return a > b ? 1 : 0;
}

function buildTree(files: InspectedFile[]): DirNode {
   const root: DirNode = { dirs: new Map(), files: [] };
   for (const file of files) {
      const segments = file.path.split('/');
      segments.pop();
      let node = root;
      for (const segment of segments) {
         let next = node.dirs.get(segment);
         if (!next) {
            next = { dirs: new Map(), files: [] };
            node.dirs.set(segment, next);
         }
         node = next;
      }
      node.files.push(file);
   }
   return root;
}

const MARKERS: Record<DriftStatus, string> = {
   unchanged: '',
   added: ' +',
   changed: ' *',
};

/**
 * Text tree of an inspection: two spaces per level, directories first and
 * suffixed with "/", each file tagged with its source and a drift marker.
 */
export function renderInspection(result: InspectionResult): string {
   const lines: string[] = [];

   function walk(node: DirNode, depth: number): void {
      const indent = '  '.repeat(depth);
      for (const name of [...node.dirs.keys()].sort(byName)) {
         lines.push(`${indent}${name}/`);
         const child = node.dirs.get(name);
         if (child) walk(child, depth + 1);
      }
      const files = [...node.files].sort((a, b) => byName(a.path, b.path));
      for (const file of files) {
         const name = path.posix.basename(file.path);
         lines.push(`${indent}${name} [${file.source ?? 'unsigned'}]${MARKERS[file.status]}`);
      }
   }

   walk(buildTree(result.files), 0);

   if (result.deleted.length) {
      lines.push('deleted:');
      for (const rel of result.deleted) {
         lines.push(`  ${rel}`);
      }
   }

   return lines.join('\n');
}
