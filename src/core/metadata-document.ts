// src/core/metadata-document.ts

import fs from 'fs';
import path from 'path';
import { parse, stringify } from 'yaml';

import {
   ComposeError,
   type MappingNode,
   type MetadataDocument,
   type MetadataNode,
   type ScalarValue,
} from '../schema';
import { ensureDirSync } from '../util/fs-utils';

function isScalar(value: unknown): value is ScalarValue {
   return (
      value === null ||
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
   );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
   if (value === null || typeof value !== 'object' || Array.isArray(value)) {
      return false;
   }
   const proto: unknown = Object.getPrototypeOf(value);
   return proto === Object.prototype || proto === null;
}

function keyToString(key: unknown, where: string): string {
   if (typeof key === 'string') return key;
   if (typeof key === 'number' || typeof key === 'boolean' || key === null) {
      return String(key);
   }
   throw new Error(`${where}: complex mapping keys are not supported`);
}

/**
 * Convert a parsed value (plain objects / Maps, arrays, scalars) into the
 * tagged metadata tree. Throws a plain Error naming the offending key path.
 */
export function nodeFromValue(value: unknown, where = '$'): MetadataNode {
   if (isScalar(value)) {
      return { kind: 'scalar', value };
   }

   if (Array.isArray(value)) {
      return {
         kind: 'sequence',
         items: value.map((item, i) => nodeFromValue(item, `${where}[${i}]`)),
      };
   }

   if (value instanceof Map) {
      const entries = new Map<string, MetadataNode>();
      for (const [rawKey, child] of value) {
         const key = keyToString(rawKey, where);
         entries.set(key, nodeFromValue(child, `${where}.${key}`));
      }
      return { kind: 'mapping', entries };
   }

   if (isPlainObject(value)) {
      const entries = new Map<string, MetadataNode>();
      for (const [key, child] of Object.entries(value)) {
         entries.set(key, nodeFromValue(child, `${where}.${key}`));
      }
      return { kind: 'mapping', entries };
   }

   throw new Error(`${where}: unsupported value of type ${typeof value}`);
}

/**
 * Convert a metadata tree to plain JS values. Key order of objects follows
 * JS property order, so use {@link nodeToYamlValue} for serialization.
 */
export function nodeToValue(node: MetadataNode): unknown {
   switch (node.kind) {
      case 'scalar':
         return node.value;
      case 'sequence':
         return node.items.map(nodeToValue);
      case 'mapping':
         return Object.fromEntries(
            [...node.entries].map(([key, child]) => [key, nodeToValue(child)]),
         );
   }
}

/**
 * Like {@link nodeToValue} but mappings become Maps, which keeps key order
 * intact through YAML serialization.
 */
export function nodeToYamlValue(node: MetadataNode): unknown {
   switch (node.kind) {
      case 'scalar':
         return node.value;
      case 'sequence':
         return node.items.map(nodeToYamlValue);
      case 'mapping':
         return new Map(
            [...node.entries].map(([key, child]) => [key, nodeToYamlValue(child)]),
         );
   }
}

export function emptyDocument(): MetadataDocument {
   return { kind: 'mapping', entries: new Map() };
}

/**
 * Parse YAML text into a metadata document. An empty document is an empty
 * mapping; any other non-mapping root is rejected.
 */
export function parseDocument(text: string, source: string): MetadataDocument {
   let parsed: unknown;
   try {
      parsed = parse(text, { mapAsMap: true });
   } catch (err) {
      throw new ComposeError(
         'MetadataMalformed',
         `${source} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
         { path: source, cause: err },
      );
   }

   if (parsed === null || parsed === undefined) {
      return emptyDocument();
   }

   let node: MetadataNode;
   try {
      node = nodeFromValue(parsed);
   } catch (err) {
      throw new ComposeError(
         'MetadataMalformed',
         `${source}: ${err instanceof Error ? err.message : String(err)}`,
         { path: source, cause: err },
      );
   }

   if (node.kind !== 'mapping') {
      throw new ComposeError(
         'MetadataMalformed',
         `${source} must contain a mapping at its root, found a ${node.kind}`,
         { path: source },
      );
   }
   return node;
}

export function stringifyDocument(doc: MetadataDocument): string {
   return stringify(nodeToYamlValue(doc));
}

/**
 * Read a document from disk, or return null when the file does not exist.
 */
export function readDocumentSync(filePath: string): MetadataDocument | null {
   if (!fs.existsSync(filePath)) {
      return null;
   }
   return parseDocument(fs.readFileSync(filePath, 'utf8'), filePath);
}

export function writeDocumentSync(filePath: string, doc: MetadataDocument): void {
   ensureDirSync(path.dirname(filePath));
   fs.writeFileSync(filePath, stringifyDocument(doc), 'utf8');
}

/**
 * Look up a direct child mapping of a document, e.g. `options` of config.yaml.
 */
export function childMapping(doc: MappingNode, key: string): MappingNode | undefined {
   const child = doc.entries.get(key);
   return child?.kind === 'mapping' ? child : undefined;
}
