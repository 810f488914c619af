// src/core/metadata-merger.ts
//
// Field-level merge of two metadata documents. Pure: neither input is
// mutated and the result shares no nodes with them.

import type { MappingNode, MetadataDocument, MetadataNode, SequenceNode } from '../schema';

export function cloneNode(node: MetadataNode): MetadataNode {
   switch (node.kind) {
      case 'scalar':
         return { kind: 'scalar', value: node.value };
      case 'sequence':
         return { kind: 'sequence', items: node.items.map(cloneNode) };
      case 'mapping':
         return {
            kind: 'mapping',
            entries: new Map([...node.entries].map(([k, v]) => [k, cloneNode(v)])),
         };
   }
}

/**
 * Structural equality. Mapping key order does not matter; sequence order does.
 */
export function nodesEqual(a: MetadataNode, b: MetadataNode): boolean {
   if (a.kind === 'scalar' && b.kind === 'scalar') {
      return a.value === b.value;
   }
   if (a.kind === 'sequence' && b.kind === 'sequence') {
      return (
         a.items.length === b.items.length &&
         a.items.every((item, i) => nodesEqual(item, b.items[i]))
      );
   }
   if (a.kind === 'mapping' && b.kind === 'mapping') {
      if (a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries) {
         const other = b.entries.get(key);
         if (!other || !nodesEqual(value, other)) return false;
      }
      return true;
   }
   return false;
}

/**
 * Base items followed by layer items, keeping the first occurrence of
 * every structurally equal item.
 */
function unionSequences(base: SequenceNode, layer: SequenceNode): SequenceNode {
   const items: MetadataNode[] = [];
   for (const item of [...base.items, ...layer.items]) {
      if (!items.some((kept) => nodesEqual(kept, item))) {
         items.push(cloneNode(item));
      }
   }
   return { kind: 'sequence', items };
}

function mergeMappings(base: MappingNode, layer: MappingNode): MappingNode {
   const entries = new Map<string, MetadataNode>();

   for (const [key, baseValue] of base.entries) {
      const layerValue = layer.entries.get(key);
      entries.set(key, layerValue ? mergeNodes(baseValue, layerValue) : cloneNode(baseValue));
   }
   for (const [key, layerValue] of layer.entries) {
      if (!base.entries.has(key)) {
         entries.set(key, cloneNode(layerValue));
      }
   }

   return { kind: 'mapping', entries };
}

/**
 * Merge a layer value over a base value:
 * - two mappings merge key by key (recursively),
 * - two sequences form an order-preserving union, base first,
 * - anything else (two scalars, or a shape mismatch) takes the layer value.
 */
export function mergeNodes(base: MetadataNode, layer: MetadataNode): MetadataNode {
   if (base.kind === 'mapping' && layer.kind === 'mapping') {
      return mergeMappings(base, layer);
   }
   if (base.kind === 'sequence' && layer.kind === 'sequence') {
      return unionSequences(base, layer);
   }
   return cloneNode(layer);
}

/**
 * Merge two whole documents. Keys keep base order, followed by keys only
 * the layer has, in layer order.
 */
export function mergeMetadata(base: MetadataDocument, layer: MetadataDocument): MetadataDocument {
   return mergeMappings(base, layer);
}

/**
 * Remove a dotted key path (e.g. "provides.website") from a mapping.
 * Returns false when some segment of the path does not exist.
 */
export function deletePath(doc: MappingNode, dottedPath: string): boolean {
   const parts = dottedPath.split('.');
   const last = parts.pop();
   if (last === undefined) return false;

   let current: MappingNode = doc;
   for (const part of parts) {
      const next = current.entries.get(part);
      if (next?.kind !== 'mapping') return false;
      current = next;
   }
   return current.entries.delete(last);
}
