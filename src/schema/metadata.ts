// src/schema/metadata.ts

/**
 * Scalar values allowed in a metadata document.
 */
export type ScalarValue = string | number | boolean | null;

export interface ScalarNode {
   kind: 'scalar';
   value: ScalarValue;
}

export interface SequenceNode {
   kind: 'sequence';
   items: MetadataNode[];
}

/**
 * A keyed sub-document. Entry order is the order keys were first seen,
 * which is also the order they are written back out.
 */
export interface MappingNode {
   kind: 'mapping';
   entries: Map<string, MetadataNode>;
}

/**
 * A single node of a metadata document (metadata.yaml, config.yaml):
 * either a scalar, an ordered list or a keyed map.
 */
export type MetadataNode = ScalarNode | SequenceNode | MappingNode;

/**
 * A whole document. The root of metadata.yaml / config.yaml is always a map.
 */
export type MetadataDocument = MappingNode;
