// src/index.ts

import type { ComposeConfig } from './schema';

export * from './schema';
export { compose, mergeDocuments, prepareOutput } from './core/composer';
export type { ComposeOptions, ComposeResult } from './core/composer';
export { loadManifest, parseManifest, getManifestPath } from './core/manifest-loader';
export { resolveBase, baseCandidates, searchPathFromEnv } from './core/resolve-base';
export { copyTree, isIgnored } from './core/tree-copier';
export { divertHook, divertHooks, divertPaths, renderDispatcher } from './core/hook-diverter';
export type { DivertResult } from './core/hook-diverter';
export { applyFileRule, applyFileRules } from './core/file-overlay';
export { mergeMetadata, mergeNodes, deletePath, nodesEqual } from './core/metadata-merger';
export {
   nodeFromValue,
   nodeToValue,
   parseDocument,
   stringifyDocument,
   readDocumentSync,
   writeDocumentSync,
} from './core/metadata-document';
export { OutputTree, readSignatureFile } from './core/output-tree';
export type { EntryKind, SignatureFile, TreeEntry } from './core/output-tree';
export { inspectCharm, renderInspection } from './core/inspect';
export type { DriftStatus, InspectedFile, InspectionResult } from './core/inspect';
export { loadComposeConfig, parseComposeConfig } from './core/config-loader';
export { CallbackRunner } from './core/callback-runner';
export { Logger, defaultLogger } from './util/logger';
export type { LogLevel, LoggerOptions, LogSink } from './util/logger';

/**
 * Identity helper giving `charm-compose.config.ts` its types.
 */
export function defineConfig(config: ComposeConfig): ComposeConfig {
   return config;
}
