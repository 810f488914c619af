// src/core/composer.ts

import fs from 'fs';
import path from 'path';
import pluralize from 'pluralize';

import {
   CONFIG_FILE,
   ComposeError,
   DEFAULT_IGNORE,
   DEFAULT_SERIES,
   METADATA_FILE,
   type CallbacksConfig,
   type ComposeErrorCode,
   type ComposeManifest,
   type ComposeStage,
   type ExistingOutputPolicy,
   type MetadataDocument,
   type RunCallbackContext,
} from '../schema';
import { ensureDirSync, isSubPath, listEntriesSync, lstatSafeSync } from '../util/fs-utils';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';
import { CallbackRunner } from './callback-runner';
import { applyFileRules } from './file-overlay';
import { divertHooks, type DivertResult } from './hook-diverter';
import { loadManifest } from './manifest-loader';
import {
   childMapping,
   emptyDocument,
   readDocumentSync,
   writeDocumentSync,
} from './metadata-document';
import { deletePath, mergeMetadata } from './metadata-merger';
import { OutputTree, type SignatureFile, type TreeEntry } from './output-tree';
import { resolveBase, searchPathFromEnv } from './resolve-base';
import { copyTree } from './tree-copier';

export interface ComposeOptions {
   /**
    * Layer directory holding compose.yaml.
    */
   layerDir: string;

   /**
    * Name of the output charm.
    */
   name: string;

   /**
    * Repository directory; the charm is written to <outputDir>/<series>/<name>.
    * Default: $JUJU_REPOSITORY, then the current directory.
    */
   outputDir?: string;

   series?: string;

   /**
    * Default: 'reject'.
    */
   existing?: ExistingOutputPolicy;

   /**
    * Extra ignore patterns on top of the defaults and the manifest's own.
    */
   ignore?: string[];

   /**
    * Default: $CHARM_COMPOSE_PATH.
    */
   searchPath?: string[];

   callbacks?: CallbacksConfig;

   /**
    * Optional logger override.
    */
   logger?: Logger;
}

export interface ComposeResult {
   /**
    * Absolute path of the composed charm.
    */
   outputDir: string;
   layerDir: string;
   baseDir: string;
   manifest: ComposeManifest;
   entries: TreeEntry[];
   diverted: DivertResult[];
   signatures: SignatureFile;
}

interface MergedDocuments {
   metadata: MetadataDocument;
   /**
    * null when neither the base nor the layer has a config.yaml.
    */
   config: MetadataDocument | null;
}

/**
 * Error code used when a stage fails with something other than a ComposeError.
 */
const STAGE_FAILURE_CODE: Record<ComposeStage, ComposeErrorCode> = {
   LoadManifest: 'ManifestMalformed',
   ResolveBase: 'BaseUnresolvable',
   PrepareOutput: 'OutputConflict',
   CopyBaseTree: 'CopyFailed',
   MergeMetadata: 'MetadataMalformed',
   ApplyDivertRules: 'CopyFailed',
   ApplyFileRules: 'CopyFailed',
   WriteMetadata: 'CopyFailed',
   WriteSignatures: 'CopyFailed',
};

function runStage<T>(stage: ComposeStage, logger: Logger, fn: () => T): T {
   logger.debug(`stage ${stage}`);
   try {
      return fn();
   } catch (err) {
      if (err instanceof ComposeError) {
         if (!err.stage) err.stage = stage;
         throw err;
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new ComposeError(STAGE_FAILURE_CODE[stage], reason, { stage, cause: err });
   }
}

/**
 * Apply the existing-output policy and make sure the output directory
 * does not overlap the inputs.
 */
export function prepareOutput(
   outputDir: string,
   inputs: { baseDir: string; layerDir: string },
   existing: ExistingOutputPolicy,
): void {
   const overlapping =
      isSubPath(outputDir, inputs.baseDir) ||
      isSubPath(outputDir, inputs.layerDir) ||
      isSubPath(inputs.baseDir, outputDir);
   if (overlapping) {
      throw new ComposeError(
         'OutputConflict',
         `Output ${outputDir} overlaps the base (${inputs.baseDir}) or the layer (${inputs.layerDir})`,
         { path: outputDir },
      );
   }

   if (lstatSafeSync(outputDir)) {
      if (existing !== 'overwrite') {
         throw new ComposeError(
            'OutputConflict',
            `Output ${outputDir} already exists (use --force to overwrite it)`,
            { path: outputDir },
         );
      }
      fs.rmSync(outputDir, { recursive: true, force: true });
   }

   ensureDirSync(outputDir);
}

function applyDeletes(doc: MetadataDocument, deletes: string[], label: string, logger: Logger): void {
   for (const key of deletes) {
      if (!deletePath(doc, key)) {
         logger.warn(`${label}: nothing to delete at "${key}"`);
      }
   }
}

/**
 * Merge metadata.yaml and config.yaml of the base and the layer, then
 * apply the manifest's deletes. Nothing is written here.
 */
export function mergeDocuments(
   baseDir: string,
   layerDir: string,
   manifest: ComposeManifest,
   logger: Logger,
): MergedDocuments {
   const baseMetadata = readDocumentSync(path.join(baseDir, METADATA_FILE)) ?? emptyDocument();
   const layerMetadata = readDocumentSync(path.join(layerDir, METADATA_FILE)) ?? emptyDocument();
   const metadata = mergeMetadata(baseMetadata, layerMetadata);
   applyDeletes(metadata, manifest.metadata.deletes, METADATA_FILE, logger);

   const baseConfig = readDocumentSync(path.join(baseDir, CONFIG_FILE));
   const layerConfig = readDocumentSync(path.join(layerDir, CONFIG_FILE));
   if (!baseConfig && !layerConfig) {
      if (manifest.config.deletes.length) {
         logger.warn(`${CONFIG_FILE}: config deletes given but neither base nor layer has one`);
      }
      return { metadata, config: null };
   }

   const config = mergeMetadata(baseConfig ?? emptyDocument(), layerConfig ?? emptyDocument());
   const options = childMapping(config, 'options');
   if (options) {
      applyDeletes(options, manifest.config.deletes, `${CONFIG_FILE} options`, logger);
   } else if (manifest.config.deletes.length) {
      logger.warn(`${CONFIG_FILE}: no "options" mapping to delete from`);
   }

   return { metadata, config };
}

function writeMergedDocument(tree: OutputTree, fileName: string, doc: MetadataDocument): void {
   const target = tree.resolve(fileName);
   // never write through a link copied from the base
   fs.rmSync(target, { force: true });
   writeDocumentSync(target, doc);
   tree.record(fileName, 'compose', 'dynamic');
}

function isCharmName(name: string): boolean {
   return name.length > 0 && name !== '.' && name !== '..' && !/[\\/]/.test(name);
}

/**
 * Compose one charm: load the layer manifest, resolve its base, copy the
 * base, merge metadata, divert hooks, overlay files, then write the merged
 * documents and the signature manifest.
 *
 * Stages run strictly in sequence. A failing stage throws a ComposeError
 * naming the stage; whatever was already written stays on disk.
 */
export async function compose(options: ComposeOptions): Promise<ComposeResult> {
   const logger = options.logger ?? defaultLogger.child('[compose]');
   const layerDir = path.resolve(options.layerDir);
   const series = options.series ?? DEFAULT_SERIES;
   const repoDir = path.resolve(options.outputDir ?? process.env.JUJU_REPOSITORY ?? '.');
   const callbacks = new CallbackRunner(options.callbacks);

   if (!isCharmName(options.name)) {
      throw new ComposeError(
         'OutputConflict',
         `Charm name "${options.name}" must be a single path segment`,
         { stage: 'PrepareOutput' },
      );
   }
   const outputDir = path.join(repoDir, series, options.name);

   const manifest = runStage('LoadManifest', logger, () => loadManifest(layerDir));

   const baseDir = runStage('ResolveBase', logger, () =>
      resolveBase(manifest.baseReference, {
         layerDir,
         searchPath: options.searchPath ?? searchPathFromEnv(),
      }),
   );

   runStage('PrepareOutput', logger, () =>
      prepareOutput(outputDir, { baseDir, layerDir }, options.existing ?? 'reject'),
   );

   const tree = new OutputTree(outputDir, {
      base: path.basename(baseDir),
      layer: path.basename(layerDir),
      compose: 'compose',
   });

   const runCtx: RunCallbackContext = {
      outputDir,
      layerDir,
      baseDir,
      charmName: options.name,
      series,
   };

   await callbacks.run('preCompose', runCtx);

   runStage('CopyBaseTree', logger, () => {
      const ignore = [...DEFAULT_IGNORE, ...(options.ignore ?? []), ...manifest.ignore];
      for (const entry of copyTree(baseDir, outputDir, { ignore })) {
         tree.record(entry.path, 'base', 'static');
      }
   });

   const merged = runStage('MergeMetadata', logger, () =>
      mergeDocuments(baseDir, layerDir, manifest, logger),
   );

   const diverted = runStage('ApplyDivertRules', logger, () =>
      divertHooks(tree, layerDir, manifest.divertRules),
   );

   const overlaid = runStage('ApplyFileRules', logger, () =>
      applyFileRules(tree, layerDir, manifest.fileRules),
   );

   runStage('WriteMetadata', logger, () => {
      writeMergedDocument(tree, METADATA_FILE, merged.metadata);
      if (merged.config) {
         writeMergedDocument(tree, CONFIG_FILE, merged.config);
      }
   });

   if (callbacks.hasFileCallbacks()) {
      for (const rel of listEntriesSync(outputDir)) {
         // eslint-disable-next-line no-await-in-loop
         await callbacks.runForFile({
            ...runCtx,
            targetPath: rel,
            absolutePath: tree.resolve(rel),
            origin: tree.get(rel)?.origin ?? 'compose',
         });
      }
   }

   const signatures = runStage('WriteSignatures', logger, () => tree.saveSignatures());

   await callbacks.run('postCompose', runCtx);

   const fileCount = Object.keys(signatures.signatures).length;
   logger.info(
      `Composed ${series}/${options.name} from ${path.basename(baseDir)} + ${path.basename(layerDir)}: ` +
      `${pluralize('file', fileCount, true)}, ` +
      `${pluralize('diverted hook', diverted.length, true)}, ` +
      `${pluralize('overlaid file', overlaid.length, true)}`,
   );

   return {
      outputDir,
      layerDir,
      baseDir,
      manifest,
      entries: tree.allEntries(),
      diverted,
      signatures,
   };
}
