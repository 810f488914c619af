// src/schema/callbacks.ts

/**
 * Points of a compose run at which config-declared callbacks are invoked.
 */
export type RunCallbackKind = 'preCompose' | 'postCompose';

/**
 * Where a file in the output tree came from.
 * `compose` marks files generated during the run (dispatchers, merged documents).
 */
export type FileOrigin = 'base' | 'layer' | 'compose';

export interface RunCallbackContext {
   /**
    * Absolute path of the output charm directory.
    */
   outputDir: string;

   layerDir: string;

   /**
    * Absolute path of the resolved base charm.
    */
   baseDir: string;

   charmName: string;
   series: string;
}

export interface FileCallbackContext extends RunCallbackContext {
   /**
    * Output-relative POSIX path, e.g. "hooks/install".
    */
   targetPath: string;

   absolutePath: string;

   origin: FileOrigin;
}

/**
 * Glob filters evaluated against `targetPath` of a file callback.
 */
export interface CallbackFilter {
   /**
    * At least one pattern must match for the callback to run.
    */
   include?: string[];

   /**
    * Any matching pattern prevents the callback from running.
    */
   exclude?: string[];

   /**
    * Alias of `include` for explicit file lists.
    */
   files?: string[];
}

export interface RunCallbackConfig {
   fn: (ctx: RunCallbackContext) => void | Promise<void>;
}

export interface FileCallbackConfig extends CallbackFilter {
   fn: (ctx: FileCallbackContext) => void | Promise<void>;
}

export interface CallbacksConfig {
   preCompose?: RunCallbackConfig[];
   postCompose?: RunCallbackConfig[];
   postWriteFile?: FileCallbackConfig[];
}
