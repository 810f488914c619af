// src/schema/errors.ts

export type ComposeErrorCode =
   | 'ManifestMissing'
   | 'ManifestMalformed'
   | 'BaseUnresolvable'
   | 'CopyFailed'
   | 'DivertSourceMissing'
   | 'OverlaySourceMissing'
   | 'MetadataMalformed'
   | 'OutputConflict'
   | 'ConfigInvalid';

/**
 * Stages of a compose run, in execution order.
 */
export type ComposeStage =
   | 'LoadManifest'
   | 'ResolveBase'
   | 'PrepareOutput'
   | 'CopyBaseTree'
   | 'MergeMetadata'
   | 'ApplyDivertRules'
   | 'ApplyFileRules'
   | 'WriteMetadata'
   | 'WriteSignatures';

/**
 * Process exit status for each error code. 1 is left for unexpected errors.
 */
export const EXIT_CODES: Record<ComposeErrorCode, number> = {
   ManifestMissing: 2,
   ManifestMalformed: 3,
   BaseUnresolvable: 4,
   CopyFailed: 5,
   DivertSourceMissing: 6,
   OverlaySourceMissing: 7,
   MetadataMalformed: 8,
   OutputConflict: 9,
   ConfigInvalid: 10,
};

export interface ComposeErrorOptions {
   stage?: ComposeStage;
   path?: string;
   cause?: unknown;
}

export class ComposeError extends Error {
   readonly code: ComposeErrorCode;
   stage: ComposeStage | undefined;
   readonly path: string | undefined;

   constructor(code: ComposeErrorCode, message: string, options: ComposeErrorOptions = {}) {
      super(message, { cause: options.cause });
      this.name = 'ComposeError';
      this.code = code;
      this.stage = options.stage;
      this.path = options.path;
   }

   get exitCode(): number {
      return EXIT_CODES[this.code];
   }

   /**
    * Human-readable form used by the CLI: "[Stage] Code: message".
    */
   describe(): string {
      const stage = this.stage ? `[${this.stage}] ` : '';
      return `${stage}${this.code}: ${this.message}`;
   }
}

export function isComposeError(err: unknown): err is ComposeError {
   return err instanceof ComposeError;
}
