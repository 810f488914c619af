// src/schema/config.ts

import type { CallbacksConfig } from './callbacks';
import type { LogLevel } from '../util/logger';

/**
 * What to do when the output charm directory already exists.
 * - 'reject': fail the run with OutputConflict.
 * - 'overwrite': remove the directory and compose into a fresh one.
 */
export type ExistingOutputPolicy = 'reject' | 'overwrite';

/**
 * Root configuration object for charm-compose.
 *
 * This is what you export from `charm-compose.config.ts` in the directory
 * you run the CLI from, or pass programmatically. Every field is optional;
 * CLI flags take precedence over it.
 */
export interface ComposeConfig {
    /**
     * Repository directory the composed charm is written into, as
     * `<outputDir>/<series>/<name>`.
     *
     * Default: $JUJU_REPOSITORY, then the current directory.
     */
    outputDir?: string;

    /**
     * Default: "trusty".
     */
    series?: string;

    /**
     * Default: 'reject'. `--force` switches a single run to 'overwrite'.
     */
    existing?: ExistingOutputPolicy;

    /**
     * Glob patterns added to every layer's ignore list.
     */
    ignore?: string[];

    /**
     * Directories searched for a base charm when the manifest's
     * `baseReference` is neither absolute nor relative to the layer.
     *
     * Default: $CHARM_COMPOSE_PATH split on the path delimiter.
     */
    searchPath?: string[];

    logLevel?: LogLevel;

    callbacks?: CallbacksConfig;
}
