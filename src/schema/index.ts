// src/schema/index.ts

export * from './callbacks';
export * from './config';
export * from './errors';
export * from './manifest';
export * from './metadata';

/**
 * Layer manifest file name, looked up at the root of a layer.
 */
export const MANIFEST_FILE = 'compose.yaml';

export const METADATA_FILE = 'metadata.yaml';

export const CONFIG_FILE = 'config.yaml';

export const HOOKS_DIR = 'hooks';

/**
 * Directory under hooks/ holding relocated scripts of diverted hooks.
 */
export const DIVERT_DIR = '.divert';

/**
 * Signature manifest written at the root of every composed charm.
 */
export const SIGNATURE_FILE = '.compose.manifest';

export const DEFAULT_SERIES = 'trusty';

export const DEFAULT_IGNORE: string[] = [
   '.bzr/',
   '.git/',
   '**/.ropeproject/',
   '*.pyc',
   '*~',
];
