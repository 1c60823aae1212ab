/** Package namespace used when none is given. */
export const DEFAULT_PACKAGE_NAME = "default";

/** Static attribute read to identify a plugin: a class's own name. */
export const DEFAULT_PLUGIN_ID_ATTRIBUTE = "name";

/**
 * How the modules under a registered path are loaded.
 *
 * - GUESS:       try IMPORTABLE, fall back to LOAD_SOURCE
 * - LOAD_SOURCE: compile the file's source text directly, outside the module cache
 * - IMPORTABLE:  go through Node's CommonJS loader and its module cache
 */
export const LoadingMechanism = {
  GUESS: "guess",
  LOAD_SOURCE: "load-source",
  IMPORTABLE: "importable",
} as const;

export type LoadingMechanism = (typeof LoadingMechanism)[keyof typeof LoadingMechanism];

export const LOADING_MECHANISMS = [
  LoadingMechanism.GUESS,
  LoadingMechanism.LOAD_SOURCE,
  LoadingMechanism.IMPORTABLE,
] as const;

/** Candidate file names: a leading ASCII letter and a CommonJS source or build-output extension. */
export const FILE_NAME_PATTERN = /^[A-Za-z].*\.(js|cjs)$/;

/** Files starting with this prefix are tests, never plugins. */
export const TEST_FILE_PREFIX = "test";

/** Build scripts that sit beside plugin sources. */
export const EXCLUDED_FILE_NAMES: ReadonlySet<string> = new Set(["setup.js"]);

/** Any path containing one of these segments is not traversed. */
export const EXCLUDED_DIRECTORY_NAMES: ReadonlySet<string> = new Set(["node_modules"]);
