import type { PluginLoadError, PluginScanError } from "@plugforge/errors";
import type { LoadingMechanism } from "./constants.js";
import type { Logger } from "./logger.js";

/**
 * A class deriving from the plugin interface `T`. Plugins are registered
 * and returned as classes, never as instances.
 */
export type PluginType<T> = abstract new (...args: never[]) => T;

/** Where a plugin class was discovered. */
export interface PluginOrigin {
  /** The registered directory the file was found under. */
  readonly root: string;
  /** Canonical absolute path of the defining module. */
  readonly sourcePath: string;
}

/** A (package, path, mechanism) triple held by the path registry. */
export interface RegisteredPath {
  readonly packageName: string;
  readonly path: string;
  readonly mechanism: LoadingMechanism;
}

/** Outcome of loading one candidate file. */
export type LoadResult =
  | { readonly ok: true; readonly module: unknown }
  | { readonly ok: false; readonly error: PluginLoadError };

/** Outcome of scanning one loaded module. */
export type ScanResult<T> =
  | { readonly ok: true; readonly plugins: readonly PluginType<T>[] }
  | { readonly ok: false; readonly error: PluginScanError };

/** Why a lookup by identifier came back empty. */
export type LookupMissReason =
  | "package-not-registered"
  | "identifier-not-found"
  | "version-not-found";

/** Outcome of a registry lookup by identifier. */
export type LookupResult<T> =
  | { readonly found: true; readonly plugin: PluginType<T> }
  | { readonly found: false; readonly reason: LookupMissReason };

export interface LookupOptions {
  /** Restrict the lookup to one package; all packages are searched otherwise. */
  readonly packageName?: string | undefined;
  /**
   * Exact version wanted, as written by the plugin (`"1.10"`, not `1.10`).
   * Ignored when the factory is unversioned.
   */
  readonly version?: string | undefined;
}

/** A directory yielded by the walker with the plain files directly inside it. */
export interface WalkEntry {
  readonly directory: string;
  readonly files: readonly string[];
}

/**
 * Options accepted by the PluginFactory constructor.
 */
export interface PluginFactoryOptions {
  /** Directories scanned at construction (a single path or a list). */
  readonly paths?: string | readonly string[];
  /** Package the factory registers into by default (default: "default"). */
  readonly packageName?: string;
  /** Static attribute naming a plugin (default: "name", the class name). */
  readonly pluginIdAttribute?: string;
  /** Static attribute giving a plugin's version. Unset disables versioning. */
  readonly versionIdAttribute?: string;
  /** Environment variable listing more directories, joined by the OS path delimiter. */
  readonly envVar?: string;
  /** Loading mechanism for constructor-time paths (default: "guess"). */
  readonly mechanism?: LoadingMechanism;
  /** Diagnostics sink (default: console logger scoped "plugin-factory"). */
  readonly logger?: Logger;
  /** Environment read for `envVar` and later env lookups (default: process.env). */
  readonly env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Resolved configuration with all defaults applied.
 */
export interface ResolvedPluginFactoryOptions {
  readonly paths: readonly string[];
  readonly packageName: string;
  readonly pluginIdAttribute: string;
  readonly versionIdAttribute: string | undefined;
  readonly envVar: string | undefined;
  readonly mechanism: LoadingMechanism;
  readonly logger: Logger;
  readonly env: Readonly<Record<string, string | undefined>>;
}
