import { delimiter } from "node:path";
import { PluginRegistrationError } from "@plugforge/errors";
import { PluginIdentity } from "./attribute-resolver.js";
import { resolveFactoryOptions } from "./config.js";
import type { LoadingMechanism } from "./constants.js";
import { isPluginClass, scanModule } from "./interface-scanner.js";
import type { Logger } from "./logger.js";
import { loadModule } from "./module-loader.js";
import { PathRegistry } from "./path-registry.js";
import {
  cleanPath,
  isCandidateFile,
  isDirectory,
  isFile,
  isTraversableDirectory,
  stripExtension,
  walkDirectory,
} from "./path-utils.js";
import { PluginRegistry } from "./plugin-registry.js";
import type { LookupOptions, PluginFactoryOptions, PluginOrigin, PluginType } from "./types.js";

// ---------------------------------------------------------------------------
// PluginFactory
// ---------------------------------------------------------------------------

/**
 * Discovers classes deriving from a plugin interface under registered
 * directories and keeps them in a registry partitioned by package.
 *
 * Discovery is best effort: a file that fails to load or scan is logged
 * and skipped, and lookups that find nothing return `undefined` or an
 * empty collection instead of throwing.
 *
 * ```ts
 * const factory = new PluginFactory(Tool, {
 *   paths: ["/opt/tools"],
 *   versionIdAttribute: "version",
 * });
 * const Hammer = factory.getPluginFromId("hammer");
 * ```
 */
export class PluginFactory<T> {
  private readonly iface: PluginType<T>;
  private readonly identity: PluginIdentity;
  private readonly defaultPackage: string;
  private readonly defaultMechanism: LoadingMechanism;
  private readonly logger: Logger;
  private readonly env: Readonly<Record<string, string | undefined>>;

  private readonly registry: PluginRegistry<T>;
  private readonly registeredPaths = new PathRegistry();
  private origins = new WeakMap<PluginType<T>, PluginOrigin>();

  constructor(iface: PluginType<T>, options: PluginFactoryOptions = {}) {
    const resolved = resolveFactoryOptions(options);

    this.iface = iface;
    this.identity = new PluginIdentity(resolved.pluginIdAttribute, resolved.versionIdAttribute);
    this.defaultPackage = resolved.packageName;
    this.defaultMechanism = resolved.mechanism;
    this.logger = resolved.logger;
    this.env = resolved.env;
    this.registry = new PluginRegistry<T>(this.identity);

    this.registerPaths(resolved.paths);
    if (resolved.envVar !== undefined) {
      this.registerPathsFromEnvVar(resolved.envVar);
    }
  }

  // -------------------------------------------------------------------------
  // Accessors
  // -------------------------------------------------------------------------

  /** The base class every plugin derives from. */
  get interface(): PluginType<T> {
    return this.iface;
  }

  get packageName(): string {
    return this.defaultPackage;
  }

  get pluginIdAttribute(): string {
    return this.identity.pluginIdAttribute;
  }

  get versionIdAttribute(): string | undefined {
    return this.identity.versionIdAttribute;
  }

  get isVersioned(): boolean {
    return this.identity.isVersioned;
  }

  /** Total plugin entries across all packages. */
  get size(): number {
    return this.registry.count();
  }

  toString(): string {
    return `[PluginFactory - Identifier: ${this.pluginIdAttribute}, Plugin Count: ${this.size}]`;
  }

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  /**
   * Registers a directory and scans it recursively for plugins.
   *
   * The path is recorded even when nothing is found in it. Returns the
   * number of plugin entries added; 0 when `path` is not a directory.
   */
  registerPath(
    path: string,
    packageName: string = this.defaultPackage,
    mechanism: LoadingMechanism = this.defaultMechanism,
  ): number {
    if (!path || !isDirectory(path)) return 0;

    const root = cleanPath(path);
    this.registeredPaths.register(packageName, root, mechanism);

    const before = this.registry.count(packageName);

    for (const filePath of this.collectCandidateFiles(root)) {
      const loaded = loadModule(filePath, mechanism);
      if (!loaded.ok) {
        const { error } = loaded;
        this.logger.debug(error.message, { code: error.code, cause: error.cause });
        continue;
      }

      const scanned = scanModule(loaded.module, this.iface, filePath);
      if (!scanned.ok) {
        const { error } = scanned;
        this.logger.debug(error.message, { code: error.code, cause: error.cause });
        continue;
      }

      for (const plugin of scanned.plugins) {
        this.origins.set(plugin, { root, sourcePath: filePath });
        this.registry.add(packageName, plugin);
      }
    }

    const added = this.registry.count(packageName) - before;
    this.logger.info(`Registered path "${root}"`, { packageName, mechanism, plugins: added });
    return added;
  }

  /**
   * Registers several paths. Entries naming the same location (files
   * compared without their extension) are registered once.
   */
  registerPaths(
    paths: string | readonly string[],
    packageName: string = this.defaultPackage,
    mechanism: LoadingMechanism = this.defaultMechanism,
  ): number {
    const list = typeof paths === "string" ? [paths] : paths;
    const visited = new Set<string>();
    let total = 0;

    for (const path of list) {
      if (!path) continue;
      const key = cleanPath(isFile(path) ? stripExtension(path) : path);
      if (visited.has(key)) continue;
      visited.add(key);
      total += this.registerPath(path, packageName, mechanism);
    }

    return total;
  }

  /** Registers the paths listed in an environment variable (OS path delimiter). */
  registerPathsFromEnvVar(
    name: string,
    packageName: string = this.defaultPackage,
    mechanism: LoadingMechanism = this.defaultMechanism,
  ): number {
    const value = this.env[name];
    if (!value) return 0;
    return this.registerPaths(value.split(delimiter), packageName, mechanism);
  }

  /**
   * Adds a class directly, without scanning. Without a package name the
   * package is taken from the identifier's leading segment (`acme-tool`
   * and `acme.tool` both go to `acme`), falling back to the factory's
   * package.
   *
   * @returns false when `plugin` is not a class deriving from the interface
   */
  registerPluginFromClass(plugin: unknown, packageName?: string): boolean {
    if (!isPluginClass(plugin, this.iface)) {
      const error = new PluginRegistrationError(
        describeValue(plugin),
        "not a class deriving from the plugin interface",
      );
      this.logger.warn(error.message, { code: error.code });
      return false;
    }

    const target =
      packageName ?? this.packageFromIdentifier(this.identity.resolveIdentifier(plugin));
    this.registry.add(target, plugin);
    return true;
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /** Registered directories of a package. */
  paths(packageName: string = this.defaultPackage): string[] {
    return this.registeredPaths.paths(packageName);
  }

  /** Packages holding at least one plugin. */
  packages(): string[] {
    return this.registry.packages();
  }

  /** Distinct plugin identifiers of a package. */
  identifiers(packageName: string = this.defaultPackage): ReadonlySet<string> {
    return this.registry.identifiers(packageName);
  }

  /** Ascending versions available for an identifier; always empty when unversioned. */
  versions(identifier: string, packageName: string = this.defaultPackage): string[] {
    return this.registry.versions(identifier, packageName);
  }

  /** One plugin per identifier, the highest version where several exist. */
  plugins(packageName: string = this.defaultPackage): PluginType<T>[] {
    return this.registry.plugins(packageName);
  }

  /**
   * Retrieves a plugin by identifier. Searches every package unless
   * `packageName` is given. Without `version` the highest version wins.
   */
  getPluginFromId(identifier: string, options: LookupOptions = {}): PluginType<T> | undefined {
    const result = this.registry.find(identifier, options);
    if (result.found) return result.plugin;

    const { packageName, version } = options;
    const reason = result.reason;
    switch (reason) {
      case "package-not-registered":
        this.logger.error(
          `Cannot retrieve plugin "${identifier}": package "${packageName}" is not registered`,
        );
        break;
      case "identifier-not-found":
        this.logger.warn(`No plugin with id "${identifier}" found in ${formatScope(packageName)}`);
        break;
      case "version-not-found":
        this.logger.warn(
          `No plugin with id "${identifier}" and version "${version}" found in ${formatScope(packageName)}`,
        );
        break;
      default: {
        const _exhaustive: never = reason;
        throw new Error(`Unknown lookup miss: ${_exhaustive}`);
      }
    }
    return undefined;
  }

  /** Where a plugin was discovered; undefined for directly registered classes. */
  origin(plugin: PluginType<T>): PluginOrigin | undefined {
    return this.origins.get(plugin);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Removes a registered path. Everything is cleared and every other
   * registered path is scanned again.
   */
  unregisterPath(path: string, packageName: string = this.defaultPackage): void {
    const target = cleanPath(path);
    const previous = this.registeredPaths.entries();

    this.clear();

    for (const entry of previous) {
      if (entry.packageName === packageName && entry.path === target) continue;
      this.registerPath(entry.path, entry.packageName, entry.mechanism);
    }
  }

  /** Clears everything and scans all registered paths again. */
  reload(): void {
    const previous = this.registeredPaths.entries();

    this.clear();

    for (const entry of previous) {
      this.registerPath(entry.path, entry.packageName, entry.mechanism);
    }
  }

  /** Drops all plugins and registered paths without rescanning. */
  clear(): void {
    this.registry.clear();
    this.registeredPaths.clear();
    this.origins = new WeakMap();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private collectCandidateFiles(root: string): string[] {
    const files: string[] = [];
    const walk = walkDirectory(
      root,
      (directory) => !isTraversableDirectory(directory),
      (directory, error) => {
        this.logger.debug(`Skipping unreadable directory "${directory}"`, { cause: error });
      },
    );

    for (const { directory, files: names } of walk) {
      for (const name of names) {
        if (isCandidateFile(name)) files.push(`${directory}/${name}`);
      }
    }
    return files;
  }

  private packageFromIdentifier(identifier: string | undefined): string {
    if (identifier === undefined) return this.defaultPackage;
    const [head] = identifier.replace(/\./g, "-").split("-");
    return head && head !== identifier ? head : this.defaultPackage;
  }
}

function describeValue(value: unknown): string {
  if (typeof value === "function") return value.name || "(anonymous)";
  return value === null ? "null" : typeof value;
}

function formatScope(packageName: string | undefined): string {
  return packageName === undefined ? "any package" : `package "${packageName}"`;
}
