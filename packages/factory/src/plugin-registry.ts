import type { PluginIdentity } from "./attribute-resolver.js";
import { LooseVersion } from "./loose-version.js";
import type { LookupOptions, LookupResult, PluginType } from "./types.js";

// ---------------------------------------------------------------------------
// PluginRegistry
// ---------------------------------------------------------------------------

/**
 * Discovered plugin classes per package, in discovery order.
 *
 * The same class may appear more than once (for example after scanning a
 * path twice); entries are never deduplicated. Queries resolve
 * identifiers and versions through the given `PluginIdentity` on every
 * call, so computed attributes are re-evaluated.
 */
export class PluginRegistry<T> {
  private readonly byPackage = new Map<string, PluginType<T>[]>();
  private readonly identity: PluginIdentity;

  constructor(identity: PluginIdentity) {
    this.identity = identity;
  }

  // -------------------------------------------------------------------------
  // Storage
  // -------------------------------------------------------------------------

  /** Appends a plugin to a package, creating the package on first use. */
  add(packageName: string, plugin: PluginType<T>): void {
    let plugins = this.byPackage.get(packageName);
    if (!plugins) {
      plugins = [];
      this.byPackage.set(packageName, plugins);
    }
    plugins.push(plugin);
  }

  /** Plugins of a package in discovery order; empty for unknown packages. */
  list(packageName: string): readonly PluginType<T>[] {
    return [...(this.byPackage.get(packageName) ?? [])];
  }

  /** Plugins of every package, package by package. */
  all(): readonly PluginType<T>[] {
    return [...this.byPackage.values()].flat();
  }

  has(packageName: string): boolean {
    return this.byPackage.has(packageName);
  }

  packages(): string[] {
    return [...this.byPackage.keys()];
  }

  /** Entry count for one package, or across all packages when omitted. */
  count(packageName?: string): number {
    if (packageName !== undefined) {
      return this.byPackage.get(packageName)?.length ?? 0;
    }
    let total = 0;
    for (const plugins of this.byPackage.values()) total += plugins.length;
    return total;
  }

  clear(): void {
    this.byPackage.clear();
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /** Distinct identifiers of a package, in discovery order. */
  identifiers(packageName: string): ReadonlySet<string> {
    const result = new Set<string>();
    for (const plugin of this.byPackage.get(packageName) ?? []) {
      const identifier = this.identity.resolveIdentifier(plugin);
      if (identifier !== undefined) result.add(identifier);
    }
    return result;
  }

  /** Ascending versions of the plugins sharing `identifier`; empty when unversioned. */
  versions(identifier: string, packageName: string): string[] {
    if (!this.identity.isVersioned) return [];

    return (this.byPackage.get(packageName) ?? [])
      .filter((plugin) => this.identity.resolveIdentifier(plugin) === identifier)
      .map((plugin) => this.identity.resolveVersion(plugin))
      .sort(LooseVersion.compare);
  }

  /** One plugin per identifier: the highest version, or the first discovered. */
  plugins(packageName: string): PluginType<T>[] {
    const result: PluginType<T>[] = [];
    for (const identifier of this.identifiers(packageName)) {
      const lookup = this.find(identifier, { packageName });
      if (lookup.found) result.push(lookup.plugin);
    }
    return result;
  }

  /**
   * Looks a plugin up by identifier, optionally within one package and at
   * one exact version.
   */
  find(identifier: string, options: LookupOptions = {}): LookupResult<T> {
    const { packageName, version } = options;

    if (packageName !== undefined && !this.byPackage.has(packageName)) {
      return { found: false, reason: "package-not-registered" };
    }

    const pool = packageName !== undefined ? this.list(packageName) : this.all();
    const candidates = pool.filter(
      (plugin) => this.identity.resolveIdentifier(plugin) === identifier,
    );

    const [first] = candidates;
    if (first === undefined) {
      return { found: false, reason: "identifier-not-found" };
    }

    if (!this.identity.isVersioned) {
      return { found: true, plugin: first };
    }

    if (version === undefined) {
      let best = first;
      let bestVersion = new LooseVersion(this.identity.resolveVersion(first));
      for (const candidate of candidates.slice(1)) {
        const candidateVersion = new LooseVersion(this.identity.resolveVersion(candidate));
        if (candidateVersion.compare(bestVersion) > 0) {
          best = candidate;
          bestVersion = candidateVersion;
        }
      }
      return { found: true, plugin: best };
    }

    const wanted = new LooseVersion(version);
    const match = candidates.find((candidate) =>
      wanted.equals(this.identity.resolveVersion(candidate)),
    );
    return match ? { found: true, plugin: match } : { found: false, reason: "version-not-found" };
  }
}
