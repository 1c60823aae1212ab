import type { PluginType } from "./types.js";

/**
 * Reads a static attribute off a plugin class. A function-valued
 * attribute is a computed value: it is called with the class as `this`
 * and no arguments. Missing values, and accessors or functions that
 * throw, give `undefined`.
 */
export function readAttribute(plugin: object, attribute: string): unknown {
  try {
    const value: unknown = Reflect.get(plugin, attribute);
    if (typeof value === "function") {
      const computed: unknown = Reflect.apply(value, plugin, []);
      return computed;
    }
    return value;
  } catch {
    return undefined;
  }
}

/**
 * Resolves identifiers and versions of plugin classes from the two
 * attribute names a factory is configured with.
 */
export class PluginIdentity {
  readonly pluginIdAttribute: string;
  readonly versionIdAttribute: string | undefined;

  constructor(pluginIdAttribute: string, versionIdAttribute?: string) {
    this.pluginIdAttribute = pluginIdAttribute;
    this.versionIdAttribute = versionIdAttribute;
  }

  /** Whether plugins are told apart by version. */
  get isVersioned(): boolean {
    return this.versionIdAttribute !== undefined;
  }

  /** The plugin's identifier, or `undefined` when it has none. */
  resolveIdentifier<T>(plugin: PluginType<T>): string | undefined {
    const value = readAttribute(plugin, this.pluginIdAttribute);
    return value === undefined || value === null ? undefined : String(value);
  }

  /** The plugin's version string; `""` when unversioned or missing. */
  resolveVersion<T>(plugin: PluginType<T>): string {
    if (this.versionIdAttribute === undefined) return "";
    const value = readAttribute(plugin, this.versionIdAttribute);
    return value === undefined || value === null ? "" : String(value);
  }
}
