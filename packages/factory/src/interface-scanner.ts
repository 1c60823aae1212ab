import { getErrorMessage, PluginScanError } from "@plugforge/errors";
import type { PluginType, ScanResult } from "./types.js";

/**
 * True when `value` is a class deriving from `iface` (and not `iface`
 * itself).
 */
export function isPluginClass<T>(value: unknown, iface: PluginType<T>): value is PluginType<T> {
  if (typeof value !== "function" || value === iface) return false;
  const prototype: unknown = value.prototype;
  return prototype instanceof iface;
}

/**
 * Collects every exported class of a loaded module that derives from
 * `iface`: the exports value itself (`module.exports = class ...`) first,
 * then its own enumerable properties. If reading the exports throws, the
 * whole module counts as having no plugins.
 */
export function scanModule<T>(
  moduleExports: unknown,
  iface: PluginType<T>,
  filePath: string,
): ScanResult<T> {
  if (
    moduleExports === null ||
    (typeof moduleExports !== "object" && typeof moduleExports !== "function")
  ) {
    return { ok: true, plugins: [] };
  }

  const plugins: PluginType<T>[] = [];
  if (isPluginClass(moduleExports, iface)) {
    plugins.push(moduleExports);
  }

  try {
    for (const key of Object.keys(moduleExports)) {
      const item: unknown = Reflect.get(moduleExports, key);
      if (isPluginClass(item, iface)) {
        plugins.push(item);
      }
    }
  } catch (error) {
    return { ok: false, error: new PluginScanError(filePath, getErrorMessage(error), error) };
  }

  return { ok: true, plugins };
}
