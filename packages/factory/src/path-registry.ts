import type { LoadingMechanism } from "./constants.js";
import type { RegisteredPath } from "./types.js";

/**
 * Registered search paths per package, each with the mechanism used to
 * load it. Paths are stored exactly as given; callers canonicalize them.
 */
export class PathRegistry {
  private readonly byPackage = new Map<string, Map<string, LoadingMechanism>>();

  /** Stores the mechanism for (package, path), replacing any earlier one. */
  register(packageName: string, path: string, mechanism: LoadingMechanism): void {
    let paths = this.byPackage.get(packageName);
    if (!paths) {
      paths = new Map();
      this.byPackage.set(packageName, paths);
    }
    paths.set(path, mechanism);
  }

  /** Registered paths of a package, in registration order. */
  paths(packageName: string): string[] {
    return [...(this.byPackage.get(packageName)?.keys() ?? [])];
  }

  mechanism(packageName: string, path: string): LoadingMechanism | undefined {
    return this.byPackage.get(packageName)?.get(path);
  }

  /** Snapshot of every (package, path, mechanism) triple. */
  entries(): RegisteredPath[] {
    const result: RegisteredPath[] = [];
    for (const [packageName, paths] of this.byPackage) {
      for (const [path, mechanism] of paths) {
        result.push({ packageName, path, mechanism });
      }
    }
    return result;
  }

  packages(): string[] {
    return [...this.byPackage.keys()];
  }

  /** Total number of registered paths across packages. */
  get size(): number {
    let total = 0;
    for (const paths of this.byPackage.values()) total += paths.size;
    return total;
  }

  clear(): void {
    this.byPackage.clear();
  }
}
