import { readFileSync } from "node:fs";
import { createRequire } from "node:module";
import { dirname } from "node:path";
import { compileFunction } from "node:vm";
import { getErrorMessage, PluginLoadError } from "@plugforge/errors";
import { LoadingMechanism } from "./constants.js";
import type { LoadResult } from "./types.js";

const nodeRequire = createRequire(import.meta.url);

/** CommonJS wrapper parameters, in the order Node passes them. */
const WRAPPER_PARAMETERS = ["exports", "require", "module", "__filename", "__dirname"];

const SHEBANG_PATTERN = /^#![^\n]*/;

// ---------------------------------------------------------------------------
// Module resolution
// ---------------------------------------------------------------------------

/**
 * The id Node's CommonJS loader caches `filePath` under, or `undefined`
 * when the loader cannot resolve it.
 */
export function resolveModuleId(filePath: string): string | undefined {
  try {
    return nodeRequire.resolve(filePath);
  } catch {
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// IMPORTABLE
// ---------------------------------------------------------------------------

/**
 * Loads a file through Node's module loader. A module already in the
 * cache is returned as-is, without executing it again.
 */
export function importModule(filePath: string): LoadResult {
  const moduleId = resolveModuleId(filePath);
  if (moduleId === undefined) {
    return {
      ok: false,
      error: new PluginLoadError(filePath, "resolve", "not resolvable by the module loader"),
    };
  }

  const cached = nodeRequire.cache[moduleId];
  if (cached) {
    const exports: unknown = cached.exports;
    return { ok: true, module: exports };
  }

  try {
    const exports: unknown = nodeRequire(moduleId);
    return { ok: true, module: exports };
  } catch (error) {
    return {
      ok: false,
      error: new PluginLoadError(filePath, "import", getErrorMessage(error), error),
    };
  }
}

// ---------------------------------------------------------------------------
// LOAD_SOURCE
// ---------------------------------------------------------------------------

/**
 * Compiles and runs a file's source text as an anonymous CommonJS module.
 * The module cache is neither read nor written, so every call produces
 * fresh exports. Relative `require` calls inside the file resolve from
 * its own directory.
 */
export function loadModuleFromSource(filePath: string): LoadResult {
  try {
    const source = readFileSync(filePath, "utf-8").replace(SHEBANG_PATTERN, "");
    const wrapper = compileFunction(source, WRAPPER_PARAMETERS, { filename: filePath });
    const moduleRecord: { exports: unknown; id: string; filename: string } = {
      exports: {},
      id: filePath,
      filename: filePath,
    };
    Reflect.apply(wrapper, moduleRecord.exports, [
      moduleRecord.exports,
      createRequire(filePath),
      moduleRecord,
      filePath,
      dirname(filePath),
    ]);
    return { ok: true, module: moduleRecord.exports };
  } catch (error) {
    return {
      ok: false,
      error: new PluginLoadError(filePath, "load-source", getErrorMessage(error), error),
    };
  }
}

// ---------------------------------------------------------------------------
// Strategy dispatch
// ---------------------------------------------------------------------------

/**
 * Loads `filePath` with the given mechanism. GUESS tries IMPORTABLE first
 * and falls back to LOAD_SOURCE; the last failure is returned when
 * neither produced a module.
 */
export function loadModule(filePath: string, mechanism: LoadingMechanism): LoadResult {
  let result: LoadResult | undefined;

  if (mechanism === LoadingMechanism.IMPORTABLE || mechanism === LoadingMechanism.GUESS) {
    result = importModule(filePath);
    if (result.ok) return result;
  }

  if (mechanism === LoadingMechanism.LOAD_SOURCE || mechanism === LoadingMechanism.GUESS) {
    result = loadModuleFromSource(filePath);
  }

  return (
    result ?? {
      ok: false,
      error: new PluginLoadError(filePath, "resolve", `unknown loading mechanism "${mechanism}"`),
    }
  );
}
