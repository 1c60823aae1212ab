// ---------------------------------------------------------------------------
// @plugforge/factory: plugin discovery and versioned registry
// ---------------------------------------------------------------------------

// Identity resolution
export { PluginIdentity, readAttribute } from "./attribute-resolver.js";
// Configuration
export {
  LoadingMechanismSchema,
  PluginFactoryOptionsSchema,
  resolveFactoryOptions,
} from "./config.js";
// Constants
export {
  DEFAULT_PACKAGE_NAME,
  DEFAULT_PLUGIN_ID_ATTRIBUTE,
  EXCLUDED_DIRECTORY_NAMES,
  EXCLUDED_FILE_NAMES,
  FILE_NAME_PATTERN,
  LOADING_MECHANISMS,
  LoadingMechanism,
  TEST_FILE_PREFIX,
} from "./constants.js";
// Scanner
export { isPluginClass, scanModule } from "./interface-scanner.js";
// Logging
export { createConsoleLogger, type Logger, silentLogger } from "./logger.js";
// Versions
export { LooseVersion, type VersionComponent } from "./loose-version.js";
// Module loading
export {
  importModule,
  loadModule,
  loadModuleFromSource,
  resolveModuleId,
} from "./module-loader.js";
// Registries
export { PathRegistry } from "./path-registry.js";
export {
  cleanPath,
  isCandidateFile,
  isTraversableDirectory,
  walkDirectory,
} from "./path-utils.js";
// Factory (main entry point)
export { PluginFactory } from "./plugin-factory.js";
export { PluginRegistry } from "./plugin-registry.js";
// Types
export type {
  LoadResult,
  LookupMissReason,
  LookupOptions,
  LookupResult,
  PluginFactoryOptions,
  PluginOrigin,
  PluginType,
  RegisteredPath,
  ResolvedPluginFactoryOptions,
  ScanResult,
  WalkEntry,
} from "./types.js";

// Package metadata
export const PACKAGE_NAME = "@plugforge/factory";
