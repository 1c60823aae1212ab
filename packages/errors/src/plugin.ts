import { ForgeError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

// ---------------------------------------------------------------------------
// Abstract base for all plugin errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for plugin factory errors.
 *
 * Enables generic catch: `if (e instanceof PluginError)`
 */
export abstract class PluginError extends ForgeError {}

// ---------------------------------------------------------------------------
// Configuration invalid
// ---------------------------------------------------------------------------

/**
 * Thrown when the options given to a plugin factory fail validation.
 */
export class FactoryConfigurationError extends PluginError {
  readonly _tag = "PluginError" as const;
  override readonly code = "FACTORY_CONFIGURATION_INVALID" as const;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;
  readonly validationErrors: readonly string[];

  constructor(validationErrors: readonly string[]) {
    super(`Invalid plugin factory configuration: ${validationErrors.join("; ")}`);
    const entry = ERROR_CATALOG.FACTORY_CONFIGURATION_INVALID;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.validationErrors = validationErrors;
  }
}

// ---------------------------------------------------------------------------
// Load failed (resolve / import / load-source)
// ---------------------------------------------------------------------------

/** Step of module loading where the failure occurred. */
export type PluginLoadPhase = "resolve" | "import" | "load-source";

/**
 * Describes a candidate module that could not be loaded. Produced as a
 * result value by the module loader rather than thrown.
 */
export class PluginLoadError extends PluginError {
  readonly _tag = "PluginError" as const;
  override readonly code = "PLUGIN_LOAD_FAILED" as const;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;
  readonly filePath: string;
  readonly phase: PluginLoadPhase;

  constructor(filePath: string, phase: PluginLoadPhase, message: string, cause?: unknown) {
    super(
      `Plugin load failed [${phase}] "${filePath}": ${message}`,
      { filePath, phase },
      cause === undefined ? undefined : { cause },
    );
    const entry = ERROR_CATALOG.PLUGIN_LOAD_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.filePath = filePath;
    this.phase = phase;
  }
}

// ---------------------------------------------------------------------------
// Scan failed
// ---------------------------------------------------------------------------

/**
 * Describes a loaded module whose exports could not be enumerated.
 */
export class PluginScanError extends PluginError {
  readonly _tag = "PluginError" as const;
  override readonly code = "PLUGIN_SCAN_FAILED" as const;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;
  readonly filePath: string;

  constructor(filePath: string, message: string, cause?: unknown) {
    super(
      `Plugin scan failed "${filePath}": ${message}`,
      { filePath },
      cause === undefined ? undefined : { cause },
    );
    const entry = ERROR_CATALOG.PLUGIN_SCAN_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.filePath = filePath;
  }
}

// ---------------------------------------------------------------------------
// Registration failed
// ---------------------------------------------------------------------------

/**
 * Describes a value rejected by direct class registration.
 */
export class PluginRegistrationError extends PluginError {
  readonly _tag = "PluginError" as const;
  override readonly code = "PLUGIN_REGISTRATION_FAILED" as const;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;
  readonly pluginName: string;

  constructor(pluginName: string, message: string) {
    super(`Plugin registration failed "${pluginName}": ${message}`, { pluginName });
    const entry = ERROR_CATALOG.PLUGIN_REGISTRATION_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.pluginName = pluginName;
  }
}
