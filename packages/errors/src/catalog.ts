/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised or reported by the plugin factory is declared
 * here. The error classes look their domain and expectation flag up in
 * this table instead of hard-coding them.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 */

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // FACTORY ERRORS - Construction and configuration
  // ============================================================================
  FACTORY_CONFIGURATION_INVALID: {
    domain: "factory",
    isExpected: false,
    title: "Invalid factory configuration",
    description: "The options passed to the plugin factory failed validation",
  },

  // ============================================================================
  // PLUGIN ERRORS - Discovery, loading and registration
  // ============================================================================
  PLUGIN_LOAD_FAILED: {
    domain: "plugin",
    isExpected: true,
    title: "Plugin module load failed",
    description: "A candidate module could not be imported or loaded from source",
  },
  PLUGIN_SCAN_FAILED: {
    domain: "plugin",
    isExpected: true,
    title: "Plugin module scan failed",
    description: "Reading the exports of a loaded module threw",
  },
  PLUGIN_REGISTRATION_FAILED: {
    domain: "plugin",
    isExpected: true,
    title: "Plugin registration failed",
    description: "The given value is not a class deriving from the plugin interface",
  },
} as const;

/**
 * Union of every catalog code
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union of catalog domains
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];
