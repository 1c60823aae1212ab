/**
 * @plugforge/errors
 *
 * Shared error taxonomy for the plugin factory.
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained
 * matching, or `instanceof PluginError` for category matching.
 */

export { type ErrorJSON, ForgeError, isForgeError } from "./base.js";
export { InternalError } from "./bases/internal-error.js";
export {
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";
export {
  FactoryConfigurationError,
  PluginError,
  PluginLoadError,
  type PluginLoadPhase,
  PluginRegistrationError,
  PluginScanError,
} from "./plugin.js";
export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorMessage,
  isValidErrorCode,
  wrapError,
} from "./utils.js";

export const PACKAGE_NAME = "@plugforge/errors";
