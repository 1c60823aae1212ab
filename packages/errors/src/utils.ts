import { ForgeError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import { ERROR_CATALOG, type ErrorCatalogEntry, type ErrorCode } from "./catalog.js";

/**
 * Get catalog entry for an error code
 */
export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERROR_CATALOG, code);
}

/**
 * Get all error codes
 */
export function getAllErrorCodes(): ErrorCode[] {
  return Object.keys(ERROR_CATALOG).filter(isValidErrorCode);
}

/**
 * Wrap an unknown thrown value in a ForgeError
 */
export function wrapError(error: unknown): ForgeError {
  if (error instanceof ForgeError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, { originalName: error.name }, { cause: error });
  }

  return new InternalError(getErrorMessage(error));
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}
