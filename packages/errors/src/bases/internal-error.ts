import { ForgeError } from "../base.js";
import { ERROR_CATALOG, type ErrorDomain } from "../catalog.js";

/**
 * Errors caused by bugs or by values thrown from code we do not control.
 */
export class InternalError extends ForgeError {
  readonly _tag = "InternalError" as const;
  override readonly code = "INTERNAL_ERROR" as const;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(message: string, metadata?: Record<string, string>, options?: ErrorOptions) {
    super(message, metadata, options);
    const entry = ERROR_CATALOG.INTERNAL_ERROR;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
