import type { ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * JSON shape produced by {@link ForgeError.toJSON}.
 */
export interface ErrorJSON {
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Record<string, string> | undefined;
  readonly cause?: string | undefined;
}

/**
 * Abstract root of every error the plugin factory produces.
 *
 * Concrete subclasses fill `code`, `domain` and `isExpected` from
 * ERROR_CATALOG. Use `instanceof ForgeError` for generic matching and
 * `error.code === "..."` for specific conditions.
 */
export abstract class ForgeError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly timestamp: Date;

  constructor(message: string, metadata?: Record<string, string>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.timestamp = new Date();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
    };
  }
}

/**
 * Type guard for any ForgeError
 */
export function isForgeError(error: unknown): error is ForgeError {
  return error instanceof ForgeError;
}
