import { inspect } from "node:util";

/** Error codes raised by the converter, the fetch engine and the CLI. */
export type OrgConversionErrorCode =
  | "ERR_PARSE_FAILED"
  | "ERR_INVALID_URL"
  | "ERR_INVALID_OPTIONS"
  | "ERR_FETCH_FAILED"
  | "ERR_HTTP_ERROR"
  | "ERR_NON_HTML_CONTENT";

export interface OrgConversionErrorDetails {
  name: string;
  message: string;
  code?: string | number;
  statusCode?: number;
  originalError?: OrgConversionErrorDetails;
}

/**
 * Error raised when a document cannot be converted. A conversion that throws
 * produces no partial output.
 */
export class OrgConversionError extends Error {
  /** A specific error code (e.g., ERR_INVALID_URL, ERR_HTTP_ERROR). */
  public readonly code: OrgConversionErrorCode;
  /** The original error object, if available. */
  public readonly originalError?: Error;
  /** HTTP status code, if relevant. */
  public readonly statusCode?: number;

  /**
   * Creates an instance of OrgConversionError.
   * @param message The error message.
   * @param code Error code.
   * @param originalError Optional original error.
   * @param statusCode Optional HTTP status code.
   */
  constructor(message: string, code: OrgConversionErrorCode, originalError?: Error, statusCode?: number) {
    super(message);
    this.name = "OrgConversionError";
    this.code = code;
    this.originalError = originalError;
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OrgConversionError);
    }
  }

  /**
   * Returns a plain object representation with only useful metadata for logging.
   */
  toObject(): OrgConversionErrorDetails {
    const descriptor: OrgConversionErrorDetails = {
      name: this.name,
      message: this.message,
      code: this.code,
    };

    if (this.statusCode !== undefined) {
      descriptor.statusCode = this.statusCode;
    }

    const original = serializeUnknownError(this.originalError);
    if (original) {
      descriptor.originalError = original;
    }

    return descriptor;
  }

  toJSON(): OrgConversionErrorDetails {
    return this.toObject();
  }

  /**
   * Makes console output (`console.error`) display the cleaned error payload without stack noise.
   */
  [inspect.custom](): OrgConversionErrorDetails {
    return this.toObject();
  }
}

/** Wraps anything thrown by a collaborator into an OrgConversionError, keeping ours untouched. */
export function toConversionError(
  error: unknown,
  code: OrgConversionErrorCode,
  prefix: string
): OrgConversionError {
  if (error instanceof OrgConversionError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new OrgConversionError(`${prefix}: ${message}`, code, error instanceof Error ? error : undefined);
}

function serializeUnknownError(error: unknown): OrgConversionErrorDetails | undefined {
  if (!error) {
    return undefined;
  }

  if (error instanceof OrgConversionError) {
    return error.toObject();
  }

  if (error instanceof Error) {
    const descriptor: OrgConversionErrorDetails = {
      name: error.name || "Error",
      message: error.message,
    };

    if ("code" in error && (typeof error.code === "string" || typeof error.code === "number")) {
      descriptor.code = error.code;
    }

    if ("cause" in error) {
      const nestedDescriptor = serializeUnknownError(error.cause);
      if (nestedDescriptor) {
        descriptor.originalError = nestedDescriptor;
      }
    }

    return descriptor;
  }

  return {
    name: "Error",
    message: typeof error === "string" ? error : String(error),
  };
}
