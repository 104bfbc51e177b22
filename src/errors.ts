/**
 * Error taxonomy
 * Every failure is local to the request that triggered it; stored wardrobe
 * state is never modified on an error path.
 */

export type StylistErrorCode =
  | "configuration"
  | "transport"
  | "schema_validation"
  | "referential"
  | "precondition"
  | "invalid_request"
  | "not_found";

export type ErrorStatus = 400 | 401 | 404 | 409 | 422 | 502 | 504;

export type AiOperation = "extraction" | "recommendation";

export interface ErrorBody {
  error: string;
  code: StylistErrorCode;
  retryable: boolean;
  operation?: AiOperation;
  issues?: string[];
  unresolved_ids?: string[];
}

export class StylistError extends Error {
  constructor(
    message: string,
    public readonly code: StylistErrorCode,
    public readonly status: ErrorStatus,
    public readonly isRetryable: boolean = false,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = "StylistError";
  }

  toJSON(): ErrorBody {
    return { error: this.message, code: this.code, retryable: this.isRetryable };
  }
}

/**
 * No usable API credential, or the remote service rejected it
 */
export class ConfigurationError extends StylistError {
  constructor(message: string, originalError?: unknown) {
    super(message, "configuration", 401, false, originalError);
    this.name = "ConfigurationError";
  }
}

export class TransportError extends StylistError {
  readonly operation?: AiOperation;
  readonly timedOut: boolean;

  constructor(
    message: string,
    options: {
      operation?: AiOperation;
      isRetryable?: boolean;
      timedOut?: boolean;
      originalError?: unknown;
    } = {}
  ) {
    super(
      message,
      "transport",
      options.timedOut ? 504 : 502,
      options.isRetryable ?? false,
      options.originalError
    );
    this.name = "TransportError";
    this.operation = options.operation;
    this.timedOut = options.timedOut ?? false;
  }

  /** Copy of this error attributed to an operation */
  during(operation: AiOperation): TransportError {
    return new TransportError(this.message, {
      operation,
      isRetryable: this.isRetryable,
      timedOut: this.timedOut,
      originalError: this.originalError,
    });
  }

  override toJSON(): ErrorBody {
    return { ...super.toJSON(), operation: this.operation };
  }
}

export class SchemaValidationError extends StylistError {
  readonly operation?: AiOperation;

  constructor(
    message: string,
    public readonly issues: string[] = [],
    options: { operation?: AiOperation; status?: 400 | 502; originalError?: unknown } = {}
  ) {
    super(message, "schema_validation", options.status ?? 502, false, options.originalError);
    this.name = "SchemaValidationError";
    this.operation = options.operation;
  }

  during(operation: AiOperation): SchemaValidationError {
    return new SchemaValidationError(this.message, this.issues, {
      operation,
      status: this.status === 400 ? 400 : 502,
      originalError: this.originalError,
    });
  }

  override toJSON(): ErrorBody {
    return { ...super.toJSON(), operation: this.operation, issues: this.issues };
  }
}

export class ReferentialError extends StylistError {
  constructor(
    message: string,
    public readonly unresolvedIds: string[] = []
  ) {
    super(message, "referential", 422);
    this.name = "ReferentialError";
  }

  override toJSON(): ErrorBody {
    return { ...super.toJSON(), unresolved_ids: this.unresolvedIds };
  }
}

export class PreconditionError extends StylistError {
  constructor(message: string) {
    super(message, "precondition", 409);
    this.name = "PreconditionError";
  }
}

export class InvalidRequestError extends StylistError {
  constructor(message: string, originalError?: unknown) {
    super(message, "invalid_request", 400, false, originalError);
    this.name = "InvalidRequestError";
  }
}

export class NotFoundError extends StylistError {
  constructor(message: string) {
    super(message, "not_found", 404);
    this.name = "NotFoundError";
  }
}

export function isStylistError(err: unknown): err is StylistError {
  return err instanceof StylistError;
}
