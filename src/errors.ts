export type ErrorKind =
  | "InvalidInput"
  | "ValidationFailed"
  | "NotFound"
  | "Conflict"
  | "PayloadTooLarge"
  | "UnsupportedMediaType"
  | "Unavailable";

const ERROR_STATUS: Record<ErrorKind, number> = {
  InvalidInput: 400,
  ValidationFailed: 422,
  NotFound: 404,
  Conflict: 409,
  PayloadTooLarge: 413,
  UnsupportedMediaType: 415,
  Unavailable: 503,
};

export interface FieldIssue {
  path: string;
  message: string;
}

/**
 * An error the API knows how to answer. Each kind maps to exactly one status
 * code; anything thrown that is not an ApiError is answered with a 500.
 */
export class ApiError extends Error {
  readonly kind: ErrorKind;
  readonly issues: FieldIssue[];

  constructor(kind: ErrorKind, message: string, issues: FieldIssue[] = []) {
    super(message);
    this.name = "ApiError";
    this.kind = kind;
    this.issues = issues;
  }

  get status(): number {
    return ERROR_STATUS[this.kind];
  }
}

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError;
}
