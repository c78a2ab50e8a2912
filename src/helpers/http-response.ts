import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import { ApiError, isApiError } from "../errors.js";

const UNEXPECTED_ERROR_DETAIL = "An unexpected error occurred";

interface ErrorBody {
  detail: string;
  errors?: { path: string; message: string }[];
}

/**
 * Wraps an async route handler so a rejected promise reaches the error
 * middleware instead of becoming an unhandled rejection.
 */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

/**
 * body-parser rejects bodies it cannot read with an http-errors instance that
 * carries a 4xx `status` and a `type` such as "entity.parse.failed",
 * "entity.too.large" or "charset.unsupported"; those are client errors.
 */
function fromBodyParserError(err: unknown): ApiError | null {
  if (!(err instanceof Error) || !("type" in err) || typeof err.type !== "string") return null;
  const status = "status" in err && typeof err.status === "number" ? err.status : NaN;
  if (!(status >= 400 && status < 500)) return null;

  if (err.type === "entity.parse.failed") return new ApiError("InvalidInput", "Malformed JSON body");
  if (status === 413) return new ApiError("PayloadTooLarge", "Request body too large");
  if (status === 415) return new ApiError("UnsupportedMediaType", err.message);
  return new ApiError("InvalidInput", err.message);
}

function toApiError(err: unknown): ApiError | null {
  if (isApiError(err)) return err;
  return fromBodyParserError(err);
}

/**
 * Maps errors to responses. ApiErrors answer with their kind's status and
 * message; anything else is logged and answered with a fixed 500.
 */
export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const apiError = toApiError(err);
  if (apiError) {
    const body: ErrorBody = { detail: apiError.message };
    if (apiError.issues.length > 0) body.errors = apiError.issues;
    res.status(apiError.status).json(body);
    return;
  }

  console.error(`[${req.method} ${req.path}] Unhandled error:`, err instanceof Error ? err.stack : err);
  res.status(500).json({ detail: UNEXPECTED_ERROR_DETAIL } satisfies ErrorBody);
};
