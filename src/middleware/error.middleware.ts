import { NextFunction, Request, RequestHandler, Response } from "express";
import { AppError } from "../errors/app.error";
import { SyncError, SyncErrorBody, ValidationError } from "../errors/sync.errors";
import logger, { forRequest } from "../utils/logger";

interface InternalErrorBody {
  code: "INTERNAL_ERROR" | "NOT_FOUND" | "REQUEST_ABORTED";
  message: string;
  kind: "internal" | "client";
}

export interface ErrorResponse {
  ok: false;
  error: SyncErrorBody | InternalErrorBody;
  details?: { field: string; message: string }[];
  path: string;
  stack?: string;
}

export const requestIdOf = (res: Response): string | undefined =>
  typeof res.locals.requestId === "string" ? res.locals.requestId : undefined;

const isAbort = (err: Error): boolean => err.name === "AbortError";

const toErrorBody = (err: Error): SyncErrorBody | InternalErrorBody => {
  if (err instanceof SyncError) return err.toJSON();
  if (isAbort(err)) {
    return { code: "REQUEST_ABORTED", message: "Request aborted", kind: "client" };
  }
  return { code: "INTERNAL_ERROR", message: "Internal Server Error", kind: "internal" };
};

export const statusCodeOf = (err: Error): number => {
  if (err instanceof AppError) return err.statusCode;
  return isAbort(err) ? 499 : 500;
};

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const statusCode = statusCodeOf(err);
  const log = forRequest(logger, requestIdOf(res));
  const context = {
    path: req.path,
    method: req.method,
    statusCode,
    error: err.message,
  };

  if (statusCode >= 500) {
    log.error("Request failed", { ...context, stack: err.stack });
  } else {
    log.warn("Request rejected", context);
  }

  const response: ErrorResponse = {
    ok: false,
    error: toErrorBody(err),
    path: req.path,
  };

  if (err instanceof ValidationError && err.details.length) {
    response.details = err.details;
  }

  if (process.env.NODE_ENV === "development" && statusCode >= 500) {
    response.stack = err.stack;
  }

  res.status(statusCode).json(response);
};

export const notFoundHandler = (req: Request, res: Response) => {
  const response: ErrorResponse = {
    ok: false,
    error: { code: "NOT_FOUND", message: "Route not found", kind: "client" },
    path: req.path,
  };
  res.status(404).json(response);
};

// Async error wrapper
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler => {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
