/**
 * Error types and the global Express error middleware.
 *
 * Every error that reaches the middleware is rendered as `{ error: message }`
 * with the error's HTTP status; anything that is not an AppError becomes a
 * 500 "Internal Server Error".
 */
import { logger } from "@infrastructure/logging/Logger";
import { Request, Response, NextFunction } from "express";

export type AppErrorType =
  | "AppError"
  | "InfrastructureError"
  | "ValidationError"
  | "ForbiddenError"
  | "NotFoundError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    statusCode = 500,
    metadata?: AppErrorMetadata
  ) {
    super(message);
    this.name = new.target.name;
    this.type = type;
    this.statusCode = statusCode;
    this.metadata = metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class InfrastructureError extends AppError {
  constructor(
    message: string,
    statusCode = 500,
    metadata?: AppErrorMetadata
  ) {
    super(message, "InfrastructureError", statusCode, metadata);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "ValidationError", 400, metadata);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Forbidden", metadata?: AppErrorMetadata) {
    super(message, "ForbiddenError", 403, metadata);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not Found", metadata?: AppErrorMetadata) {
    super(message, "NotFoundError", 404, metadata);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Terminal handler for requests no route claimed.
 */
export function notFoundHandler(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  next(new NotFoundError("Not Found", { method: req.method, path: req.path }));
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const appError = isAppError(err)
    ? err
    : new InfrastructureError("Internal Server Error", 500, {
        originalError: err instanceof Error ? err.message : String(err),
      });

  const status = appError.statusCode;

  logger.log(status >= 500 ? "error" : "warn", "Request failed", {
    method: req.method,
    path: req.path,
    type: appError.type,
    statusCode: status,
    message: appError.message,
    metadata: appError.metadata ? JSON.stringify(appError.metadata) : undefined,
  });

  res.status(status).json({ error: appError.message });
}
