import type { NextFunction, Request, Response } from "express";
import { createLogger } from "@/lib/logger";

const logger = createLogger("error");

// Custom error classes
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super(message, 404);
  }
}

// Error response format
interface ErrorResponse {
  detail: string;
  stack?: string;
}

const BODY_PARSER_DETAILS: Record<string, string> = {
  "entity.parse.failed": "Malformed JSON body",
  "entity.too.large": "Request body too large",
  "charset.unsupported": "Unsupported request charset",
  "encoding.unsupported": "Unsupported content encoding",
};

// body-parser rejects bad request bodies with a 4xx http-error tagged with a `type`
function fromBodyParserError(err: Error): AppError | null {
  if (!("type" in err) || typeof err.type !== "string") {
    return null;
  }
  const status = "status" in err ? err.status : undefined;
  if (typeof status !== "number" || status < 400 || status > 499) {
    return null;
  }
  return new AppError(BODY_PARSER_DETAILS[err.type] ?? err.message, status);
}

// Global error handler middleware
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction,
) {
  const error = fromBodyParserError(err) ?? err;
  const isOperational = error instanceof AppError && error.isOperational;

  if (isOperational) {
    logger.warn({ err: error, path: req.path, method: req.method }, "Operational error");
  } else {
    logger.error({ err: error, path: req.path, method: req.method }, "Unexpected error");
  }

  const statusCode = error instanceof AppError ? error.statusCode : 500;

  // Store and driver messages stay in the logs
  const response: ErrorResponse = {
    detail: error instanceof AppError ? error.message : "Internal server error",
  };

  // Include stack trace of unexpected errors in development
  if (process.env.NODE_ENV === "development" && !isOperational) {
    response.stack = error.stack;
  }

  res.status(statusCode).json(response);
}

// 404 handler for unknown routes
export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({
    detail: `Route ${req.method} ${req.path} not found`,
  });
}
