import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { logger } from "../utils/logger.js";

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code?: string;

  constructor(message: string, statusCode: number, code?: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = true;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

type ErrorBody = {
  error: string;
  message: string;
  requestId?: string;
  details?: Array<{ path: string; message: string }>;
};

/**
 * Maps thrown errors onto the service's JSON error body. The caller's X-Request-ID is echoed
 * back so a failed ingestion call can be matched to its log lines.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  const requestId = req.get("x-request-id");
  const context = { method: req.method, path: req.originalUrl, requestId };
  const send = (status: number, body: ErrorBody) =>
    res.status(status).json(requestId ? { ...body, requestId } : body);

  if (err instanceof ZodError) {
    logger.warn({
      msg: "Validation error",
      ...context,
      errors: err.errors,
    });

    return send(400, {
      error: "validation_error",
      message: "Invalid request data",
      details: err.errors.map((e) => ({
        path: e.path.join("."),
        message: e.message,
      })),
    });
  }

  if (err instanceof AppError) {
    logger.warn({
      msg: "Operational error",
      ...context,
      code: err.code,
      statusCode: err.statusCode,
      message: err.message,
    });

    return send(err.statusCode, {
      error: err.code ?? "error",
      message: err.message,
    });
  }

  if (isBodyParserError(err)) {
    logger.warn({ msg: "Rejected request body", ...context, type: err.type, statusCode: err.status });
    return send(err.status, {
      error: err.type === "entity.too.large" ? "payload_too_large" : "invalid_body",
      message: err.message,
    });
  }

  logger.error({
    msg: "Internal server error",
    ...context,
    error: err.message,
    stack: err.stack,
  });

  return send(500, {
    error: "internal_error",
    message: "An unexpected error occurred",
  });
}

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({
    error: "not_found",
    message: `No route for ${req.method} ${req.path}`,
  });
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

function isBodyParserError(err: Error): err is Error & { status: number; type: string } {
  return (
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500 &&
    "type" in err &&
    typeof err.type === "string"
  );
}
