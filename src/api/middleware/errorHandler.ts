import "@/types/express";
import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { createContextLogger } from "@/monitoring/logger";
import { AppError, ErrorCode } from "@/utils/errors";

export interface ErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
  correlationId: string;
}

export interface ResolvedError {
  statusCode: number;
  code: string;
  message: string;
  isOperational: boolean;
  details?: unknown;
}

export const resolveError = (error: Error): ResolvedError => {
  if (error instanceof AppError) {
    return {
      statusCode: error.statusCode,
      code: error.code,
      message: error.message,
      isOperational: error.isOperational,
      details: error.details,
    };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      code: ErrorCode.INVALID_INPUT,
      message: "Invalid request data",
      isOperational: true,
      details: error.errors.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    };
  }

  // Malformed JSON bodies from express.json()
  if (error instanceof SyntaxError && "body" in error) {
    return {
      statusCode: 400,
      code: ErrorCode.INVALID_INPUT,
      message: "Malformed JSON body",
      isOperational: true,
    };
  }

  return {
    statusCode: 500,
    code: ErrorCode.INTERNAL_ERROR,
    message: error.message,
    isOperational: false,
  };
};

// Don't leak error details of server failures
export const toErrorBody = (
  resolved: ResolvedError,
  correlationId: string
): ErrorBody => ({
  success: false,
  error:
    resolved.statusCode < 500
      ? {
          code: resolved.code,
          message: resolved.message,
          ...(resolved.details === undefined
            ? {}
            : { details: resolved.details }),
        }
      : { code: resolved.code, message: "Internal Server Error" },
  correlationId,
});

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const logger = createContextLogger(req.correlationId);
  const resolved = resolveError(error);

  const meta = {
    error: error.message,
    code: resolved.code,
    statusCode: resolved.statusCode,
    path: req.path,
    method: req.method,
    isOperational: resolved.isOperational,
  };
  if (resolved.statusCode >= 500) {
    logger.error("Request error", { ...meta, stack: error.stack });
  } else {
    logger.warn("Request rejected", meta);
  }

  res
    .status(resolved.statusCode)
    .json(toErrorBody(resolved, req.correlationId));
};

export const notFoundHandler = (req: Request, res: Response) => {
  const logger = createContextLogger(req.correlationId);

  logger.warn("Route not found", {
    path: req.path,
    method: req.method,
  });

  const body: ErrorBody = {
    success: false,
    error: {
      code: ErrorCode.NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
    },
    correlationId: req.correlationId,
  };

  res.status(404).json(body);
};
