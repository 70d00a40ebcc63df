import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { logger } from "@utils/logger";
import { isAppError, ValidationError, type AppError } from "@utils/errors.util";

// Standard Error Response Format
interface ErrorResponse {
  status: false;
  message: string;
  data: null;
  error: { type: string };
  stack?: string;
}

interface BodyParserError {
  type: string;
  status: number;
  message: string;
}

const isBodyParserError = (err: unknown): err is BodyParserError =>
  err instanceof Error && "type" in err && typeof err.type === "string" && "status" in err && typeof err.status === "number";

const BODY_ERROR_MESSAGES: Record<string, string> = {
  "entity.parse.failed": "Malformed JSON",
  "entity.too.large": "Payload too large",
  "charset.unsupported": "Unsupported charset",
  "encoding.unsupported": "Unsupported content encoding",
  "request.aborted": "Request aborted",
  "request.size.invalid": "Request size did not match content length",
};

/** Describe the first offending field, e.g. `email: Invalid email`. */
export const describeZodError = (err: ZodError): string => {
  const issue = err.issues[0];
  if (!issue) return "Invalid request";
  const field = issue.path.length ? issue.path.join(".") : "body";
  return `${field}: ${issue.message}`;
};

const toAppError = (err: unknown): AppError | null => {
  if (isAppError(err)) return err;
  if (err instanceof ZodError) return new ValidationError(describeZodError(err));
  // any client error raised while reading the body
  if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
    return new ValidationError(`body: ${BODY_ERROR_MESSAGES[err.type] ?? err.message}`);
  }
  return null;
};

// Central Error Handling Middleware
export const globalErrorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const appError = toAppError(err);

  if (appError) {
    logger.warn(`${req.method} ${req.originalUrl} -> ${appError.status} ${appError.type}: ${appError.message}`);
    if (appError.status === 401) {
      res.setHeader("WWW-Authenticate", "Bearer");
    }
    const body: ErrorResponse = {
      status: false,
      message: appError.message,
      data: null,
      error: { type: appError.type },
    };
    res.status(appError.status).json(body);
    return;
  }

  logger.error("❌ Global Error Caught:", err);
  const isDevelopment = process.env.NODE_ENV === "development";

  const body: ErrorResponse = {
    status: false,
    message: "Internal Server error",
    data: null,
    error: { type: "InternalError" },
    ...(isDevelopment && err instanceof Error && err.stack ? { stack: err.stack } : {}),
  };
  res.status(500).json(body);
};
