/**
 * Express middleware: request logging and error-to-status mapping.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import multer from "multer";
import { ZodError } from "zod";
import { isDitaScaffoldError, type DitaErrorCode } from "../shared/errors.js";

const STATUS_BY_CODE: Record<DitaErrorCode, number> = {
  EMPTY_TITLE: 400,
  MISSING_FIELD: 400,
  EMPTY_MAP: 400,
  INVALID_BUNDLE: 400,
  LIMIT_EXCEEDED: 400,
  MISSING_TEMPLATE: 404,
  DUPLICATE_ITEM: 409,
};

/** Thrown by route handlers for unknown sessions or items. */
export class NotFoundError extends Error {
  constructor(what: string, id: string) {
    super(`${what} not found: ${id}`);
    this.name = "NotFoundError";
  }
}

export function requestLogger(): RequestHandler {
  return (req, res, next) => {
    const started = Date.now();
    res.on("finish", () => {
      console.log(
        `  ${req.method} ${req.originalUrl} → ${res.statusCode} (${Date.now() - started}ms)`,
      );
    });
    next();
  };
}

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (isDitaScaffoldError(err)) {
    res.status(STATUS_BY_CODE[err.code]).json({
      error: err.code,
      message: err.message,
      details: err.details,
    });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      error: "VALIDATION_ERROR",
      message: "Invalid request body",
      details: {
        issues: err.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      },
    });
    return;
  }

  if (err instanceof NotFoundError) {
    res.status(404).json({ error: "NOT_FOUND", message: err.message });
    return;
  }

  if (err instanceof multer.MulterError) {
    res.status(400).json({ error: "UPLOAD_ERROR", message: err.message });
    return;
  }

  // express.json() reports unparsable bodies as SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: "MALFORMED_JSON", message: err.message });
    return;
  }

  const message = err instanceof Error ? err.message : String(err);
  console.error(`  Unhandled error: ${message}`);
  res.status(500).json({ error: "INTERNAL", message });
};
