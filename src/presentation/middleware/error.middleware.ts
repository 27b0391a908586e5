import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import { AppError } from "../../domain/errors/app.errors";

export interface ErrorResponse {
  error: string;
  code: string;
  details?: string[];
}

export function sendError(res: Response, error: unknown, fallbackMessage: string): void {
  if (error instanceof AppError) {
    const body: ErrorResponse = { error: error.message, code: error.code };
    if (error.details.length > 0) {
      body.details = error.details;
    }
    res.status(error.statusCode).json(body);
    return;
  }

  console.error(`[API] ${fallbackMessage}:`, error);
  const body: ErrorResponse = { error: fallbackMessage, code: "INTERNAL_ERROR" };
  res.status(500).json(body);
}

/**
 * Catches errors raised before a controller runs: multipart parsing and JSON bodies.
 */
export function errorMiddleware(error: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof multer.MulterError) {
    const message =
      error.code === "LIMIT_FILE_SIZE" ? "File exceeds the maximum allowed size" : `Invalid upload: ${error.message}`;
    const body: ErrorResponse = { error: message, code: "VALIDATION_ERROR" };
    res.status(400).json(body);
    return;
  }

  if (error instanceof SyntaxError) {
    const body: ErrorResponse = { error: "Malformed JSON body", code: "VALIDATION_ERROR" };
    res.status(400).json(body);
    return;
  }

  sendError(res, error, "Unexpected error");
}
