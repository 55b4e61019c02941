import { NextFunction, Request, Response } from "express";
import multer from "multer";
import { AppError, errorMessage } from "../../domain/errors/app.error";

/** Shared by controllers: AppErrors keep their status, anything else is a 500. */
export function sendError(res: Response, error: unknown, fallback: string): void {
  if (error instanceof AppError) {
    res.status(error.statusCode).json({ success: false, error: error.message, code: error.code });
    return;
  }
  console.error(`[API] ${fallback}:`, error);
  res.status(500).json({ success: false, error: errorMessage(error, fallback), code: "INTERNAL_ERROR" });
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && "type" in error && error.type === "entity.parse.failed";
}

/** Last handler in the chain; catches errors thrown by middleware such as multer. */
export function errorMiddleware(error: unknown, req: Request, res: Response, next: NextFunction): void {
  console.error(`[API] ${req.method} ${req.path} failed:`, errorMessage(error));

  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof multer.MulterError) {
    const isLimit = error.code.startsWith("LIMIT_") && error.code !== "LIMIT_UNEXPECTED_FILE";
    res.status(isLimit ? 413 : 400).json({ success: false, error: error.message, code: error.code });
    return;
  }

  if (isBodyParseError(error)) {
    res.status(400).json({ success: false, error: "Malformed JSON body", code: "INVALID_JSON" });
    return;
  }

  sendError(res, error, "Internal server error");
}
