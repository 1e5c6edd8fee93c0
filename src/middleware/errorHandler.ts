// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from "express";

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
  details?: Record<string, unknown>;
}

// Express only treats 4-arity functions as error handlers, hence the unused _next
export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  const status = err.statusCode || 500;

  if (status >= 500) {
    console.error(`[ERROR] ${req.method} ${req.url}`, err);
  } else {
    console.warn(`[WARN] ${req.method} ${req.url} -> ${status} ${err.message}`);
  }

  res.status(status).json({
    success: false,
    ...(err.code ? { code: err.code } : {}),
    message: err.message || "Internal Server Error",
    ...(err.details ? { details: err.details } : {}),
  });
}
