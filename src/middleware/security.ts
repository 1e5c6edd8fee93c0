// src/middleware/security.ts
import rateLimit from "express-rate-limit";
import sanitize from "mongo-sanitize";
import { Request, Response, NextFunction } from "express";
import config from "../config/config";

export const computeRateLimiter = rateLimit({
  windowMs: 60 * 60 * 1000, // 1 hour
  max: config.computeRateLimit,
  message: {
    message: "Too many attainment computations from this IP. Please try again later.",
  },
  standardHeaders: true,
  legacyHeaders: false,
});

// Strips $-prefixed keys so request data cannot become Mongo operators
export const sanitizeInput = (req: Request, _res: Response, next: NextFunction) => {
  if (req.body) {
    req.body = sanitize(req.body);
  }

  if (req.query) {
    Object.keys(req.query).forEach((key) => {
      req.query[key] = sanitize(req.query[key]);
    });
  }

  next();
};
