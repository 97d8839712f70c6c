/**
 * Rate Limiting Middleware
 * Protects the read API from request floods
 */

import rateLimit from "express-rate-limit";

const RATE_LIMIT_WINDOW_MS = 15 * 60 * 1000;

const RATE_LIMIT_MAX_REQUESTS = 300;

/**
 * General API rate limiter
 * Limits: 300 requests per 15 minutes per IP
 */
export const apiLimiter = rateLimit({
  windowMs: RATE_LIMIT_WINDOW_MS,
  max: RATE_LIMIT_MAX_REQUESTS,
  message: {
    error: "Too many requests",
    code: "RATE_LIMITED",
    retryAfter: "15 minutes",
  },
  standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
  legacyHeaders: false,
  skip: (req) => req.path === "/health",
});
