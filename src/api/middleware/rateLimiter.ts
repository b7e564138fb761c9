import "@/types/express";
import rateLimit from "express-rate-limit";
import { config } from "@/config/env";

export const rateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  limit: config.rateLimit.max,
  standardHeaders: true,
  legacyHeaders: false,
  // Skip rate limiting for health checks
  skip: (req) => req.path === "/health",
  handler: (req, res) => {
    res.status(429).json({
      success: false,
      error: {
        code: "RATE_LIMITED",
        message: "Rate limit exceeded. Try again later.",
      },
      correlationId: req.correlationId,
    });
  },
});
