// configs/security.config.ts
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import type { RequestHandler } from "express";
import type { CorsOptions } from "cors";
import type { Keys } from "./dotenv.config";

/**
 * 🛡️ Helmet Security Middleware
 */
export const securityHeaders: RequestHandler = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'self'"],
      objectSrc: ["'none'"],
      upgradeInsecureRequests: [],
    },
  },
  xFrameOptions: { action: "deny" },
  strictTransportSecurity: { maxAge: 31536000, includeSubDomains: true, preload: true },
  xContentTypeOptions: true,
  xDownloadOptions: true,
});

/**
 * 🚦 General Rate Limiting Middleware (one store per app instance)
 */
export const createRateLimiter = (): RequestHandler => rateLimit({
  windowMs: 10 * 60 * 1000, // 10 minutes window
  limit: 500,
  message: { status: false, message: "Too many requests, please try again later.", data: null },
  standardHeaders: true,
  legacyHeaders: false,
  skipFailedRequests: true, // Don't count failed requests
});

export const LOGIN_ATTEMPT_LIMIT = 10;

/**
 * 🔐 Login Rate Limiting: only failed attempts count, so guessing is capped
 */
export const createLoginRateLimiter = (): RequestHandler => rateLimit({
  windowMs: 15 * 60 * 1000,
  limit: LOGIN_ATTEMPT_LIMIT,
  message: { status: false, message: "Too many login attempts, please try again later.", data: null },
  standardHeaders: true,
  legacyHeaders: false,
  skipSuccessfulRequests: true,
});

/**
 * 🕵️‍♂️ CORS Configuration. No configured origins means any origin.
 */
export const buildCorsOptions = (keys: Keys): CorsOptions => ({
  origin(origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) {
    if (!origin || keys.corsOrigins.length === 0 || keys.corsOrigins.includes(origin)) {
      callback(null, true);
    } else {
      callback(new Error("❌ Not allowed by CORS"));
    }
  },
  methods: ["GET", "POST"],
  allowedHeaders: ["Content-Type", "Authorization"],
  credentials: true,
});
