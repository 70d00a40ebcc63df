// app.ts - Express application built from an explicit context
import compression from "compression";
import cors from "cors";
import express from "express";
import { buildCorsOptions, createRateLimiter, securityHeaders } from "@configs/security.config";
import { createAuthMiddlewares } from "@middlewares/auth.middleware";
import { globalErrorHandler } from "@middlewares/error-handler.middleware";
import type { AppContext } from "@services/app-context";
import { NotFoundError } from "@utils/errors.util";
import { morganMiddleware } from "@utils/logger";

// Route imports
import { createAuthRouter } from "@routes/auth-router";
import { createFeedbackRouter } from "@routes/feedback.router";
import { createNetworkLogRouter } from "@routes/network-log.router";
import { createRecommendationRouter } from "@routes/recommendation.router";
import { createSystemRouter } from "@routes/system.route";
import { createUserRouter } from "@routes/user.router";

export const createApp = (context: AppContext) => {
  const app = express();
  const authMiddlewares = createAuthMiddlewares(context.auth);

  // Trust proxy for rate limiting
  app.set("trust proxy", 1);

  // Middlewares
  app.use(compression());
  app.use(express.json({ limit: "1mb" }));
  app.use(securityHeaders);
  app.use(createRateLimiter());
  app.use(cors(buildCorsOptions(context.keys)));
  app.use(morganMiddleware);

  // Express routes
  app.use("/", createSystemRouter(context));
  app.use("/auth", createAuthRouter(context, authMiddlewares));
  app.use("/users", createUserRouter(context, authMiddlewares));
  app.use("/feedback", createFeedbackRouter(context, authMiddlewares));
  app.use("/network-logs", createNetworkLogRouter(context, authMiddlewares));
  app.use("/recommendations", createRecommendationRouter(context));

  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
  });

  // Error handling middleware
  app.use(globalErrorHandler);

  return app;
};
