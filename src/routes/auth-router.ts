import express from "express";
import { createLoginRateLimiter } from "@configs/security.config";
import { createAuthControllers } from "@controllers/auth.controller";
import type { AuthMiddlewares } from "@middlewares/auth.middleware";
import type { AppContext } from "@services/app-context";

export const createAuthRouter = (context: AppContext, { authMiddleware }: AuthMiddlewares) => {
    const authRouter = express.Router();
    const authController = createAuthControllers(context);

    authRouter.post("/register", authController.registerController);
    authRouter.post("/login", createLoginRateLimiter(), authController.loginController);
    authRouter.get("/me", authMiddleware, authController.meController);

    return authRouter;
};
