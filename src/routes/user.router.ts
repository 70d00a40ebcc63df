import express from "express";
import { createGetUserController } from "@controllers/user.controller";
import type { AuthMiddlewares } from "@middlewares/auth.middleware";
import type { AppContext } from "@services/app-context";

export const createUserRouter = (context: AppContext, { authMiddleware }: AuthMiddlewares) => {
    const userRouter = express.Router();

    userRouter.get("/:id", authMiddleware, createGetUserController(context));

    return userRouter;
};
