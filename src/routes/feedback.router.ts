import express from "express";
import { createFeedbackControllers } from "@controllers/feedback.controller";
import type { AuthMiddlewares } from "@middlewares/auth.middleware";
import type { AppContext } from "@services/app-context";

export const createFeedbackRouter = (context: AppContext, { optionalAuthMiddleware }: AuthMiddlewares) => {
    const feedbackRouter = express.Router();
    const feedbackController = createFeedbackControllers(context);

    feedbackRouter.post("/", optionalAuthMiddleware, feedbackController.createFeedbackController);
    feedbackRouter.get("/", optionalAuthMiddleware, feedbackController.listFeedbackController);

    return feedbackRouter;
};
