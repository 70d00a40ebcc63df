import express from "express";
import { createRecommendationController } from "@controllers/recommendation.controller";
import type { AppContext } from "@services/app-context";

export const createRecommendationRouter = (context: AppContext) => {
    const recommendationRouter = express.Router();

    recommendationRouter.get("/", createRecommendationController(context));

    return recommendationRouter;
};
