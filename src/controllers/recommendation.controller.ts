import type { RequestHandler } from "express";
import { z } from "zod";
import type { AppContext } from "@services/app-context";
import { sendResponse } from "@utils/express.util";

const recommendationQuerySchema = z.object({
    location: z.string({ required_error: "Location is required" }).trim().min(1, "Location is required"),
});

export const createRecommendationController = ({ recommendations }: AppContext): RequestHandler =>
    async (req, res, next) => {
        try {
            const { location } = recommendationQuerySchema.parse(req.query);
            const ranked = await recommendations.recommend(location);

            sendResponse(res, {
                status: true,
                code: 200,
                message: ranked.length ? "Recommendations generated" : "No network data for this location",
                data: ranked,
            });
        } catch (error) {
            next(error);
        }
    };
