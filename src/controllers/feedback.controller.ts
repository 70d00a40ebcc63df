import type { RequestHandler } from "express";
import { z } from "zod";
import type { AppContext } from "@services/app-context";
import { sendResponse } from "@utils/express.util";
import { pageQuerySchema } from "@utils/pagination.util";
import { submitterOf, telemetryHandler } from "./telemetry.controller";

export const feedbackSchema = z.object({
    rating: z.number().int().min(1).max(5),
    category: z.string().trim().min(1, "Category is required").max(50),
    content: z.string().max(2000).default(""),
}).strict();

export interface FeedbackControllers {
    createFeedbackController: RequestHandler;
    listFeedbackController: RequestHandler;
}

export const createFeedbackControllers = ({ telemetry }: AppContext): FeedbackControllers => ({
    createFeedbackController: telemetryHandler(async (req, res) => {
        const input = feedbackSchema.parse(req.body);
        const feedback = await telemetry.submitFeedback(submitterOf(req), input);

        sendResponse(res, {
            status: true,
            code: 201,
            message: "Feedback submitted successfully",
            data: feedback,
            storage: telemetry.storage,
        });
    }),

    listFeedbackController: telemetryHandler(async (req, res) => {
        const page = pageQuerySchema.parse(req.query);
        const feedback = await telemetry.listFeedback(submitterOf(req), page);

        sendResponse(res, {
            status: true,
            code: 200,
            message: "Feedback retrieved successfully",
            data: feedback,
            storage: telemetry.storage,
        });
    }),
});
