import type { RequestHandler } from "express";
import { z } from "zod";
import type { AppContext } from "@services/app-context";
import { NotFoundError } from "@utils/errors.util";
import { sendResponse } from "@utils/express.util";
import { toPublicUser } from "types/records.types";

const userIdParamsSchema = z.object({
    id: z.coerce.number().int().positive(),
});

/**
 * Get a user's public profile by id
 */
export const createGetUserController = ({ gateway }: AppContext): RequestHandler =>
    async (req, res, next) => {
        try {
            const { id } = userIdParamsSchema.parse(req.params);
            const user = await gateway.findUserById(id);
            if (!user) {
                throw new NotFoundError("User not found");
            }

            sendResponse(res, {
                status: true,
                code: 200,
                message: "User retrieved successfully",
                data: toPublicUser(user),
            });
        } catch (error) {
            next(error);
        }
    };
