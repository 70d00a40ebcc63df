import type { NextFunction, RequestHandler, Response } from "express";
import { z } from "zod";
import type { AppContext } from "@services/app-context";
import { currentUser } from "@middlewares/auth.middleware";
import { MAX_PASSWORD_BYTES, passwordByteLength } from "@services/auth";
import { sendResponse } from "@utils/express.util";
import type { injectedRequest } from "types/injected-types";

// Validation schemas
export const registerSchema = z.object({
    username: z.string().trim().min(3, "Username must be at least 3 characters").max(50)
        .regex(/^[A-Za-z0-9_.-]+$/, "Username may only contain letters, digits, '.', '_' and '-'"),
    email: z.string().trim().email("Invalid email").max(254),
    password: z.string().min(8, "Password must be at least 8 characters")
        .refine((password) => passwordByteLength(password) <= MAX_PASSWORD_BYTES, `Password must be at most ${MAX_PASSWORD_BYTES} bytes`),
    provider: z.string().trim().min(1).max(100).optional(),
}).strict();

export const loginSchema = z.object({
    username: z.string().trim().min(1, "Username is required"),
    password: z.string().min(1, "Password is required"),
}).strict();

export interface AuthControllers {
    registerController: RequestHandler;
    loginController: RequestHandler;
    meController: RequestHandler;
}

export const createAuthControllers = ({ auth }: AppContext): AuthControllers => ({
    registerController: async (req, res, next) => {
        try {
            const data = registerSchema.parse(req.body);
            const user = await auth.register(data);

            sendResponse(res, {
                status: true,
                code: 201,
                message: "User registered successfully",
                data: user,
            });
        } catch (err) {
            next(err);
        }
    },

    loginController: async (req, res, next) => {
        try {
            const { username, password } = loginSchema.parse(req.body);
            const token = await auth.login(username, password);

            sendResponse(res, {
                status: true,
                code: 200,
                message: "Login successful",
                data: token,
            });
        } catch (err) {
            next(err);
        }
    },

    // the user is resolved by authMiddleware
    meController: (req: injectedRequest, res: Response, next: NextFunction) => {
        try {
            sendResponse(res, {
                status: true,
                code: 200,
                message: "User verified successfully",
                data: currentUser(req),
            });
        } catch (err) {
            next(err);
        }
    },
});
