import type { Response, NextFunction, RequestHandler } from "express";
import type { AuthFlowService } from "@services/auth";
import { UnauthorizedError } from "@utils/errors.util";
import type { injectedRequest } from "types/injected-types";
import type { PublicUser } from "types/records.types";

/**
 * `undefined` when no Authorization header was sent, `null` when one was
 * sent but is not a usable bearer credential.
 */
export const extractBearerToken = (header: string | undefined): string | null | undefined => {
    if (header === undefined) return undefined;
    const [scheme, token, ...rest] = header.trim().split(/\s+/);
    if (!scheme || scheme.toLowerCase() !== "bearer" || !token || rest.length) return null;
    return token;
};

export interface AuthMiddlewares {
    /** 401 unless a valid bearer token for an active user is presented. */
    authMiddleware: RequestHandler;
    /** No header: continue anonymously. A bad header is still a 401. */
    optionalAuthMiddleware: RequestHandler;
}

export const createAuthMiddlewares = (auth: AuthFlowService): AuthMiddlewares => {
    const resolve = (required: boolean) =>
        async (req: injectedRequest, _res: Response, next: NextFunction): Promise<void> => {
            try {
                const token = extractBearerToken(req.headers.authorization);

                if (token === undefined && !required) {
                    req.user = null;
                    next();
                    return;
                }
                if (!token) {
                    throw new UnauthorizedError();
                }

                req.user = await auth.authenticate(token);
                next();
            } catch (error) {
                next(error);
            }
        };

    return {
        authMiddleware: resolve(true),
        optionalAuthMiddleware: resolve(false),
    };
};

/** The authenticated caller; only valid behind `authMiddleware`. */
export const currentUser = (req: injectedRequest): PublicUser => {
    if (!req.user) {
        throw new UnauthorizedError();
    }
    return req.user;
};
