import type { NextFunction, RequestHandler, Response } from "express";
import type { Submitter } from "@services/telemetry/telemetry.service";
import type { injectedRequest } from "types/injected-types";

/** Authenticated caller, or the explicit anonymous path. */
export const submitterOf = (req: injectedRequest): Submitter =>
    req.user ? { kind: "user", userId: req.user.id } : { kind: "anonymous" };

/** Shared try/next wrapper for the telemetry handlers. */
export const telemetryHandler = (
    handle: (req: injectedRequest, res: Response) => Promise<void>,
): RequestHandler =>
    async (req: injectedRequest, res: Response, next: NextFunction) => {
        try {
            await handle(req, res);
        } catch (error) {
            next(error);
        }
    };
