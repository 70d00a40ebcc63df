import type { Request } from "express";
import type { PublicUser } from "types/records.types";

export interface injectedRequest extends Request {
    /** Set by the auth middlewares; `null` means an anonymous caller. */
    user?: PublicUser | null
}
