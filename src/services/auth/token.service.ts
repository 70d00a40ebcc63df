// services/auth/token.service.ts
import jwt from "jsonwebtoken";
import { logger } from "@utils/logger";
import type { TokenPayload, TokenValidation } from './auth.types';

export const TOKEN_TTL_SECONDS = 30 * 60;

const toSeconds = (ms: number) => Math.floor(ms / 1000);

const isTokenPayload = (value: unknown): value is TokenPayload =>
    typeof value === "object" && value !== null && "sub" in value && typeof value.sub === "string" && value.sub !== "";

export class TokenService {
    constructor(private readonly secret: string) {
        if (!secret) {
            throw new Error("Token secret must not be empty");
        }
    }

    /**
     * Sign a bearer token for `subject`. JWT times are whole seconds: `now` is
     * floored, so the token expires 30 minutes after the start of the second it
     * was issued in, up to 999 ms before `now + 30 min` and never after it.
     */
    issue(subject: string, now: number = Date.now()): string {
        const payload: TokenPayload = {
            sub: subject,
            iat: toSeconds(now),
        };

        const token = jwt.sign(payload, this.secret, {
            algorithm: "HS256",
            expiresIn: TOKEN_TTL_SECONDS,
        });

        logger.debug(`Token issued for subject: ${subject}`);
        return token;
    }

    /**
     * Signature mismatch, malformed input and expiry all produce `{ valid: false }`.
     */
    validate(token: string, now: number = Date.now()): TokenValidation {
        try {
            const decoded = jwt.verify(token, this.secret, {
                algorithms: ["HS256"],
                clockTimestamp: toSeconds(now),
            });

            if (!isTokenPayload(decoded)) {
                logger.debug('Token rejected: missing subject');
                return { valid: false };
            }
            return { valid: true, subject: decoded.sub };
        } catch (error) {
            logger.debug(`Token rejected: ${error instanceof Error ? error.name : 'unknown error'}`);
            return { valid: false };
        }
    }
}
