// services/auth/credential.service.ts
import bcrypt from "bcryptjs";
import { ValidationError } from "@utils/errors.util";
import { logger } from "@utils/logger";

/** bcrypt ignores everything past this many UTF-8 bytes. */
export const MAX_PASSWORD_BYTES = 72;

export const passwordByteLength = (password: string): number => Buffer.byteLength(password, "utf8");

export class CredentialService {
    constructor(private readonly rounds: number = 10) {}

    /**
     * Salted one-way hash; every call draws a fresh salt.
     */
    async hash(password: string): Promise<string> {
        if (passwordByteLength(password) > MAX_PASSWORD_BYTES) {
            throw new ValidationError(`password: Password must be at most ${MAX_PASSWORD_BYTES} bytes`);
        }
        return bcrypt.hash(password, this.rounds);
    }

    /**
     * Never throws. A malformed hash is simply a mismatch, and so is a
     * password bcrypt would truncate.
     */
    async verify(password: string, hash: string): Promise<boolean> {
        if (passwordByteLength(password) > MAX_PASSWORD_BYTES) {
            return false;
        }
        try {
            return await bcrypt.compare(password, hash);
        } catch (error) {
            logger.debug(`Password verification rejected a malformed hash: ${error instanceof Error ? error.message : String(error)}`);
            return false;
        }
    }
}
