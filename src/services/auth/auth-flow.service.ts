// ====================================
// services/auth/auth-flow.service.ts
// ====================================

import type { PersistenceGateway } from "@services/storage/persistence.gateway";
import { UnauthorizedError } from "@utils/errors.util";
import { logger } from "@utils/logger";
import { toPublicUser, type PublicUser } from "types/records.types";
import type { CredentialService } from './credential.service';
import type { TokenService } from './token.service';
import type { LoginResult, RegisterData } from './auth.types';

const LOGIN_FAILED = "Incorrect username or password";

export class AuthFlowService {
    // Compared against when the username is unknown, so both failure paths do one bcrypt compare.
    private readonly dummyHash: Promise<string>;

    constructor(
        private readonly gateway: PersistenceGateway,
        private readonly credentials: CredentialService,
        private readonly tokens: TokenService,
    ) {
        this.dummyHash = credentials.hash("not-a-real-password");
    }

    /**
     * 🚀 REGISTRATION
     * Uniqueness is checked by the gateway in the same step as the insert.
     */
    async register(data: RegisterData): Promise<PublicUser> {
        const password_hash = await this.credentials.hash(data.password);
        const user = await this.gateway.createUser({
            username: data.username,
            email: data.email,
            password_hash,
            provider: data.provider ?? null,
        });

        logger.info(`Registration successful for user: ${user.id}`);
        return toPublicUser(user);
    }

    /**
     * 🔐 LOGIN
     * Unknown user, wrong password and inactive account fail identically.
     */
    async login(username: string, password: string, now: number = Date.now()): Promise<LoginResult> {
        const user = await this.gateway.findUserByUsername(username);

        if (!user) {
            await this.credentials.verify(password, await this.dummyHash);
            logger.warn('Login failed');
            throw new UnauthorizedError(LOGIN_FAILED);
        }

        const passwordMatches = await this.credentials.verify(password, user.password_hash);
        if (!passwordMatches || !user.is_active) {
            logger.warn('Login failed');
            throw new UnauthorizedError(LOGIN_FAILED);
        }

        logger.info(`Login successful for user: ${user.id}`);
        return {
            access_token: this.tokens.issue(user.username, now),
            token_type: "bearer",
        };
    }

    /**
     * 🔍 Resolve a bearer token to a live, active user.
     */
    async authenticate(token: string, now: number = Date.now()): Promise<PublicUser> {
        const validation = this.tokens.validate(token, now);
        if (!validation.valid) {
            throw new UnauthorizedError();
        }

        const user = await this.gateway.findUserByUsername(validation.subject);
        if (!user || !user.is_active) {
            logger.debug('Token subject no longer resolves to an active user');
            throw new UnauthorizedError();
        }

        return toPublicUser(user);
    }
}
