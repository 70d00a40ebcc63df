// ====================================
// services/auth/auth.types.ts
// ====================================

export interface RegisterData {
    username: string;
    email: string;
    password: string;
    provider?: string;
}

export interface LoginResult {
    access_token: string;
    token_type: "bearer";
}

export interface TokenPayload {
    sub: string;
    iat?: number;
    exp?: number;
}

/** Deliberately carries no failure reason. */
export type TokenValidation =
    | { valid: true; subject: string }
    | { valid: false };
