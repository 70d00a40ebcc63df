// services/auth/index.ts - UNIFIED EXPORT
// ====================================

export { AuthFlowService } from './auth-flow.service';
export { CredentialService, MAX_PASSWORD_BYTES, passwordByteLength } from './credential.service';
export { TokenService, TOKEN_TTL_SECONDS } from './token.service';

// Export types
export type {
    RegisterData,
    LoginResult,
    TokenPayload,
    TokenValidation
} from './auth.types';
