// services/app-context.ts
import type { Keys } from "@configs/dotenv.config";
import { AuthFlowService, CredentialService, TokenService } from "@services/auth";
import { RecommendationService } from "@services/recommendation/recommendation.service";
import { PersistenceGateway } from "@services/storage/persistence.gateway";
import type { DurableBackend } from "@services/storage/storage.types";
import { TelemetryService } from "@services/telemetry/telemetry.service";

/**
 * Everything a request handler needs, built once at startup and torn
 * down at shutdown. Nothing here is module-level state.
 */
export interface AppContext {
    keys: Keys;
    gateway: PersistenceGateway;
    credentials: CredentialService;
    tokens: TokenService;
    auth: AuthFlowService;
    telemetry: TelemetryService;
    recommendations: RecommendationService;
    close(): Promise<void>;
}

export const createContextFromGateway = (keys: Keys, gateway: PersistenceGateway): AppContext => {
    const credentials = new CredentialService(keys.bcryptRounds);
    const tokens = new TokenService(keys.jwtSecret);

    return {
        keys,
        gateway,
        credentials,
        tokens,
        auth: new AuthFlowService(gateway, credentials, tokens),
        telemetry: new TelemetryService(gateway),
        recommendations: new RecommendationService(gateway),
        close: () => gateway.close(),
    };
};

export const createAppContext = async (keys: Keys, backend: DurableBackend | null): Promise<AppContext> => {
    const gateway = await PersistenceGateway.initialize(backend);
    return createContextFromGateway(keys, gateway);
};
