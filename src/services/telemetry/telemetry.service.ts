// services/telemetry/telemetry.service.ts
import type { PersistenceGateway } from "@services/storage/persistence.gateway";
import type { StorageMode } from "@services/storage/storage.types";
import { UnauthorizedError } from "@utils/errors.util";
import { logger } from "@utils/logger";
import type {
    FeedbackRecord,
    NetworkLogRecord,
    NewFeedback,
    NewNetworkLog,
} from "types/records.types";

/**
 * Who is submitting or listing. Anonymous access is its own path and only
 * exists while the gateway runs in fallback mode.
 */
export type Submitter =
    | { kind: "user"; userId: number }
    | { kind: "anonymous" };

export type FeedbackInput = Omit<NewFeedback, "user_id">;
export type NetworkLogInput = Omit<NewNetworkLog, "user_id">;

export interface Page {
    offset: number;
    limit: number;
}

export class TelemetryService {
    constructor(private readonly gateway: PersistenceGateway) {}

    get storage(): StorageMode {
        return this.gateway.mode;
    }

    async submitFeedback(submitter: Submitter, input: FeedbackInput): Promise<FeedbackRecord> {
        return this.gateway.createFeedback({ ...input, user_id: this.ownerOf(submitter) });
    }

    async listFeedback(submitter: Submitter, page: Page): Promise<FeedbackRecord[]> {
        return this.gateway.listFeedback({ ...page, userId: this.scopeOf(submitter) });
    }

    async submitNetworkLog(submitter: Submitter, input: NetworkLogInput): Promise<NetworkLogRecord> {
        return this.gateway.createNetworkLog({ ...input, user_id: this.ownerOf(submitter) });
    }

    async listNetworkLogs(submitter: Submitter, page: Page): Promise<NetworkLogRecord[]> {
        return this.gateway.listNetworkLogs({ ...page, userId: this.scopeOf(submitter) });
    }

    private ownerOf(submitter: Submitter): number | null {
        if (submitter.kind === "user") return submitter.userId;
        this.assertAnonymousAllowed();
        return null;
    }

    private scopeOf(submitter: Submitter): number | undefined {
        if (submitter.kind === "user") return submitter.userId;
        this.assertAnonymousAllowed();
        return undefined;
    }

    private assertAnonymousAllowed(): void {
        if (this.gateway.mode !== "fallback") {
            throw new UnauthorizedError();
        }
        logger.debug("Serving anonymous telemetry request from the fallback store");
    }
}
