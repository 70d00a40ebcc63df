// services/storage/persistence.gateway.ts
import { BackendUnavailableError, NotFoundError } from "@utils/errors.util";
import { logger } from "@utils/logger";
import type {
    FeedbackRecord,
    ListQuery,
    NetworkLogRecord,
    NewFeedback,
    NewNetworkLog,
    NewUser,
    UserRecord,
} from "types/records.types";
import { MemoryRecordStore } from "./memory-record.store";
import type { DurableBackend, RecordStore, StorageMode } from "./storage.types";

/**
 * Uniform read/write surface over users, feedback and network logs.
 *
 * The durable backend is probed exactly once in `initialize`; if it is
 * absent or unreachable the gateway serves from an in-memory store for the
 * rest of the process lifetime.
 */
export class PersistenceGateway {
    private constructor(
        readonly mode: StorageMode,
        private readonly store: RecordStore,
        private readonly backend: DurableBackend | null,
    ) {}

    static async initialize(backend: DurableBackend | null): Promise<PersistenceGateway> {
        if (backend && (await backend.probe())) {
            logger.info("💾 Storage mode: durable");
            return new PersistenceGateway("durable", backend.createStore(), backend);
        }

        const reason = backend
            ? new BackendUnavailableError()
            : new BackendUnavailableError("No durable store configured");
        logger.warn(`⚠️ ${reason.type}: ${reason.message}. Storage mode: fallback (in-memory, non-durable)`);
        return new PersistenceGateway("fallback", new MemoryRecordStore(), null);
    }

    /** Gateway over an already-chosen store, for tests and tools. */
    static withStore(mode: StorageMode, store: RecordStore): PersistenceGateway {
        return new PersistenceGateway(mode, store, null);
    }

    createUser(user: NewUser): Promise<UserRecord> {
        return this.store.createUser(user);
    }

    findUserById(id: number): Promise<UserRecord | null> {
        return this.store.findUserById(id);
    }

    findUserByUsername(username: string): Promise<UserRecord | null> {
        return this.store.findUserByUsername(username);
    }

    findUserByEmail(email: string): Promise<UserRecord | null> {
        return this.store.findUserByEmail(email);
    }

    async createFeedback(feedback: NewFeedback): Promise<FeedbackRecord> {
        await this.ensureUserExists(feedback.user_id);
        return this.store.createFeedback(feedback);
    }

    listFeedback(query: ListQuery): Promise<FeedbackRecord[]> {
        return this.store.listFeedback(query);
    }

    async createNetworkLog(log: NewNetworkLog): Promise<NetworkLogRecord> {
        await this.ensureUserExists(log.user_id);
        return this.store.createNetworkLog(log);
    }

    listNetworkLogs(query: ListQuery): Promise<NetworkLogRecord[]> {
        return this.store.listNetworkLogs(query);
    }

    listNetworkLogsByLocation(location: string): Promise<NetworkLogRecord[]> {
        return this.store.listNetworkLogsByLocation(location);
    }

    /** True when the durable backend answers; always false in fallback mode. */
    async ping(): Promise<boolean> {
        return this.backend ? this.backend.ping() : false;
    }

    async close(): Promise<void> {
        if (this.backend) await this.backend.close();
    }

    // Not a constraint: a user could disappear between this read and the insert.
    private async ensureUserExists(userId: number | null): Promise<void> {
        if (userId === null) return;
        const user = await this.store.findUserById(userId);
        if (!user) {
            throw new NotFoundError(`User ${userId} not found`);
        }
    }
}
