// services/storage/storage.types.ts
import type {
    FeedbackRecord,
    ListQuery,
    NetworkLogRecord,
    NewFeedback,
    NewNetworkLog,
    NewUser,
    UserRecord,
} from "types/records.types";

/** Decided once at startup, never per request. */
export type StorageMode = "durable" | "fallback";

/**
 * Record-level operations a backing store provides. Both the MongoDB store
 * and the in-memory store implement this; the gateway layers referential
 * checks on top.
 */
export interface RecordStore {
    createUser(user: NewUser): Promise<UserRecord>;
    findUserById(id: number): Promise<UserRecord | null>;
    findUserByUsername(username: string): Promise<UserRecord | null>;
    findUserByEmail(email: string): Promise<UserRecord | null>;

    createFeedback(feedback: NewFeedback): Promise<FeedbackRecord>;
    listFeedback(query: ListQuery): Promise<FeedbackRecord[]>;

    createNetworkLog(log: NewNetworkLog): Promise<NetworkLogRecord>;
    listNetworkLogs(query: ListQuery): Promise<NetworkLogRecord[]>;
    listNetworkLogsByLocation(location: string): Promise<NetworkLogRecord[]>;
}

/**
 * A durable backend the gateway can probe once at startup.
 */
export interface DurableBackend {
    /** Resolves true when the backend is reachable and ready. Must not throw. */
    probe(): Promise<boolean>;
    createStore(): RecordStore;
    ping(): Promise<boolean>;
    close(): Promise<void>;
}
