// services/storage/memory-record.store.ts
import { ConflictError } from "@utils/errors.util";
import { SerialQueue } from "@utils/serial-queue.util";
import type {
    FeedbackRecord,
    ListQuery,
    NetworkLogRecord,
    NewFeedback,
    NewNetworkLog,
    NewUser,
    UserRecord,
} from "types/records.types";
import type { RecordStore } from "./storage.types";

/**
 * One in-process collection: ids start at 1, records keep insertion order.
 * Every mutation goes through `queue`.
 */
class MemoryCollection<T extends { id: number }> {
    private records: T[] = [];
    private nextId = 1;
    readonly queue = new SerialQueue();

    /** Call only from inside `queue.run`. */
    insert(build: (id: number) => T): T {
        const record = build(this.nextId);
        Object.freeze(record);
        this.nextId += 1;
        this.records = [...this.records, record];
        return record;
    }

    snapshot(): readonly T[] {
        return this.records;
    }
}

const paginate = <T extends { user_id: number | null }>(records: readonly T[], query: ListQuery): T[] => {
    const scoped = query.userId === undefined
        ? records
        : records.filter((record) => record.user_id === query.userId);
    return scoped.slice(query.offset, query.offset + query.limit);
};

/**
 * Fallback store used when the durable backend is unreachable at startup.
 * Single-process and non-durable.
 */
export class MemoryRecordStore implements RecordStore {
    private readonly users = new MemoryCollection<UserRecord>();
    private readonly feedback = new MemoryCollection<FeedbackRecord>();
    private readonly networkLogs = new MemoryCollection<NetworkLogRecord>();

    createUser(user: NewUser): Promise<UserRecord> {
        return this.users.queue.run(() => {
            // uniqueness check and insert share one queued task
            const existing = this.users.snapshot();
            if (existing.some((record) => record.username === user.username)) {
                throw new ConflictError("Username already registered");
            }
            if (existing.some((record) => record.email === user.email)) {
                throw new ConflictError("Email already registered");
            }
            return this.users.insert((id) => ({
                id,
                username: user.username,
                email: user.email,
                password_hash: user.password_hash,
                provider: user.provider,
                is_active: true,
                created_at: new Date(),
            }));
        });
    }

    async findUserById(id: number): Promise<UserRecord | null> {
        return this.users.snapshot().find((record) => record.id === id) ?? null;
    }

    async findUserByUsername(username: string): Promise<UserRecord | null> {
        return this.users.snapshot().find((record) => record.username === username) ?? null;
    }

    async findUserByEmail(email: string): Promise<UserRecord | null> {
        return this.users.snapshot().find((record) => record.email === email) ?? null;
    }

    createFeedback(feedback: NewFeedback): Promise<FeedbackRecord> {
        return this.feedback.queue.run(() =>
            this.feedback.insert((id) => ({ id, ...feedback, created_at: new Date() })),
        );
    }

    async listFeedback(query: ListQuery): Promise<FeedbackRecord[]> {
        return paginate(this.feedback.snapshot(), query);
    }

    createNetworkLog(log: NewNetworkLog): Promise<NetworkLogRecord> {
        return this.networkLogs.queue.run(() =>
            this.networkLogs.insert((id) => ({ id, ...log, created_at: new Date() })),
        );
    }

    async listNetworkLogs(query: ListQuery): Promise<NetworkLogRecord[]> {
        return paginate(this.networkLogs.snapshot(), query);
    }

    async listNetworkLogsByLocation(location: string): Promise<NetworkLogRecord[]> {
        return this.networkLogs.snapshot().filter((record) => record.location === location);
    }
}
