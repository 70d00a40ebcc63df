// services/storage/mongo-record.store.ts
import { nextSequence } from "@models/counter.model";
import { Feedback, type FeedbackDocument } from "@models/feedback.model";
import { MODEL_NAMES } from "@models/names";
import { NetworkLog, type NetworkLogDocument } from "@models/network-log.model";
import { User, type UserDocument } from "@models/user.model";
import { ConflictError } from "@utils/errors.util";
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
import type { RecordStore } from "./storage.types";

interface DuplicateKeyError {
    code: 11000;
    keyPattern?: Record<string, unknown>;
}

const isDuplicateKeyError = (error: unknown): error is DuplicateKeyError =>
    typeof error === "object" && error !== null && "code" in error && error.code === 11000;

const toUserRecord = ({ _id, ...doc }: UserDocument): UserRecord => ({
    id: _id,
    username: doc.username,
    email: doc.email,
    password_hash: doc.password_hash,
    provider: doc.provider ?? null,
    is_active: doc.is_active,
    created_at: doc.created_at,
});

const toFeedbackRecord = ({ _id, ...doc }: FeedbackDocument): FeedbackRecord => ({
    id: _id,
    user_id: doc.user_id ?? null,
    rating: doc.rating,
    category: doc.category,
    content: doc.content,
    created_at: doc.created_at,
});

const toNetworkLogRecord = ({ _id, ...doc }: NetworkLogDocument): NetworkLogRecord => ({
    id: _id,
    user_id: doc.user_id ?? null,
    location: doc.location,
    provider: doc.provider,
    quality_score: doc.quality_score,
    latency_ms: doc.latency_ms,
    download_mbps: doc.download_mbps,
    upload_mbps: doc.upload_mbps ?? null,
    signal_strength_dbm: doc.signal_strength_dbm ?? null,
    created_at: doc.created_at,
});

const ownerFilter = (query: ListQuery) =>
    query.userId === undefined ? {} : { user_id: query.userId };

/**
 * MongoDB-backed store. Ids come from the `counters` collection; the unique
 * indexes on users enforce username/email uniqueness atomically.
 */
export class MongoRecordStore implements RecordStore {
    async createUser(user: NewUser): Promise<UserRecord> {
        const id = await nextSequence(MODEL_NAMES.USER);
        try {
            const created = await User.create({
                _id: id,
                username: user.username,
                email: user.email,
                password_hash: user.password_hash,
                provider: user.provider,
                is_active: true,
                created_at: new Date(),
            });
            return toUserRecord(created.toObject());
        } catch (error) {
            if (isDuplicateKeyError(error)) {
                const field = error.keyPattern && "email" in error.keyPattern ? "Email" : "Username";
                logger.debug(`Duplicate ${field.toLowerCase()} on user insert`);
                throw new ConflictError(`${field} already registered`);
            }
            throw error;
        }
    }

    async findUserById(id: number): Promise<UserRecord | null> {
        const doc = await User.findById(id).lean<UserDocument>();
        return doc ? toUserRecord(doc) : null;
    }

    async findUserByUsername(username: string): Promise<UserRecord | null> {
        const doc = await User.findOne({ username }).lean<UserDocument>();
        return doc ? toUserRecord(doc) : null;
    }

    async findUserByEmail(email: string): Promise<UserRecord | null> {
        const doc = await User.findOne({ email }).lean<UserDocument>();
        return doc ? toUserRecord(doc) : null;
    }

    async createFeedback(feedback: NewFeedback): Promise<FeedbackRecord> {
        const id = await nextSequence(MODEL_NAMES.FEEDBACK);
        const created = await Feedback.create({ _id: id, ...feedback, created_at: new Date() });
        return toFeedbackRecord(created.toObject());
    }

    async listFeedback(query: ListQuery): Promise<FeedbackRecord[]> {
        const docs = await Feedback.find(ownerFilter(query))
            .sort({ _id: 1 })
            .skip(query.offset)
            .limit(query.limit)
            .lean<FeedbackDocument[]>();
        return docs.map(toFeedbackRecord);
    }

    async createNetworkLog(log: NewNetworkLog): Promise<NetworkLogRecord> {
        const id = await nextSequence(MODEL_NAMES.NETWORK_LOG);
        const created = await NetworkLog.create({ _id: id, ...log, created_at: new Date() });
        return toNetworkLogRecord(created.toObject());
    }

    async listNetworkLogs(query: ListQuery): Promise<NetworkLogRecord[]> {
        const docs = await NetworkLog.find(ownerFilter(query))
            .sort({ _id: 1 })
            .skip(query.offset)
            .limit(query.limit)
            .lean<NetworkLogDocument[]>();
        return docs.map(toNetworkLogRecord);
    }

    async listNetworkLogsByLocation(location: string): Promise<NetworkLogRecord[]> {
        const docs = await NetworkLog.find({ location }).sort({ _id: 1 }).lean<NetworkLogDocument[]>();
        return docs.map(toNetworkLogRecord);
    }
}
