// types/records.types.ts

export interface UserRecord {
    id: number;
    username: string;
    email: string;
    password_hash: string;
    provider: string | null;
    is_active: boolean;
    created_at: Date;
}

/** User as it leaves the service: never carries the password hash. */
export type PublicUser = Omit<UserRecord, "password_hash">;

export interface NewUser {
    username: string;
    email: string;
    password_hash: string;
    provider: string | null;
}

export interface FeedbackRecord {
    id: number;
    /** `null` only for an explicit anonymous submission in fallback mode. */
    user_id: number | null;
    rating: number;
    category: string;
    content: string;
    created_at: Date;
}

export type NewFeedback = Omit<FeedbackRecord, "id" | "created_at">;

export interface NetworkLogRecord {
    id: number;
    user_id: number | null;
    location: string;
    provider: string;
    quality_score: number;
    latency_ms: number;
    download_mbps: number;
    upload_mbps: number | null;
    signal_strength_dbm: number | null;
    created_at: Date;
}

export type NewNetworkLog = Omit<NetworkLogRecord, "id" | "created_at">;

export interface ListQuery {
    /** Restrict to one owner; omitted means unscoped. */
    userId?: number;
    offset: number;
    limit: number;
}

export const toPublicUser = ({ password_hash: _hash, ...user }: UserRecord): PublicUser => user;
