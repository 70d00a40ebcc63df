import mongoose from "mongoose";
import { MODEL_NAMES } from "./names";

export interface NetworkLogDocument {
    _id: number;
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

const networkLogSchema = new mongoose.Schema<NetworkLogDocument>({
    _id: {
        type: Number,
        required: true,
    },
    user_id: {
        type: Number,
        ref: MODEL_NAMES.USER,
        default: null,
    },
    location: {
        type: String,
        required: true,
    },
    provider: {
        type: String,
        required: true,
    },
    quality_score: {
        type: Number,
        required: true,
        min: 0,
        max: 100,
    },
    latency_ms: {
        type: Number,
        required: true,
        min: 0,
    },
    download_mbps: {
        type: Number,
        required: true,
        min: 0,
    },
    upload_mbps: {
        type: Number,
        default: null,
    },
    signal_strength_dbm: {
        type: Number,
        default: null,
    },
    created_at: {
        type: Date,
        default: Date.now,
    },
}, { versionKey: false });

networkLogSchema.index({ user_id: 1, _id: 1 });
networkLogSchema.index({ location: 1 }); // Recommendation lookups

export const NetworkLog = mongoose.model<NetworkLogDocument>(MODEL_NAMES.NETWORK_LOG, networkLogSchema, MODEL_NAMES.NETWORK_LOG);
