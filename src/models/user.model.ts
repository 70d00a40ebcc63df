import mongoose from "mongoose";
import { MODEL_NAMES } from "./names";

export interface UserDocument {
    _id: number;
    username: string;
    email: string;
    password_hash: string;
    provider: string | null;
    is_active: boolean;
    created_at: Date;
}

const userSchema = new mongoose.Schema<UserDocument>({
    _id: {
        type: Number,
        required: true,
    },
    username: {
        type: String,
        required: true,
    },
    email: {
        type: String,
        required: true,
    },
    password_hash: {
        type: String,
        required: true,
    },
    provider: {
        type: String,
        default: null,
    },
    is_active: {
        type: Boolean,
        default: true,
    },
    created_at: {
        type: Date,
        default: Date.now,
    },
}, { versionKey: false });

// 📊 Uniqueness is enforced by the indexes, not by a read-before-write
userSchema.index({ username: 1 }, { unique: true });
userSchema.index({ email: 1 }, { unique: true });

export const User = mongoose.model<UserDocument>(MODEL_NAMES.USER, userSchema, MODEL_NAMES.USER);
