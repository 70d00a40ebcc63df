import mongoose from "mongoose";
import { MODEL_NAMES } from "./names";

export interface FeedbackDocument {
    _id: number;
    user_id: number | null;
    rating: number;
    category: string;
    content: string;
    created_at: Date;
}

const feedbackSchema = new mongoose.Schema<FeedbackDocument>({
    _id: {
        type: Number,
        required: true,
    },
    user_id: {
        type: Number,
        ref: MODEL_NAMES.USER,
        default: null,
    },
    rating: {
        type: Number,
        required: true,
        min: 1,
        max: 5,
    },
    category: {
        type: String,
        required: true,
    },
    content: {
        type: String,
        default: "",
    },
    created_at: {
        type: Date,
        default: Date.now,
    },
}, { versionKey: false });

feedbackSchema.index({ user_id: 1, _id: 1 });

export const Feedback = mongoose.model<FeedbackDocument>(MODEL_NAMES.FEEDBACK, feedbackSchema, MODEL_NAMES.FEEDBACK);
