import mongoose from "mongoose";
import { MODEL_NAMES } from "./names";

/** One sequence per collection, keyed by collection name. */
export interface CounterDocument {
    _id: string;
    seq: number;
}

const counterSchema = new mongoose.Schema<CounterDocument>({
    _id: {
        type: String,
        required: true,
    },
    seq: {
        type: Number,
        default: 0,
    },
}, { versionKey: false });

export const Counter = mongoose.model<CounterDocument>(MODEL_NAMES.COUNTER, counterSchema, MODEL_NAMES.COUNTER);

/**
 * Atomically allocate the next integer id for a collection (first id is 1).
 */
export const nextSequence = async (name: string): Promise<number> => {
    const counter = await Counter.findOneAndUpdate(
        { _id: name },
        { $inc: { seq: 1 } },
        { new: true, upsert: true },
    ).lean();

    if (!counter) {
        throw new Error(`Failed to allocate id for ${name}`);
    }
    return counter.seq;
};
