// services/recommendation/recommendation.service.ts
import type { PersistenceGateway } from "@services/storage/persistence.gateway";
import type { NetworkLogRecord } from "types/records.types";

export interface Recommendation {
    provider: string;
    score: number;
    sample_count: number;
    average_quality: number;
}

/** Weight of the sample-count bonus: a provider gains this much per doubling of (n + 1). */
export const SAMPLE_WEIGHT = 5;

const round2 = (value: number) => Math.round(value * 100) / 100;

/**
 * score = average quality + SAMPLE_WEIGHT * log2(1 + samples).
 * Monotonic in both inputs; average quality dominates for small sample sets.
 */
export const scoreProvider = (averageQuality: number, sampleCount: number): number =>
    averageQuality + SAMPLE_WEIGHT * Math.log2(1 + sampleCount);

export const rankProviders = (logs: NetworkLogRecord[]): Recommendation[] => {
    const groups = new Map<string, { total: number; count: number }>();
    for (const log of logs) {
        const group = groups.get(log.provider) ?? { total: 0, count: 0 };
        group.total += log.quality_score;
        group.count += 1;
        groups.set(log.provider, group);
    }

    const ranked = [...groups.entries()].map(([provider, { total, count }]) => {
        const average = total / count;
        return { provider, average, count, score: scoreProvider(average, count) };
    });

    ranked.sort((a, b) => {
        if (b.score !== a.score) return b.score - a.score;
        if (a.provider === b.provider) return 0;
        return a.provider < b.provider ? -1 : 1;
    });

    return ranked.map(({ provider, average, count, score }) => ({
        provider,
        score: round2(score),
        sample_count: count,
        average_quality: round2(average),
    }));
};

export class RecommendationService {
    constructor(private readonly gateway: PersistenceGateway) {}

    /**
     * Providers for `location` (exact match), best first. Empty when no logs match.
     */
    async recommend(location: string): Promise<Recommendation[]> {
        const logs = await this.gateway.listNetworkLogsByLocation(location);
        return rankProviders(logs);
    }
}
