import { describe, expect, it } from "vitest";
import { MemoryRecordStore } from "@services/storage/memory-record.store";
import { PersistenceGateway } from "@services/storage/persistence.gateway";
import type { NetworkLogRecord } from "types/records.types";
import { rankProviders, RecommendationService, scoreProvider } from "./recommendation.service";

const log = (provider: string, quality_score: number, location = "Downtown"): NetworkLogRecord => ({
  id: 0,
  user_id: null,
  location,
  provider,
  quality_score,
  latency_ms: 50,
  download_mbps: 20,
  upload_mbps: null,
  signal_strength_dbm: null,
  created_at: new Date("2026-01-15T10:00:00Z"),
});

describe("scoreProvider", () => {
  it("grows with both average quality and sample count", () => {
    expect(scoreProvider(90, 1)).toBeGreaterThan(scoreProvider(80, 1));
    expect(scoreProvider(80, 3)).toBeGreaterThan(scoreProvider(80, 1));
  });

  it("adds five points per doubling of samples + 1", () => {
    expect(scoreProvider(90, 1)).toBe(95);
    expect(scoreProvider(60, 3)).toBe(70);
  });
});

describe("rankProviders", () => {
  it("ranks a better single sample above a weaker pair", () => {
    const ranked = rankProviders([log("A", 80), log("A", 80), log("B", 90)]);

    expect(ranked).toEqual([
      { provider: "B", score: 95, sample_count: 1, average_quality: 90 },
      { provider: "A", score: 87.92, sample_count: 2, average_quality: 80 },
    ]);
  });

  it("breaks score ties by provider name", () => {
    const ranked = rankProviders([log("Zain", 70), log("Airtel", 70), log("Mtn", 70)]);

    expect(ranked.map((entry) => entry.provider)).toEqual(["Airtel", "Mtn", "Zain"]);
  });

  it("averages uneven samples", () => {
    const [only] = rankProviders([log("Jio", 70), log("Jio", 95), log("Jio", 60)]);

    expect(only).toEqual({ provider: "Jio", score: 85, sample_count: 3, average_quality: 75 });
  });

  it("returns an empty list for no logs", () => {
    expect(rankProviders([])).toEqual([]);
  });
});

describe("RecommendationService", () => {
  const seed = async () => {
    const gateway = PersistenceGateway.withStore("fallback", new MemoryRecordStore());
    for (const entry of [log("A", 80), log("A", 80), log("B", 90), log("C", 100, "Airport")]) {
      const { id: _id, created_at: _createdAt, ...fields } = entry;
      await gateway.createNetworkLog(fields);
    }
    return new RecommendationService(gateway);
  };

  it("only considers logs from the requested location", async () => {
    const service = await seed();

    const ranked = await service.recommend("Downtown");

    expect(ranked.map((entry) => entry.provider)).toEqual(["B", "A"]);
  });

  it("returns an empty list for a location nobody reported from", async () => {
    const service = await seed();

    expect(await service.recommend("Harbour")).toEqual([]);
  });
});
