import { describe, expect, it, vi } from "vitest";
import { HealthService } from "./health.service";
import { MemoryRecordStore } from "./storage/memory-record.store";
import { PersistenceGateway } from "./storage/persistence.gateway";
import type { DurableBackend } from "./storage/storage.types";

const NOW = new Date("2026-01-15T10:00:00Z");

const durableGateway = (pingResult: boolean) => {
  const backend: DurableBackend = {
    probe: vi.fn(async () => true),
    createStore: () => new MemoryRecordStore(),
    ping: vi.fn(async () => pingResult),
    close: vi.fn(async () => undefined),
  };
  return PersistenceGateway.initialize(backend);
};

describe("HealthService", () => {
  it("is healthy when the durable store answers", async () => {
    const health = await HealthService.getHealthStatus(await durableGateway(true), NOW);

    expect(health.status).toBe("healthy");
    expect(health.timestamp).toBe("2026-01-15T10:00:00.000Z");
    expect(health.services.database).toEqual({ status: "connected", storage: "durable" });
  });

  it("is unhealthy when the durable store stops answering", async () => {
    const health = await HealthService.getHealthStatus(await durableGateway(false), NOW);

    expect(health.status).toBe("unhealthy");
    expect(health.services.database).toEqual({ status: "unreachable", storage: "durable" });
  });

  it("is degraded in fallback mode", async () => {
    const health = await HealthService.getHealthStatus(await PersistenceGateway.initialize(null), NOW);

    expect(health.status).toBe("degraded");
    expect(health.services.database).toEqual({ status: "not_in_use", storage: "fallback" });
  });
});
