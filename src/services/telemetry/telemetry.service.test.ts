import { describe, expect, it } from "vitest";
import { MemoryRecordStore } from "@services/storage/memory-record.store";
import { PersistenceGateway } from "@services/storage/persistence.gateway";
import type { StorageMode } from "@services/storage/storage.types";
import { UnauthorizedError } from "@utils/errors.util";
import { TelemetryService, type Submitter } from "./telemetry.service";

const anonymous: Submitter = { kind: "anonymous" };
const page = { offset: 0, limit: 10 };

const setup = async (mode: StorageMode) => {
  const gateway = PersistenceGateway.withStore(mode, new MemoryRecordStore());
  const user = await gateway.createUser({
    username: "alice",
    email: "alice@example.com",
    password_hash: "hash",
    provider: null,
  });
  const owner: Submitter = { kind: "user", userId: user.id };
  return { service: new TelemetryService(gateway), owner };
};

describe("TelemetryService", () => {
  it("records the submitting user as owner", async () => {
    const { service, owner } = await setup("durable");

    const feedback = await service.submitFeedback(owner, { rating: 5, category: "speed", content: "" });

    expect(feedback.user_id).toBe(1);
    expect(service.storage).toBe("durable");
  });

  it("refuses anonymous access in durable mode", async () => {
    const { service } = await setup("durable");

    await expect(service.submitFeedback(anonymous, { rating: 5, category: "speed", content: "" })).rejects.toBeInstanceOf(
      UnauthorizedError,
    );
    await expect(service.listNetworkLogs(anonymous, page)).rejects.toBeInstanceOf(UnauthorizedError);
  });

  it("stores anonymous records without an owner in fallback mode and lists them unscoped", async () => {
    const { service, owner } = await setup("fallback");
    await service.submitNetworkLog(owner, {
      location: "Downtown",
      provider: "Airtel",
      quality_score: 70,
      latency_ms: 35,
      download_mbps: 12,
      upload_mbps: 3,
      signal_strength_dbm: -85,
    });
    const anonymousLog = await service.submitNetworkLog(anonymous, {
      location: "Downtown",
      provider: "Jio",
      quality_score: 60,
      latency_ms: 80,
      download_mbps: 6,
      upload_mbps: null,
      signal_strength_dbm: null,
    });

    const everything = await service.listNetworkLogs(anonymous, page);
    const own = await service.listNetworkLogs(owner, page);

    expect(anonymousLog.user_id).toBeNull();
    expect(everything.map((log) => log.provider)).toEqual(["Airtel", "Jio"]);
    expect(own.map((log) => log.provider)).toEqual(["Airtel"]);
  });
});
