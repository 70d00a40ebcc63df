// services/health.service.ts
import type { StorageMode } from "@services/storage/storage.types";
import type { PersistenceGateway } from "@services/storage/persistence.gateway";

export type HealthState = "healthy" | "degraded" | "unhealthy";

export interface HealthStatus {
  status: HealthState;
  timestamp: string;
  services: {
    database: { status: "connected" | "unreachable" | "not_in_use"; storage: StorageMode };
  };
  uptime: number;
}

export class HealthService {
  /**
   * Fallback mode is reported as degraded, a durable store that stops
   * answering as unhealthy.
   */
  static async getHealthStatus(gateway: PersistenceGateway, now: Date = new Date()): Promise<HealthStatus> {
    let status: HealthState = "degraded";
    let database: HealthStatus["services"]["database"]["status"] = "not_in_use";

    if (gateway.mode === "durable") {
      const reachable = await gateway.ping();
      status = reachable ? "healthy" : "unhealthy";
      database = reachable ? "connected" : "unreachable";
    }

    return {
      status,
      timestamp: now.toISOString(),
      services: {
        database: { status: database, storage: gateway.mode },
      },
      uptime: process.uptime(),
    };
  }
}
