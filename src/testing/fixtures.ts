// testing/fixtures.ts - shared builders for the test suites
import { loadKeys, type Keys } from "@configs/dotenv.config";
import { createContextFromGateway, type AppContext } from "@services/app-context";
import { MemoryRecordStore } from "@services/storage/memory-record.store";
import { PersistenceGateway } from "@services/storage/persistence.gateway";
import type { StorageMode } from "@services/storage/storage.types";

export const TEST_SECRET = "test-secret";

export const testKeys = (): Keys =>
    loadKeys({ JWT_SECRET: TEST_SECRET, BCRYPT_ROUNDS: "4", NODE_ENV: "test" });

/**
 * Context over an in-memory store. `mode` only changes how the gateway
 * reports itself, which is what the anonymous-access rules look at.
 */
export const createTestContext = (mode: StorageMode = "fallback"): AppContext =>
    createContextFromGateway(testKeys(), PersistenceGateway.withStore(mode, new MemoryRecordStore()));

/** 2026-01-15T10:00:00Z, a whole second so token maths stays exact. */
export const FIXED_NOW = Date.UTC(2026, 0, 15, 10, 0, 0);
