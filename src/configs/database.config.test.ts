import mongoose from "mongoose";
import { afterEach, describe, expect, it, vi } from "vitest";
import { TEST_SECRET, testKeys } from "../testing/fixtures";
import { getDatabaseConfig, MongoBackend } from "./database.config";
import { loadKeys } from "./dotenv.config";

const MONGO_URI = "mongodb://db.invalid:27017";

const mongoKeys = () => loadKeys({ JWT_SECRET: TEST_SECRET, NODE_ENV: "test", MONGO_URI, MONGO_MAX_POOL_SIZE: "3" });

describe("getDatabaseConfig", () => {
  it("takes the URI, database name and pool size from the keys", () => {
    const { uri, options } = getDatabaseConfig(mongoKeys());

    expect(uri).toBe(MONGO_URI);
    expect(options).toMatchObject({ dbName: "qoe_boost", maxPoolSize: 3, serverSelectionTimeoutMS: 5000 });
  });
});

describe("MongoBackend", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("is not built without a MONGO_URI", () => {
    expect(MongoBackend.fromKeys(testKeys())).toBeNull();
  });

  it("reports a failed connection as false and releases the client", async () => {
    const connect = vi.spyOn(mongoose, "connect").mockRejectedValue(new Error("connection refused"));
    const disconnect = vi.spyOn(mongoose, "disconnect").mockResolvedValue(undefined);
    const backend = MongoBackend.fromKeys(mongoKeys());
    if (!backend) throw new Error("backend missing");

    expect(await backend.probe()).toBe(false);
    expect(connect).toHaveBeenCalledWith(MONGO_URI, expect.objectContaining({ dbName: "qoe_boost" }));
    expect(disconnect).toHaveBeenCalledTimes(1);
  });

  it("still reports false when releasing the client fails too", async () => {
    vi.spyOn(mongoose, "connect").mockRejectedValue(new Error("connection refused"));
    vi.spyOn(mongoose, "disconnect").mockRejectedValue(new Error("already closed"));
    const backend = MongoBackend.fromKeys(mongoKeys());
    if (!backend) throw new Error("backend missing");

    expect(await backend.probe()).toBe(false);
  });

  it("fails the ping before any successful probe", async () => {
    const backend = new MongoBackend(getDatabaseConfig(mongoKeys()));

    expect(await backend.ping()).toBe(false);
  });
});
