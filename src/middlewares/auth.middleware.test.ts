import { describe, expect, it } from "vitest";
import { extractBearerToken } from "./auth.middleware";

describe("extractBearerToken", () => {
  it("distinguishes a missing header from a bad one", () => {
    expect(extractBearerToken(undefined)).toBeUndefined();
    expect(extractBearerToken("")).toBeNull();
  });

  it("accepts the bearer scheme in any case", () => {
    expect(extractBearerToken("Bearer abc.def.ghi")).toBe("abc.def.ghi");
    expect(extractBearerToken("bearer abc.def.ghi")).toBe("abc.def.ghi");
  });

  it("rejects other schemes and stray parts", () => {
    expect(extractBearerToken("Basic dXNlcjpwYXNz")).toBeNull();
    expect(extractBearerToken("Bearer")).toBeNull();
    expect(extractBearerToken("Bearer a b")).toBeNull();
  });
});
